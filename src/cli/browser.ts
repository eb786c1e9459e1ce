/**
 * Open a URL in the user's browser, or print it when no opener works.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

function openers(url: string): Array<[string, string[]]> {
  switch (process.platform) {
    case 'darwin':
      return [['open', [url]]];
    case 'win32':
      return [['rundll32', ['url.dll,FileProtocolHandler', url]]];
    default:
      // Linux / WSL
      return [
        ['xdg-open', [url]],
        ['sensible-browser', [url]],
        ['wslview', [url]],
      ];
  }
}

export async function openBrowser(url: string): Promise<boolean> {
  for (const [command, args] of openers(url)) {
    try {
      await execFileAsync(command, args);
      return true;
    } catch {
      // try the next opener
    }
  }
  console.log(`\nPlease open this URL in your browser:\n${url}\n`);
  return false;
}
