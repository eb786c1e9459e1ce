/**
 * CLI Auth Commands
 *
 * `mybooks-mcp auth` runs the whole authorization:
 * 1. Probe the MCP server and discover its authorization server
 * 2. Sign the user in first when registration requires it
 * 3. Register this application (once)
 * 4. Open the browser on the authorize URL
 * 5. Receive the callback on the loopback port and store the tokens
 */

import type { FlowName } from '../core/oauth/types.js';
import type { CallbackResult } from '../core/session.js';
import { isAuthorized, isRegistered } from '../core/storage/credentials.js';
import { createCallbackApp, type CallbackApp } from './callback-server.js';
import type { CliConfig } from './config.js';
import { createCliSession, probeServer, resolveDeps, type CliDeps, type ResolvedDeps } from './context.js';

async function openAndWait(
  url: string,
  expected: FlowName,
  callback: CallbackApp,
  deps: ResolvedDeps
): Promise<CallbackResult> {
  console.log('\nOpening browser for authorization...');
  await deps.openUrl(url);

  console.log('Waiting for authorization...');
  console.log('(Press Ctrl+C to cancel)\n');

  for (;;) {
    const result = await callback.next(deps.callbackTimeoutMs);
    if (result.flow === expected) {
      return result;
    }
    deps.logger.warn(`Ignoring callback for the ${result.flow} flow while waiting for ${expected}`);
  }
}

export async function runAuth(config: CliConfig, options: { force?: boolean } = {}, cliDeps: CliDeps = {}): Promise<void> {
  const deps = resolveDeps(cliDeps);
  const { session, stores } = createCliSession(config, deps);

  console.log('\n🔐 MyBooks MCP Authorization\n');

  const existing = await session.loadCredentials();
  if (isAuthorized(existing)) {
    if (!options.force) {
      console.log('You are already authorized.');
      console.log(`Credentials stored at: ${stores.credentials.path}`);
      console.log('\nTo re-authorize, run: mybooks-mcp auth --force\n');
      return;
    }
    console.log('Clearing existing authorization...');
    await session.resetAuthorization();
  }

  const probe = await probeServer(config, deps);
  if (probe?.status === 'ok') {
    console.log(`${config.serverUrl} accepted an unauthenticated request; no authorization is needed.\n`);
    return;
  }

  const metadata = await session.getMetadata(
    probe?.status === 'unauthorized' ? { unauthorized: probe.challenge } : {}
  );
  deps.logger.info(`Authorization server: ${metadata.authorizationServer.issuer}`);

  const callback = createCallbackApp(config.callbackPath, (params) => session.handleCallback(params), deps.logger);
  const listener = await deps.serve(callback.app, config.callbackPort, config.callbackHost);
  deps.logger.info(`Listening on ${config.redirectUri}`);

  try {
    let credentials = await session.loadCredentials();
    if (!isRegistered(credentials)) {
      if (config.registrationRequiresAuth && !credentials.userAccessToken) {
        console.log('Client registration requires signing in first.');
        await openAndWait(await session.beginUserLogin(), 'user_login', callback, deps);
      }
      console.log('Registering this application with the authorization server...');
      credentials = await session.register();
      console.log(`Registered client: ${credentials.clientId ?? ''}`);
    }

    await openAndWait(await session.beginAuthorization(), 'app_authorize', callback, deps);
  } finally {
    await listener.close();
  }

  console.log('\n✅ Authorization successful!');
  console.log(`Credentials saved to: ${stores.credentials.path}`);
  console.log('\nRun `mybooks-mcp tools` to list the tools you can now use.\n');
}

export async function runLogout(config: CliConfig, options: { all?: boolean } = {}, cliDeps: CliDeps = {}): Promise<void> {
  const deps = resolveDeps(cliDeps);
  const { session, stores } = createCliSession(config, deps);

  console.log('\n🔓 MyBooks MCP Logout\n');

  const status = await session.status();
  const hasTokens = status.authorized || status.userSignedIn || status.pendingFlows.length > 0;
  if (!hasTokens && !(options.all && status.registered)) {
    console.log('You are not signed in.\n');
    return;
  }

  await session.signOut({ keepRegistration: !options.all });
  console.log('✅ Successfully logged out.');
  if (options.all) {
    console.log(`Removed credentials from: ${stores.credentials.path}\n`);
  } else if (status.registered) {
    console.log(`Kept client registration ${status.clientId ?? ''}; use --all to remove it.\n`);
  }
}

export async function runStatus(config: CliConfig, cliDeps: CliDeps = {}): Promise<void> {
  const deps = resolveDeps(cliDeps);
  const { session, stores } = createCliSession(config, deps);

  console.log('\n📊 MyBooks MCP Status\n');

  const status = await session.status();
  console.log(`Server: ${status.serverUrl}`);
  console.log(`Profile: ${config.profile}`);

  if (!status.registered) {
    console.log('Registration: Not registered');
  } else {
    console.log(`Registration: ${status.clientId ?? ''}${status.clientName ? ` (${status.clientName})` : ''}`);
  }

  if (!status.authorized) {
    console.log('Status: Not authorized');
    console.log('\nRun `mybooks-mcp auth` to authorize.\n');
    return;
  }

  console.log('Status: Authorized');
  console.log(`Access token: ${status.accessToken}`);
  console.log(`Refresh token: ${status.refreshToken}`);
  if (status.userSignedIn) {
    console.log('User sign-in: yes');
  }
  if (status.pendingFlows.length > 0) {
    console.log(`Pending flows: ${status.pendingFlows.join(', ')}`);
  }
  if (status.updatedAt) {
    console.log(`Updated at: ${status.updatedAt}`);
  }
  console.log(`Credentials file: ${stores.credentials.path}\n`);
}
