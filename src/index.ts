#!/usr/bin/env node
/**
 * workspace-reaper — revokes workspace access for accounts that are no
 * longer active in the corporate directory.
 *
 * Entry point: load configuration, wire components, optionally serve the
 * status API, and run the supervisor loop until SIGTERM/SIGINT.
 */

import { Server } from 'http';
import { CONFIG_ERROR_EXIT_CODE, ConfigEnv, ReaperConfig, configSecrets, loadConfig } from './config';
import { createReaperContext } from './context';
import { describeThrown, isReaperError } from './domain/errors';
import { logger, setLogLevel, setLogSecrets } from './logger';
import { StatusSource, createStatusApp } from './server';

/** Load configuration or terminate with the configuration exit status. */
export function loadConfigOrExit(env: ConfigEnv, exit: (code: number) => never = process.exit): ReaperConfig {
  try {
    return loadConfig(env);
  } catch (err) {
    if (isReaperError(err, 'CONFIG.INVALID')) {
      logger.error(err.message, { code: err.code, issues: err.typedError.details?.issues });
      return exit(CONFIG_ERROR_EXIT_CODE);
    }
    throw err;
  }
}

/**
 * Serve the status API. A listen failure (port in use, no permission) is a
 * deployment mistake: it is logged and the process exits with the
 * configuration status.
 */
export function serveStatus(source: StatusSource, port: number, exit: (code: number) => void = process.exit): Server {
  const server = createStatusApp(source).listen(port, () => {
    logger.info('Status API listening', { port });
  });
  server.on('error', (err: Error) => {
    logger.error('Status API failed to listen', { port, error: describeThrown(err) });
    exit(CONFIG_ERROR_EXIT_CODE);
  });
  return server;
}

export async function main(env: ConfigEnv = process.env): Promise<void> {
  const config = loadConfigOrExit(env);
  setLogLevel(config.logLevel);
  setLogSecrets(configSecrets(config));

  const { supervisor } = createReaperContext(config);

  let server: Server | undefined;
  if (config.statusPort !== undefined) {
    server = serveStatus(supervisor, config.statusPort);
  }

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info('Received signal, stopping after the current cycle', { signal });
    supervisor.stop();
    server?.close();
  };
  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);

  await supervisor.start();
}

if (require.main === module) {
  main().catch((err: unknown) => {
    logger.error('Fatal error', { error: describeThrown(err) });
    process.exit(1);
  });
}

// Public exports for programmatic use
export * from './domain';
export { loadConfig, CONFIG_ERROR_EXIT_CODE } from './config';
export type { ReaperConfig } from './config';
export { createReaperContext } from './context';
export { DirectoryEnumerator } from './directory/enumerator';
export { LdapDirectoryTransport } from './directory/ldap-transport';
export { PlatformInventory } from './platform/inventory';
export { SlackPlatformClient } from './platform/slack-client';
export { reconcile } from './engine/reconciler';
export { AccountRevoker } from './engine/revoker';
export { SupervisorLoop } from './engine/supervisor';
export { shouldEscalate } from './engine/escalation';
export { OwnerNotifier } from './notifications/owner-notifier';
export { createStatusApp } from './server';
