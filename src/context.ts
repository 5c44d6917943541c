/**
 * Dependency wiring.
 *
 * Builds every component from the frozen configuration. Transports can be
 * replaced, which is how tests run whole cycles against in-memory fakes.
 */

import { ReaperConfig, configSecrets } from './config';
import { DirectoryEnumerator } from './directory/enumerator';
import { LdapDirectoryTransport } from './directory/ldap-transport';
import { DirectoryTransport } from './directory/transport';
import { AccountRevoker } from './engine/revoker';
import { SupervisorLoop, SupervisorOptions } from './engine/supervisor';
import { Logger, logger as rootLogger } from './logger';
import { OwnerNotifier } from './notifications/owner-notifier';
import { PlatformClient } from './platform/client';
import { PlatformInventory } from './platform/inventory';
import { SlackPlatformClient } from './platform/slack-client';

/** Application context containing all components. */
export interface ReaperContext {
  config: ReaperConfig;
  platformClient: PlatformClient;
  directoryTransport: DirectoryTransport;
  inventory: PlatformInventory;
  enumerator: DirectoryEnumerator;
  notifier: OwnerNotifier;
  revoker: AccountRevoker;
  supervisor: SupervisorLoop;
}

export interface ReaperContextOverrides {
  platformClient?: PlatformClient;
  directoryTransport?: DirectoryTransport;
  sleep?: SupervisorOptions['sleep'];
  logger?: Logger;
}

export function createReaperContext(config: ReaperConfig, overrides: ReaperContextOverrides = {}): ReaperContext {
  const logger = overrides.logger ?? rootLogger;

  const platformClient =
    overrides.platformClient ??
    new SlackPlatformClient({
      token: config.platform.token,
      apiUrl: config.platform.apiUrl,
      workspaceUrl: config.platform.workspaceUrl,
      logger,
    });

  const directoryTransport =
    overrides.directoryTransport ??
    new LdapDirectoryTransport({
      url: config.directory.url,
      baseDn: config.directory.baseDn,
      bindDn: config.directory.bindDn,
      bindPassword: config.directory.bindPassword,
      searchFilter: config.directory.searchFilter,
      searchAttributes: config.directory.searchAttributes,
      pageSize: config.directory.pageSize,
      logger,
    });

  const inventory = new PlatformInventory(platformClient, { listingMode: config.platform.listingMode, logger });
  const enumerator = new DirectoryEnumerator(directoryTransport, { emailAttribute: config.directory.emailAttribute, logger });
  const notifier = new OwnerNotifier(platformClient, config.notification, logger);
  const revoker = new AccountRevoker(platformClient, notifier, config.platform.revokeMode, logger);
  const supervisor = new SupervisorLoop(
    { inventory, enumerator, revoker, notifier },
    {
      intervalMs: config.intervalMs,
      maxDeleteFailsafe: config.maxDeleteFailsafe,
      botEmailSuffix: config.platform.botEmailSuffix,
      secrets: configSecrets(config),
      sleep: overrides.sleep,
      logger,
    },
  );

  return { config, platformClient, directoryTransport, inventory, enumerator, notifier, revoker, supervisor };
}
