import { EtcdAdminClient } from '../admin/EtcdAdminClient';
import { IMemberAdminClient } from '../admin/types';
import { BootstrapperConfig } from '../config/BootstrapperConfiguration';
import { ConfigurationError } from '../common/errors';
import { BootstrapLogger, createLogger } from '../common/logger';
import { Ec2MetadataIdentitySource, StaticIdentitySource } from '../inventory/IdentitySources';
import { IdentitySource, InventorySource } from '../inventory/types';
import { YamlInventorySource } from '../inventory/YamlInventorySource';
import { deriveExpectedRoster } from '../membership/Roster';
import { MemberUrlConfig } from '../membership/types';
import { MembershipReconciler, ReconciliationResult } from '../reconciliation/MembershipReconciler';
import { DirectiveEmitter, DropInWriter } from './DropInWriter';

export interface BootstrapperDependencies {
  inventory: InventorySource;
  identity: IdentitySource;
  client: IMemberAdminClient;
  emitter: DirectiveEmitter;
  urls: MemberUrlConfig;
  logger?: BootstrapLogger;
}

/**
 * One bootstrap run: inventory -> expected roster -> reconcile -> emit.
 * Nothing is emitted when reconciliation fails.
 */
export class Bootstrapper {
  private readonly logger: BootstrapLogger;
  private readonly reconciler: MembershipReconciler;

  constructor(private readonly deps: BootstrapperDependencies) {
    this.logger = deps.logger ?? createLogger();
    this.reconciler = new MembershipReconciler(deps.client, { logger: this.logger });
  }

  getReconciler(): MembershipReconciler {
    return this.reconciler;
  }

  async run(): Promise<ReconciliationResult> {
    const localName = await this.deps.identity.getLocalName();
    const entries = await this.deps.inventory.listEntries();
    const expected = deriveExpectedRoster(entries, this.deps.urls);
    this.logger.inventory(`Expected members: ${expected.map(m => `${m.name}=${m.clientURL}`).join(', ') || '<none>'}`);

    const result = await this.reconciler.reconcile(expected, localName);
    await this.deps.emitter.write(result.directive);
    return result;
  }
}

/**
 * Wire the production collaborators from a resolved configuration
 */
export async function createBootstrapper(config: BootstrapperConfig, logger: BootstrapLogger = createLogger()): Promise<Bootstrapper> {
  if (!config.inventoryFile) {
    throw new ConfigurationError('inventory-file is required');
  }

  const client = await EtcdAdminClient.fromFiles(config.tls, {
    timeout: config.timeoutMs,
    adminPathPrefix: config.adminPathPrefix,
    logger
  });

  const identity: IdentitySource = config.localName
    ? new StaticIdentitySource(config.localName)
    : new Ec2MetadataIdentitySource({ endpoint: config.metadataEndpoint, timeout: config.timeoutMs, logger });

  return new Bootstrapper({
    inventory: new YamlInventorySource(config.inventoryFile, logger),
    identity,
    client,
    emitter: new DropInWriter(config.dropInFile, logger),
    urls: config.urls,
    logger
  });
}
