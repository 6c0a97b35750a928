import { promises as fs } from 'fs';
import * as path from 'path';
import { BootstrapDirective } from '../membership/types';
import { renderInitialCluster } from '../membership/Roster';
import { BootstrapLogger, createLogger } from '../common/logger';

/**
 * Render a systemd drop-in exposing the directive to the etcd unit
 */
export function renderDropIn(directive: BootstrapDirective): string {
  return [
    '[Service]',
    `Environment=ETCD_INITIAL_CLUSTER=${renderInitialCluster(directive)}`,
    `Environment=ETCD_INITIAL_CLUSTER_STATE=${directive.mode}`,
    ''
  ].join('\n');
}

/**
 * Persists a directive where the local process supervisor picks it up
 */
export interface DirectiveEmitter {
  write(directive: BootstrapDirective): Promise<string>;
}

export class DropInWriter implements DirectiveEmitter {
  private readonly logger: BootstrapLogger;

  constructor(
    private readonly filePath: string,
    logger?: BootstrapLogger
  ) {
    this.logger = logger ?? createLogger();
  }

  async write(directive: BootstrapDirective): Promise<string> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, renderDropIn(directive), 'utf8');
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to write drop-in file ${this.filePath}: ${errorMessage}`);
    }

    this.logger.bootstrap(`Wrote ${directive.mode} cluster drop-in to ${this.filePath}`);
    return this.filePath;
  }
}
