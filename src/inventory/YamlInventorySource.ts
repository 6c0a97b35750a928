import * as yaml from 'js-yaml';
import { promises as fs } from 'fs';
import { InventorySource, IN_SERVICE } from './types';
import { InventoryEntry } from '../membership/types';
import { InventoryError, describeCause } from '../common/errors';
import { BootstrapLogger, createLogger } from '../common/logger';

/**
 * Inventory loaded from a YAML file, re-read on every call:
 *
 *   members:
 *     - name: i-0abc            # stable node identifier
 *       address: 10.0.0.5       # private IP or hostname
 *       lifecycle_state: InService
 *
 * Only InService nodes (the default) are expected members.
 */
export class YamlInventorySource implements InventorySource {
  private readonly logger: BootstrapLogger;

  constructor(
    private readonly filePath: string,
    logger?: BootstrapLogger
  ) {
    this.logger = logger ?? createLogger();
  }

  async listEntries(): Promise<InventoryEntry[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      throw new InventoryError(`Failed to read inventory from ${this.filePath}: ${describeCause(error)}`, error);
    }

    const entries = parseInventory(content);
    const inService: InventoryEntry[] = [];
    for (const entry of entries) {
      if (entry.lifecycleState === IN_SERVICE) {
        this.logger.inventory(`Found instance ${entry.name} at ${entry.address}`);
        inService.push(entry);
      } else {
        this.logger.inventory(`Ignoring instance ${entry.name} (${entry.lifecycleState})`);
      }
    }
    return inService;
  }
}

/**
 * Parse and validate an inventory document. Names must be unique.
 */
export function parseInventory(content: string): InventoryEntry[] {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new InventoryError(`Failed to parse inventory YAML: ${describeCause(error)}`, error);
  }

  if (typeof parsed !== 'object' || parsed === null || !('members' in parsed) || !Array.isArray(parsed.members)) {
    throw new InventoryError('inventory.members array is required');
  }

  const seen = new Set<string>();
  return parsed.members.map((raw: unknown, index: number): InventoryEntry => {
    if (typeof raw !== 'object' || raw === null) {
      throw new InventoryError(`inventory.members[${index}] must be a mapping`);
    }
    const name = 'name' in raw ? raw.name : undefined;
    const address = 'address' in raw ? raw.address : undefined;
    const state = 'lifecycle_state' in raw ? raw.lifecycle_state : undefined;

    if (typeof name !== 'string' || name.length === 0) {
      throw new InventoryError(`inventory.members[${index}].name is required`);
    }
    if (typeof address !== 'string' || address.length === 0) {
      throw new InventoryError(`inventory.members[${index}].address is required`);
    }
    if (state !== undefined && typeof state !== 'string') {
      throw new InventoryError(`inventory.members[${index}].lifecycle_state must be a string`);
    }
    if (seen.has(name)) {
      throw new InventoryError(`Duplicate inventory member name "${name}"`);
    }
    seen.add(name);

    return { name, address, lifecycleState: state ?? IN_SERVICE };
  });
}

/**
 * In-memory inventory, mostly for library callers and tests
 */
export class StaticInventorySource implements InventorySource {
  constructor(private readonly entries: InventoryEntry[]) {}

  async listEntries(): Promise<InventoryEntry[]> {
    return this.entries.filter(entry => (entry.lifecycleState ?? IN_SERVICE) === IN_SERVICE);
  }
}
