import { InventoryEntry } from '../membership/types';

/**
 * Supplies the nodes that should belong to the cluster
 */
export interface InventorySource {
  listEntries(): Promise<InventoryEntry[]>;
}

/**
 * Supplies the local node's stable name
 */
export interface IdentitySource {
  getLocalName(): Promise<string>;
}

export const IN_SERVICE = 'InService';
