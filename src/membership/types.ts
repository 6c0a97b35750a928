/**
 * Core data model for cluster membership reconciliation
 */

/**
 * One node participating in (or intended to participate in) the cluster.
 *
 * `name` is the join key between the expected and the actual roster.
 * `id` is assigned by the cluster on admission and is absent for entries
 * that only exist in the expected roster.
 */
export interface Member {
  id?: string;
  name: string;
  clientURL: string;
  peerURL: string;
}

/**
 * Ordered point-in-time view of the cluster. Names are unique.
 */
export type Roster = ReadonlyArray<Member>;

export type BootstrapMode = 'new' | 'existing';

/**
 * Output of a reconciliation run. The peer list always reflects the
 * expected roster, never the post-reconciliation live state.
 */
export interface BootstrapDirective {
  initialCluster: string[];
  mode: BootstrapMode;
}

/**
 * How inventory addresses become member URLs
 */
export interface MemberUrlConfig {
  clientSchema: UrlSchema;
  clientPort: number;
  peerSchema: UrlSchema;
  peerPort: number;
}

export type UrlSchema = 'http' | 'https';

export const URL_SCHEMAS: readonly UrlSchema[] = ['http', 'https'];

export const DEFAULT_URL_CONFIG: MemberUrlConfig = {
  clientSchema: 'http',
  clientPort: 2379,
  peerSchema: 'http',
  peerPort: 2380
};

/**
 * A node reported by the inventory source
 */
export interface InventoryEntry {
  name: string;
  address: string;
  lifecycleState?: string;
}
