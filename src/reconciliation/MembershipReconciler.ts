/**
 * Membership reconciliation engine.
 *
 * Probes the expected roster for a live member, lists that member's view of
 * the cluster, prunes stale members, admits the local node, and derives the
 * bootstrap directive. Every run re-derives everything from scratch, so it is
 * safe to invoke on each boot.
 */

import { EventEmitter } from 'events';
import { IMemberAdminClient } from '../admin/types';
import { BootstrapDirective, Member, Roster } from '../membership/types';
import { assertUniqueNames, createDirective, findByName, staleMembers } from '../membership/Roster';
import { ConfigurationError, describeCause } from '../common/errors';
import { BootstrapLogger, createLogger } from '../common/logger';

export type ReconcilerState =
  | 'start'
  | 'probe-existing'
  | 'fetch-actual'
  | 'prune-stale'
  | 'ensure-self'
  | 'bootstrap-new'
  | 'bootstrap-existing';

export interface ReconcilerOptions {
  logger?: BootstrapLogger;
}

export interface ReconciliationResult {
  directive: BootstrapDirective;
  /** Member whose admin endpoint was used; absent for `new` outcomes */
  adminMember?: Member;
  removed: Member[];
  added?: Member;
  /** Why the run fell back to a `new` cluster */
  degradedReason?: string;
}

export class MembershipReconciler extends EventEmitter {
  private readonly logger: BootstrapLogger;
  private state: ReconcilerState = 'start';

  constructor(
    private readonly client: IMemberAdminClient,
    options: ReconcilerOptions = {}
  ) {
    super();
    this.logger = options.logger ?? createLogger();
  }

  getState(): ReconcilerState {
    return this.state;
  }

  /**
   * Reconcile the live cluster against `expected` for the node named `localName`.
   *
   * Resolves with mode `new` when no member can be found or listed. Once a
   * member list is in hand, rejects with ConfigurationError when the local
   * node is not in the roster (before any removal), and with
   * AdminRequestFailedError when a removal or the self-admission fails; the
   * first failed removal aborts the run.
   */
  async reconcile(expected: Roster, localName: string): Promise<ReconciliationResult> {
    this.transition('start');
    assertUniqueNames(expected, 'expected roster');

    this.transition('probe-existing');
    let adminMember: Member;
    try {
      adminMember = await this.client.findHealthyMember(expected);
    } catch (error) {
      return this.bootstrapNew(expected, describeCause(error));
    }
    this.emit('member-healthy', { member: adminMember });

    this.transition('fetch-actual');
    let actual: Member[];
    try {
      actual = await this.client.listMembers(adminMember);
    } catch (error) {
      return this.bootstrapNew(expected, describeCause(error));
    }

    // Must fail before the prune loop issues any mutation
    const myself = findByName(expected, localName);
    if (!myself) {
      throw new ConfigurationError(`Couldn't find local node "${localName}" in expected members`);
    }

    this.transition('prune-stale');
    const removed: Member[] = [];
    for (const stale of staleMembers(expected, actual)) {
      this.logger.reconciler(`Member ${stale.name || '<unstarted>'} (${stale.id ?? 'no id'}) is not expected, removing`);
      await this.client.removeMember(adminMember, stale);
      removed.push(stale);
      this.emit('member-removed', { member: stale });
    }

    this.transition('ensure-self');
    let added: Member | undefined;
    if (findByName(actual, myself.name)) {
      this.logger.reconciler(`Local node ${myself.name} is already a member`);
    } else {
      await this.client.addMember(adminMember, myself);
      added = myself;
      this.emit('member-added', { member: myself });
    }

    this.transition('bootstrap-existing');
    const directive = createDirective(expected, 'existing');
    this.emit('directive', directive);
    return { directive, adminMember, removed, added };
  }

  private bootstrapNew(expected: Roster, reason: string): ReconciliationResult {
    this.transition('bootstrap-new');
    this.logger.reconciler(`Assuming a new cluster: ${reason}`);
    this.emit('degraded-to-new', { reason });

    const directive = createDirective(expected, 'new');
    this.emit('directive', directive);
    return { directive, removed: [], degradedReason: reason };
  }

  private transition(next: ReconcilerState): void {
    this.logger.debug(`Reconciler ${this.state} -> ${next}`);
    this.state = next;
  }
}
