/**
 * Member-management API contract the reconciler drives
 */

import { Member } from '../membership/types';

export interface IMemberAdminClient {
  /**
   * Probe `{clientURL}/health`. Resolves false on any transport failure,
   * non-2xx status or payload not asserting health; never rejects.
   */
  checkHealth(member: Member): Promise<boolean>;

  /**
   * Probe candidates in order and resolve the first healthy one.
   * Rejects with NoHealthyMemberError when none answer healthy.
   */
  findHealthyMember(candidates: ReadonlyArray<Member>): Promise<Member>;

  listMembers(adminEndpoint: Member): Promise<Member[]>;

  addMember(adminEndpoint: Member, newMember: Member): Promise<void>;

  /**
   * Remove by cluster-assigned `id`, resolved from a prior listMembers call
   */
  removeMember(adminEndpoint: Member, victim: Member): Promise<void>;
}

/**
 * Wire shape of one element of `GET /members`
 */
export interface MemberPayload {
  id: string;
  name: string;
  clientURLs: string[];
  peerURLs: string[];
}

export interface TlsMaterial {
  ca?: Buffer;
  cert?: Buffer;
  key?: Buffer;
}
