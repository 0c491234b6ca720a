/**
 * Linkage store interface
 *
 * One linkage per requester, created or refreshed by upsert.
 */

import type { Linkage, LinkageInput } from '../types.js';

export interface LinkageStore {
  getByRequester(requesterId: string): Promise<Linkage | null>;

  /**
   * Create or replace the requester's linkage; `linkedAt` is set to now
   */
  upsert(linkage: LinkageInput): Promise<Linkage>;

  /**
   * @returns false when the requester had no linkage
   */
  delete(requesterId: string): Promise<boolean>;

  dispose(): void;
}
