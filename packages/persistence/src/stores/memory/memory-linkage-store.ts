/**
 * In-memory linkage store
 *
 * WARNING: linkages are lost on restart. Use Redis (or an external
 * database behind LinkageStore) for anything but development and tests.
 */

import type { LinkageStore } from '../../interfaces/linkage-store.js';
import type { Linkage, LinkageInput } from '../../types.js';
import { logger } from '../../logger.js';

export class MemoryLinkageStore implements LinkageStore {
  private readonly linkages = new Map<string, Linkage>();

  async getByRequester(requesterId: string): Promise<Linkage | null> {
    return this.linkages.get(requesterId) ?? null;
  }

  async upsert(input: LinkageInput): Promise<Linkage> {
    const linkage: Linkage = {
      requesterId: input.requesterId,
      externalId: input.externalId,
      externalDisplayName: input.externalDisplayName,
      linkedAt: new Date().toISOString()
    };
    const replaced = this.linkages.has(input.requesterId);
    this.linkages.set(input.requesterId, linkage);

    logger.info(replaced ? 'Linkage updated' : 'Linkage created', {
      requesterId: input.requesterId,
      externalId: input.externalId
    });
    return linkage;
  }

  async delete(requesterId: string): Promise<boolean> {
    const existed = this.linkages.delete(requesterId);
    if (existed) {
      logger.info('Linkage deleted', { requesterId });
    }
    return existed;
  }

  get size(): number {
    return this.linkages.size;
  }

  dispose(): void {
    this.linkages.clear();
  }
}
