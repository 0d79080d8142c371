import EnrichmentEntryModel, { type IEnrichmentEntry } from '@src/models/EnrichmentEntry';
import type { EnrichmentEntry } from '@src/types/pipeline';
import type { EnrichmentStore } from '@src/types/stores';

export class EnrichmentEntryRepo implements EnrichmentStore {
  async get(fingerprint: string): Promise<EnrichmentEntry | null> {
    const doc = await EnrichmentEntryModel.findById(fingerprint).lean<IEnrichmentEntry>().exec();
    if (!doc) {
      return null;
    }
    return {
      fingerprint: doc._id,
      contact: doc.contact,
      fetchedAt: doc.fetchedAt,
      sourceBatchId: doc.sourceBatchId,
    };
  }

  /**
   * Whole-document replace: the newest fetch overwrites whatever was there.
   */
  async put(entry: EnrichmentEntry): Promise<void> {
    await EnrichmentEntryModel.replaceOne(
      { _id: entry.fingerprint },
      {
        _id: entry.fingerprint,
        contact: entry.contact,
        fetchedAt: entry.fetchedAt,
        sourceBatchId: entry.sourceBatchId,
      },
      { upsert: true },
    ).exec();
  }
}
