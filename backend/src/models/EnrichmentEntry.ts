import mongoose, { Schema } from 'mongoose';

import type { ContactMetadata } from '@src/types/pipeline';

/**
 * Purchased skip-trace result. `_id` is the property-address fingerprint, so
 * there is exactly one entry per property across all owners.
 */
export interface IEnrichmentEntry {
  _id: string;
  contact: ContactMetadata;
  fetchedAt: Date;
  sourceBatchId: string;
}

const EnrichmentEntrySchema = new Schema<IEnrichmentEntry>({
  _id: { type: String, required: true },
  contact: { type: Schema.Types.Mixed, required: true },
  fetchedAt: { type: Date, required: true },
  sourceBatchId: { type: String, required: true },
}, {
  minimize: false,
});

export const EnrichmentEntryModel = mongoose.model<IEnrichmentEntry>('EnrichmentEntry', EnrichmentEntrySchema);

export default EnrichmentEntryModel;
