import mongoose, { Schema } from 'mongoose';

import type { RecordProgress } from '@src/types/pipeline';

export type IRecordProgress = RecordProgress;

const RecordProgressSchema = new Schema<IRecordProgress>({
  batchId: { type: String, required: true },
  rowNumber: { type: Number, required: true },
  record: { type: Schema.Types.Mixed },
  issue: { type: Schema.Types.Mixed },
  duplicateOfRow: { type: Number },
  enrichment: { type: Schema.Types.Mixed },
  litigator: { type: Schema.Types.Mixed },
  result: {
    type: String,
    enum: ['enriched_from_cache', 'enriched_fresh', 'matched_litigator', 'skipped_invalid', 'failed_external'],
  },
  failure: { type: Schema.Types.Mixed },
  tagStatus: { type: String, enum: ['applied', 'skipped', 'failed'] },
}, {
  timestamps: true,
});

RecordProgressSchema.index({ batchId: 1, rowNumber: 1 }, { unique: true });

export const RecordProgressModel = mongoose.model<IRecordProgress>('RecordProgress', RecordProgressSchema);

export default RecordProgressModel;
