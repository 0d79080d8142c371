import mongoose, { Schema } from 'mongoose';

import { MAPPING_TARGETS, SKIP } from '@src/common/constants/CanonicalSchema';
import type { BatchStatus, ColumnMapping, RefreshPolicy } from '@src/types/pipeline';

export interface IUploadBatch {
  _id: string;
  ownerId: string;
  originalName: string;
  rawRef: string;
  hasHeaderRow: boolean;
  mapping: ColumnMapping[];
  mappingConfirmedAt?: Date;
  refreshPolicy: RefreshPolicy;
  tags: string[];
  status: BatchStatus;
  totalCount: number;
  cancelRequested: boolean;
  processingStartedAt?: Date;
  completedAt?: Date;
  lastError?: string;
  runnerId?: string;
  leaseUntil?: Date;
  createdAt: Date;
  updatedAt: Date;
}

const ColumnMappingSchema = new Schema<ColumnMapping>({
  columnIndex: { type: Number, required: true },
  header: { type: String, default: '' },
  samples: { type: [String], default: [] },
  field: { type: String, enum: [...MAPPING_TARGETS], default: SKIP },
  match: { type: String, enum: ['exact', 'alternate', 'none'], default: 'none' },
  needsReview: { type: Boolean, default: false },
  conflictsWith: { type: Number },
}, { _id: false });

const UploadBatchSchema = new Schema<IUploadBatch>({
  _id: { type: String, required: true },
  ownerId: { type: String, required: true, index: true },
  originalName: { type: String, default: '' },
  rawRef: { type: String, required: true },
  hasHeaderRow: { type: Boolean, default: true },
  mapping: { type: [ColumnMappingSchema], default: [] },
  mappingConfirmedAt: { type: Date },
  refreshPolicy: {
    type: String,
    enum: ['prefer_cache', 'force_refresh'],
    default: 'prefer_cache',
  },
  tags: { type: [String], default: [] },
  status: {
    type: String,
    enum: ['mapping', 'processing', 'completed', 'failed_partial'],
    default: 'mapping',
    index: true,
  },
  totalCount: { type: Number, default: 0 },
  cancelRequested: { type: Boolean, default: false },
  processingStartedAt: { type: Date },
  completedAt: { type: Date },
  lastError: { type: String },
  runnerId: { type: String },
  leaseUntil: { type: Date },
}, {
  timestamps: true,
});

// Resume script scans by status, lease and age
UploadBatchSchema.index({ status: 1, leaseUntil: 1, updatedAt: 1 });

export const UploadBatch = mongoose.model<IUploadBatch>('UploadBatch', UploadBatchSchema);

export default UploadBatch;
