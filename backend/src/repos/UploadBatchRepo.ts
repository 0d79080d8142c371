import UploadBatch, { type IUploadBatch } from '@src/models/UploadBatch';
import type {
  BatchStatus,
  NewUploadBatch,
  UploadBatch as UploadBatchRecord,
  UploadBatchPatch,
} from '@src/types/pipeline';
import type { BatchStore } from '@src/types/stores';
import { toUpdate } from './updates';

function toBatch(doc: IUploadBatch): UploadBatchRecord {
  return {
    id: doc._id,
    ownerId: doc.ownerId,
    originalName: doc.originalName,
    rawRef: doc.rawRef,
    hasHeaderRow: doc.hasHeaderRow,
    mapping: doc.mapping.map((column) => ({
      columnIndex: column.columnIndex,
      header: column.header,
      samples: [...column.samples],
      field: column.field,
      match: column.match,
      needsReview: column.needsReview,
      conflictsWith: column.conflictsWith ?? undefined,
    })),
    mappingConfirmedAt: doc.mappingConfirmedAt,
    refreshPolicy: doc.refreshPolicy,
    tags: [...doc.tags],
    status: doc.status,
    totalCount: doc.totalCount,
    cancelRequested: doc.cancelRequested,
    processingStartedAt: doc.processingStartedAt,
    completedAt: doc.completedAt,
    lastError: doc.lastError,
    runnerId: doc.runnerId,
    leaseUntil: doc.leaseUntil,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export class UploadBatchRepo implements BatchStore {
  async create(batch: NewUploadBatch): Promise<UploadBatchRecord> {
    const { id, ...fields } = batch;
    await UploadBatch.create({ _id: id, ...fields });
    const created = await this.get(id);
    if (!created) {
      throw new Error(`Upload ${id} was not stored`);
    }
    return created;
  }

  async get(id: string): Promise<UploadBatchRecord | null> {
    const doc = await UploadBatch.findById(id).lean<IUploadBatch>().exec();
    return doc ? toBatch(doc) : null;
  }

  async update(id: string, patch: UploadBatchPatch): Promise<UploadBatchRecord | null> {
    const doc = await UploadBatch
      .findByIdAndUpdate(id, toUpdate(patch), { new: true })
      .lean<IUploadBatch>()
      .exec();
    return doc ? toBatch(doc) : null;
  }

  async listByStatus(status: BatchStatus): Promise<UploadBatchRecord[]> {
    const docs = await UploadBatch.find({ status }).sort({ updatedAt: 1 }).lean<IUploadBatch[]>().exec();
    return docs.map(toBatch);
  }

  async delete(id: string): Promise<void> {
    await UploadBatch.deleteOne({ _id: id }).exec();
  }

  async claimLease(id: string, runnerId: string, leaseUntil: Date, now: Date): Promise<UploadBatchRecord | null> {
    // Single conditional write, so two processes cannot both win
    const doc = await UploadBatch
      .findOneAndUpdate(
        {
          _id: id,
          $or: [
            { leaseUntil: null }, // also matches a missing field
            { leaseUntil: { $lte: now } },
            { runnerId },
          ],
        },
        { $set: { runnerId, leaseUntil } },
        { new: true },
      )
      .lean<IUploadBatch>()
      .exec();
    return doc ? toBatch(doc) : null;
  }

  async renewLease(id: string, runnerId: string, leaseUntil: Date): Promise<boolean> {
    const result = await UploadBatch.updateOne({ _id: id, runnerId }, { $set: { leaseUntil } }).exec();
    return result.matchedCount > 0;
  }

  async releaseLease(id: string, runnerId: string, patch: UploadBatchPatch): Promise<UploadBatchRecord | null> {
    const doc = await UploadBatch
      .findOneAndUpdate(
        { _id: id, runnerId },
        toUpdate({ ...patch, runnerId: undefined, leaseUntil: undefined }),
        { new: true },
      )
      .lean<IUploadBatch>()
      .exec();
    return doc ? toBatch(doc) : null;
  }
}
