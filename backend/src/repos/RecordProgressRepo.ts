import RecordProgressModel, { type IRecordProgress } from '@src/models/RecordProgress';
import type { RecordProgress } from '@src/types/pipeline';
import type { RecordProgressStore } from '@src/types/stores';
import { compact } from './updates';

function toProgress(doc: IRecordProgress): RecordProgress {
  return {
    batchId: doc.batchId,
    rowNumber: doc.rowNumber,
    record: doc.record,
    issue: doc.issue,
    duplicateOfRow: doc.duplicateOfRow ?? undefined,
    enrichment: doc.enrichment,
    litigator: doc.litigator,
    result: doc.result,
    failure: doc.failure,
    tagStatus: doc.tagStatus,
  };
}

export class RecordProgressRepo implements RecordProgressStore {
  async list(batchId: string): Promise<RecordProgress[]> {
    const docs = await RecordProgressModel.find({ batchId }).sort({ rowNumber: 1 }).lean<IRecordProgress[]>().exec();
    return docs.map(toProgress);
  }

  async save(progress: RecordProgress): Promise<void> {
    await RecordProgressModel.replaceOne(
      { batchId: progress.batchId, rowNumber: progress.rowNumber },
      compact(progress),
      { upsert: true },
    ).exec();
  }

  async deleteBatch(batchId: string): Promise<void> {
    await RecordProgressModel.deleteMany({ batchId }).exec();
  }
}
