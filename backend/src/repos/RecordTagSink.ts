import RecordTag from '@src/models/RecordTag';
import type { TagSink } from '@src/types/stores';

/**
 * Tags land in the RecordTag collection; `$addToSet` keeps a repeated call
 * from adding a tag twice.
 */
export class RecordTagSink implements TagSink {
  async apply(recordId: string, tags: string[]): Promise<void> {
    await RecordTag.updateOne(
      { recordId },
      {
        $addToSet: { tags: { $each: tags } },
        $set: { updatedAt: new Date() },
      },
      { upsert: true },
    ).exec();
  }
}
