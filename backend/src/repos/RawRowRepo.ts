import UploadRawChunk, { type IUploadRawChunk } from '@src/models/UploadRawChunk';
import type { RawRowStore } from '@src/types/stores';

const CHUNK_SIZE = 500;

/**
 * Raw rows live in UploadRawChunk documents; the reference handed back is the
 * batch id.
 */
export class RawRowRepo implements RawRowStore {
  async save(batchId: string, rows: string[][]): Promise<string> {
    const chunks: IUploadRawChunk[] = [];
    for (let start = 0; start < rows.length; start += CHUNK_SIZE) {
      chunks.push({
        batchId,
        index: chunks.length,
        rows: rows.slice(start, start + CHUNK_SIZE),
      });
    }
    await UploadRawChunk.insertMany(chunks);
    return batchId;
  }

  async load(ref: string): Promise<string[][]> {
    const chunks = await UploadRawChunk.find({ batchId: ref }).sort({ index: 1 }).lean<IUploadRawChunk[]>().exec();
    if (chunks.length === 0) {
      throw new Error(`Raw rows for upload ${ref} are missing`);
    }
    return chunks.flatMap((chunk) => chunk.rows);
  }

  async delete(ref: string): Promise<void> {
    await UploadRawChunk.deleteMany({ batchId: ref }).exec();
  }
}
