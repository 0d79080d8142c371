import mongoose, { Schema } from 'mongoose';

/**
 * Raw upload rows, stored in fixed-size chunks so a large spreadsheet never
 * hits the document size limit.
 */
export interface IUploadRawChunk {
  batchId: string;
  index: number;
  rows: string[][];
}

const UploadRawChunkSchema = new Schema<IUploadRawChunk>({
  batchId: { type: String, required: true, index: true },
  index: { type: Number, required: true },
  rows: { type: [[String]], default: [] },
});

UploadRawChunkSchema.index({ batchId: 1, index: 1 }, { unique: true });

export const UploadRawChunk = mongoose.model<IUploadRawChunk>('UploadRawChunk', UploadRawChunkSchema);

export default UploadRawChunk;
