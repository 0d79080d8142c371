import mongoose, { Schema } from 'mongoose';

export interface IRecordTag {
  recordId: string;
  tags: string[];
  updatedAt: Date;
}

const RecordTagSchema = new Schema<IRecordTag>({
  recordId: { type: String, required: true, unique: true },
  tags: { type: [String], default: [] },
  updatedAt: { type: Date, default: Date.now },
});

export const RecordTag = mongoose.model<IRecordTag>('RecordTag', RecordTagSchema);

export default RecordTag;
