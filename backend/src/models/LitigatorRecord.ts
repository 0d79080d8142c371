import mongoose, { Schema } from 'mongoose';

import { LITIGATOR_TYPES, type LitigatorType } from '@src/types/pipeline';

/**
 * Blocklist entry. Maintained outside this service; `fingerprint` must be
 * written with `litigatorFingerprint` from utils/fingerprint and `phones` as
 * bare 10 digit numbers. Either may be empty, not both.
 */
export interface ILitigatorRecord {
  fullname: string;
  firstName: string;
  lastName: string;
  street: string;
  city: string;
  state: string;
  zipcode: string;
  litigatorType: LitigatorType;
  fingerprint: string;
  phones: string[];
  createdAt: Date;
}

const LitigatorRecordSchema = new Schema<ILitigatorRecord>({
  fullname: { type: String, default: '' },
  firstName: { type: String, default: '' },
  lastName: { type: String, default: '' },
  street: { type: String, default: '' },
  city: { type: String, default: '' },
  state: { type: String, default: '' },
  zipcode: { type: String, default: '' },
  litigatorType: { type: String, enum: [...LITIGATOR_TYPES], required: true },
  fingerprint: { type: String, default: '', index: true },
  phones: { type: [String], default: [], index: true },
  createdAt: { type: Date, default: Date.now },
});

export const LitigatorRecordModel = mongoose.model<ILitigatorRecord>('LitigatorRecord', LitigatorRecordSchema);

export default LitigatorRecordModel;
