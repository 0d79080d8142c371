import LitigatorRecordModel, { type ILitigatorRecord } from '@src/models/LitigatorRecord';
import type { LitigatorRecord } from '@src/types/pipeline';
import type { LitigatorStore } from '@src/types/stores';

type LeanLitigator = ILitigatorRecord & { _id: { toString(): string } };

function toLitigator(doc: LeanLitigator): LitigatorRecord {
  return {
    id: doc._id.toString(),
    fingerprint: doc.fingerprint,
    phones: [...doc.phones],
    fullname: doc.fullname,
    litigatorType: doc.litigatorType,
  };
}

export class LitigatorRepo implements LitigatorStore {
  async findByFingerprints(fingerprints: string[]): Promise<LitigatorRecord[]> {
    if (fingerprints.length === 0) {
      return [];
    }
    const docs = await LitigatorRecordModel
      .find({ fingerprint: { $in: fingerprints } })
      .lean<LeanLitigator[]>()
      .exec();
    return docs.map(toLitigator);
  }

  async findByPhones(phones: string[]): Promise<LitigatorRecord[]> {
    if (phones.length === 0) {
      return [];
    }
    const docs = await LitigatorRecordModel
      .find({ phones: { $in: phones } })
      .lean<LeanLitigator[]>()
      .exec();
    return docs.map(toLitigator);
  }
}
