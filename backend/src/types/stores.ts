import type {
  EnrichmentEntry,
  LitigatorRecord,
  NewUploadBatch,
  RecordProgress,
  UploadBatch,
  UploadBatchPatch,
  BatchStatus,
} from './pipeline';

/**
 * Storage seams. The mongoose repositories in `repos/` implement these; the
 * unit tests use in-memory versions.
 */

export interface BatchStore {
  create(batch: NewUploadBatch): Promise<UploadBatch>;
  get(id: string): Promise<UploadBatch | null>;
  update(id: string, patch: UploadBatchPatch): Promise<UploadBatch | null>;
  listByStatus(status: BatchStatus): Promise<UploadBatch[]>;
  delete(id: string): Promise<void>;
  /**
   * Atomically take the run lease. Succeeds when no lease is live at `now` or
   * `runnerId` already holds it; returns null when another runner does.
   */
  claimLease(id: string, runnerId: string, leaseUntil: Date, now: Date): Promise<UploadBatch | null>;
  /** Extend a lease `runnerId` still holds. False once it has been taken over. */
  renewLease(id: string, runnerId: string, leaseUntil: Date): Promise<boolean>;
  /** Apply `patch` and drop the lease, only while `runnerId` holds it. */
  releaseLease(id: string, runnerId: string, patch: UploadBatchPatch): Promise<UploadBatch | null>;
}

/** Raw tabular rows exactly as uploaded, header row included. */
export interface RawRowStore {
  save(batchId: string, rows: string[][]): Promise<string>;
  load(ref: string): Promise<string[][]>;
  delete(ref: string): Promise<void>;
}

export interface RecordProgressStore {
  list(batchId: string): Promise<RecordProgress[]>;
  /** Upsert keyed by (batchId, rowNumber). */
  save(progress: RecordProgress): Promise<void>;
  deleteBatch(batchId: string): Promise<void>;
}

export interface EnrichmentStore {
  get(fingerprint: string): Promise<EnrichmentEntry | null>;
  put(entry: EnrichmentEntry): Promise<void>;
}

export interface LitigatorStore {
  findByFingerprints(fingerprints: string[]): Promise<LitigatorRecord[]>;
  /** Entries listing any of these 10 digit numbers. */
  findByPhones(phones: string[]): Promise<LitigatorRecord[]>;
}

export interface TagSink {
  apply(recordId: string, tags: string[]): Promise<void>;
}
