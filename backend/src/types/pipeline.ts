import type { CanonicalField, MappingTarget } from '@src/common/constants/CanonicalSchema';


/******************************************************************************
                                  Mapping
******************************************************************************/

export type HeaderMatch = 'exact' | 'alternate' | 'none';

export interface ColumnMapping {
  /** 0-based position of the column in each row. */
  columnIndex: number;
  header: string;
  samples: string[];
  field: MappingTarget;
  match: HeaderMatch;
  /** Not auto-resolved; the user has to look at it before confirming. */
  needsReview: boolean;
  /** Set when the header matched a field another column already took. */
  conflictsWith?: number;
}

export interface FieldOption {
  field: CanonicalField;
  label: string;
  disabled: boolean;
}


/******************************************************************************
                                  Records
******************************************************************************/

export interface AddressParts {
  street: string;
  city: string;
  state: string;
  zipcode: string;
}

export interface CanonicalRecord {
  rowNumber: number;
  fullname: string;
  firstName: string;
  lastName: string;
  property: AddressParts;
  mailing: AddressParts;
  phones: string[];
  email: string;
  custom1: string;
  custom2: string;
  custom3: string;
}

export interface RowIssue {
  row: number;
  column?: number;
  field: string;
  message: string;
}


/******************************************************************************
                                 Enrichment
******************************************************************************/

export interface ContactPhone {
  number: string;
  type?: string;
  carrier?: string;
  lastSeen?: string;
}

export interface HistoricAddress extends AddressParts {
  lastSeen?: string;
}

export interface ContactMetadata {
  ownerNames: string[];
  phones: ContactPhone[];
  emails: string[];
  addressHistory: HistoricAddress[];
}

export interface EnrichmentEntry {
  fingerprint: string;
  contact: ContactMetadata;
  fetchedAt: Date;
  sourceBatchId: string;
}

export type EnrichmentSource = 'cache' | 'fresh' | 'not_found';

export interface EnrichmentOutcome {
  source: EnrichmentSource;
  fingerprint: string;
  fetchedAt?: Date;
  contact?: ContactMetadata;
}

export const LITIGATOR_TYPES = [
  'Litigator',
  'Serial Litigator',
  'Pre-Litigator',
  'Complainer',
  'Associated',
] as const;

export type LitigatorType = typeof LITIGATOR_TYPES[number];

export interface LitigatorRecord {
  id: string;
  /** Name key + address fingerprint; empty for entries known only by phone. */
  fingerprint: string;
  phones: string[];
  fullname: string;
  litigatorType: LitigatorType;
}

export type LitigatorMatchKind = 'phone' | 'name_address';

export interface LitigatorMatch {
  matched: boolean;
  litigatorId?: string;
  litigatorType?: LitigatorType;
  matchedOn?: LitigatorMatchKind;
  fingerprint?: string;
  phone?: string;
}


/******************************************************************************
                                  Batches
******************************************************************************/

export type RefreshPolicy = 'prefer_cache' | 'force_refresh';
export type BatchStatus = 'mapping' | 'processing' | 'completed' | 'failed_partial';
export type PipelineStage = 'normalize' | 'enrich' | 'match' | 'tag';
export type TagStatus = 'applied' | 'skipped' | 'failed';

export type PipelineResult =
  | 'enriched_from_cache'
  | 'enriched_fresh'
  | 'matched_litigator'
  | 'skipped_invalid'
  | 'failed_external';

export interface UploadBatch {
  id: string;
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
  /** Process currently running the batch, while its lease is live. */
  runnerId?: string;
  leaseUntil?: Date;
  createdAt: Date;
  updatedAt: Date;
}

export type NewUploadBatch = Omit<UploadBatch, 'createdAt' | 'updatedAt'>;
export type UploadBatchPatch = Partial<Omit<UploadBatch, 'id' | 'ownerId' | 'createdAt' | 'updatedAt'>>;

/**
 * Durable per-record state. A stage counts as done when its output is
 * present, so re-running a batch only picks up what is missing.
 */
export interface RecordProgress {
  batchId: string;
  rowNumber: number;
  record?: CanonicalRecord;
  issue?: RowIssue;
  duplicateOfRow?: number;
  enrichment?: EnrichmentOutcome;
  litigator?: LitigatorMatch;
  result?: PipelineResult;
  failure?: { stage: PipelineStage; reason: string };
  tagStatus?: TagStatus;
}

export interface BatchProgress {
  batchId: string;
  status: BatchStatus;
  totalCount: number;
  processedCount: number;
  failedCount: number;
  succeededCount: number;
  skippedCount: number;
  litigatorCount: number;
  cacheReuseCount: number;
  freshFetchCount: number;
  notFoundCount: number;
  duplicateCount: number;
  /** Records that came back with a phone, email or address, cached or fresh. */
  hitCount: number;
  /** Hits paid for in this batch; repeated rows are not billed. */
  billableHitCount: number;
  phoneCount: number;
  emailCount: number;
  addressCount: number;
  cancelRequested: boolean;
  lastError?: string;
  issues: RowIssue[];
}
