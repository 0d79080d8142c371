import crypto from 'crypto';
import logger from 'jet-logger';

import HttpStatusCodes from '@src/common/constants/HttpStatusCodes';
import { SKIP, MAX_FIELD_LENGTH, type MappingTarget } from '@src/common/constants/CanonicalSchema';
import { RouteError } from '@src/common/util/route-errors';
import { BatchStateError, SchemaError } from '@src/common/util/pipeline-errors';
import type {
  ColumnMapping,
  FieldOption,
  RecordProgress,
  RefreshPolicy,
  UploadBatch,
} from '@src/types/pipeline';
import type { BatchStore, RawRowStore, RecordProgressStore } from '@src/types/stores';
import { isLeaseLive } from './pipelineOrchestrator';
import { countDataRows } from './recordNormalizer';
import { columnLetters, type SchemaMapper } from './schemaMapper';

export interface CreateBatchInput {
  ownerId: string;
  originalName: string;
  rows: string[][];
  /** Guessed from the first row when not given. */
  hasHeaderRow?: boolean;
}

export interface ProposedColumn extends ColumnMapping {
  options: FieldOption[];
}

export interface MappingProposal {
  batch: UploadBatch;
  columns: ProposedColumn[];
}

export interface ColumnAssignment {
  columnIndex: number;
  field: MappingTarget;
}

export interface ConfirmMappingInput {
  /** The full table: columns left out are skipped. */
  assignments: ColumnAssignment[];
  refreshPolicy: RefreshPolicy;
  tags: string[];
}

export interface UploadServiceDependencies {
  batches: BatchStore;
  rawRows: RawRowStore;
  records: RecordProgressStore;
  mapper: SchemaMapper;
  runs: { isRunning(batchId: string): boolean };
  now?: () => Date;
}

/**
 * Upload Service
 *
 * The two user-facing boundaries in front of the pipeline: storing an upload
 * with a proposed column mapping, and confirming that mapping. Also owns
 * ownership checks and purging.
 */
export class UploadService {
  private readonly now: () => Date;

  constructor(private readonly deps: UploadServiceDependencies) {
    this.now = deps.now ?? (() => new Date());
  }

  async createBatch(input: CreateBatchInput): Promise<MappingProposal> {
    const { rows } = input;
    if (rows.length === 0) {
      throw new SchemaError('Upload contains no rows');
    }

    const hasHeaderRow = input.hasHeaderRow ?? this.deps.mapper.detectHeaderRow(rows);
    const width = rows.reduce((max, row) => Math.max(max, row.length), 0);
    const headers = hasHeaderRow ? rows[0] : columnLetters(width);
    const dataRows = hasHeaderRow ? rows.slice(1) : rows;
    if (dataRows.length === 0) {
      throw new SchemaError('Upload has a header row but no data rows');
    }

    const mapping = this.deps.mapper.proposeMapping(headers, dataRows.slice(0, 3));

    const id = crypto.randomUUID();
    const rawRef = await this.deps.rawRows.save(id, rows);
    const batch = await this.deps.batches.create({
      id,
      ownerId: input.ownerId,
      originalName: input.originalName,
      rawRef,
      hasHeaderRow,
      mapping,
      refreshPolicy: 'prefer_cache',
      tags: [],
      status: 'mapping',
      totalCount: countDataRows(rows, hasHeaderRow),
      cancelRequested: false,
    });

    logger.info(`📥 Upload ${id} stored: ${batch.totalCount} rows, ${mapping.length} columns (header row: ${hasHeaderRow})`);
    return { batch, columns: this.withOptions(mapping) };
  }

  async confirmMapping(ownerId: string, batchId: string, input: ConfirmMappingInput): Promise<UploadBatch> {
    const batch = await this.getOwnedBatch(ownerId, batchId);
    if (batch.status !== 'mapping') {
      throw new BatchStateError(batch.status, `Upload ${batchId} mapping was already confirmed`);
    }

    const { mapper } = this.deps;
    let mapping = batch.mapping.map((column): ColumnMapping => ({ ...column, field: SKIP }));
    for (const assignment of input.assignments) {
      mapping = mapper.assignField(mapping, assignment.columnIndex, assignment.field);
    }
    mapper.validateMapping(mapping);

    if (!mapping.some((column) => column.field === 'property_street')) {
      throw new SchemaError('Property Street must be mapped to a column');
    }

    const updated = await this.deps.batches.update(batchId, {
      mapping: mapping.map((column) => ({ ...column, needsReview: false, conflictsWith: undefined })),
      mappingConfirmedAt: this.now(),
      refreshPolicy: input.refreshPolicy,
      tags: normalizeTags(input.tags),
      status: 'processing',
    });
    if (!updated) {
      throw notFound(batchId);
    }

    logger.info(`🗺️ Upload ${batchId} mapping confirmed (${input.refreshPolicy})`);
    return updated;
  }

  /**
   * The batch, if it exists and belongs to `ownerId`. Someone else's batch is
   * reported as missing.
   */
  async getOwnedBatch(ownerId: string, batchId: string): Promise<UploadBatch> {
    const batch = await this.deps.batches.get(batchId);
    if (!batch || batch.ownerId !== ownerId) {
      throw notFound(batchId);
    }
    return batch;
  }

  async listResults(ownerId: string, batchId: string): Promise<RecordProgress[]> {
    await this.getOwnedBatch(ownerId, batchId);
    const records = await this.deps.records.list(batchId);
    return [...records].sort((a, b) => a.rowNumber - b.rowNumber);
  }

  /**
   * Remove a batch with its raw rows and record progress. Shared enrichment
   * entries stay.
   */
  async purge(ownerId: string, batchId: string): Promise<void> {
    const batch = await this.getOwnedBatch(ownerId, batchId);
    // A run in another process shows up only as a live lease
    if (this.deps.runs.isRunning(batchId) || isLeaseLive(batch, this.now())) {
      throw new BatchStateError(batch.status, `Upload ${batchId} is processing; cancel it before deleting`);
    }

    await this.deps.records.deleteBatch(batchId);
    await this.deps.rawRows.delete(batch.rawRef);
    await this.deps.batches.delete(batchId);
    logger.info(`🗑️ Upload ${batchId} purged`);
  }

  private withOptions(mapping: ColumnMapping[]): ProposedColumn[] {
    return mapping.map((column) => ({
      ...column,
      options: this.deps.mapper.fieldOptions(mapping, column.columnIndex),
    }));
  }
}

/**
 * Trim, drop empties and duplicates, keep the first spelling.
 */
export function normalizeTags(tags: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of tags) {
    const tag = raw.trim();
    const key = tag.toLowerCase();
    if (!tag || seen.has(key)) {
      continue;
    }
    if (tag.length > MAX_FIELD_LENGTH) {
      throw new SchemaError(`Tag "${tag.slice(0, 20)}..." is longer than ${MAX_FIELD_LENGTH} characters`);
    }
    seen.add(key);
    result.push(tag);
  }
  return result;
}

function notFound(batchId: string): RouteError {
  return new RouteError(HttpStatusCodes.NOT_FOUND, `Upload ${batchId} not found`);
}
