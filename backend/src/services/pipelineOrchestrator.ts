import crypto from 'crypto';
import PQueue from 'p-queue';
import logger from 'jet-logger';

import HttpStatusCodes from '@src/common/constants/HttpStatusCodes';
import { RouteError } from '@src/common/util/route-errors';
import { BatchStateError, ExternalServiceError } from '@src/common/util/pipeline-errors';
import type {
  BatchProgress,
  CanonicalRecord,
  ContactMetadata,
  EnrichmentOutcome,
  LitigatorMatch,
  PipelineResult,
  PipelineStage,
  RecordProgress,
  UploadBatch,
} from '@src/types/pipeline';
import type { BatchStore, RawRowStore, RecordProgressStore } from '@src/types/stores';
import { addressFingerprint } from '@src/utils/fingerprint';
import type { CostDecisionEngine, DecisionContext } from './costDecisionEngine';
import type { LitigatorMatcher } from './litigatorMatcher';
import { normalizeRows } from './recordNormalizer';
import type { TagApplier } from './tagApplier';


/******************************************************************************
                                   Types
******************************************************************************/

export interface PipelineDependencies {
  batches: BatchStore;
  rawRows: RawRowStore;
  records: RecordProgressStore;
  decisions: CostDecisionEngine;
  matcher: LitigatorMatcher;
  tagger: TagApplier;
}

export interface PipelineOptions {
  /** Records worked on at the same time within one batch. */
  concurrency: number;
  /** How long a claimed batch stays reserved for this runner without renewal. */
  leaseMs?: number;
  /** Identifies this process on the batch lease. */
  runnerId?: string;
  now?: () => Date;
}

interface RunContext {
  batch: UploadBatch;
  decision: DecisionContext;
  controller: AbortController;
  outage?: ExternalServiceError;
  leaseRenewAt: number;
  leaseLost: boolean;
}

const DEFAULT_LEASE_MS = 2 * 60 * 1000;

// Hit statistics count at most this many values of each kind per record
const COUNTED_PHONES = 3;
const COUNTED_EMAILS = 2;
const COUNTED_ADDRESSES = 2;


/******************************************************************************
                                 Functions
******************************************************************************/

export function recordIdFor(progress: Pick<RecordProgress, 'batchId' | 'rowNumber'>): string {
  return `${progress.batchId}:${progress.rowNumber}`;
}

/**
 * A record is done once it has a final result and the tag stage has run.
 * `failed_external` is not final: resuming the batch retries it.
 */
export function isFinished(progress: RecordProgress): boolean {
  return progress.result !== undefined
    && progress.result !== 'failed_external'
    && progress.tagStatus !== undefined;
}

/**
 * A blocklist match always wins over whatever enrichment produced.
 */
export function resolveResult(enrichment: EnrichmentOutcome, litigator: LitigatorMatch): PipelineResult {
  if (litigator.matched) {
    return 'matched_litigator';
  }
  switch (enrichment.source) {
    case 'cache':
      return 'enriched_from_cache';
    case 'fresh':
      return 'enriched_fresh';
    case 'not_found':
      return 'skipped_invalid';
  }
}

/**
 * True while some runner holds the batch. A runner renews its lease as it
 * works, so an expired lease means the run died.
 */
export function isLeaseLive(batch: Pick<UploadBatch, 'leaseUntil'>, now: Date): boolean {
  return batch.leaseUntil !== undefined && batch.leaseUntil.getTime() > now.getTime();
}

/**
 * Batches a scheduler should pick up: stopped ones that were not cancelled,
 * and `processing` ones whose runner is gone. A `processing` batch that was
 * never claimed counts as gone once it is `staleMs` old.
 */
export function selectResumable(batches: readonly UploadBatch[], now: Date, staleMs: number): UploadBatch[] {
  return batches.filter((batch) => {
    if (batch.cancelRequested || isLeaseLive(batch, now)) {
      return false;
    }
    if (batch.status === 'failed_partial') {
      return true;
    }
    if (batch.status !== 'processing') {
      return false;
    }
    return batch.leaseUntil !== undefined || now.getTime() - batch.updatedAt.getTime() >= staleMs;
  });
}

function duplicateKey(record: CanonicalRecord): string {
  return `${record.fullname.toLowerCase()}|${addressFingerprint(record.property)}`;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}


/******************************************************************************
                                Orchestrator
******************************************************************************/

/**
 * Pipeline Orchestrator
 *
 * Drives an upload batch through Normalize → Decide/Enrich → Match → Tag with
 * a bounded worker pool, persisting each record's progress after every stage.
 *
 * - `run` starts or resumes a batch; stages already recorded are skipped, so
 *   calling it again never repeats paid work
 * - an ExternalServiceError (after the client's retries) stops new records
 *   from being scheduled and leaves the batch `failed_partial`
 * - `cancel` is cooperative: records already being worked on finish
 * - a run holds a lease on the batch document, so a second process (or the
 *   resume script) cannot run the same batch and pay for its rows twice
 */
export class PipelineOrchestrator {
  private readonly active = new Map<string, Promise<BatchProgress>>();
  private readonly controllers = new Map<string, AbortController>();
  private readonly now: () => Date;
  private readonly runnerId: string;
  private readonly leaseMs: number;

  constructor(
    private readonly deps: PipelineDependencies,
    private readonly options: PipelineOptions,
  ) {
    this.now = options.now ?? (() => new Date());
    this.runnerId = options.runnerId ?? crypto.randomUUID();
    this.leaseMs = options.leaseMs ?? DEFAULT_LEASE_MS;
  }

  /**
   * Run or resume a batch. Concurrent calls for the same batch share one run.
   */
  run(batchId: string): Promise<BatchProgress> {
    const existing = this.active.get(batchId);
    if (existing) {
      return existing;
    }

    const run = this.execute(batchId).finally(() => {
      this.active.delete(batchId);
    });
    this.active.set(batchId, run);
    return run;
  }

  /**
   * Run in the background; failures are logged.
   */
  start(batchId: string): void {
    void this.run(batchId).catch((error: unknown) => {
      logger.err(`❌ Upload ${batchId} stopped: ${describe(error)}`);
    });
  }

  isRunning(batchId: string): boolean {
    return this.active.has(batchId);
  }

  /**
   * Ask a batch to stop. No new records are started after this; the batch
   * ends `failed_partial` and can be resumed.
   */
  async cancel(batchId: string): Promise<BatchProgress> {
    const batch = await this.requireBatch(batchId);
    if (batch.status === 'mapping' || batch.status === 'completed') {
      throw new BatchStateError(batch.status, `Upload ${batchId} is ${batch.status} and cannot be cancelled`);
    }

    // Nobody is running it, so nobody else will move it out of `processing`
    const orphaned = batch.status === 'processing'
      && !this.active.has(batchId)
      && !isLeaseLive(batch, this.now());
    await this.deps.batches.update(batchId, orphaned
      ? { cancelRequested: true, status: 'failed_partial', lastError: 'Cancelled' }
      : { cancelRequested: true });
    this.controllers.get(batchId)?.abort();
    logger.info(`🛑 Cancellation requested for upload ${batchId}`);

    return this.progress(batchId);
  }

  async progress(batchId: string): Promise<BatchProgress> {
    const batch = await this.requireBatch(batchId);
    const records = await this.deps.records.list(batchId);
    return summarize(batch, records);
  }

  /**
   * Wait for every run started in this process.
   */
  async drain(): Promise<void> {
    await Promise.allSettled([...this.active.values()]);
  }

  private async execute(batchId: string): Promise<BatchProgress> {
    const batch = await this.requireBatch(batchId);
    if (batch.status === 'mapping') {
      throw new BatchStateError(batch.status, `Upload ${batchId} is still waiting for its column mapping`);
    }
    if (batch.status === 'completed') {
      return this.progress(batchId);
    }

    const claimed = await this.deps.batches.claimLease(batchId, this.runnerId, this.leaseExpiry(), this.now());
    if (!claimed) {
      logger.info(`⏭️ Upload ${batchId} is being processed by another worker`);
      return this.progress(batchId);
    }
    if (claimed.status === 'completed') {
      await this.deps.batches.releaseLease(batchId, this.runnerId, {});
      return this.progress(batchId);
    }

    const controller = new AbortController();
    this.controllers.set(batchId, controller);

    try {
      const processingStartedAt = claimed.processingStartedAt ?? this.now();
      const running = await this.deps.batches.update(batchId, {
        status: 'processing',
        cancelRequested: false,
        processingStartedAt,
        lastError: undefined,
      });
      if (!running) {
        throw new RouteError(HttpStatusCodes.NOT_FOUND, `Upload ${batchId} not found`);
      }

      const context: RunContext = {
        batch: running,
        decision: {
          batchId,
          refreshPolicy: running.refreshPolicy,
          processingStartedAt,
        },
        controller,
        leaseRenewAt: this.now().getTime() + this.leaseMs / 2,
        leaseLost: false,
      };
      logger.info(`🚀 Processing upload ${batchId} (${running.refreshPolicy}, ${running.totalCount} rows)`);

      const work = await this.prepareRecords(running);
      const queue = new PQueue({ concurrency: this.options.concurrency });
      const tasks = work.map((progress) => queue.add(() => this.processRecord(progress, context)));
      const settled = await Promise.allSettled(tasks);

      const crashed = settled.find((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected');
      if (crashed) {
        throw crashed.reason;
      }
      return await this.finalize(context);
    } catch (error) {
      logger.err(`❌ Upload ${batchId} failed: ${describe(error)}`);
      await this.deps.batches.releaseLease(batchId, this.runnerId, {
        status: 'failed_partial',
        lastError: describe(error),
      });
      throw error;
    } finally {
      this.controllers.delete(batchId);
    }
  }

  /**
   * Normalize every raw row and make sure it has a progress record. Returns
   * the records that still have work left.
   */
  private async prepareRecords(batch: UploadBatch): Promise<RecordProgress[]> {
    const rows = await this.deps.rawRows.load(batch.rawRef);
    const existing = new Map(
      (await this.deps.records.list(batch.id)).map((progress) => [progress.rowNumber, progress]),
    );
    const firstSeen = new Map<string, number>();
    const work: RecordProgress[] = [];

    for (const item of normalizeRows(rows, { hasHeaderRow: batch.hasHeaderRow, mapping: batch.mapping })) {
      const rowNumber = item.ok ? item.record.rowNumber : item.error.row;
      let progress = existing.get(rowNumber);

      if (!progress) {
        if (item.ok) {
          progress = {
            batchId: batch.id,
            rowNumber,
            record: item.record,
            duplicateOfRow: firstSeen.get(duplicateKey(item.record)),
          };
        } else {
          progress = {
            batchId: batch.id,
            rowNumber,
            issue: item.error.toIssue(),
            result: 'skipped_invalid',
            tagStatus: 'skipped',
          };
        }
        await this.deps.records.save(progress);
      }

      if (item.ok && !firstSeen.has(duplicateKey(item.record))) {
        firstSeen.set(duplicateKey(item.record), rowNumber);
      }
      if (!isFinished(progress)) {
        work.push(progress);
      }
    }

    return work;
  }

  private async processRecord(progress: RecordProgress, context: RunContext): Promise<void> {
    const { record } = progress;
    if (!record || await this.shouldStop(context)) {
      return;
    }

    // Decide / enrich
    let enrichment = progress.enrichment;
    if (!enrichment) {
      try {
        enrichment = await this.deps.decisions.decide(record, context.decision);
      } catch (error) {
        await this.recordFailure(progress, 'enrich', error, context);
        return;
      }
      progress.enrichment = enrichment;
      progress.failure = undefined;
      if (progress.result === 'failed_external') {
        progress.result = undefined;
      }
      await this.deps.records.save(progress);
    }

    // Match
    let litigator = progress.litigator;
    if (!litigator) {
      try {
        litigator = await this.deps.matcher.match(record, enrichment.contact);
      } catch (error) {
        await this.recordFailure(progress, 'match', error, context);
        return;
      }
      progress.litigator = litigator;
    }

    if (progress.result === undefined) {
      progress.result = resolveResult(enrichment, litigator);
      progress.failure = undefined;
      await this.deps.records.save(progress);
    }

    // Tag
    if (progress.tagStatus === undefined) {
      progress.tagStatus = await this.deps.tagger.apply(recordIdFor(progress), progress.result, context.batch.tags);
      await this.deps.records.save(progress);
    }
  }

  private async recordFailure(
    progress: RecordProgress,
    stage: PipelineStage,
    error: unknown,
    context: RunContext,
  ): Promise<void> {
    progress.failure = { stage, reason: describe(error) };

    if (error instanceof ExternalServiceError) {
      progress.result = 'failed_external';
      if (!context.outage) {
        context.outage = error;
        logger.err(`❌ Skip-trace provider unavailable (${error.kind}); upload ${context.batch.id} will stop after in-flight rows`);
      }
    } else {
      logger.err(`❌ Row ${progress.rowNumber} of upload ${context.batch.id} failed at ${stage}: ${describe(error)}`);
    }

    await this.deps.records.save(progress);
  }

  private async shouldStop(context: RunContext): Promise<boolean> {
    if (context.outage || context.controller.signal.aborted) {
      return true;
    }

    // Cancellation may come from another process through the stored flag
    const batch = await this.deps.batches.get(context.batch.id);
    if (!batch || batch.cancelRequested) {
      context.controller.abort();
      return true;
    }

    if (this.now().getTime() >= context.leaseRenewAt) {
      context.leaseRenewAt = this.now().getTime() + this.leaseMs / 2;
      const renewed = await this.deps.batches.renewLease(context.batch.id, this.runnerId, this.leaseExpiry());
      if (!renewed) {
        logger.warn(`⚠️ Upload ${context.batch.id} was taken over by another worker; stopping`);
        context.leaseLost = true;
        context.controller.abort();
        return true;
      }
    }
    return false;
  }

  private leaseExpiry(): Date {
    return new Date(this.now().getTime() + this.leaseMs);
  }

  private async finalize(context: RunContext): Promise<BatchProgress> {
    const batchId = context.batch.id;
    const records = await this.deps.records.list(batchId);
    const complete = records.length >= context.batch.totalCount && records.every(isFinished);

    let lastError: string | undefined;
    if (!complete) {
      if (context.leaseLost) {
        lastError = 'Taken over by another worker';
      } else if (context.outage) {
        lastError = context.outage.message;
      } else if (context.controller.signal.aborted) {
        lastError = 'Cancelled';
      } else {
        lastError = 'Some rows could not be processed';
      }
    }

    const updated = await this.deps.batches.releaseLease(batchId, this.runnerId, {
      status: complete ? 'completed' : 'failed_partial',
      lastError,
      completedAt: complete ? this.now() : undefined,
    });
    if (!updated) {
      // The new lease holder owns the batch status now
      logger.warn(`⚠️ Upload ${batchId} stopped: ${lastError ?? 'lease lost'}`);
      return summarize(await this.requireBatch(batchId), records);
    }

    const progress = summarize(updated, records);
    if (complete) {
      logger.info(
        `✅ Upload ${batchId} completed - ${progress.succeededCount} enriched `
        + `(${progress.freshFetchCount} fresh, ${progress.cacheReuseCount} reused), `
        + `${progress.litigatorCount} litigators, ${progress.skippedCount} skipped`,
      );
    } else {
      logger.warn(`⚠️ Upload ${batchId} stopped at ${progress.processedCount}/${progress.totalCount}: ${lastError}`);
    }
    return progress;
  }

  private async requireBatch(batchId: string): Promise<UploadBatch> {
    const batch = await this.deps.batches.get(batchId);
    if (!batch) {
      throw new RouteError(HttpStatusCodes.NOT_FOUND, `Upload ${batchId} not found`);
    }
    return batch;
  }
}

export function summarize(batch: UploadBatch, records: readonly RecordProgress[]): BatchProgress {
  const count = (predicate: (progress: RecordProgress) => boolean): number => records.filter(predicate).length;
  const counted = records.flatMap((p) => (
    p.enrichment?.contact && p.duplicateOfRow === undefined ? [p.enrichment.contact] : []
  ));
  const total = (pick: (contact: ContactMetadata) => number): number => (
    counted.reduce((sum, contact) => sum + pick(contact), 0)
  );

  return {
    batchId: batch.id,
    status: batch.status,
    totalCount: batch.totalCount,
    processedCount: count((p) => p.result !== undefined && p.result !== 'failed_external'),
    failedCount: count((p) => p.result === 'failed_external' || (p.result === undefined && p.failure !== undefined)),
    succeededCount: count((p) => p.result === 'enriched_from_cache' || p.result === 'enriched_fresh'),
    skippedCount: count((p) => p.result === 'skipped_invalid'),
    litigatorCount: count((p) => p.result === 'matched_litigator'),
    cacheReuseCount: count((p) => p.enrichment?.source === 'cache'),
    freshFetchCount: count((p) => p.enrichment?.source === 'fresh'),
    notFoundCount: count((p) => p.enrichment?.source === 'not_found'),
    duplicateCount: count((p) => p.duplicateOfRow !== undefined),
    hitCount: count((p) => p.enrichment?.contact !== undefined),
    billableHitCount: count((p) => p.enrichment?.source === 'fresh' && p.duplicateOfRow === undefined),
    phoneCount: total((contact) => Math.min(contact.phones.length, COUNTED_PHONES)),
    emailCount: total((contact) => Math.min(contact.emails.length, COUNTED_EMAILS)),
    addressCount: total((contact) => Math.min(contact.addressHistory.length, COUNTED_ADDRESSES)),
    cancelRequested: batch.cancelRequested,
    lastError: batch.lastError,
    issues: records
      .flatMap((p) => (p.issue ? [p.issue] : []))
      .sort((a, b) => a.row - b.row),
  };
}
