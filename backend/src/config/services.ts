import logger from 'jet-logger';

import ENV from '@src/common/constants/ENV';
import { loadFieldAliases } from '@src/config/fieldAliases';
import { EnrichmentEntryRepo } from '@src/repos/EnrichmentEntryRepo';
import { LitigatorRepo } from '@src/repos/LitigatorRepo';
import { RawRowRepo } from '@src/repos/RawRowRepo';
import { RecordProgressRepo } from '@src/repos/RecordProgressRepo';
import { RecordTagSink } from '@src/repos/RecordTagSink';
import { UploadBatchRepo } from '@src/repos/UploadBatchRepo';
import { CostDecisionEngine } from '@src/services/costDecisionEngine';
import { EnrichmentCache } from '@src/services/enrichmentCache';
import { EnrichmentClient, HttpSkipTraceProvider } from '@src/services/enrichmentClient';
import { LitigatorMatcher } from '@src/services/litigatorMatcher';
import { PipelineOrchestrator } from '@src/services/pipelineOrchestrator';
import { SchemaMapper } from '@src/services/schemaMapper';
import { TagApplier } from '@src/services/tagApplier';
import { UploadService } from '@src/services/uploadService';

export interface AppServices {
  uploads: UploadService;
  orchestrator: PipelineOrchestrator;
  cache: EnrichmentCache;
  client: EnrichmentClient;
  decisions: CostDecisionEngine;
}

/**
 * Wire the pipeline onto the mongoose repositories and the HTTP skip-trace
 * provider. Call once per process, after the database connection is up.
 */
export function createServices(): AppServices {
  if (!ENV.SkipTrace.ApiUrl) {
    logger.warn('⚠️ SKIP_TRACE_API_URL is not set - fresh lookups will fail');
  }

  const batches = new UploadBatchRepo();
  const rawRows = new RawRowRepo();
  const records = new RecordProgressRepo();

  const cache = new EnrichmentCache(new EnrichmentEntryRepo(), {
    hotTtlSeconds: ENV.Enrichment.HotCacheTtlSeconds,
  });
  const client = new EnrichmentClient(
    new HttpSkipTraceProvider(ENV.SkipTrace.ApiUrl, ENV.SkipTrace.ApiKey),
    {
      timeoutMs: ENV.SkipTrace.TimeoutMs,
      maxAttempts: ENV.SkipTrace.MaxAttempts,
      backoffMs: ENV.SkipTrace.BackoffMs,
      concurrency: ENV.SkipTrace.Concurrency,
    },
  );
  const decisions = new CostDecisionEngine(cache, client, {
    maxAgeDays: ENV.Enrichment.MaxAgeDays,
    notFoundTtlSeconds: 24 * 60 * 60,
  });

  const orchestrator = new PipelineOrchestrator({
    batches,
    rawRows,
    records,
    decisions,
    matcher: new LitigatorMatcher(new LitigatorRepo()),
    tagger: new TagApplier(new RecordTagSink()),
  }, {
    concurrency: ENV.PipelineConcurrency,
    leaseMs: ENV.PipelineLeaseMs,
  });

  const uploads = new UploadService({
    batches,
    rawRows,
    records,
    mapper: new SchemaMapper(loadFieldAliases(ENV.FieldAliasesPath)),
    runs: orchestrator,
  });

  logger.info(`✅ Pipeline ready (workers: ${ENV.PipelineConcurrency}, provider concurrency: ${ENV.SkipTrace.Concurrency})`);
  return { uploads, orchestrator, cache, client, decisions };
}

export function closeServices(services: AppServices): void {
  services.cache.close();
  services.decisions.close();
}
