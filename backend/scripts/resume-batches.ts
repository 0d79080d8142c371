/**
 * Resume uploads that stopped part-way (provider outage, cancel, crash).
 *
 * Meant to be run by a scheduler:
 *   tsx backend/scripts/resume-batches.ts [--stale-minutes=30] [--dry-run]
 *
 * Picks up every `failed_partial` upload that was not cancelled, plus
 * `processing` uploads whose worker lease ran out (their worker died).
 * `processing` uploads that were never claimed count once they have not been
 * touched for --stale-minutes. Runs them one at a time; an upload another
 * worker claims in the meantime is left to it.
 */
import 'dotenv/config';

import mongoose from 'mongoose';
import logger from 'jet-logger';

import ENV from '@src/common/constants/ENV';
import connectDB from '@src/config/database';
import { closeServices, createServices } from '@src/config/services';
import { UploadBatchRepo } from '@src/repos/UploadBatchRepo';
import { selectResumable } from '@src/services/pipelineOrchestrator';

const DEFAULT_STALE_MINUTES = 30;

function readArgs(argv: string[]): { staleMinutes: number; dryRun: boolean } {
  const staleArg = argv.find((arg) => arg.startsWith('--stale-minutes='));
  const staleMinutes = staleArg ? Number(staleArg.split('=')[1]) : DEFAULT_STALE_MINUTES;
  if (!Number.isFinite(staleMinutes) || staleMinutes < 0) {
    throw new Error(`Invalid --stale-minutes value: ${staleArg}`);
  }
  return { staleMinutes, dryRun: argv.includes('--dry-run') };
}

async function resumeBatches() {
  const { staleMinutes, dryRun } = readArgs(process.argv.slice(2));
  await connectDB(ENV.MongodbUri);

  const repo = new UploadBatchRepo();
  const candidates = selectResumable(
    [...await repo.listByStatus('failed_partial'), ...await repo.listByStatus('processing')],
    new Date(),
    staleMinutes * 60 * 1000,
  );
  logger.info(`📋 ${candidates.length} upload(s) to resume`);

  const services = createServices();
  let completed = 0;
  for (const batch of candidates) {
    if (dryRun) {
      logger.info(`   would resume ${batch.id} (${batch.status}, ${batch.originalName})`);
      continue;
    }

    try {
      const progress = await services.orchestrator.run(batch.id);
      logger.info(`   ${batch.id}: ${progress.status} (${progress.processedCount}/${progress.totalCount})`);
      if (progress.status === 'completed') {
        completed++;
      } else if (progress.status === 'failed_partial' && progress.lastError) {
        // Provider is probably still down; the next scheduled run will retry
        logger.warn(`⚠️ Stopping early: ${progress.lastError}`);
        break;
      }
    } catch (error) {
      logger.err(error, true);
    }
  }

  closeServices(services);
  await mongoose.disconnect();
  logger.info(`✅ Resumed ${completed}/${candidates.length} upload(s) to completion`);
}

resumeBatches().catch((error: unknown) => {
  logger.err(error, true);
  process.exit(1);
});
