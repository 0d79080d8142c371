import logger from 'jet-logger';

import type { PipelineResult, TagStatus } from '@src/types/pipeline';
import type { TagSink } from '@src/types/stores';

const TAGGABLE: ReadonlySet<PipelineResult> = new Set(['enriched_from_cache', 'enriched_fresh']);

/**
 * Sends the batch's tags for enriched records to the tag sink. A failed call
 * is logged and recorded, never retried.
 */
export class TagApplier {
  constructor(private readonly sink: TagSink) {}

  async apply(recordId: string, result: PipelineResult, tags: readonly string[]): Promise<TagStatus> {
    if (!TAGGABLE.has(result) || tags.length === 0) {
      return 'skipped';
    }

    try {
      await this.sink.apply(recordId, [...new Set(tags)]);
      return 'applied';
    } catch (error) {
      logger.err(`❌ Tagging ${recordId} failed: ${error instanceof Error ? error.message : String(error)}`);
      return 'failed';
    }
  }
}
