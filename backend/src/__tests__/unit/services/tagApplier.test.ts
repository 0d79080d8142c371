import { describe, it, expect } from 'vitest';

import { TagApplier } from '@src/services/tagApplier';
import { MemoryTagSink } from '@src/__tests__/support/memoryStores';

describe('TagApplier', () => {
  it('tags enriched records once per tag', async () => {
    const sink = new MemoryTagSink();
    const tagger = new TagApplier(sink);

    await expect(tagger.apply('batch-1:1', 'enriched_fresh', ['hot', 'skiptraced', 'hot'])).resolves.toBe('applied');
    await expect(tagger.apply('batch-1:2', 'enriched_from_cache', ['hot'])).resolves.toBe('applied');

    expect(sink.calls).toEqual([
      { recordId: 'batch-1:1', tags: ['hot', 'skiptraced'] },
      { recordId: 'batch-1:2', tags: ['hot'] },
    ]);
  });

  it('skips records that were not enriched', async () => {
    const sink = new MemoryTagSink();
    const tagger = new TagApplier(sink);

    for (const result of ['matched_litigator', 'skipped_invalid', 'failed_external'] as const) {
      await expect(tagger.apply('batch-1:1', result, ['hot'])).resolves.toBe('skipped');
    }
    await expect(tagger.apply('batch-1:1', 'enriched_fresh', [])).resolves.toBe('skipped');
    expect(sink.calls).toEqual([]);
  });

  it('reports a failing sink without throwing', async () => {
    const sink = new MemoryTagSink();
    sink.failWith = new Error('sink offline');

    await expect(new TagApplier(sink).apply('batch-1:1', 'enriched_fresh', ['hot'])).resolves.toBe('failed');
    expect(sink.calls).toHaveLength(1);
  });
});
