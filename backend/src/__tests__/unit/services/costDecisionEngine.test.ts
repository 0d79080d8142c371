import { afterEach, describe, it, expect } from 'vitest';

import { ExternalServiceError } from '@src/common/util/pipeline-errors';
import type { CanonicalRecord } from '@src/types/pipeline';
import { contactFor } from '@src/__tests__/support/fakeProvider';
import { createHarness, type Harness } from '@src/__tests__/support/pipelineHarness';

const NOW = new Date('2026-03-01T00:00:00Z');
const FINGERPRINT = '12 main st|springfield|il|62701';

function record(street: string, rowNumber = 1): CanonicalRecord {
  const blank = { street: '', city: '', state: '', zipcode: '' };
  return {
    rowNumber,
    fullname: 'Jane Doe',
    firstName: 'Jane',
    lastName: 'Doe',
    property: { street, city: 'Springfield', state: 'IL', zipcode: '62701' },
    mailing: blank,
    phones: [],
    email: '',
    custom1: '',
    custom2: '',
    custom3: '',
  };
}

const preferCache = { batchId: 'batch-1', refreshPolicy: 'prefer_cache' as const, processingStartedAt: NOW };
const forceRefresh = { batchId: 'batch-1', refreshPolicy: 'force_refresh' as const, processingStartedAt: NOW };

describe('CostDecisionEngine', () => {
  let harness: Harness;

  afterEach(() => {
    harness.close();
  });

  async function seed(fetchedAt: Date): Promise<void> {
    await harness.enrichment.put({
      fingerprint: FINGERPRINT,
      contact: contactFor('cached'),
      fetchedAt,
      sourceBatchId: 'older-batch',
    });
  }

  it('reuses a cached entry under prefer_cache without calling the provider', async () => {
    harness = createHarness({ now: () => NOW });
    await seed(new Date('2020-01-01T00:00:00Z'));

    const outcome = await harness.decisions.decide(record('12 Main Street'), preferCache);

    expect(outcome).toMatchObject({ source: 'cache', fingerprint: FINGERPRINT, contact: contactFor('cached') });
    expect(harness.provider.calls).toBe(0);
  });

  it('buys and stores a result on a miss', async () => {
    harness = createHarness({ now: () => NOW });

    const outcome = await harness.decisions.decide(record('12 Main St'), preferCache);

    expect(outcome).toEqual({
      source: 'fresh',
      fingerprint: FINGERPRINT,
      fetchedAt: NOW,
      contact: contactFor('12 Main St'),
    });
    expect(harness.provider.calls).toBe(1);
    expect(harness.enrichment.entries.get(FINGERPRINT)).toMatchObject({ fetchedAt: NOW, sourceBatchId: 'batch-1' });
  });

  it('treats entries older than the maximum age as stale', async () => {
    harness = createHarness({ now: () => NOW, maxAgeDays: 30 });
    await seed(new Date('2026-01-01T00:00:00Z'));

    const outcome = await harness.decisions.decide(record('12 Main St'), preferCache);

    expect(outcome.source).toBe('fresh');
    expect(harness.provider.calls).toBe(1);
  });

  it('pays once per fingerprint under force_refresh and reuses that result', async () => {
    harness = createHarness({ now: () => NOW });
    await seed(new Date('2026-02-28T00:00:00Z'));

    const first = await harness.decisions.decide(record('12 Main St', 1), forceRefresh);
    const second = await harness.decisions.decide(record('12 Main Street', 2), forceRefresh);

    expect(first.source).toBe('fresh');
    expect(second.source).toBe('cache');
    expect(harness.provider.calls).toBe(1);
  });

  it('fetches a fingerprint once when records race for it', async () => {
    harness = createHarness({ now: () => NOW });
    harness.provider.delayMs = 10;

    const outcomes = await Promise.all(
      ['12 Main St', '12 main street', '12  MAIN ST.', '12 Main St', '12 Main Street']
        .map((street, index) => harness.decisions.decide(record(street, index + 1), preferCache)),
    );

    expect(harness.provider.calls).toBe(1);
    expect(outcomes.map((outcome) => outcome.source).sort()).toEqual(['cache', 'cache', 'cache', 'cache', 'fresh']);
  });

  it('remembers not-found answers per batch without caching them', async () => {
    harness = createHarness({ now: () => NOW });
    harness.provider.unknownStreets.add('9 Nowhere Rd');
    const unknown = record('9 Nowhere Rd');

    expect((await harness.decisions.decide(unknown, preferCache)).source).toBe('not_found');
    expect((await harness.decisions.decide(unknown, preferCache)).source).toBe('not_found');
    expect(harness.provider.calls).toBe(1);
    expect(harness.enrichment.entries.size).toBe(0);

    await harness.decisions.decide(unknown, { ...preferCache, batchId: 'batch-2' });
    expect(harness.provider.calls).toBe(2);

    harness.decisions.forgetBatch('batch-1');
    await harness.decisions.decide(unknown, preferCache);
    expect(harness.provider.calls).toBe(3);
  });

  it('lets a provider failure reach the caller', async () => {
    harness = createHarness({ now: () => NOW });
    harness.provider.outage = new ExternalServiceError('service_error', 'vendor down');

    await expect(harness.decisions.decide(record('12 Main St'), preferCache)).rejects.toBeInstanceOf(ExternalServiceError);
    expect(harness.enrichment.entries.size).toBe(0);
  });
});
