import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { SKIP } from '@src/common/constants/CanonicalSchema';
import HttpStatusCodes from '@src/common/constants/HttpStatusCodes';
import { BatchStateError, FieldConflictError, SchemaError } from '@src/common/util/pipeline-errors';
import { loadFieldAliases } from '@src/config/fieldAliases';
import { SchemaMapper } from '@src/services/schemaMapper';
import { UploadService, normalizeTags } from '@src/services/uploadService';
import { HEADERS, createHarness, leadRow, type Harness } from '@src/__tests__/support/pipelineHarness';
import { MemoryBatchStore, MemoryRawRowStore, MemoryRecordProgressStore } from '@src/__tests__/support/memoryStores';

const NOW = new Date('2026-03-01T00:00:00Z');

describe('UploadService', () => {
  let harness: Harness;

  beforeEach(() => {
    harness = createHarness({ now: () => NOW });
  });

  afterEach(() => {
    harness.close();
  });

  async function upload(rows: string[][]) {
    return harness.uploads.createBatch({ ownerId: 'owner-1', originalName: 'leads.csv', rows });
  }

  describe('createBatch', () => {
    it('stores the rows and proposes a mapping', async () => {
      const { batch, columns } = await upload([
        HEADERS,
        leadRow('1 Oak Ave', 'Jane', 'Doe', '5551234567'),
        leadRow('2 Elm St'),
      ]);

      expect(batch).toMatchObject({ ownerId: 'owner-1', status: 'mapping', hasHeaderRow: true, totalCount: 2 });
      expect(columns.map((column) => column.field)).toEqual([
        'first_name',
        'last_name',
        'property_street',
        'property_city',
        'property_state',
        'property_zipcode',
        'phone',
      ]);
      expect(columns[2].samples).toEqual(['1 Oak Ave', '2 Elm St']);
      expect(await harness.rawRows.load(batch.rawRef)).toHaveLength(3);
    });

    it('marks fields taken by other columns as unavailable', async () => {
      const { columns } = await upload([HEADERS, leadRow('1 Oak Ave')]);

      const optionsForLastName = columns[1].options;
      expect(optionsForLastName.find((option) => option.field === 'first_name')?.disabled).toBe(true);
      expect(optionsForLastName.find((option) => option.field === 'last_name')?.disabled).toBe(false);
      expect(optionsForLastName.find((option) => option.field === 'phone')?.disabled).toBe(false);
    });

    it('names columns by letter when the first row is data', async () => {
      const { batch, columns } = await upload([leadRow('1 Oak Ave'), leadRow('2 Elm St')]);

      expect(batch.hasHeaderRow).toBe(false);
      expect(batch.totalCount).toBe(2);
      expect(columns.map((column) => column.header)).toEqual(['A', 'B', 'C', 'D', 'E', 'F', 'G']);
      expect(columns.every((column) => column.field === SKIP && column.needsReview)).toBe(true);
    });

    it('rejects uploads without data rows', async () => {
      await expect(upload([])).rejects.toBeInstanceOf(SchemaError);
      await expect(upload([HEADERS])).rejects.toThrow('Upload has a header row but no data rows');
    });
  });

  describe('confirmMapping', () => {
    it('saves the table, policy and tags and moves the batch on', async () => {
      const { batch } = await upload([HEADERS, leadRow('1 Oak Ave')]);

      const confirmed = await harness.uploads.confirmMapping('owner-1', batch.id, {
        assignments: [
          { columnIndex: 0, field: 'first_name' },
          { columnIndex: 2, field: 'property_street' },
          { columnIndex: 5, field: 'property_zipcode' },
          { columnIndex: 6, field: 'custom_1' },
        ],
        refreshPolicy: 'force_refresh',
        tags: [' hot ', 'HOT', '', 'cold'],
      });

      expect(confirmed.mapping.map((column) => column.field)).toEqual([
        'first_name', SKIP, 'property_street', SKIP, SKIP, 'property_zipcode', 'custom_1',
      ]);
      expect(confirmed).toMatchObject({
        status: 'processing',
        refreshPolicy: 'force_refresh',
        tags: ['hot', 'cold'],
        mappingConfirmedAt: NOW,
      });
    });

    it('refuses a second confirmation', async () => {
      const batch = await harness.confirmedBatch([leadRow('1 Oak Ave')]);

      await expect(harness.uploads.confirmMapping('owner-1', batch.id, {
        assignments: [{ columnIndex: 2, field: 'property_street' }],
        refreshPolicy: 'prefer_cache',
        tags: [],
      })).rejects.toBeInstanceOf(BatchStateError);
    });

    it('requires the property street', async () => {
      const { batch } = await upload([HEADERS, leadRow('1 Oak Ave')]);

      await expect(harness.uploads.confirmMapping('owner-1', batch.id, {
        assignments: [{ columnIndex: 0, field: 'first_name' }],
        refreshPolicy: 'prefer_cache',
        tags: [],
      })).rejects.toThrow('Property Street must be mapped to a column');
    });

    it('rejects two columns on a single-column field', async () => {
      const { batch } = await upload([HEADERS, leadRow('1 Oak Ave')]);

      await expect(harness.uploads.confirmMapping('owner-1', batch.id, {
        assignments: [
          { columnIndex: 2, field: 'property_street' },
          { columnIndex: 3, field: 'email' },
          { columnIndex: 4, field: 'email' },
        ],
        refreshPolicy: 'prefer_cache',
        tags: [],
      })).rejects.toBeInstanceOf(FieldConflictError);
      expect((await harness.batches.get(batch.id))?.status).toBe('mapping');
    });
  });

  it('hides other owners\' batches', async () => {
    const { batch } = await upload([HEADERS, leadRow('1 Oak Ave')]);

    await expect(harness.uploads.getOwnedBatch('owner-2', batch.id))
      .rejects.toMatchObject({ status: HttpStatusCodes.NOT_FOUND });
  });

  it('purges a batch with its rows and progress', async () => {
    const batch = await harness.confirmedBatch([leadRow('1 Oak Ave')]);
    await harness.orchestrator.run(batch.id);

    await harness.uploads.purge('owner-1', batch.id);

    expect(harness.batches.batches.size).toBe(0);
    expect(harness.rawRows.rows.size).toBe(0);
    expect(harness.records.records.size).toBe(0);
    expect(harness.enrichment.entries.size).toBe(1);
  });

  it('refuses to purge a running batch', async () => {
    const batches = new MemoryBatchStore();
    const uploads = new UploadService({
      batches,
      rawRows: new MemoryRawRowStore(),
      records: new MemoryRecordProgressStore(),
      mapper: new SchemaMapper(loadFieldAliases()),
      runs: { isRunning: () => true },
    });
    const { batch } = await uploads.createBatch({ ownerId: 'owner-1', originalName: 'leads.csv', rows: [HEADERS, leadRow('1 Oak Ave')] });

    await expect(uploads.purge('owner-1', batch.id)).rejects.toBeInstanceOf(BatchStateError);
    expect(batches.batches.size).toBe(1);
  });

  it('refuses to purge a batch another worker holds', async () => {
    const batch = await harness.confirmedBatch([leadRow('1 Oak Ave')]);
    await harness.batches.claimLease(batch.id, 'worker-2', new Date(NOW.getTime() + 60_000), NOW);

    await expect(harness.uploads.purge('owner-1', batch.id)).rejects.toBeInstanceOf(BatchStateError);
    expect(harness.batches.batches.size).toBe(1);
  });

  it('purges a batch whose worker lease ran out', async () => {
    const batch = await harness.confirmedBatch([leadRow('1 Oak Ave')]);
    await harness.batches.claimLease(batch.id, 'worker-2', new Date(NOW.getTime() - 1), new Date(0));

    await harness.uploads.purge('owner-1', batch.id);

    expect(harness.batches.batches.size).toBe(0);
  });
});

describe('normalizeTags', () => {
  it('trims and drops blank and repeated tags', () => {
    expect(normalizeTags(['  Hot Lead ', 'hot lead', '', 'Callback'])).toEqual(['Hot Lead', 'Callback']);
  });

  it('rejects an overlong tag', () => {
    expect(() => normalizeTags(['x'.repeat(256)])).toThrow(SchemaError);
  });
});
