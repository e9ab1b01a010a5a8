import assert from 'node:assert/strict';
import { test } from 'node:test';

import { ValidationError } from '../src/errors';
import type { ExportRequest, ExportResult } from '../src/imagery/exportClient';
import type { AreaRecord } from '../src/jobs/types';
import type { RasterProcessingRequest, RasterProcessingResult } from '../src/raster/processor';
import { PipelineDispatcher } from '../src/scheduler/dispatch';
import { jobRecord, SQUARE } from './helpers/fixtures';

const AREA: AreaRecord = { id: 1, name: 'Test valley', geometry: SQUARE, metadata: {}, createdAt: '2024-01-01T00:00:00.000Z' };

function createDispatcher() {
  const exportCalls: ExportRequest[] = [];
  const rasterCalls: RasterProcessingRequest[] = [];
  const exportResult: ExportResult = { months: [], failedMonths: [], metadata: { months: [], failedMonths: [] }, failure: null };
  const dispatcher = new PipelineDispatcher({
    areaStore: { get: async (areaId) => (areaId === AREA.id ? AREA : null) },
    exportClient: {
      run: async (request) => {
        exportCalls.push(request);
        return exportResult;
      }
    },
    rasterProcessor: {
      process: async (request): Promise<RasterProcessingResult> => {
        rasterCalls.push(request);
        throw new Error('raster processing is not exercised here');
      }
    }
  });
  return { dispatcher, exportCalls, rasterCalls };
}

const signal = new AbortController().signal;

test('routes export jobs to the export client with the area geometry', async () => {
  const { dispatcher, exportCalls, rasterCalls } = createDispatcher();
  const result = await dispatcher.dispatch(jobRecord({ id: 'job-3' }), signal);

  assert.deepEqual(exportCalls, [
    { jobId: 'job-3', areaId: 1, geometry: SQUARE, startDate: '2023-01-01', endDate: '2023-02-01' }
  ]);
  assert.equal(rasterCalls.length, 0);
  assert.deepEqual(result, { metadata: { months: [], failedMonths: [] }, failure: null });
});

test('routes etl jobs to the raster processor', async () => {
  const { dispatcher, rasterCalls } = createDispatcher();
  await assert.rejects(
    dispatcher.dispatch(
      jobRecord({ id: 'job-4', jobType: 'etl_processing', metadata: { raster_key: 'k.tif', month: '2023-09-01' } }),
      signal
    ),
    /raster processing is not exercised here/
  );
  assert.deepEqual(rasterCalls, [
    { jobId: 'job-4', areaId: 1, geometry: SQUARE, month: { year: 2023, month: 9 }, rasterKey: 'k.tif' }
  ]);
});

test('rejects unknown job types before touching any delegate', async () => {
  const { dispatcher, exportCalls, rasterCalls } = createDispatcher();
  await assert.rejects(
    dispatcher.dispatch(jobRecord({ jobType: 'reindex' }), signal),
    (err: unknown) => err instanceof ValidationError && err.code === 'UNKNOWN_JOB_TYPE'
  );
  assert.equal(exportCalls.length + rasterCalls.length, 0);
});

test('rejects jobs whose area no longer exists', async () => {
  const { dispatcher } = createDispatcher();
  await assert.rejects(
    dispatcher.dispatch(jobRecord({ areaId: 99 }), signal),
    (err: unknown) => err instanceof ValidationError && err.code === 'AREA_NOT_FOUND' && err.message === 'area 99 not found'
  );
});
