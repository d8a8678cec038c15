/**
 * Result Aggregator Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { TaskSlice } from '@scatter/shared';
import { TASK_TYPES } from '@scatter/shared';
import { ResultAggregator } from '../aggregator.js';
import type { SliceOutcome } from '../../dispatch/dispatcher.js';

const slice: TaskSlice = { endpoint: { host: 'worker-a', port: 3000 }, files: [] };

function succeeded(items: unknown[]): SliceOutcome {
  return { ok: true, slice, items, durationMs: 1 };
}

function failed(): SliceOutcome {
  return {
    ok: false,
    slice,
    failure: { reason: 'timeout', message: 'No response within 45000ms' },
    durationMs: 45000,
  };
}

async function* stream(...outcomes: SliceOutcome[]): AsyncGenerator<SliceOutcome> {
  for (const outcome of outcomes) {
    yield outcome;
  }
}

const toBase64 = (text: string): string => Buffer.from(text, 'utf-8').toString('base64');

describe('ResultAggregator', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'scatter-results-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should write decoded image bytes verbatim', async () => {
    const png = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x01]);
    const outputDir = join(root, 'image');
    const aggregator = new ResultAggregator(TASK_TYPES.image, outputDir);
    await aggregator.prepare();

    const result = await aggregator.consume(
      stream(succeeded([{ filename: 'dot.png', image_data: png.toString('base64') }]))
    );

    const expectedPath = join(outputDir, 'processed_dot.png');
    expect(result).toEqual({
      taskType: 'image',
      message: 'Image processing complete',
      totalPersisted: 1,
      outputPaths: [expectedPath],
    });
    expect(Buffer.compare(await readFile(expectedPath), png)).toBe(0);
  });

  it('should write JSON payloads as text with the type suffix', async () => {
    const outputDir = join(root, 'document');
    const aggregator = new ResultAggregator(TASK_TYPES.document, outputDir);
    await aggregator.prepare();

    const result = await aggregator.consume(
      stream(succeeded([{ filename: 'report.pdf', document_data: toBase64('{"pages":3}') }]))
    );

    expect(result.message).toBe('Document processing complete');
    expect(result.outputPaths).toEqual([join(outputDir, 'report_document_analysis.json')]);
    expect(await readFile(join(outputDir, 'report_document_analysis.json'), 'utf-8')).toBe(
      '{"pages":3}'
    );
  });

  it('should skip bad items and keep the good ones', async () => {
    const outputDir = join(root, 'text');
    const aggregator = new ResultAggregator(TASK_TYPES.text, outputDir);
    await aggregator.prepare();

    const itemOutcomes = await aggregator.addSlice(
      succeeded([
        { filename: 'good.txt', analysis_data: toBase64('{"ok":true}') },
        { filename: 'bad.txt', analysis_data: '%%%' },
        { filename: 'empty.txt' },
        { filename: 'also-good.txt', analysis_data: toBase64('[]') },
      ])
    );

    expect(itemOutcomes.map((o) => o.ok)).toEqual([true, false, false, true]);
    expect(aggregator.result().totalPersisted).toBe(2);
    expect((await readdir(outputDir)).sort()).toEqual([
      'also-good_analysis.json',
      'good_analysis.json',
    ]);
    expect(aggregator.getStats()).toEqual({
      slicesSucceeded: 1,
      slicesFailed: 0,
      itemsPersisted: 2,
      itemsFailed: 2,
    });
  });

  it('should count only surviving slices when one fails', async () => {
    const outputDir = join(root, 'ocr');
    const aggregator = new ResultAggregator(TASK_TYPES.ocr, outputDir);
    await aggregator.prepare();

    const result = await aggregator.consume(
      stream(
        failed(),
        succeeded([
          { filename: 'a.png', ocr_data: toBase64('{"text":"a"}') },
          { filename: 'b.png', ocr_data: toBase64('{"text":"b"}') },
        ])
      )
    );

    expect(result.totalPersisted).toBe(2);
    expect(aggregator.getStats()).toMatchObject({ slicesSucceeded: 1, slicesFailed: 1 });
  });

  it('should produce an empty result when every slice fails', async () => {
    const aggregator = new ResultAggregator(TASK_TYPES.audio, join(root, 'audio'));
    await aggregator.prepare();

    const result = await aggregator.consume(stream(failed(), failed()));

    expect(result).toEqual({
      taskType: 'audio',
      message: 'Audio processing complete',
      totalPersisted: 0,
      outputPaths: [],
    });
  });

  it('should report a write failure as an item error', async () => {
    // Output directory never created
    const aggregator = new ResultAggregator(TASK_TYPES.image, join(root, 'missing', 'image'));

    const [outcome] = await aggregator.addSlice(
      succeeded([{ filename: 'a.png', image_data: 'AAAA' }])
    );

    expect(outcome?.ok).toBe(false);
    if (outcome && !outcome.ok) {
      expect(outcome.error.reason).toBe('write-failed');
      expect(outcome.error.filename).toBe('a.png');
    }
    expect(aggregator.result().totalPersisted).toBe(0);
  });
});
