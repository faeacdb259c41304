import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import type { LoadedConfig } from '../src/config.js';
import { PipelineFailure } from '../src/errors.js';
import { runPipeline } from '../src/pipeline.js';
import type { PipelineRequest } from '../src/pipeline.js';
import { codeFileName } from '../src/scannableCode.js';
import { exists, fakeBackend, testConfig, writeWorkbook } from './fixtures.js';

const SHIPMENT_HEADER = ['item_code', 'quantity', 'destination', 'order_number', 'ship_date'];
const MASTER_HEADER = ['item_code', 'description', 'unit', 'location'];

function itemCodes(count: number): string[] {
  return Array.from({ length: count }, (_, index) => `P-${String(index + 1).padStart(3, '0')}`);
}

describe('runPipeline', () => {
  let tempDir: string;
  let outputDir: string;
  let config: LoadedConfig;
  const now = () => new Date('2025-10-01T06:30:00.000Z');

  beforeAll(async () => {
    config = await testConfig();
  });

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'picking-pipeline-'));
    outputDir = path.join(tempDir, 'out');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function request(shipment: string[], master: string[], extra: Partial<PipelineRequest> = {}): Promise<PipelineRequest> {
    const shipmentPath = await writeWorkbook(path.join(tempDir, 'shipment.xlsx'), [
      SHIPMENT_HEADER,
      ...shipment.map((code, index) => [code, index + 1, 'CUST', `PO-${index + 1}`, '2025-10-01'])
    ]);
    const masterPath = await writeWorkbook(path.join(tempDir, 'master.xlsx'), [
      MASTER_HEADER,
      ...master.map(code => [code, `${code} part`, 'PC', `R-${code}`])
    ]);
    return { shipmentPath, masterPath, outputDir, config, ...extra };
  }

  it('renders thirteen lines onto three pages', async () => {
    const codes = itemCodes(13);

    const result = await runPipeline(await request(codes, codes), { backends: [fakeBackend('primary')], now });

    expect(result.pages.map(page => page.rows.length)).toEqual([6, 6, 1]);
    expect(result.report).toMatchObject({
      rowsProcessed: 13,
      rowsExcluded: 0,
      codeFailures: 0,
      backendUsed: 'primary',
      pageCount: 3,
      unresolved: [],
      encodingFailures: []
    });
    expect(result.report.outputs.codes).toHaveLength(13);
    expect(await fs.readdir(path.join(outputDir, 'codes'))).toHaveLength(13);
    expect(await fs.readFile(path.join(outputDir, 'picking.pdf'), 'utf8')).toBe('%PDF-primary');

    const markup = await fs.readFile(path.join(outputDir, 'picking.html'), 'utf8');
    expect(markup.match(/<div class="page" /g)).toHaveLength(3);
    expect(markup).toContain('<title>Picking list 2025-10-01</title>');

    const report: unknown = JSON.parse(await fs.readFile(path.join(outputDir, 'report.json'), 'utf8'));
    expect(report).toEqual(result.report);
  });

  it('excludes a line missing from the item master and reports it', async () => {
    const result = await runPipeline(await request(['A', 'B', 'X', 'C', 'D'], ['A', 'B', 'C', 'D']), {
      backends: [fakeBackend('primary')],
      now
    });

    expect(result.pages).toHaveLength(1);
    expect(result.rows.map(row => row.itemCode)).toEqual(['A', 'B', 'C', 'D']);
    expect(result.report.rowsProcessed).toBe(4);
    expect(result.report.rowsExcluded).toBe(1);
    expect(result.report.unresolved).toEqual([{ itemCode: 'X', line: 3, reason: 'missing-master' }]);
    expect(result.issues.map(issue => issue.message)).toEqual(['Item X (line 3) is not in the item master']);
  });

  it('writes one code per distinct item', async () => {
    const result = await runPipeline(await request(['A', 'B', 'A', 'A'], ['A', 'B']), {
      backends: [fakeBackend('primary')],
      now
    });

    expect(result.rows).toHaveLength(4);
    expect(result.report.outputs.codes).toHaveLength(2);
    const paths = result.rows.map(row => (row.code.status === 'ready' ? row.code.relativePath : null));
    expect(paths[0]).toBe(paths[2]);
    expect(paths[0]).not.toBe(paths[1]);
  });

  it('prints rows whose code cannot be encoded without a code', async () => {
    const result = await runPipeline(await request(['A', '部品-1'], ['A', '部品-1']), {
      backends: [fakeBackend('primary')],
      now
    });

    expect(result.report.rowsProcessed).toBe(2);
    expect(result.report.codeFailures).toBe(1);
    expect(result.report.encodingFailures).toEqual([
      {
        itemCode: '部品-1',
        lineNos: ['2'],
        reason: 'Item code "部品-1" contains characters outside printable ASCII'
      }
    ]);
    const markup = await fs.readFile(result.document.markupPath, 'utf8');
    expect(markup.match(/NO CODE/g)).toHaveLength(1);
  });

  it('expands BOM parents into their components', async () => {
    const bomPath = await writeWorkbook(path.join(tempDir, 'bom.xlsx'), [
      ['parent_item_code', 'component_item_code', 'quantity_per_parent', 'sequence'],
      ['KIT', 'C-2', 1, '2'],
      ['KIT', 'C-1', 3, '1']
    ]);

    const result = await runPipeline(await request(['A', 'KIT'], ['A', 'C-1', 'C-2']), {
      backends: [fakeBackend('primary')],
      now
    });
    expect(result.rows.map(row => row.itemCode)).toEqual(['A']);
    expect(result.report.unresolved).toEqual([{ itemCode: 'KIT', line: 2, reason: 'missing-master' }]);
    await fs.rm(outputDir, { recursive: true, force: true });

    const expanded = await runPipeline(await request(['A', 'KIT'], ['A', 'C-1', 'C-2'], { bomPath }), {
      backends: [fakeBackend('primary')],
      now
    });

    expect(expanded.rows.map(row => [row.lineNo, row.itemCode, row.quantity, row.quantityNote])).toEqual([
      ['1', 'A', 1, ''],
      ['2-1', 'C-1', 6, '2 × 3'],
      ['2-2', 'C-2', 2, '2 × 1']
    ]);
    expect(expanded.report.rowsExcluded).toBe(0);
  });

  it('uses the fallback backend when the primary one is missing', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const result = await runPipeline(await request(['A'], ['A']), {
      backends: [fakeBackend('primary', 'unavailable'), fakeBackend('fallback')],
      now
    });

    expect(result.report.backendUsed).toBe('fallback');
    expect(warn).toHaveBeenCalledWith('primary is not available; trying fallback');
  });

  it('removes everything it wrote when rendering fails', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const error = await runPipeline(await request(['A', 'B'], ['A', 'B']), {
      backends: [fakeBackend('primary', 'unavailable'), fakeBackend('fallback', 'fail')],
      now
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(PipelineFailure);
    expect(error).toMatchObject({ kind: 'render' });
    expect(await exists(path.join(outputDir, 'picking.pdf'))).toBe(false);
    expect(await exists(path.join(outputDir, 'picking.html'))).toBe(false);
    expect(await exists(path.join(outputDir, 'report.json'))).toBe(false);
    expect(await exists(outputDir)).toBe(false);
  });

  it('leaves the previous run untouched when a later run fails', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    await runPipeline(await request(['A'], ['A', 'B']), { backends: [fakeBackend('primary')], now });
    const before = new Map<string, string>();
    for (const name of ['picking.html', 'picking.pdf', 'report.json', `codes/${codeFileName('A')}`]) {
      before.set(name, await fs.readFile(path.join(outputDir, name), 'latin1'));
    }

    const error = await runPipeline(await request(['B', 'A'], ['A', 'B']), {
      backends: [fakeBackend('primary', 'unavailable'), fakeBackend('fallback', 'unavailable')],
      now
    }).catch((caught: unknown) => caught);

    expect(error).toMatchObject({ kind: 'render' });
    for (const [name, content] of before) {
      expect(await fs.readFile(path.join(outputDir, name), 'latin1')).toBe(content);
    }
    expect((await fs.readdir(outputDir)).sort()).toEqual(['codes', 'picking.html', 'picking.pdf', 'report.json']);
    expect(await fs.readdir(path.join(outputDir, 'codes'))).toEqual([codeFileName('A')]);
  });

  it('replaces the previous run and keeps no backups when a later run succeeds', async () => {
    await runPipeline(await request(['A'], ['A', 'B']), { backends: [fakeBackend('primary')], now });

    await runPipeline(await request(['B', 'A'], ['A', 'B']), { backends: [fakeBackend('second')], now });

    expect(await fs.readFile(path.join(outputDir, 'picking.pdf'), 'utf8')).toBe('%PDF-second');
    expect(await fs.readFile(path.join(outputDir, 'picking.html'), 'utf8')).toContain('<td>B</td>');
    expect((await fs.readdir(outputDir)).sort()).toEqual(['codes', 'picking.html', 'picking.pdf', 'report.json']);
    expect((await fs.readdir(path.join(outputDir, 'codes'))).sort()).toEqual(
      [codeFileName('A'), codeFileName('B')].sort()
    );
  });

  it('stops before writing anything when a row lacks a required field', async () => {
    const shipmentPath = await writeWorkbook(path.join(tempDir, 'shipment.xlsx'), [
      SHIPMENT_HEADER,
      ['A', 1, 'CUST', '', '2025-10-01']
    ]);
    const masterPath = await writeWorkbook(path.join(tempDir, 'master.xlsx'), [MASTER_HEADER, ['A', null, 'PC', 'R-1']]);

    const error = await runPipeline(
      { shipmentPath, masterPath, outputDir, config },
      { backends: [fakeBackend('primary')], now }
    ).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(PipelineFailure);
    expect(error).toMatchObject({
      kind: 'template',
      affectedRows: ['1'],
      message: 'Line 1 (A) has no value for required field "description"'
    });
    expect(await exists(outputDir)).toBe(false);
  });

  it('reports a schema problem as a single failure', async () => {
    const shipmentPath = await writeWorkbook(path.join(tempDir, 'shipment.xlsx'), [['item_code'], ['A']]);
    const masterPath = await writeWorkbook(path.join(tempDir, 'master.xlsx'), [MASTER_HEADER, ['A', 'Bolt', 'PC', 'R-1']]);

    await expect(
      runPipeline({ shipmentPath, masterPath, outputDir, config }, { backends: [fakeBackend('primary')], now })
    ).rejects.toMatchObject({ kind: 'schema', name: 'PipelineFailure' });
  });

  it('renders an empty shipment as a document without pages', async () => {
    const result = await runPipeline(await request([], ['A']), { backends: [fakeBackend('primary')], now });

    expect(result.pages).toEqual([]);
    expect(result.report).toMatchObject({ rowsProcessed: 0, pageCount: 0, backendUsed: 'primary' });
  });
});
