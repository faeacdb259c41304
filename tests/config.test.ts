import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  SHIPMENT_FIELDS,
  buildColumnSpecs,
  loadConfig,
  parseConfig,
  resolveBomPath
} from '../src/config.js';
import { ConfigError } from '../src/errors.js';
import { CONFIG_PATH } from './fixtures.js';

const columns = {
  shipment: {
    itemCode: 'item_code',
    quantity: ['quantity', 'Qty'],
    destination: 'destination',
    orderNumber: 'order_number',
    shipDate: 'ship_date'
  },
  master: {
    itemCode: 'item_code',
    description: 'description',
    unit: 'unit',
    itemType: 'item_type',
    location: 'location',
    notice: 'notice'
  },
  bom: {
    parentItemCode: 'parent',
    componentItemCode: 'component',
    quantityPerParent: 'qty',
    sequence: 'seq'
  }
};

describe('parseConfig', () => {
  it('fills in the default grid and code settings', () => {
    const config = parseConfig({ columns });

    expect(config.headerScanRows).toBe(5);
    expect(config.bom).toEqual({ path: null, keepParent: false });
    expect(config.grid).toMatchObject({
      slotsPerPage: 6,
      sheetWidthMm: 210,
      sheetHeightMm: 297,
      slotHeightMm: 49.5,
      printerMarginMm: 5,
      codeSizeMm: 30,
      requiredFields: ['itemCode', 'description', 'quantity']
    });
    expect(config.code).toEqual({ symbology: 'qrcode', scale: 4, dpi: 300 });
  });

  it('turns single aliases into lists', () => {
    const config = parseConfig({ columns });

    expect(config.columns.shipment.itemCode).toEqual(['item_code']);
    expect(config.columns.shipment.quantity).toEqual(['quantity', 'Qty']);
  });

  it('rejects slots that overflow the sheet', () => {
    expect(() => parseConfig({ columns, grid: { slotsPerPage: 7 } }, 'grid.json')).toThrow(
      'Invalid configuration in grid.json: grid.slotHeightMm: slotsPerPage × slotHeightMm exceeds the sheet height'
    );
  });

  it('rejects unknown keys and missing column groups', () => {
    expect(() => parseConfig({ columns, colour: 'red' })).toThrow(ConfigError);
    expect(() => parseConfig({ columns: { shipment: columns.shipment, master: columns.master } })).toThrow(
      /columns\.bom/
    );
  });

  it('requires an alias list for every field', () => {
    const shipment = { itemCode: 'item_code', quantity: 'quantity' };

    expect(() => parseConfig({ columns: { ...columns, shipment } })).toThrow(/columns\.shipment\.destination/);
  });

  it('rejects an unknown symbology', () => {
    expect(() => parseConfig({ columns, code: { symbology: 'aztec' } })).toThrow(/code\.symbology/);
  });
});

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'picking-config-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('loads the bundled configuration', async () => {
    const loaded = await loadConfig(CONFIG_PATH);

    expect(loaded.source).toBe(CONFIG_PATH);
    expect(loaded.data.columns.shipment.itemCode).toContain('品目コード');
    expect(loaded.data.grid.slotsPerPage).toBe(6);
  });

  it('reports a missing file', async () => {
    const missing = path.join(tempDir, 'nope.json');

    await expect(loadConfig(missing)).rejects.toThrow(`Configuration file not found: ${missing}`);
  });

  it('reports malformed JSON', async () => {
    const filePath = path.join(tempDir, 'bad.json');
    await fs.writeFile(filePath, '{ "columns": ', 'utf8');

    await expect(loadConfig(filePath)).rejects.toBeInstanceOf(ConfigError);
  });

  it('resolves a relative BOM path against the configuration file', async () => {
    const filePath = path.join(tempDir, 'picking.json');
    await fs.writeFile(filePath, JSON.stringify({ columns, bom: { path: 'data/bom.xlsx' } }), 'utf8');

    const loaded = await loadConfig(filePath);

    expect(resolveBomPath(loaded)).toBe(path.join(tempDir, 'data', 'bom.xlsx'));
    expect(resolveBomPath({ source: filePath, data: parseConfig({ columns }) })).toBeNull();
  });
});

describe('buildColumnSpecs', () => {
  it('combines field types with the configured aliases', () => {
    const specs = buildColumnSpecs(SHIPMENT_FIELDS, parseConfig({ columns }).columns.shipment);

    expect(specs[1]).toEqual({ key: 'quantity', type: 'decimal', required: true, aliases: ['quantity', 'Qty'] });
    expect(specs.map(spec => spec.key)).toEqual(['itemCode', 'quantity', 'destination', 'orderNumber', 'shipDate']);
  });
});
