import fs from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';
import ExcelJS from 'exceljs';
import { loadConfig } from '../src/config.js';
import type { LoadedConfig } from '../src/config.js';
import type { RenderBackend } from '../src/documentRenderer.js';
import type { PickingRow } from '../src/types.js';

export const CONFIG_PATH = fileURLToPath(new URL('../config/picking.json', import.meta.url));

export async function testConfig(): Promise<LoadedConfig> {
  return loadConfig(CONFIG_PATH);
}

export async function writeWorkbook(filePath: string, rows: Array<Array<string | number | Date | null>>): Promise<string> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet('Sheet1');
  for (const row of rows) {
    sheet.addRow(row);
  }
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await workbook.xlsx.writeFile(filePath);
  return filePath;
}

export function pickingRow(overrides: Partial<PickingRow> = {}): PickingRow {
  return {
    lineNo: '1',
    sequence: 1,
    line: 1,
    itemCode: 'A-100',
    quantity: 2,
    quantityNote: '',
    destination: 'CUST',
    orderNumber: 'ORD-001',
    shipDate: '2025-10-01',
    description: 'Sample product',
    unit: 'PC',
    itemType: 'Finished',
    location: 'LOC-1',
    notice: '',
    isComponent: false,
    parentItemCode: null,
    code: { status: 'pending' },
    ...overrides
  };
}

export function rowsFor(codes: string[]): PickingRow[] {
  return codes.map((itemCode, index) =>
    pickingRow({ itemCode, lineNo: String(index + 1), sequence: index + 1, line: index + 1 })
  );
}

/** Backend that writes a fixed payload instead of converting the markup. */
export function fakeBackend(name: string, behaviour: 'ok' | 'unavailable' | 'fail' = 'ok'): RenderBackend & {
  calls: string[];
} {
  const calls: string[] = [];
  return {
    name,
    calls,
    async isAvailable() {
      return behaviour !== 'unavailable';
    },
    async render(markupPath: string, outputPath: string) {
      calls.push(markupPath);
      if (behaviour === 'fail') {
        await fs.writeFile(outputPath, '%PDF-partial');
        throw new Error(`${name} crashed`);
      }
      await fs.writeFile(outputPath, `%PDF-${name}`);
    }
  };
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
