import fs from 'fs/promises';
import path from 'path';
import ExcelJS from 'exceljs';
import { BOM_FIELDS, MASTER_FIELDS, SHIPMENT_FIELDS, buildColumnSpecs } from './config.js';
import type { PipelineConfig } from './config.js';
import { InputFileError, ParseError, SchemaError } from './errors.js';
import type { BomEntry, CellValue, ColumnSpec, ItemMasterRecord, ShipmentRow, TableRow } from './types.js';

export interface LoadOptions {
  /** How many leading rows may hold the header. */
  headerScanRows?: number;
}

export interface LoadedTable<K extends string> {
  filePath: string;
  headerRow: number;
  /** Column index (1-based) each field was read from; absent optional fields are missing. */
  columns: Partial<Record<K, number>>;
  rows: TableRow<K>[];
}

const NUMBER_PATTERN = /^[-+]?(\d+(\.\d*)?|\.\d+)$/;
const INTEGER_PATTERN = /^[-+]?\d+$/;

export function normalizeHeader(name: string): string {
  return name.normalize('NFKC').replace(/\s+/g, '');
}

function formatDate(value: Date): string {
  return value.toISOString().slice(0, 10);
}

function toCellValue(value: ExcelJS.CellValue): CellValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed ? trimmed : null;
  }
  if (typeof value === 'boolean') {
    return value ? 'TRUE' : 'FALSE';
  }
  if (value instanceof Date) {
    return formatDate(value);
  }
  if ('richText' in value) {
    return toCellValue(value.richText.map(part => part.text).join(''));
  }
  if ('hyperlink' in value) {
    return toCellValue(value.text);
  }
  if ('formula' in value || 'sharedFormula' in value) {
    return value.result === undefined ? null : toCellValue(value.result);
  }
  // Error cells (#N/A, #REF!) carry no usable value.
  return null;
}

async function readWorksheet(filePath: string): Promise<ExcelJS.Worksheet> {
  try {
    await fs.access(filePath);
  } catch (error) {
    throw new InputFileError(filePath, `Input file not found: ${filePath}`, { cause: error });
  }

  const extension = path.extname(filePath).toLowerCase();
  const workbook = new ExcelJS.Workbook();
  try {
    if (extension === '.xlsx' || extension === '.xlsm') {
      await workbook.xlsx.readFile(filePath);
      const sheet = workbook.worksheets[0];
      if (!sheet) {
        throw new Error('workbook has no worksheets');
      }
      return sheet;
    }
    if (extension === '.csv' || extension === '.tsv' || extension === '.txt') {
      // Keep every cell as text; the schema decides what becomes a number.
      return await workbook.csv.readFile(filePath, {
        map: (value: unknown) => value,
        parserOptions: { delimiter: extension === '.csv' ? ',' : '\t' }
      });
    }
  } catch (error) {
    throw new InputFileError(filePath, `Could not read ${filePath}: ${error instanceof Error ? error.message : error}`, {
      cause: error
    });
  }
  throw new SchemaError(filePath, [], `Unsupported spreadsheet format "${extension || '(none)'}": ${filePath}`);
}

function readHeader(sheet: ExcelJS.Worksheet, rowNumber: number): string[] {
  const row = sheet.getRow(rowNumber);
  const seen = new Map<string, number>();
  const names: string[] = [];
  for (let col = 1; col <= sheet.columnCount; col += 1) {
    const value = toCellValue(row.getCell(col).value);
    let name = value === null ? '' : normalizeHeader(String(value));
    if (name) {
      // Repeated headers get ".1", ".2" suffixes so each stays addressable.
      const count = seen.get(name) ?? 0;
      seen.set(name, count + 1);
      if (count > 0) {
        name = `${name}.${count}`;
      }
    }
    names.push(name);
  }
  return names;
}

function matchColumns<K extends string>(header: string[], columns: ColumnSpec<K>[]): Partial<Record<K, number>> {
  const matched: Partial<Record<K, number>> = {};
  for (const column of columns) {
    for (const alias of column.aliases) {
      const index = header.indexOf(normalizeHeader(alias));
      if (index >= 0) {
        matched[column.key] = index + 1;
        break;
      }
    }
  }
  return matched;
}

function coerce(
  value: CellValue,
  column: ColumnSpec,
  filePath: string,
  sheetRow: number
): CellValue {
  if (column.type === 'text') {
    return value === null ? '' : String(value);
  }

  if (value === null) {
    if (column.required) {
      throw new ParseError(filePath, sheetRow, column.key, `${filePath} row ${sheetRow}: "${column.key}" is empty`);
    }
    return null;
  }

  let parsed: number;
  if (typeof value === 'number') {
    parsed = value;
  } else {
    const text = value.replace(/[,\s]/g, '');
    const pattern = column.type === 'integer' ? INTEGER_PATTERN : NUMBER_PATTERN;
    parsed = pattern.test(text) ? Number(text) : Number.NaN;
  }

  if (!Number.isFinite(parsed) || (column.type === 'integer' && !Number.isInteger(parsed))) {
    throw new ParseError(
      filePath,
      sheetRow,
      column.key,
      `${filePath} row ${sheetRow}: "${column.key}" value "${value}" is not a valid ${column.type}`
    );
  }
  return parsed;
}

/**
 * Reads the first worksheet of `filePath` into rows keyed by the schema's field names.
 * The header may sit on any of the first `headerScanRows` rows.
 */
export async function loadTable<K extends string>(
  filePath: string,
  columns: ColumnSpec<K>[],
  options: LoadOptions = {}
): Promise<LoadedTable<K>> {
  const sheet = await readWorksheet(filePath);
  const scanRows = Math.max(1, Math.min(options.headerScanRows ?? 5, sheet.rowCount));
  const required = columns.filter(column => column.required);

  let headerRow = 0;
  let matched: Partial<Record<K, number>> = {};
  let best: { row: number; missing: string[] } | null = null;

  for (let row = 1; row <= scanRows; row += 1) {
    const candidate = matchColumns(readHeader(sheet, row), columns);
    const missing = required.filter(column => candidate[column.key] === undefined).map(column => column.key);
    if (missing.length === 0) {
      headerRow = row;
      matched = candidate;
      break;
    }
    if (!best || missing.length < best.missing.length) {
      best = { row, missing };
    }
  }

  if (!headerRow) {
    const missing = best ? best.missing : required.map(column => column.key);
    throw new SchemaError(
      filePath,
      missing,
      `${filePath}: required columns not found: ${missing.join(', ')}`
    );
  }

  const rows: TableRow<K>[] = [];
  for (let sheetRow = headerRow + 1; sheetRow <= sheet.rowCount; sheetRow += 1) {
    const row = sheet.getRow(sheetRow);
    const raw = new Map<K, CellValue>();
    for (const column of columns) {
      const col = matched[column.key];
      raw.set(column.key, col === undefined ? null : toCellValue(row.getCell(col).value));
    }
    if ([...raw.values()].every(value => value === null)) {
      continue;
    }

    const values: Partial<Record<K, CellValue>> = {};
    for (const column of columns) {
      values[column.key] = coerce(raw.get(column.key) ?? null, column, filePath, sheetRow);
    }
    rows.push({ line: rows.length + 1, sheetRow, values });
  }

  return { filePath, headerRow, columns: matched, rows };
}

export function textValue<K extends string>(row: TableRow<K>, key: K): string {
  const value = row.values[key];
  if (value === null || value === undefined) {
    return '';
  }
  return typeof value === 'string' ? value : String(value);
}

export function numberValue<K extends string>(row: TableRow<K>, key: K): number | null {
  const value = row.values[key];
  return typeof value === 'number' ? value : null;
}

function requireNumber<K extends string>(table: LoadedTable<K>, row: TableRow<K>, key: K): number {
  const value = numberValue(row, key);
  if (value === null) {
    throw new ParseError(table.filePath, row.sheetRow, key, `${table.filePath} row ${row.sheetRow}: "${key}" is empty`);
  }
  return value;
}

function requireText<K extends string>(table: LoadedTable<K>, row: TableRow<K>, key: K): string {
  const value = textValue(row, key);
  if (!value) {
    throw new ParseError(table.filePath, row.sheetRow, key, `${table.filePath} row ${row.sheetRow}: "${key}" is empty`);
  }
  return value;
}

export async function loadShipment(filePath: string, config: PipelineConfig): Promise<ShipmentRow[]> {
  const table = await loadTable(filePath, buildColumnSpecs(SHIPMENT_FIELDS, config.columns.shipment), {
    headerScanRows: config.headerScanRows
  });
  return table.rows.map(row => ({
    line: row.line,
    itemCode: requireText(table, row, 'itemCode'),
    quantity: requireNumber(table, row, 'quantity'),
    destination: textValue(row, 'destination'),
    orderNumber: textValue(row, 'orderNumber'),
    shipDate: textValue(row, 'shipDate'),
    origin: { kind: 'shipment' }
  }));
}

export async function loadItemMaster(filePath: string, config: PipelineConfig): Promise<ItemMasterRecord[]> {
  const table = await loadTable(filePath, buildColumnSpecs(MASTER_FIELDS, config.columns.master), {
    headerScanRows: config.headerScanRows
  });
  return table.rows
    .filter(row => textValue(row, 'itemCode') !== '')
    .map(row => ({
      itemCode: textValue(row, 'itemCode'),
      description: textValue(row, 'description'),
      unit: textValue(row, 'unit'),
      itemType: textValue(row, 'itemType'),
      location: textValue(row, 'location'),
      notice: textValue(row, 'notice')
    }));
}

export async function loadBom(filePath: string, config: PipelineConfig): Promise<BomEntry[]> {
  const table = await loadTable(filePath, buildColumnSpecs(BOM_FIELDS, config.columns.bom), {
    headerScanRows: config.headerScanRows
  });
  return table.rows
    .filter(row => textValue(row, 'parentItemCode') !== '' && textValue(row, 'componentItemCode') !== '')
    .map(row => ({
      parentItemCode: textValue(row, 'parentItemCode'),
      componentItemCode: textValue(row, 'componentItemCode'),
      quantityPerParent: requireNumber(table, row, 'quantityPerParent'),
      sequence: textValue(row, 'sequence')
    }));
}
