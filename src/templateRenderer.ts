import { formatQuantity } from './bomExpander.js';
import type { GridSpec, RenderableField } from './config.js';
import { TemplateError } from './errors.js';
import type { Page, PickingRow } from './types.js';

export interface SlotGeometry {
  topMm: number;
  heightMm: number;
  padding: { top: number; right: number; bottom: number; left: number };
  innerWidthMm: number;
  innerHeightMm: number;
  codeSizeMm: number;
  codeSide: 'left' | 'right';
  textWidthMm: number;
}

export interface DocumentMeta {
  title: string;
  generatedAt: Date;
}

const FIELD_LABELS: Record<RenderableField, string> = {
  itemCode: 'Item',
  description: 'Description',
  quantity: 'Quantity',
  unit: 'Unit',
  destination: 'Destination',
  orderNumber: 'Order',
  shipDate: 'Ship date',
  itemType: 'Type',
  location: 'Location',
  notice: 'Notice'
};

function round(value: number): number {
  return Math.round(value * 100) / 100;
}

function mm(value: number): string {
  return `${round(value)}mm`;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * Geometry of slot `slotIndex` (0-based). Edges that come closer to the sheet border
 * than the printer margin get the missing distance added to their padding.
 */
export function computeSlotGeometry(grid: GridSpec, slotIndex: number): SlotGeometry {
  const topMm = slotIndex * grid.slotHeightMm;
  const bottomGap = grid.sheetHeightMm - (topMm + grid.slotHeightMm);
  const padding = {
    top: round(grid.slotPaddingMm + Math.max(0, grid.printerMarginMm - topMm)),
    right: round(grid.slotPaddingMm + grid.printerMarginMm),
    bottom: round(grid.slotPaddingMm + Math.max(0, grid.printerMarginMm - bottomGap)),
    left: round(grid.slotPaddingMm + grid.printerMarginMm)
  };
  const innerWidthMm = round(grid.sheetWidthMm - padding.left - padding.right);
  const innerHeightMm = round(grid.slotHeightMm - padding.top - padding.bottom);
  const codeSizeMm = round(Math.max(0, Math.min(grid.codeSizeMm, innerHeightMm, innerWidthMm / 2)));

  return {
    topMm: round(topMm),
    heightMm: grid.slotHeightMm,
    padding,
    innerWidthMm,
    innerHeightMm,
    codeSizeMm,
    codeSide: grid.codePosition === 'left-edge' ? 'left' : 'right',
    textWidthMm: round(Math.max(0, innerWidthMm - codeSizeMm - grid.slotPaddingMm))
  };
}

export function assertRenderable(row: PickingRow, grid: GridSpec): void {
  for (const field of grid.requiredFields) {
    const value = row[field];
    const present = typeof value === 'number' ? Number.isFinite(value) : value.trim() !== '';
    if (!present) {
      throw new TemplateError(
        field,
        row.lineNo,
        `Line ${row.lineNo} (${row.itemCode || 'no item code'}) has no value for required field "${field}"`
      );
    }
  }
}

function quantityText(row: PickingRow): string {
  const quantity = [formatQuantity(row.quantity), row.unit].filter(Boolean).join(' ');
  return row.quantityNote ? `${quantity} (${row.quantityNote})` : quantity;
}

function fieldRows(row: PickingRow): string {
  const entries: Array<[string, string]> = [
    [FIELD_LABELS.itemCode, row.itemCode],
    [FIELD_LABELS.description, row.description],
    [FIELD_LABELS.quantity, quantityText(row)],
    [FIELD_LABELS.location, row.location],
    [FIELD_LABELS.orderNumber, row.orderNumber],
    [FIELD_LABELS.itemType, row.itemType],
    [FIELD_LABELS.notice, row.notice]
  ];
  return entries
    .filter(([, value]) => value !== '')
    .map(([label, value]) => `<tr><th>${escapeHtml(label)}</th><td>${escapeHtml(value)}</td></tr>`)
    .join('');
}

function codeBlock(row: PickingRow, geometry: SlotGeometry): string {
  const style = `width:${mm(geometry.codeSizeMm)};height:${mm(geometry.codeSizeMm)}`;
  if (row.code.status === 'ready') {
    return `<div class="slot-code" style="${style}"><img src="${escapeHtml(row.code.relativePath)}" alt="${escapeHtml(row.itemCode)}"></div>`;
  }
  return `<div class="slot-code code-missing" style="${style}">NO CODE</div>`;
}

function slotFrame(geometry: SlotGeometry, body: string, extraClass = ''): string {
  const { padding } = geometry;
  const style =
    `top:${mm(geometry.topMm)};height:${mm(geometry.heightMm)};` +
    `padding:${mm(padding.top)} ${mm(padding.right)} ${mm(padding.bottom)} ${mm(padding.left)}`;
  return `<section class="slot${extraClass}" style="${style}">${body}</section>`;
}

function renderSlot(row: PickingRow, geometry: SlotGeometry): string {
  const header = [`No. ${row.lineNo}`, row.shipDate, row.destination].filter(Boolean).map(escapeHtml).join(' · ');
  const text =
    `<div class="slot-text" style="width:${mm(geometry.textWidthMm)}">` +
    `<div class="slot-header">${header}</div>` +
    `<table class="fields">${fieldRows(row)}</table>` +
    `</div>`;
  const code = codeBlock(row, geometry);
  const body = geometry.codeSide === 'right' ? text + code : code + text;
  return slotFrame(geometry, `<div class="slot-body code-${geometry.codeSide}">${body}</div>`, row.isComponent ? ' slot-component' : '');
}

/** Markup of one sheet; slots past the last row are left blank. */
export function renderPage(page: Page, grid: GridSpec): string {
  const slots: string[] = [];
  for (let index = 0; index < grid.slotsPerPage; index += 1) {
    const geometry = computeSlotGeometry(grid, index);
    const row = page.rows[index];
    if (row) {
      assertRenderable(row, grid);
      slots.push(renderSlot(row, geometry));
    } else {
      slots.push(slotFrame(geometry, '', ' slot-empty'));
    }
  }
  return `<div class="page" data-page="${page.number}">${slots.join('')}</div>`;
}

function stylesheet(grid: GridSpec): string {
  return `
    @page { size: ${mm(grid.sheetWidthMm)} ${mm(grid.sheetHeightMm)}; margin: 0; }
    * { box-sizing: border-box; }
    html, body { margin: 0; padding: 0; }
    body { font-family: 'Noto Sans JP', 'Hiragino Sans', 'Yu Gothic', Arial, sans-serif; color: #000; }
    .page { position: relative; width: ${mm(grid.sheetWidthMm)}; height: ${mm(grid.sheetHeightMm)}; overflow: hidden; }
    .page:not(:last-child) { page-break-after: always; }
    .slot { position: absolute; left: 0; width: ${mm(grid.sheetWidthMm)}; border-bottom: 0.2mm dashed #999; overflow: hidden; }
    .slot-body { display: flex; height: 100%; align-items: flex-start; justify-content: space-between; }
    .slot-header { font-size: ${grid.fontSizeHeaderPx}px; font-weight: bold; margin-bottom: 1mm; }
    .fields { border-collapse: collapse; width: 100%; }
    .fields th { font-size: ${grid.fontSizeLabelPx}px; font-weight: normal; text-align: left; white-space: nowrap; padding-right: 2mm; vertical-align: top; }
    .fields td { font-size: ${grid.fontSizeValuePx}px; word-break: break-all; }
    .slot-code img { width: 100%; height: 100%; }
    .code-missing { border: 0.3mm solid #000; display: flex; align-items: center; justify-content: center; font-size: ${grid.fontSizeLabelPx}px; }
    .slot-component .slot-header::before { content: '↳ '; }
  `;
}

export function renderDocument(pages: Page[], grid: GridSpec, meta: DocumentMeta): string {
  const body = pages.map(page => renderPage(page, grid)).join('\n');
  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="utf-8">',
    `<title>${escapeHtml(meta.title)}</title>`,
    `<meta name="generated-at" content="${meta.generatedAt.toISOString()}">`,
    `<style>${stylesheet(grid)}</style>`,
    '</head>',
    '<body>',
    body,
    '</body>',
    '</html>',
    ''
  ].join('\n');
}
