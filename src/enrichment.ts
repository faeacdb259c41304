import { UnresolvedReferenceError } from './errors.js';
import type { ItemMasterRecord, PickingRow, ShipmentRow, UnresolvedReference } from './types.js';

export interface JoinResult {
  rows: PickingRow[];
  unresolved: UnresolvedReference[];
  errors: UnresolvedReferenceError[];
}

export function buildMasterLookup(records: ItemMasterRecord[]): Map<string, ItemMasterRecord> {
  const lookup = new Map<string, ItemMasterRecord>();
  for (const record of records) {
    // Later rows replace earlier ones.
    lookup.set(record.itemCode, record);
  }
  return lookup;
}

function lineNoFor(row: ShipmentRow): string {
  return row.origin.kind === 'component' ? `${row.line}-${row.origin.componentIndex}` : String(row.line);
}

/**
 * Joins shipment lines with the item master on the exact item code.
 * Lines that do not resolve are left out of `rows` and listed in `unresolved`.
 */
export function joinWithMaster(rows: ShipmentRow[], master: Map<string, ItemMasterRecord>): JoinResult {
  const picking: PickingRow[] = [];
  const unresolved: UnresolvedReference[] = [];
  const errors: UnresolvedReferenceError[] = [];

  for (const row of rows) {
    const nested = row.origin.kind === 'component' && row.origin.nestedBom;
    const record = nested ? undefined : master.get(row.itemCode);
    if (!record) {
      const reason = nested ? 'nested-bom' : 'missing-master';
      unresolved.push({ itemCode: row.itemCode, line: row.line, reason });
      errors.push(new UnresolvedReferenceError(row.itemCode, row.line, reason));
      continue;
    }

    const component = row.origin.kind === 'component' ? row.origin : null;
    picking.push({
      lineNo: lineNoFor(row),
      sequence: picking.length + 1,
      line: row.line,
      itemCode: row.itemCode,
      quantity: row.quantity,
      quantityNote: component ? component.quantityNote : '',
      destination: row.destination,
      orderNumber: row.orderNumber,
      shipDate: row.shipDate,
      description: record.description,
      unit: record.unit,
      itemType: record.itemType,
      location: record.location,
      notice: record.notice,
      isComponent: component !== null,
      parentItemCode: component ? component.parentItemCode : null,
      code: { status: 'pending' }
    });
  }

  return { rows: picking, unresolved, errors };
}
