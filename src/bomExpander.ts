import type { BomEntry, BomLookup, ShipmentRow } from './types.js';

export interface ExpandOptions {
  /** Keep the parent line in place and list its components right after it. */
  keepParent?: boolean;
}

function compareSequence(a: BomEntry, b: BomEntry): number {
  const left = /^\d+$/.test(a.sequence) ? Number.parseInt(a.sequence, 10) : null;
  const right = /^\d+$/.test(b.sequence) ? Number.parseInt(b.sequence, 10) : null;
  if (left !== null && right !== null) {
    return left - right;
  }
  if (left !== null) {
    return -1;
  }
  if (right !== null) {
    return 1;
  }
  return a.sequence.localeCompare(b.sequence);
}

export function buildBomLookup(entries: BomEntry[]): BomLookup {
  const lookup: BomLookup = new Map();
  for (const entry of entries) {
    const list = lookup.get(entry.parentItemCode);
    if (list) {
      list.push(entry);
    } else {
      lookup.set(entry.parentItemCode, [entry]);
    }
  }
  // Array.prototype.sort is stable, so equal sequences keep file order.
  for (const list of lookup.values()) {
    list.sort(compareSequence);
  }
  return lookup;
}

export function formatQuantity(value: number): string {
  return String(roundQuantity(value));
}

export function roundQuantity(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

/**
 * Replaces every shipment line whose item is a BOM parent with one line per component.
 * Expansion is single-level: components that are BOM parents themselves are marked
 * `nestedBom` and left for the join to report.
 */
export function expandBom(rows: ShipmentRow[], lookup?: BomLookup | null, options: ExpandOptions = {}): ShipmentRow[] {
  if (!lookup || lookup.size === 0) {
    return [...rows];
  }

  const expanded: ShipmentRow[] = [];
  for (const row of rows) {
    const components = lookup.get(row.itemCode);
    if (!components || components.length === 0) {
      expanded.push(row);
      continue;
    }

    if (options.keepParent) {
      expanded.push(row);
    }
    components.forEach((component, index) => {
      expanded.push({
        line: row.line,
        itemCode: component.componentItemCode,
        quantity: roundQuantity(row.quantity * component.quantityPerParent),
        destination: row.destination,
        orderNumber: row.orderNumber,
        shipDate: row.shipDate,
        origin: {
          kind: 'component',
          parentItemCode: row.itemCode,
          componentIndex: index + 1,
          quantityPerParent: component.quantityPerParent,
          quantityNote: `${formatQuantity(row.quantity)} × ${formatQuantity(component.quantityPerParent)}`,
          nestedBom: lookup.has(component.componentItemCode)
        }
      });
    });
  }
  return expanded;
}
