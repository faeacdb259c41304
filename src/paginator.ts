import type { Page, PickingRow } from './types.js';

export const SLOTS_PER_PAGE = 6;

function assertCapacity(capacity: number): void {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`Slot capacity must be a positive integer, got ${capacity}`);
  }
}

/** Page (0-based) and slot (0-based) of the row at `index`. */
export function locateSlot(index: number, capacity: number = SLOTS_PER_PAGE): { page: number; slot: number } {
  assertCapacity(capacity);
  return { page: Math.floor(index / capacity), slot: index % capacity };
}

export function pageCount(rowCount: number, capacity: number = SLOTS_PER_PAGE): number {
  assertCapacity(capacity);
  return Math.ceil(rowCount / capacity);
}

export function paginate(rows: PickingRow[], capacity: number = SLOTS_PER_PAGE): Page[] {
  assertCapacity(capacity);
  const pages: Page[] = [];
  for (let start = 0; start < rows.length; start += capacity) {
    pages.push({ number: pages.length + 1, rows: rows.slice(start, start + capacity) });
  }
  return pages;
}
