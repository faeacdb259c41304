export type ColumnType = 'text' | 'integer' | 'decimal';

export type CellValue = string | number | null;

export interface ColumnSpec<K extends string = string> {
  key: K;
  type: ColumnType;
  required: boolean;
  aliases: string[];
}

export interface TableRow<K extends string = string> {
  /** 1-based position among the data rows of the source sheet. */
  line: number;
  /** Row number in the sheet itself, header included. */
  sheetRow: number;
  values: Partial<Record<K, CellValue>>;
}

export type ShipmentOrigin =
  | { kind: 'shipment' }
  | {
      kind: 'component';
      parentItemCode: string;
      componentIndex: number;
      quantityPerParent: number;
      quantityNote: string;
      nestedBom: boolean;
    };

export interface ShipmentRow {
  line: number;
  itemCode: string;
  quantity: number;
  destination: string;
  orderNumber: string;
  shipDate: string;
  origin: ShipmentOrigin;
}

export interface ItemMasterRecord {
  itemCode: string;
  description: string;
  unit: string;
  itemType: string;
  location: string;
  notice: string;
}

export interface BomEntry {
  parentItemCode: string;
  componentItemCode: string;
  quantityPerParent: number;
  sequence: string;
}

export type BomLookup = Map<string, BomEntry[]>;

export type CodeReference =
  | { status: 'pending' }
  | { status: 'ready'; itemCode: string; path: string; relativePath: string }
  | { status: 'failed'; reason: string };

export interface PickingRow {
  lineNo: string;
  sequence: number;
  line: number;
  itemCode: string;
  quantity: number;
  quantityNote: string;
  destination: string;
  orderNumber: string;
  shipDate: string;
  description: string;
  unit: string;
  itemType: string;
  location: string;
  notice: string;
  isComponent: boolean;
  parentItemCode: string | null;
  code: CodeReference;
}

export interface Page {
  /** 1-based page number. */
  number: number;
  rows: PickingRow[];
}

export type UnresolvedReason = 'missing-master' | 'nested-bom';

export interface UnresolvedReference {
  itemCode: string;
  line: number;
  reason: UnresolvedReason;
}

export interface EncodingFailure {
  itemCode: string;
  lineNos: string[];
  reason: string;
}

export interface BackendAttempt {
  backend: string;
  outcome: 'unavailable' | 'failed' | 'succeeded';
  message?: string;
}

export interface RenderedDocument {
  markupPath: string;
  documentPath: string;
  backend: string;
  attempts: BackendAttempt[];
}

export interface RunReport {
  rowsProcessed: number;
  rowsExcluded: number;
  codeFailures: number;
  backendUsed: string;
  pageCount: number;
  unresolved: UnresolvedReference[];
  encodingFailures: EncodingFailure[];
  outputs: {
    document: string;
    markup: string;
    report: string;
    codes: string[];
  };
}
