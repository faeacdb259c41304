import type { BackendAttempt, UnresolvedReason } from './types.js';

export type ErrorKind =
  | 'config'
  | 'input-file'
  | 'schema'
  | 'parse'
  | 'unresolved-reference'
  | 'encoding'
  | 'template'
  | 'render'
  | 'print';

/**
 * Base class of every error the pipeline raises on purpose.
 * `rows` names the affected rows (line numbers or item codes) for the run report.
 */
export abstract class PickingError extends Error {
  abstract readonly kind: ErrorKind;
  readonly rows: string[];

  constructor(message: string, rows: string[] = [], options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.rows = rows;
  }
}

export class ConfigError extends PickingError {
  readonly kind = 'config';
}

export class InputFileError extends PickingError {
  readonly kind = 'input-file';

  constructor(readonly filePath: string, message: string, options?: { cause?: unknown }) {
    super(message, [], options);
  }
}

export class SchemaError extends PickingError {
  readonly kind = 'schema';

  constructor(readonly filePath: string, readonly missingColumns: string[], message: string) {
    super(message);
  }
}

export class ParseError extends PickingError {
  readonly kind = 'parse';

  constructor(
    readonly filePath: string,
    readonly sheetRow: number,
    readonly column: string,
    message: string
  ) {
    super(message, [String(sheetRow)]);
  }
}

export class UnresolvedReferenceError extends PickingError {
  readonly kind = 'unresolved-reference';

  constructor(readonly itemCode: string, readonly line: number, readonly reason: UnresolvedReason) {
    super(
      reason === 'nested-bom'
        ? `Component ${itemCode} (line ${line}) is itself a BOM parent; multi-level BOMs are not expanded`
        : `Item ${itemCode} (line ${line}) is not in the item master`,
      [String(line)]
    );
  }
}

export class EncodingError extends PickingError {
  readonly kind = 'encoding';

  constructor(readonly itemCode: string, message: string, options?: { cause?: unknown }) {
    super(message, [itemCode], options);
  }
}

export class TemplateError extends PickingError {
  readonly kind = 'template';

  constructor(readonly field: string, lineNo: string, message: string) {
    super(message, [lineNo]);
  }
}

export class RenderError extends PickingError {
  readonly kind = 'render';

  constructor(readonly attempts: BackendAttempt[], message: string) {
    super(message);
  }
}

export class PrintError extends PickingError {
  readonly kind = 'print';
}

/**
 * The single failure a caller sees when a run aborts.
 */
export class PipelineFailure extends Error {
  readonly kind: ErrorKind | 'unexpected';
  readonly affectedRows: string[];

  constructor(cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(message, { cause });
    this.name = 'PipelineFailure';
    this.kind = cause instanceof PickingError ? cause.kind : 'unexpected';
    this.affectedRows = cause instanceof PickingError ? cause.rows : [];
  }
}

export function describeError(error: unknown): string {
  if (error instanceof PipelineFailure || error instanceof PickingError) {
    return `[${error.kind}] ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}
