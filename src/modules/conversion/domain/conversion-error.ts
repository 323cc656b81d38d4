import type { ConversionState } from './conversion-report';

export type ConversionErrorKind =
  | 'FileNotFound'
  | 'SheetNotFound'
  | 'EmptySheet'
  | 'EmptyKey'
  | 'DuplicateKey'
  | 'InvalidColumn'
  | 'OutputWrite'
  | 'MalformedWorkbook'
  | 'InvalidArguments';

export abstract class ConversionError extends Error {
  abstract readonly kind: ConversionErrorKind;

  /** State the driver was in when the error surfaced; set by ConversionService. */
  state?: ConversionState;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class FileNotFoundError extends ConversionError {
  readonly kind = 'FileNotFound';

  constructor(readonly path: string, cause?: unknown) {
    super(`Input file not found or unreadable: ${path}`, { cause });
  }
}

export class MalformedWorkbookError extends ConversionError {
  readonly kind = 'MalformedWorkbook';

  constructor(readonly path: string, reason: string, cause?: unknown) {
    super(`Failed to open workbook ${path}: ${reason}`, { cause });
  }
}

export class SheetNotFoundError extends ConversionError {
  readonly kind = 'SheetNotFound';

  constructor(
    readonly path: string,
    readonly sheet: string,
    readonly available: string[],
  ) {
    super(
      `Sheet '${sheet}' not found in ${path}. Available sheets: ${
        available.length ? available.map((name) => `'${name}'`).join(', ') : '(none)'
      }`,
    );
  }
}

export class EmptySheetError extends ConversionError {
  readonly kind = 'EmptySheet';

  constructor(readonly path: string, readonly sheet: string) {
    super(`Sheet '${sheet}' in ${path} is empty, no header row found`);
  }
}

export class EmptyKeyError extends ConversionError {
  readonly kind = 'EmptyKey';

  constructor(readonly header: string, readonly position?: number) {
    super(
      `Header '${header}'${
        position === undefined ? '' : ` in column ${position + 1}`
      } normalizes to an empty key`,
    );
  }
}

export class DuplicateKeyError extends ConversionError {
  readonly kind = 'DuplicateKey';

  constructor(
    readonly key: string,
    readonly firstHeader: string,
    readonly secondHeader: string,
  ) {
    super(`Headers '${firstHeader}' and '${secondHeader}' both normalize to the key '${key}'`);
  }
}

export class InvalidColumnError extends ConversionError {
  readonly kind = 'InvalidColumn';

  constructor(readonly ordinal: number, readonly max: number) {
    super(
      ordinal < 1
        ? `Column numbers must be greater than 0 (got ${ordinal})`
        : `Column number ${ordinal} exceeds visible column count (${max})`,
    );
  }
}

export class OutputWriteError extends ConversionError {
  readonly kind = 'OutputWrite';

  constructor(readonly path: string, cause?: unknown) {
    super(
      `Failed to write output file ${path}: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      { cause },
    );
  }
}

export class InvalidArgumentsError extends ConversionError {
  readonly kind = 'InvalidArguments';
}
