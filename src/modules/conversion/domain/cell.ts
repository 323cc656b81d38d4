export type NativeCell =
  | { type: 'number'; value: number }
  | { type: 'text'; value: string }
  | { type: 'boolean'; value: boolean }
  | { type: 'error'; code: string }
  | { type: 'formula'; formula: string; cached: NativeCell | null }
  | { type: 'blank' };

export type CellValue = number | string | boolean | null;

export interface JsonRecord {
  [key: string]: CellValue;
}

export const BLANK_CELL: NativeCell = { type: 'blank' };
