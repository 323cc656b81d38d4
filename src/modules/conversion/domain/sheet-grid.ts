import type { NativeCell } from './cell';

export interface SheetGrid {
  name: string;
  /** Used range of the sheet, header row first. Rows may be shorter than the header row. */
  rows: NativeCell[][];
}

export interface LoadedWorkbook {
  path: string;
  sheetNames: string[];
  sheets: Map<string, SheetGrid>;
}
