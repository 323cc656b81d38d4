import type { LoadedWorkbook } from '@/modules/conversion/domain/sheet-grid';

export interface ParseWorkbookParams {
  buffer: Buffer;
  originalName: string;
}

export const WORKBOOK_READER = Symbol('WORKBOOK_READER');

export interface WorkbookReaderPort {
  /** Reads the whole file before parsing it. */
  load(path: string): Promise<LoadedWorkbook>;
  parse(params: ParseWorkbookParams): LoadedWorkbook;
}
