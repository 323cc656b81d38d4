import type { KeyedColumn } from './column';

export type ConversionState =
  | 'Start'
  | 'WorkbookLoaded'
  | 'SheetSelected'
  | 'HeadersNormalized'
  | 'RowsConverted'
  | 'Serialized'
  | 'Done';

export interface ConversionReport {
  input: {
    path: string;
    sheet: string;
  };
  output: string;
  visibleColumns: number;
  columns: KeyedColumn[];
  records: number;
  states: ConversionState[];
}
