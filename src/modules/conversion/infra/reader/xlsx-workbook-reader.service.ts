import { Injectable, Logger } from '@nestjs/common';
import { readFile } from 'fs/promises';
import * as XLSX from 'xlsx';
import { parse as csvParse } from 'csv-parse/sync';
import { BLANK_CELL, type NativeCell } from '@/modules/conversion/domain/cell';
import type { LoadedWorkbook, SheetGrid } from '@/modules/conversion/domain/sheet-grid';
import {
  FileNotFoundError,
  MalformedWorkbookError,
} from '@/modules/conversion/domain/conversion-error';
import type {
  ParseWorkbookParams,
  WorkbookReaderPort,
} from '@/modules/conversion/application/ports/workbook-reader.port';
import { fileBaseName } from '@/modules/conversion/application/utils/normalize';

const ZIP_SIGNATURE = Buffer.from([0x50, 0x4b, 0x03, 0x04]);
const OLE2_SIGNATURE = Buffer.from([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1]);

function valueCell(cell: XLSX.CellObject): NativeCell {
  const { v } = cell;
  switch (cell.t) {
    case 'n':
      return typeof v === 'number' ? { type: 'number', value: v } : BLANK_CELL;
    case 's':
      return { type: 'text', value: v == null ? '' : String(v) };
    case 'b':
      return typeof v === 'boolean' ? { type: 'boolean', value: v } : BLANK_CELL;
    case 'e':
      return { type: 'error', code: cell.w ?? '#ERROR' };
    case 'd':
      // only produced when dates are not read as serial numbers
      return v instanceof Date ? { type: 'text', value: v.toISOString() } : BLANK_CELL;
    case 'z':
      return BLANK_CELL;
  }
}

export function toNativeCell(cell: XLSX.CellObject | undefined): NativeCell {
  if (!cell) return BLANK_CELL;

  if (typeof cell.f === 'string') {
    return {
      type: 'formula',
      formula: cell.f,
      cached: cell.v === undefined ? null : valueCell(cell),
    };
  }
  return valueCell(cell);
}

/**
 * Rows and columns span the cells that hold something, whatever `!ref`
 * says: writers often store a dimension wider or taller than the data.
 */
export function toSheetGrid(name: string, sheet: XLSX.WorkSheet | undefined): SheetGrid {
  if (!sheet) return { name, rows: [] };

  let top = Infinity;
  let left = Infinity;
  let bottom = -1;
  let right = -1;
  for (const address of Object.keys(sheet)) {
    if (address.startsWith('!')) continue;
    const cell: XLSX.CellObject | undefined = sheet[address];
    if (toNativeCell(cell).type === 'blank') continue;

    const { r, c } = XLSX.utils.decode_cell(address);
    top = Math.min(top, r);
    left = Math.min(left, c);
    bottom = Math.max(bottom, r);
    right = Math.max(right, c);
  }
  if (bottom < 0) return { name, rows: [] };

  const rows: NativeCell[][] = [];
  for (let r = top; r <= bottom; r++) {
    const row: NativeCell[] = [];
    for (let c = left; c <= right; c++) {
      row.push(toNativeCell(sheet[XLSX.utils.encode_cell({ r, c })]));
    }
    rows.push(row);
  }
  return { name, rows };
}

@Injectable()
export class XlsxWorkbookReaderService implements WorkbookReaderPort {
  private readonly logger = new Logger(XlsxWorkbookReaderService.name);

  async load(path: string): Promise<LoadedWorkbook> {
    let buffer: Buffer;
    try {
      buffer = await readFile(path);
    } catch (error) {
      throw new FileNotFoundError(path, error);
    }

    this.logger.debug(`Read ${buffer.length} bytes from ${path}`);
    return this.parse({ buffer, originalName: path });
  }

  parse(params: ParseWorkbookParams): LoadedWorkbook {
    const { buffer, originalName } = params;

    if (originalName.toLowerCase().endsWith('.csv')) {
      return this.parseCsv(buffer, originalName);
    }

    if (!this.hasSignature(buffer, ZIP_SIGNATURE) && !this.hasSignature(buffer, OLE2_SIGNATURE)) {
      throw new MalformedWorkbookError(originalName, 'not an Excel or OpenDocument workbook');
    }
    return this.parseExcel(buffer, originalName);
  }

  private hasSignature(buffer: Buffer, signature: Buffer): boolean {
    return buffer.length >= signature.length && buffer.subarray(0, signature.length).equals(signature);
  }

  private parseCsv(buffer: Buffer, originalName: string): LoadedWorkbook {
    let records: string[][];
    try {
      records = csvParse(buffer.toString('utf-8'), {
        bom: true,
        skip_empty_lines: true,
        relax_column_count: true,
        trim: true,
      });
    } catch (error) {
      throw new MalformedWorkbookError(
        originalName,
        error instanceof Error ? error.message : String(error),
        error,
      );
    }

    const name = fileBaseName(originalName);
    const grid: SheetGrid = {
      name,
      rows: records.map((record) =>
        record.map((value): NativeCell => (value === '' ? BLANK_CELL : { type: 'text', value })),
      ),
    };

    return { path: originalName, sheetNames: [name], sheets: new Map([[name, grid]]) };
  }

  private parseExcel(buffer: Buffer, originalName: string): LoadedWorkbook {
    let workbook: XLSX.WorkBook;
    try {
      workbook = XLSX.read(buffer, {
        type: 'buffer',
        cellDates: false,
      });
    } catch (error) {
      throw new MalformedWorkbookError(
        originalName,
        error instanceof Error ? error.message : String(error),
        error,
      );
    }

    if (workbook.SheetNames.length === 0) {
      throw new MalformedWorkbookError(originalName, 'workbook has no sheets');
    }

    const sheets = new Map<string, SheetGrid>();
    for (const name of workbook.SheetNames) {
      sheets.set(name, toSheetGrid(name, workbook.Sheets[name]));
    }
    return { path: originalName, sheetNames: [...workbook.SheetNames], sheets };
  }
}
