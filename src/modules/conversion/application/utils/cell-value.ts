import type { CellValue, NativeCell } from '@/modules/conversion/domain/cell';

export function toCellValue(cell: NativeCell | undefined): CellValue {
  if (!cell) return null;

  switch (cell.type) {
    case 'number':
      return Number.isFinite(cell.value) ? cell.value : null;
    case 'text':
      return cell.value;
    case 'boolean':
      return cell.value;
    case 'formula':
      return cell.cached ? toCellValue(cell.cached) : null;
    case 'error':
    case 'blank':
      return null;
  }
}

/** Text of a header cell, "" for blanks. */
export function cellText(cell: NativeCell | undefined): string {
  if (!cell) return '';

  switch (cell.type) {
    case 'number':
    case 'boolean':
      return String(cell.value);
    case 'text':
      return cell.value;
    case 'error':
      return cell.code;
    case 'formula':
      return cell.cached ? cellText(cell.cached) : '';
    case 'blank':
      return '';
  }
}
