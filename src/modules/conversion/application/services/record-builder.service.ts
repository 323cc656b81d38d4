import { Injectable } from '@nestjs/common';
import type { JsonRecord, NativeCell } from '@/modules/conversion/domain/cell';
import type { KeyedColumn } from '@/modules/conversion/domain/column';
import { toCellValue } from '@/modules/conversion/application/utils/cell-value';

@Injectable()
export class RecordBuilderService {
  buildRecord(row: NativeCell[], columns: KeyedColumn[]): JsonRecord {
    const record: JsonRecord = {};
    for (const column of columns) {
      // short rows are padded with null
      record[column.key] = toCellValue(row[column.position]);
    }
    return record;
  }

  buildRecords(rows: NativeCell[][], columns: KeyedColumn[]): JsonRecord[] {
    return rows.map((row) => this.buildRecord(row, columns));
  }
}
