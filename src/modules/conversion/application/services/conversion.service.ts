import { Inject, Injectable, Logger } from '@nestjs/common';
import type { JsonRecord, NativeCell } from '@/modules/conversion/domain/cell';
import type { KeyedColumn } from '@/modules/conversion/domain/column';
import type { LoadedWorkbook, SheetGrid } from '@/modules/conversion/domain/sheet-grid';
import type { ConversionReport, ConversionState } from '@/modules/conversion/domain/conversion-report';
import {
  ConversionError,
  EmptySheetError,
  SheetNotFoundError,
} from '@/modules/conversion/domain/conversion-error';
import {
  WORKBOOK_READER,
  type WorkbookReaderPort,
} from '@/modules/conversion/application/ports/workbook-reader.port';
import {
  RECORDS_WRITER,
  type RecordsWriterPort,
} from '@/modules/conversion/application/ports/records-writer.port';
import { ColumnSelectionService } from '@/modules/conversion/application/services/column-selection.service';
import { RecordBuilderService } from '@/modules/conversion/application/services/record-builder.service';
import { cellText } from '@/modules/conversion/application/utils/cell-value';
import {
  CONVERTER_SETTINGS,
  type ConverterSettings,
} from '@/infra/config/converter-settings.provider';

export interface RunConversionParams {
  file: string;
  sheet: string;
  output: string;
  /** Visible-column ordinals; undefined selects every visible column. */
  columns?: number[];
}

export interface ConvertedGrid {
  visible: number;
  columns: KeyedColumn[];
  records: JsonRecord[];
}

@Injectable()
export class ConversionService {
  private readonly logger = new Logger(ConversionService.name);

  constructor(
    @Inject(WORKBOOK_READER) private readonly reader: WorkbookReaderPort,
    @Inject(RECORDS_WRITER) private readonly writer: RecordsWriterPort,
    @Inject(CONVERTER_SETTINGS) private readonly settings: ConverterSettings,
    private readonly columnSelection: ColumnSelectionService,
    private readonly recordBuilder: RecordBuilderService,
  ) {}

  async run(params: RunConversionParams): Promise<ConversionReport> {
    const states: ConversionState[] = ['Start'];
    const enter = (state: ConversionState) => {
      states.push(state);
      this.logger.debug(`-> ${state}`);
    };

    try {
      const workbook = await this.reader.load(params.file);
      enter('WorkbookLoaded');

      const grid = this.selectSheet(workbook, params.sheet);
      enter('SheetSelected');
      this.logger.log(`Converting sheet '${grid.name}' of ${params.file} (${grid.rows.length} rows)`);

      const [headerRow = [], ...dataRows] = grid.rows;
      const { visible, columns } = this.resolveColumns(headerRow, params.columns);
      enter('HeadersNormalized');

      const records = this.recordBuilder.buildRecords(dataRows, columns);
      enter('RowsConverted');

      await this.writer.write(params.output, records);
      enter('Serialized');

      enter('Done');
      return {
        input: { path: params.file, sheet: grid.name },
        output: params.output,
        visibleColumns: visible,
        columns,
        records: records.length,
        states,
      };
    } catch (error) {
      const state = states[states.length - 1];
      if (error instanceof ConversionError) {
        error.state = state;
        this.logger.debug(`Failed(${error.kind}) after ${state}`);
      } else {
        this.logger.debug(`Failed after ${state}: ${error instanceof Error ? error.message : String(error)}`);
      }
      throw error;
    }
  }

  /** Header normalization and record building over a sheet already in memory. */
  convertGrid(grid: SheetGrid, requested?: number[]): ConvertedGrid {
    const [headerRow, ...dataRows] = grid.rows;
    if (!headerRow) {
      throw new EmptySheetError('(memory)', grid.name);
    }

    const { visible, columns } = this.resolveColumns(headerRow, requested);
    return {
      visible,
      columns,
      records: this.recordBuilder.buildRecords(dataRows, columns),
    };
  }

  private resolveColumns(
    headerRow: NativeCell[],
    requested?: number[],
  ): { visible: number; columns: KeyedColumn[] } {
    const visible = this.columnSelection.selectVisible(headerRow.map((cell) => cellText(cell)));
    const columns = this.columnSelection.assignKeys(
      this.columnSelection.resolveSelection(visible, requested),
    );
    return { visible: visible.length, columns };
  }

  private selectSheet(workbook: LoadedWorkbook, name: string): SheetGrid {
    let grid = workbook.sheets.get(name);

    if (!grid && !this.settings.sheetCaseSensitive) {
      const match = workbook.sheetNames.find((sheet) => sheet.toLowerCase() === name.toLowerCase());
      grid = match === undefined ? undefined : workbook.sheets.get(match);
      if (grid) {
        this.logger.debug(`Sheet '${name}' matched '${grid.name}' ignoring case`);
      }
    }

    if (!grid) {
      throw new SheetNotFoundError(workbook.path, name, workbook.sheetNames);
    }
    if (grid.rows.length === 0) {
      throw new EmptySheetError(workbook.path, grid.name);
    }
    return grid;
  }
}
