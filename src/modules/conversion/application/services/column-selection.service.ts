import { Inject, Injectable, Logger } from '@nestjs/common';
import type { KeyedColumn, VisibleColumn } from '@/modules/conversion/domain/column';
import {
  DuplicateKeyError,
  InvalidArgumentsError,
  InvalidColumnError,
} from '@/modules/conversion/domain/conversion-error';
import { normalizeHeader } from '@/modules/conversion/application/utils/normalize';
import {
  CONVERTER_SETTINGS,
  type ConverterSettings,
} from '@/infra/config/converter-settings.provider';

/**
 * Parses a `--columns` value such as "1,3, 4" into ordinals. Range checks
 * happen later in resolveSelection, against the visible columns.
 */
export function parseColumnList(text: string): number[] {
  return text.split(',').map((item) => {
    const trimmed = item.trim();
    if (!/^[+-]?\d+$/.test(trimmed)) {
      throw new InvalidArgumentsError(`Invalid column number '${trimmed}' in '${text}'`);
    }
    return Number(trimmed);
  });
}

@Injectable()
export class ColumnSelectionService {
  private readonly logger = new Logger(ColumnSelectionService.name);

  constructor(@Inject(CONVERTER_SETTINGS) private readonly settings: ConverterSettings) {}

  /**
   * Columns whose trimmed header is non-empty, numbered 1..N in sheet order.
   * Blank headers get no ordinal and cannot be selected.
   */
  selectVisible(headerRow: string[]): VisibleColumn[] {
    const visible: VisibleColumn[] = [];
    headerRow.forEach((header, position) => {
      if (header.trim()) {
        visible.push({ ordinal: visible.length + 1, position, header });
      }
    });
    return visible;
  }

  /**
   * Maps user ordinals to visible columns, keeping the order they were given
   * in (repeats included). No selection means every visible column.
   */
  resolveSelection(visible: VisibleColumn[], requested?: number[]): VisibleColumn[] {
    if (!requested) return [...visible];

    return requested.map((ordinal) => {
      const column = ordinal >= 1 ? visible[ordinal - 1] : undefined;
      if (!column) {
        throw new InvalidColumnError(ordinal, visible.length);
      }
      return column;
    });
  }

  assignKeys(columns: VisibleColumn[]): KeyedColumn[] {
    const owners = new Map<string, VisibleColumn>();
    const keyed: KeyedColumn[] = [];

    for (const column of columns) {
      const key = normalizeHeader(column.header, column.position);
      const owner = owners.get(key);

      if (owner && owner.position !== column.position) {
        if (this.settings.duplicateKeys === 'error') {
          throw new DuplicateKeyError(key, owner.header, column.header);
        }
        this.logger.warn(
          `Headers '${owner.header}' and '${column.header}' both map to '${key}'; keeping the value of column ${
            column.position + 1
          }`,
        );
      }

      if (!owner) owners.set(key, column);
      keyed.push({ ...column, key });
      this.logger.debug(`Column ${column.ordinal} ('${column.header}') -> ${key}`);
    }

    return keyed;
  }
}
