import { validateSync } from 'class-validator';
import { ConvertOptionsDto } from '@/modules/conversion/application/dto/convert-options.dto';
import { parseColumnList } from '@/modules/conversion/application/services/column-selection.service';
import { InvalidArgumentsError } from '@/modules/conversion/domain/conversion-error';

export const USAGE = `Convert Excel files to JSON format

Usage: sheet2json [OPTIONS] --output <OUTPUT> <FILE> <SHEET>

Arguments:
  <FILE>   Input Excel file path (.xlsx, .xls, .ods or .csv)
  <SHEET>  Sheet name to convert

Options:
  -c, --columns <COLUMNS>  Visible column numbers to include (comma-separated, e.g., 1,2,3).
                           Only counts columns with non-empty headers. If not specified,
                           all visible columns are included
  -o, --output <OUTPUT>    Output JSON file path
  -v, --verbose            Log every step of the conversion
  -h, --help               Print help`;

export type ParsedArgs =
  | { command: 'help' }
  | { command: 'convert'; options: ConvertOptionsDto; verbose: boolean };

export function parseConvertArgs(argv: string[]): ParsedArgs {
  const positionals: string[] = [];
  const options = new ConvertOptionsDto();
  let verbose = false;
  let onlyPositionals = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (onlyPositionals || !arg.startsWith('-') || arg === '-') {
      positionals.push(arg);
      continue;
    }

    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const takeValue = (): string => {
      if (eq !== -1) return arg.slice(eq + 1);
      const value = argv[i + 1];
      if (value === undefined) {
        throw new InvalidArgumentsError(`${flag} requires a value`);
      }
      i++;
      return value;
    };

    switch (flag) {
      case '--':
        onlyPositionals = true;
        break;
      case '-h':
      case '--help':
        return { command: 'help' };
      case '-v':
      case '--verbose':
        verbose = true;
        break;
      case '-o':
      case '--output':
        options.output = takeValue();
        break;
      case '-c':
      case '--columns':
        options.columns = parseColumnList(takeValue());
        break;
      default:
        throw new InvalidArgumentsError(`Unknown option '${flag}'`);
    }
  }

  if (positionals.length > 2) {
    throw new InvalidArgumentsError(`Unexpected argument '${positionals[2]}'`);
  }
  [options.file, options.sheet] = positionals;

  const errors = validateSync(options, { stopAtFirstError: true });
  if (errors.length > 0) {
    const messages = errors.flatMap((error) => Object.values(error.constraints ?? {}));
    throw new InvalidArgumentsError(messages.join('; '));
  }

  return { command: 'convert', options, verbose };
}
