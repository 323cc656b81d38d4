import { Logger, type LoggerService, type LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';

import { AppModule } from '@/app.module';
import { ConversionService } from '@/modules/conversion/application/services/conversion.service';
import { ConversionError } from '@/modules/conversion/domain/conversion-error';
import { parseConvertArgs, USAGE, type ParsedArgs } from './convert-args';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export function formatError(error: unknown): string {
  if (error instanceof ConversionError) return `[${error.kind}] ${error.message}`;
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs one conversion from command-line arguments and resolves with the
 * process exit code. Usage text goes to stdout for `--help` and to stderr
 * after a usage error; everything else goes through `logger`.
 */
export async function runConvertCommand(
  argv: string[],
  logger: LoggerService = new Logger('sheet2json'),
): Promise<number> {
  let parsed: ParsedArgs;
  try {
    parsed = parseConvertArgs(argv);
  } catch (error) {
    logger.error(formatError(error));
    process.stderr.write(`\n${USAGE}\n`);
    return EXIT_USAGE;
  }

  if (parsed.command === 'help') {
    process.stdout.write(`${USAGE}\n`);
    return EXIT_SUCCESS;
  }

  const { options, verbose } = parsed;
  const levels: LogLevel[] = verbose ? ['error', 'warn', 'log', 'debug'] : ['error', 'warn', 'log'];
  Logger.overrideLogger(levels);

  const ctx = await NestFactory.createApplicationContext(AppModule, {
    logger: levels,
    abortOnError: false,
  });

  try {
    const report = await ctx.get(ConversionService, { strict: false }).run(options);

    logger.log('Successfully converted Excel to JSON');
    logger.log(`Input: ${report.input.path}`);
    logger.log(`Sheet: ${report.input.sheet}`);
    logger.log(`Output: ${report.output}`);
    logger.log(`Visible columns: ${report.visibleColumns}`);
    logger.log(`Selected columns: ${report.columns.map((column) => column.key).join(', ')}`);
    logger.log(`Total records: ${report.records}`);
    return EXIT_SUCCESS;
  } catch (error) {
    logger.error(formatError(error));
    if (!(error instanceof ConversionError) && error instanceof Error && error.stack) {
      logger.debug?.(error.stack);
    }
    return EXIT_FAILURE;
  } finally {
    await ctx.close();
  }
}
