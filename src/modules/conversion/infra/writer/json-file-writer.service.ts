import { Inject, Injectable, Logger } from '@nestjs/common';
import { rename, rm, writeFile } from 'fs/promises';
import type { JsonRecord } from '@/modules/conversion/domain/cell';
import { OutputWriteError } from '@/modules/conversion/domain/conversion-error';
import type { RecordsWriterPort } from '@/modules/conversion/application/ports/records-writer.port';
import {
  CONVERTER_SETTINGS,
  type ConverterSettings,
} from '@/infra/config/converter-settings.provider';

export function serializeRecords(records: JsonRecord[], indent: number): string {
  return `${JSON.stringify(records, null, indent)}\n`;
}

@Injectable()
export class JsonFileWriterService implements RecordsWriterPort {
  private readonly logger = new Logger(JsonFileWriterService.name);

  constructor(@Inject(CONVERTER_SETTINGS) private readonly settings: ConverterSettings) {}

  async write(path: string, records: JsonRecord[]): Promise<void> {
    const json = serializeRecords(records, this.settings.jsonIndent);

    if (!this.settings.atomicWrite) {
      try {
        await writeFile(path, json, 'utf-8');
      } catch (error) {
        throw new OutputWriteError(path, error);
      }
      return;
    }

    const tmpPath = `${path}.${process.pid}.${Date.now()}.tmp`;
    try {
      await writeFile(tmpPath, json, 'utf-8');
      await rename(tmpPath, path);
    } catch (error) {
      await rm(tmpPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.warn(
          `Could not remove temporary file ${tmpPath}: ${
            cleanupError instanceof Error ? cleanupError.message : String(cleanupError)
          }`,
        );
      });
      throw new OutputWriteError(path, error);
    }

    this.logger.debug(`Wrote ${json.length} characters to ${path}`);
  }
}
