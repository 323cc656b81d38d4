import type { Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export const CONVERTER_SETTINGS = 'CONVERTER_SETTINGS';

export type DuplicateKeyPolicy = 'error' | 'overwrite';

export interface ConverterSettings {
  jsonIndent: number;
  atomicWrite: boolean;
  duplicateKeys: DuplicateKeyPolicy;
  sheetCaseSensitive: boolean;
}

export const DEFAULT_CONVERTER_SETTINGS: ConverterSettings = {
  jsonIndent: 2,
  atomicWrite: true,
  duplicateKeys: 'error',
  sheetCaseSensitive: true,
};

type EnvReader = (name: string) => string | undefined;

const invalidEnv = (name: string, value: string, expected: string) =>
  new Error(`Invalid environment variable ${name}="${value}": expected ${expected}`);

const booleanEnv = (read: EnvReader, name: string, fallback: boolean): boolean => {
  const value = read(name)?.trim();
  if (!value) return fallback;
  if (/^(true|1|yes)$/i.test(value)) return true;
  if (/^(false|0|no)$/i.test(value)) return false;
  throw invalidEnv(name, value, 'true or false');
};

export function loadConverterSettings(read: EnvReader): ConverterSettings {
  const indentRaw = read('SHEET2JSON_JSON_INDENT')?.trim();
  let jsonIndent = DEFAULT_CONVERTER_SETTINGS.jsonIndent;
  if (indentRaw) {
    jsonIndent = Number(indentRaw);
    if (!Number.isInteger(jsonIndent) || jsonIndent < 0 || jsonIndent > 10) {
      throw invalidEnv('SHEET2JSON_JSON_INDENT', indentRaw, 'an integer between 0 and 10');
    }
  }

  const duplicatesRaw = read('SHEET2JSON_DUPLICATE_KEYS')?.trim().toLowerCase();
  let duplicateKeys = DEFAULT_CONVERTER_SETTINGS.duplicateKeys;
  if (duplicatesRaw) {
    if (duplicatesRaw !== 'error' && duplicatesRaw !== 'overwrite') {
      throw invalidEnv('SHEET2JSON_DUPLICATE_KEYS', duplicatesRaw, 'error or overwrite');
    }
    duplicateKeys = duplicatesRaw;
  }

  return {
    jsonIndent,
    atomicWrite: booleanEnv(read, 'SHEET2JSON_ATOMIC_WRITE', DEFAULT_CONVERTER_SETTINGS.atomicWrite),
    duplicateKeys,
    sheetCaseSensitive: booleanEnv(
      read,
      'SHEET2JSON_SHEET_CASE_SENSITIVE',
      DEFAULT_CONVERTER_SETTINGS.sheetCaseSensitive,
    ),
  };
}

export const converterSettingsProvider: Provider = {
  provide: CONVERTER_SETTINGS,
  inject: [ConfigService],
  useFactory: (config: ConfigService): ConverterSettings =>
    loadConverterSettings((name) => config.get<string>(name)),
};
