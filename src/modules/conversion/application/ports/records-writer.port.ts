import type { JsonRecord } from '@/modules/conversion/domain/cell';

export const RECORDS_WRITER = Symbol('RECORDS_WRITER');

export interface RecordsWriterPort {
  write(path: string, records: JsonRecord[]): Promise<void>;
}
