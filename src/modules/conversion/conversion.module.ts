import { Module } from '@nestjs/common';
import { ConversionService } from '@/modules/conversion/application/services/conversion.service';
import { ColumnSelectionService } from '@/modules/conversion/application/services/column-selection.service';
import { RecordBuilderService } from '@/modules/conversion/application/services/record-builder.service';
import { XlsxWorkbookReaderService } from '@/modules/conversion/infra/reader/xlsx-workbook-reader.service';
import { JsonFileWriterService } from '@/modules/conversion/infra/writer/json-file-writer.service';
import { WORKBOOK_READER } from '@/modules/conversion/application/ports/workbook-reader.port';
import { RECORDS_WRITER } from '@/modules/conversion/application/ports/records-writer.port';
import { converterSettingsProvider } from '@/infra/config/converter-settings.provider';

@Module({
  providers: [
    converterSettingsProvider,
    ConversionService,
    ColumnSelectionService,
    RecordBuilderService,
    {
      provide: WORKBOOK_READER,
      useClass: XlsxWorkbookReaderService,
    },
    {
      provide: RECORDS_WRITER,
      useClass: JsonFileWriterService,
    },
  ],
  exports: [ConversionService],
})
export class ConversionModule {}
