import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import * as XLSX from 'xlsx';
import {
  FileNotFoundError,
  MalformedWorkbookError,
} from '@/modules/conversion/domain/conversion-error';
import {
  toNativeCell,
  toSheetGrid,
  XlsxWorkbookReaderService,
} from './xlsx-workbook-reader.service';

function workbookBuffer(sheets: Array<[string, XLSX.WorkSheet]>): Buffer {
  const workbook = XLSX.utils.book_new();
  for (const [name, sheet] of sheets) {
    XLSX.utils.book_append_sheet(workbook, sheet, name);
  }
  return XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
}

describe('XlsxWorkbookReaderService', () => {
  const reader = new XlsxWorkbookReaderService();

  it('reads every sheet with typed cells', () => {
    const buffer = workbookBuffer([
      [
        'People',
        XLSX.utils.aoa_to_sheet([
          ['Name', 'Age', 'Active'],
          ['John', 25, true],
        ]),
      ],
      ['Notes', XLSX.utils.aoa_to_sheet([['Note'], ['hello']])],
    ]);

    const workbook = reader.parse({ buffer, originalName: 'people.xlsx' });

    expect(workbook.sheetNames).toEqual(['People', 'Notes']);
    expect(workbook.sheets.get('People')?.rows).toEqual([
      [
        { type: 'text', value: 'Name' },
        { type: 'text', value: 'Age' },
        { type: 'text', value: 'Active' },
      ],
      [
        { type: 'text', value: 'John' },
        { type: 'number', value: 25 },
        { type: 'boolean', value: true },
      ],
    ]);
    expect(workbook.sheets.get('Notes')?.rows[1]).toEqual([{ type: 'text', value: 'hello' }]);
  });

  it('starts the grid at the first cell with data', () => {
    const sheet: XLSX.WorkSheet = {};
    XLSX.utils.sheet_add_aoa(
      sheet,
      [
        ['Name', 'City'],
        ['Ann', 'Lyon'],
      ],
      { origin: 'B2' },
    );
    const workbook = reader.parse({ buffer: workbookBuffer([['Offset', sheet]]), originalName: 'o.xlsx' });

    expect(workbook.sheets.get('Offset')?.rows[0]).toEqual([
      { type: 'text', value: 'Name' },
      { type: 'text', value: 'City' },
    ]);
  });

  it('gives an empty grid for an empty sheet', () => {
    const workbook = reader.parse({
      buffer: workbookBuffer([['Empty', XLSX.utils.aoa_to_sheet([])]]),
      originalName: 'empty.xlsx',
    });

    expect(workbook.sheets.get('Empty')?.rows).toEqual([]);
  });

  it('rejects files that are not workbooks', () => {
    expect(() =>
      reader.parse({ buffer: Buffer.from('Name,Age\n'), originalName: 'people.xlsx' }),
    ).toThrow(MalformedWorkbookError);
    expect(() => reader.parse({ buffer: Buffer.alloc(0), originalName: 'empty.xlsx' })).toThrow(
      'Failed to open workbook empty.xlsx: not an Excel or OpenDocument workbook',
    );
  });

  describe('csv', () => {
    it('exposes one sheet named after the file', () => {
      const workbook = reader.parse({
        buffer: Buffer.from('Name,Age,,Email\nAnn,30,x,ann@example.com\nBob\n'),
        originalName: '/data/people.csv',
      });

      expect(workbook.sheetNames).toEqual(['people']);
      expect(workbook.sheets.get('people')?.rows).toEqual([
        [
          { type: 'text', value: 'Name' },
          { type: 'text', value: 'Age' },
          { type: 'blank' },
          { type: 'text', value: 'Email' },
        ],
        [
          { type: 'text', value: 'Ann' },
          { type: 'text', value: '30' },
          { type: 'text', value: 'x' },
          { type: 'text', value: 'ann@example.com' },
        ],
        [{ type: 'text', value: 'Bob' }],
      ]);
    });

    it('reports broken quoting as a malformed workbook', () => {
      expect(() =>
        reader.parse({ buffer: Buffer.from('a,"b\n'), originalName: 'broken.csv' }),
      ).toThrow(MalformedWorkbookError);
    });
  });

  describe('load', () => {
    let dir: string;

    beforeAll(async () => {
      dir = await mkdtemp(join(tmpdir(), 'sheet2json-reader-'));
    });

    afterAll(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('reads the workbook from disk', async () => {
      const path = join(dir, 'book.xlsx');
      await writeFile(path, workbookBuffer([['Sheet1', XLSX.utils.aoa_to_sheet([['A'], [1]])]]));

      const workbook = await reader.load(path);

      expect(workbook.path).toBe(path);
      expect(workbook.sheets.get('Sheet1')?.rows[1]).toEqual([{ type: 'number', value: 1 }]);
    });

    it('fails with FileNotFoundError for a missing path', async () => {
      const path = join(dir, 'missing.xlsx');

      await expect(reader.load(path)).rejects.toThrow(FileNotFoundError);
      await expect(reader.load(path)).rejects.toThrow(`Input file not found or unreadable: ${path}`);
    });
  });
});

describe('toSheetGrid', () => {
  it('ignores a stored dimension larger than the data on every side', () => {
    const sheet: XLSX.WorkSheet = {};
    XLSX.utils.sheet_add_aoa(
      sheet,
      [
        ['Name', 'City'],
        ['Ann', 'Lyon'],
      ],
      { origin: 'B2' },
    );
    sheet['!ref'] = 'A1:F9';

    expect(toSheetGrid('Wide', sheet)).toEqual({
      name: 'Wide',
      rows: [
        [
          { type: 'text', value: 'Name' },
          { type: 'text', value: 'City' },
        ],
        [
          { type: 'text', value: 'Ann' },
          { type: 'text', value: 'Lyon' },
        ],
      ],
    });
  });

  it('leaves out trailing stub cells', () => {
    const sheet = XLSX.utils.aoa_to_sheet([['Name'], ['Ann']]);
    sheet['C6'] = { t: 'z' };
    sheet['!ref'] = 'A1:C6';

    expect(toSheetGrid('Stubs', sheet).rows).toEqual([
      [{ type: 'text', value: 'Name' }],
      [{ type: 'text', value: 'Ann' }],
    ]);
  });

  it('keeps blank cells inside the data bounds', () => {
    const sheet = XLSX.utils.aoa_to_sheet([['Name', 'Age'], [], ['Bob', 40]]);

    expect(toSheetGrid('Gaps', sheet).rows[1]).toEqual([{ type: 'blank' }, { type: 'blank' }]);
  });

  it('gives no rows for a sheet with only a dimension', () => {
    expect(toSheetGrid('Ghost', { '!ref': 'A1:D4' })).toEqual({ name: 'Ghost', rows: [] });
    expect(toSheetGrid('Missing', undefined)).toEqual({ name: 'Missing', rows: [] });
  });
});

describe('toNativeCell', () => {
  it('maps SheetJS cell types', () => {
    expect(toNativeCell(undefined)).toEqual({ type: 'blank' });
    expect(toNativeCell({ t: 'z' })).toEqual({ type: 'blank' });
    expect(toNativeCell({ t: 'n', v: 1.5 })).toEqual({ type: 'number', value: 1.5 });
    expect(toNativeCell({ t: 's', v: '' })).toEqual({ type: 'text', value: '' });
    expect(toNativeCell({ t: 'b', v: false })).toEqual({ type: 'boolean', value: false });
    expect(toNativeCell({ t: 'e', v: 7, w: '#DIV/0!' })).toEqual({ type: 'error', code: '#DIV/0!' });
    expect(toNativeCell({ t: 'd', v: new Date(Date.UTC(2024, 0, 31)) })).toEqual({
      type: 'text',
      value: '2024-01-31T00:00:00.000Z',
    });
  });

  it('keeps the cached result of formulas', () => {
    expect(toNativeCell({ t: 'n', f: 'A1+B1', v: 3 })).toEqual({
      type: 'formula',
      formula: 'A1+B1',
      cached: { type: 'number', value: 3 },
    });
    expect(toNativeCell({ t: 'n', f: 'A1+B1' })).toEqual({
      type: 'formula',
      formula: 'A1+B1',
      cached: null,
    });
  });
});
