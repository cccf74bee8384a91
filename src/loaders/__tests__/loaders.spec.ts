import * as XLSX from 'xlsx';
import { CsvLoader, DocxLoader, PdfLoader, XlsxLoader, defaultLoaders } from '../index.js';

describe('loaders', () => {
  it('covers pdf, docx, xlsx and csv', () => {
    expect(defaultLoaders().flatMap(loader => loader.getSupportedExtensions())).toEqual(['.pdf', '.docx', '.xlsx', '.csv']);
  });

  it('checks the PDF magic bytes', () => {
    const loader = new PdfLoader();
    expect(loader.hasValidHeader(Buffer.from('%PDF-1.7\n'))).toBe(true);
    expect(loader.hasValidHeader(Buffer.from('<html>'))).toBe(false);
  });

  it('checks the zip signature of a docx', () => {
    const loader = new DocxLoader();
    expect(loader.hasValidHeader(Buffer.from([0x50, 0x4b, 0x03, 0x04, 0x14]))).toBe(true);
    expect(loader.hasValidHeader(Buffer.from('PK'))).toBe(false);
  });

  it('rejects binary content as CSV', () => {
    const loader = new CsvLoader();
    expect(loader.hasValidHeader(Buffer.from('a,b\n1,2\n'))).toBe(true);
    expect(loader.hasValidHeader(Buffer.from([0x61, 0x00, 0x62]))).toBe(false);
  });

  it('renders CSV rows as column: value lines', async () => {
    const sections = await new CsvLoader().load(Buffer.from('item, price\nCore,10\n,\n"Capital, home",\n'));

    expect(sections).toEqual([{ text: 'item: Core, price: 10\nitem: Capital, home' }]);
  });

  it('checks the zip signature of an xlsx', () => {
    const loader = new XlsxLoader();
    expect(loader.hasValidHeader(Buffer.from([0x50, 0x4b, 0x03, 0x04, 0x14]))).toBe(true);
    expect(loader.hasValidHeader(Buffer.from('item,price\n'))).toBe(false);
  });

  it('renders each sheet with data as a labelled CSV block', async () => {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([['item', 'price'], ['Core', 10], ['Capital, home', 5]]), 'Prices');
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([['notes']]), 'Headers only');
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([['a'], ['x']]), 'Other');
    const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });

    const loader = new XlsxLoader();
    expect(loader.hasValidHeader(buffer)).toBe(true);
    await expect(loader.load(buffer)).resolves.toEqual([{
      text: '[Sheet: Prices]\nitem,price\nCore,10\n"Capital, home",5\n\n[Sheet: Other]\na\nx',
    }]);
  });
});
