import { parseCsv, parseCsvRows } from '../utils/csv';

describe('CSV parsing', () => {
  it('should split plain rows and cells', () => {
    expect(parseCsvRows('a,b,c\n1,2,3\n')).toEqual([
      ['a', 'b', 'c'],
      ['1', '2', '3'],
    ]);
  });

  it('should keep delimiters, doubled quotes and newlines inside quoted cells', () => {
    const rows = parseCsvRows('name,desc\n"Lot ""A""","Berry, citrus\nand cocoa"\n');

    expect(rows).toEqual([
      ['name', 'desc'],
      ['Lot "A"', 'Berry, citrus\nand cocoa'],
    ]);
  });

  it('should keep a quote inside an unquoted cell as text', () => {
    expect(parseCsvRows('name,origin\nLot 12" Sack,Kenya\nSecond,Brazil\n')).toEqual([
      ['name', 'origin'],
      ['Lot 12" Sack', 'Kenya'],
      ['Second', 'Brazil'],
    ]);
  });

  it('should accept CRLF line endings and a missing trailing newline', () => {
    expect(parseCsvRows('a,b\r\n1,2')).toEqual([
      ['a', 'b'],
      ['1', '2'],
    ]);
  });

  it('should skip blank lines but keep rows of empty cells', () => {
    expect(parseCsvRows('a,b\n\n,\n')).toEqual([
      ['a', 'b'],
      ['', ''],
    ]);
  });

  it('should key records by trimmed header and fill short rows with empty strings', () => {
    const { headers, records } = parseCsv(' name ,origin,rating\nSolo Lot,Kenya\n');

    expect(headers).toEqual(['name', 'origin', 'rating']);
    expect(records).toEqual([{ name: 'Solo Lot', origin: 'Kenya', rating: '' }]);
  });

  it('should return nothing for empty input', () => {
    expect(parseCsv('')).toEqual({ headers: [], records: [] });
  });
});
