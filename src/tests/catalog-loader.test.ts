import fs from 'fs/promises';
import path from 'path';
import { CatalogLoaderService, coerceScore } from '../services/catalog-loader.service';
import { NUMERIC_ATTRIBUTES } from '../models/coffee.model';
import { CatalogUnavailableError } from '../utils/errors';
import { removeTempFiles, writeTempFile } from './helpers/coffee.factory';

const HEADER = 'name,origin,desc_1,acid,body,flavor,aftertaste,aroma,rating';

describe('CatalogLoaderService', () => {
  const loader = new CatalogLoaderService();

  afterEach(async () => {
    await removeTempFiles();
  });

  describe('coerceScore', () => {
    const cases: Array<[string | undefined, number]> = [
      ['8.75', 8.75],
      [' 9 ', 9],
      ['', 0],
      ['NA', 0],
      ['n/a', 0],
      ['-3', 0],
      ['Infinity', 0],
      [undefined, 0],
    ];

    it.each(cases)('should coerce %p to %p', (raw, expected) => {
      expect(coerceScore(raw)).toBe(expected);
    });
  });

  it('should load rows in file order with derived countries', async () => {
    const filePath = await writeTempFile(
      'catalog.csv',
      `${HEADER}\nFirst,"Nyeri, Kenya",Blackcurrant.,9,8,9,8,9,94\nSecond,Hawaii,Macadamia.,7,8,8,8,8,90\n`
    );

    const catalog = await loader.loadFile(filePath);

    expect(catalog.map((coffee) => [coffee.name, coffee.country])).toEqual([
      ['First', 'Kenya'],
      ['Second', 'Other'],
    ]);
    expect(catalog[0]).toEqual({
      name: 'First',
      originText: 'Nyeri, Kenya',
      country: 'Kenya',
      description: 'Blackcurrant.',
      acid: 9,
      body: 8,
      flavor: 9,
      aftertaste: 8,
      aroma: 9,
      rating: 94,
    });
  });

  it('should populate every numeric field and the description on malformed rows', async () => {
    const filePath = await writeTempFile(
      'catalog.csv',
      `${HEADER}\nBroken Lot,"Jinotega, Nicaragua",,NA,,n/a,-1,abc,\n`
    );

    const [coffee] = await loader.loadFile(filePath);

    expect(coffee.description).toBe('');
    for (const attribute of NUMERIC_ATTRIBUTES) {
      expect(coffee[attribute]).toBe(0);
    }
    expect(coffee.country).toBe('Nicaragua');
  });

  it('should keep later rows intact after a row with a stray quote', async () => {
    const filePath = await writeTempFile(
      'catalog.csv',
      `${HEADER}\nLot 12" Sack,Kenya,Berry.,9,8,9,8,9,90\nSecond,Brazil,Nutty.,7,8,8,8,8,88\nThird,Colombia,Cocoa.,8,8,8,8,8,87\n`
    );

    const catalog = await loader.loadFile(filePath);

    expect(catalog.map((coffee) => coffee.name)).toEqual(['Lot 12" Sack', 'Second', 'Third']);
    expect(catalog[0].rating).toBe(90);
    expect(catalog[2].country).toBe('Colombia');
  });

  it('should default numeric columns that are absent from the header to 0', async () => {
    const filePath = await writeTempFile('catalog.csv', 'name,origin,desc_1\nBare,Peru,Cocoa.\n');

    const [coffee] = await loader.loadFile(filePath);

    expect(coffee.rating).toBe(0);
    expect(coffee.acid).toBe(0);
  });

  it('should decode a CP949 file', async () => {
    // "name,origin,desc_1,acid\n커피,Kenya,노트,9\n" in CP949
    const bytes = Buffer.concat([
      Buffer.from('name,origin,desc_1,acid\n', 'ascii'),
      Buffer.from([0xc4, 0xbf, 0xc7, 0xc7]),
      Buffer.from(',Kenya,', 'ascii'),
      Buffer.from([0xb3, 0xeb, 0xc6, 0xae]),
      Buffer.from(',9\n', 'ascii'),
    ]);
    const filePath = await writeTempFile('catalog.csv', bytes);

    const [coffee] = await loader.loadFile(filePath);

    expect(coffee.name).toBe('커피');
    expect(coffee.description).toBe('노트');
    expect(coffee.acid).toBe(9);
  });

  it('should report a missing file as unavailable rather than an empty catalog', async () => {
    const missing = path.join(__dirname, 'fixtures', 'does-not-exist.csv');

    await expect(loader.loadFile(missing)).rejects.toThrow(CatalogUnavailableError);
    await expect(loader.loadFile(missing)).rejects.toThrow('file not found');
  });

  it('should fail the whole load when no encoding can decode the file', async () => {
    const strictLoader = new CatalogLoaderService(undefined, ['utf-8']);

    expect(() => strictLoader.parse(Uint8Array.from([0x43, 0x61, 0x66, 0xe9]))).toThrow(
      CatalogUnavailableError
    );
  });

  it('should reject a file without the required columns', async () => {
    const filePath = await writeTempFile('catalog.csv', 'title,origin\nSomething,Kenya\n');

    await expect(loader.loadFile(filePath)).rejects.toThrow('missing columns: name, desc_1');
  });

  it('should accept a legitimately empty catalog', async () => {
    const filePath = await writeTempFile('catalog.csv', `${HEADER}\n`);

    await expect(loader.loadFile(filePath)).resolves.toEqual([]);
  });

  it('should produce identical records when the same file is loaded twice', async () => {
    const fixture = path.join(__dirname, 'fixtures', 'catalog.csv');

    const first = await loader.loadFile(fixture);
    const second = await loader.loadFile(fixture);

    expect(second).toEqual(first);
    expect(second).not.toBe(first);
  });

  it('should freeze the loaded catalog and its records', async () => {
    const catalog = await loader.loadFile(path.join(__dirname, 'fixtures', 'catalog.csv'));

    expect(Object.isFrozen(catalog)).toBe(true);
    expect(Object.isFrozen(catalog[0])).toBe(true);
  });

  it('should remove temporary catalog directories on cleanup', async () => {
    const filePath = await writeTempFile('catalog.csv', `${HEADER}\n`);

    await removeTempFiles();

    await expect(fs.access(path.dirname(filePath))).rejects.toThrow();
  });
});
