import { decodeWithFallback, UndecodableTextError } from '../utils/text-decoding';

describe('decodeWithFallback', () => {
  it('should decode UTF-8 first', () => {
    const bytes = Buffer.from('커피,Kenya', 'utf-8');

    expect(decodeWithFallback(bytes)).toEqual({ text: '커피,Kenya', encoding: 'utf-8' });
  });

  it('should fall back to the Korean code page when UTF-8 fails', () => {
    // "커피,산미" in CP949
    const bytes = Uint8Array.from([0xc4, 0xbf, 0xc7, 0xc7, 0x2c, 0xbb, 0xea, 0xb9, 0xcc]);

    expect(decodeWithFallback(bytes)).toEqual({ text: '커피,산미', encoding: 'euc-kr' });
  });

  it('should fall back to latin1 when neither UTF-8 nor CP949 decode', () => {
    // "Café\n" in Latin-1
    const bytes = Uint8Array.from([0x43, 0x61, 0x66, 0xe9, 0x0a]);

    expect(decodeWithFallback(bytes)).toEqual({ text: 'Café\n', encoding: 'latin1' });
  });

  it('should fail once every encoding has been tried', () => {
    const bytes = Uint8Array.from([0x43, 0x61, 0x66, 0xe9]);

    expect(() => decodeWithFallback(bytes, ['utf-8'])).toThrow(UndecodableTextError);
  });

  it('should skip encodings the runtime does not support', () => {
    const bytes = Buffer.from('plain', 'utf-8');

    expect(decodeWithFallback(bytes, ['no-such-encoding', 'utf-8'])).toEqual({
      text: 'plain',
      encoding: 'utf-8',
    });
  });
});
