/**
 * text-decoding.ts
 * Decode raw file bytes by trying a list of encodings in order
 */

import { TextDecoder } from 'util';

// cp949 is served by the WHATWG euc-kr decoder, which implements the Windows-949 superset
export const CATALOG_ENCODINGS: readonly string[] = ['utf-8', 'euc-kr', 'latin1'];

export interface DecodedText {
  text: string;
  encoding: string;
}

export class UndecodableTextError extends Error {
  constructor(readonly attempted: readonly string[]) {
    super(`Could not decode with any of: ${attempted.join(', ')}`);
    this.name = 'UndecodableTextError';
  }
}

/**
 * Returns the text from the first encoding that decodes without error.
 * @throws UndecodableTextError when every encoding fails
 */
export const decodeWithFallback = (
  bytes: Uint8Array,
  encodings: readonly string[] = CATALOG_ENCODINGS
): DecodedText => {
  for (const encoding of encodings) {
    try {
      const text = new TextDecoder(encoding, { fatal: true }).decode(bytes);
      return { text, encoding };
    } catch (error) {
      // RangeError: unsupported label; TypeError: invalid byte sequence
      if (!(error instanceof RangeError || error instanceof TypeError)) {
        throw error;
      }
    }
  }

  throw new UndecodableTextError(encodings);
};
