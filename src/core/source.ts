import * as fs from 'node:fs';

export type SourceEncoding = 'utf-8' | 'latin1';

export interface DecodedSource {
  text: string;
  encoding: SourceEncoding;
}

/**
 * Strict UTF-8 first; bytes that are not valid UTF-8 are read as latin-1 so
 * every byte counts as one character.
 */
export function decodeSource(bytes: Uint8Array): DecodedSource {
  try {
    return { text: new TextDecoder('utf-8', { fatal: true }).decode(bytes), encoding: 'utf-8' };
  } catch (e) {
    if (!(e instanceof TypeError)) throw e;
    return { text: Buffer.from(bytes).toString('latin1'), encoding: 'latin1' };
  }
}

/** Read a file, or standard input for '-'. */
export function readSource(file: string): DecodedSource {
  return decodeSource(fs.readFileSync(file === '-' ? 0 : file));
}
