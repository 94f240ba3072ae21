/**
 * Message Reader
 * Loads a message file and decodes it with a caller-supplied charset.
 *
 * No charset detection is attempted beyond honouring a byte order mark.
 */

import fs from 'fs/promises';
import { TextDecoder } from 'util';
import logger from '../utils/logger';
import { DecodingError, FileSystemError } from '../errors/DomainError';
import { DecodedMessage } from './types';

/**
 * BOM (Byte Order Mark) signatures
 */
const BOM_SIGNATURES: Array<{ encoding: string; bom: Buffer }> = [
  { encoding: 'utf-8', bom: Buffer.from([0xef, 0xbb, 0xbf]) },
  { encoding: 'utf-16le', bom: Buffer.from([0xff, 0xfe]) },
  { encoding: 'utf-16be', bom: Buffer.from([0xfe, 0xff]) },
];

export const FALLBACK_CHARSET = 'utf-8';

/**
 * Encoding announced by a leading byte order mark, if any
 */
export function detectBom(buffer: Buffer): string | null {
  const match = findBom(buffer);
  return match ? match.encoding : null;
}

function findBom(buffer: Buffer): { encoding: string; bom: Buffer } | null {
  for (const signature of BOM_SIGNATURES) {
    const { bom } = signature;
    if (buffer.length >= bom.length && buffer.subarray(0, bom.length).equals(bom)) {
      return signature;
    }
  }
  return null;
}

/**
 * Decode raw message bytes. Invalid bytes are an error, never replaced.
 * A leading byte order mark is always dropped; a caller charset takes precedence over it.
 */
export function decodeMessage(buffer: Buffer, charset?: string, filePath?: string): DecodedMessage {
  const bomMatch = findBom(buffer);
  const label = charset || (bomMatch ? bomMatch.encoding : null) || FALLBACK_CHARSET;
  const content = bomMatch ? buffer.subarray(bomMatch.bom.length) : buffer;

  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(label, { fatal: true });
  } catch {
    throw DecodingError.unknownCharset(label, filePath);
  }

  let text: string;
  try {
    text = decoder.decode(content);
  } catch (error) {
    throw DecodingError.invalidBytes(
      decoder.encoding,
      filePath,
      error instanceof Error ? error : undefined
    );
  }

  return {
    text: text.replace(/\r\n?/g, '\n'),
    charset: decoder.encoding,
  };
}

/**
 * Read and decode a message file
 */
export async function readMessage(filePath: string, charset?: string): Promise<DecodedMessage> {
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(filePath);
  } catch (error) {
    throw FileSystemError.fromNodeError(filePath, error);
  }

  const message = decodeMessage(buffer, charset, filePath);

  logger.debug('Read message', {
    path: filePath,
    bytes: buffer.length,
    charset: message.charset,
  });

  return message;
}
