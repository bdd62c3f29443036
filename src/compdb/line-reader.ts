/**
 * Encoding-aware line reader
 * Tlog files are usually UTF-16 LE with a BOM; sources are UTF-8.
 */

import { CompdbError, describeError } from './errors.js';
import type { FileSystem } from './file-system.js';
import { err, ok, type Result } from './result.js';

export type FileEncoding = 'utf8' | 'utf16le' | 'utf16be';

export interface DetectedEncoding {
  encoding: FileEncoding;
  /** Where the text starts: past the BOM, or 0 when there is none */
  offset: number;
}

/**
 * Detect the encoding of a buffer from its byte order mark
 */
export function detectFileEncoding(bytes: Uint8Array): DetectedEncoding {
  if (bytes.length >= 2) {
    if (bytes[0] === 0xff && bytes[1] === 0xfe) {
      return { encoding: 'utf16le', offset: 2 };
    }
    if (bytes[0] === 0xfe && bytes[1] === 0xff) {
      return { encoding: 'utf16be', offset: 2 };
    }
  }
  return { encoding: 'utf8', offset: 0 };
}

/**
 * Keep one byte of every UTF-16 code unit. Anything outside 7-bit ASCII is
 * mangled; tlog content is assumed to be ASCII.
 */
function narrowUtf16(body: Uint8Array, start: number): string {
  const narrowed = Buffer.alloc(Math.ceil((body.length - start) / 2));
  let length = 0;
  for (let i = start; i < body.length; i += 2) {
    narrowed[length++] = body[i];
  }
  return narrowed.subarray(0, length).toString('latin1');
}

/**
 * Decode a whole file and split it into lines, dropping one trailing CR per line
 */
export function decodeLines(bytes: Uint8Array): string[] {
  const { encoding, offset } = detectFileEncoding(bytes);
  const body = bytes.subarray(offset);

  let text: string;
  switch (encoding) {
    case 'utf16le':
      text = narrowUtf16(body, 0);
      break;
    case 'utf16be':
      text = narrowUtf16(body, 1);
      break;
    default:
      text = Buffer.from(body.buffer, body.byteOffset, body.byteLength).toString('utf-8');
      break;
  }

  return text.split('\n').map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
}

/**
 * Read a file through the filesystem service and return its lines
 */
export function readFileLines(fs: FileSystem, filePath: string): Result<string[]> {
  let bytes: Buffer;
  try {
    bytes = fs.readFile(filePath);
  } catch (error) {
    return err(
      new CompdbError('StreamUnreadable', `Failed to open file ${filePath}: ${describeError(error)}`, {
        path: filePath,
        cause: error,
      }),
    );
  }
  return ok(decodeLines(bytes));
}
