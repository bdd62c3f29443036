/**
 * Include path extraction from cl.exe command strings
 */

import { CompdbError } from './errors.js';
import { err, ok, type Result } from './result.js';

const INCLUDE_FLAG = '/I';

function isAsciiWhitespace(c: string): boolean {
  return c === ' ' || c === '\t' || c === '\n' || c === '\r' || c === '\v' || c === '\f';
}

function malformed(command: string, detail: string): Result<never> {
  return err(new CompdbError('MalformedInclude', `${detail} in command: ${command}`));
}

/**
 * Collect every /I argument, quoted or bare, in order of appearance.
 * Lowercase /i is not an include flag.
 */
export function findIncludePaths(command: string): Result<string[]> {
  const includePaths: string[] = [];
  let index = command.indexOf(INCLUDE_FLAG);

  while (index !== -1) {
    let cursor = index + INCLUDE_FLAG.length;
    while (cursor < command.length && isAsciiWhitespace(command[cursor])) {
      cursor++;
    }

    if (cursor >= command.length) {
      return malformed(command, 'Expected include path after /I');
    }

    let next: number;
    if (command[cursor] === '"') {
      const closing = command.indexOf('"', cursor + 1);
      if (closing === -1) {
        return malformed(command, 'Unterminated quoted include path');
      }
      includePaths.push(command.slice(cursor + 1, closing));
      next = closing + 1;
    } else {
      const space = command.indexOf(' ', cursor);
      next = space === -1 ? command.length : space;
      includePaths.push(command.slice(cursor, next));
    }

    index = command.indexOf(INCLUDE_FLAG, next);
  }

  return ok(includePaths);
}
