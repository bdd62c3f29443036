/**
 * Tests for the encoding-aware line reader
 */

import { describe, it, expect } from 'vitest';
import {
  decodeLines,
  detectFileEncoding,
  readFileLines,
} from '../../src/compdb/line-reader.js';
import { MemoryFileSystem, loadFixtureProject } from '../helpers/memory-file-system.js';

function utf16le(text: string): Buffer {
  return Buffer.concat([Buffer.from([0xff, 0xfe]), Buffer.from(text, 'utf16le')]);
}

function utf16be(text: string): Buffer {
  const le = Buffer.from(text, 'utf16le');
  return Buffer.concat([Buffer.from([0xfe, 0xff]), Buffer.from(le).swap16()]);
}

describe('detectFileEncoding', () => {
  it('should classify FF FE as UTF-16 LE', () => {
    expect(detectFileEncoding(Buffer.from([0xff, 0xfe, 0x41, 0x00]))).toEqual({
      encoding: 'utf16le',
      offset: 2,
    });
  });

  it('should classify FE FF as UTF-16 BE', () => {
    expect(detectFileEncoding(Buffer.from([0xfe, 0xff, 0x00, 0x41]))).toEqual({
      encoding: 'utf16be',
      offset: 2,
    });
  });

  it('should fall back to UTF-8 and rewind to the start', () => {
    expect(detectFileEncoding(Buffer.from('/c foo.cpp'))).toEqual({ encoding: 'utf8', offset: 0 });
    expect(detectFileEncoding(Buffer.from([0xff]))).toEqual({ encoding: 'utf8', offset: 0 });
    expect(detectFileEncoding(Buffer.alloc(0))).toEqual({ encoding: 'utf8', offset: 0 });
  });
});

describe('decodeLines', () => {
  it('should split UTF-8 on LF and strip one trailing CR', () => {
    expect(decodeLines(Buffer.from('first\r\nsecond\nthird\r\r\n'))).toEqual([
      'first',
      'second',
      'third\r',
      '',
    ]);
  });

  it('should keep the first character of a UTF-8 file', () => {
    expect(decodeLines(Buffer.from('#include "a.h"'))).toEqual(['#include "a.h"']);
  });

  it('should narrow UTF-16 LE to its low bytes', () => {
    expect(decodeLines(utf16le('^C:\\SRC\\A.CPP\r\n/c C:\\SRC\\A.CPP\r\n'))).toEqual([
      '^C:\\SRC\\A.CPP',
      '/c C:\\SRC\\A.CPP',
      '',
    ]);
  });

  it('should narrow UTF-16 BE by skipping the high bytes', () => {
    expect(decodeLines(utf16be('/c C:\\B.CC\r\nnext'))).toEqual(['/c C:\\B.CC', 'next']);
  });

  it('should decode UTF-8 text as UTF-8', () => {
    expect(decodeLines(Buffer.from('// café\n'))).toEqual(['// café', '']);
  });
});

describe('readFileLines', () => {
  it('should read a UTF-16 LE tlog', () => {
    const fs = loadFixtureProject('test-project-1', 'C:\\dev\\test-project-1');
    const result = readFileLines(
      fs,
      'C:\\dev\\test-project-1\\build\\test-project-lib.dir\\Debug\\test-pro.5A2E8F1C.tlog\\CL.command.1.tlog',
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toHaveLength(3);
    expect(result.value[0]).toBe('^C:\\DEV\\TEST-PROJECT-1\\SRC\\LIB\\LIB.CPP');
    expect(result.value[1].startsWith('/c /IC:\\DEV\\TEST-PROJECT-1\\INCLUDE /Zi')).toBe(true);
    expect(result.value[1].endsWith(' C:\\DEV\\TEST-PROJECT-1\\SRC\\LIB\\LIB.CPP')).toBe(true);
    expect(result.value[2]).toBe('');
  });

  it('should fail with StreamUnreadable for a missing file', () => {
    const result = readFileLines(new MemoryFileSystem().addDirectory('C:\\'), 'C:\\nope.tlog');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('StreamUnreadable');
    expect(result.error.path).toBe('C:\\nope.tlog');
    expect(result.error.message).toBe('Failed to open file C:\\nope.tlog: ENOENT: C:\\nope.tlog');
  });

  it('should fail with StreamUnreadable for a directory', () => {
    const fs = new MemoryFileSystem().addDirectory('C:\\build');
    const result = readFileLines(fs, 'C:\\build');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('StreamUnreadable');
  });
});
