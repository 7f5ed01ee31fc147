import { describe, it, expect } from 'vitest';
import { parseConfigText, parseLine } from './parser.js';
import { resolveLoadOptions } from '../schema/index.js';
import type { ParseDiagnostic } from '../schema/index.js';

const MAX_VALUE = 256;

describe('parseLine', () => {
  it('skips comment lines', () => {
    expect(parseLine('# port=80', MAX_VALUE)).toEqual({ ok: false, reason: 'comment' });
  });

  it('only treats column one as a comment marker', () => {
    expect(parseLine(' # port=80', MAX_VALUE)).toEqual({
      ok: true,
      entry: { key: '# port', kind: 'int', value: 80 },
      valueTruncated: false,
    });
  });

  it('skips lines without a separator', () => {
    expect(parseLine('just text', MAX_VALUE)).toEqual({ ok: false, reason: 'no-separator' });
    expect(parseLine('', MAX_VALUE)).toEqual({ ok: false, reason: 'no-separator' });
  });

  it('skips lines whose key trims to nothing', () => {
    expect(parseLine('   = value', MAX_VALUE)).toEqual({ ok: false, reason: 'empty-key' });
    expect(parseLine('=5', MAX_VALUE)).toEqual({ ok: false, reason: 'empty-key' });
  });

  it('trims key and string value', () => {
    expect(parseLine(' key = value ', MAX_VALUE)).toEqual(parseLine('key=value', MAX_VALUE));
    expect(parseLine('\tname\t=\thello world\t', MAX_VALUE)).toEqual({
      ok: true,
      entry: { key: 'name', kind: 'string', value: 'hello world' },
      valueTruncated: false,
    });
  });

  it('splits on the first separator only', () => {
    expect(parseLine('url=http://host/?a=b', MAX_VALUE)).toEqual({
      ok: true,
      entry: { key: 'url', kind: 'string', value: 'http://host/?a=b' },
      valueTruncated: false,
    });
  });

  it('strips leading separators from string values', () => {
    expect(parseLine('key==value', MAX_VALUE)).toEqual({
      ok: true,
      entry: { key: 'key', kind: 'string', value: 'value' },
      valueTruncated: false,
    });
    expect(parseLine('key= = =x', MAX_VALUE)).toEqual({
      ok: true,
      entry: { key: 'key', kind: 'string', value: 'x' },
      valueTruncated: false,
    });
  });

  it('stores an empty value as an empty string', () => {
    expect(parseLine('key=', MAX_VALUE)).toEqual({
      ok: true,
      entry: { key: 'key', kind: 'string', value: '' },
      valueTruncated: false,
    });
    expect(parseLine('key=   ', MAX_VALUE)).toEqual({
      ok: true,
      entry: { key: 'key', kind: 'string', value: '' },
      valueTruncated: false,
    });
  });

  it('infers numbers with surrounding whitespace', () => {
    expect(parseLine('retries = 3 ', MAX_VALUE)).toEqual({
      ok: true,
      entry: { key: 'retries', kind: 'int', value: 3 },
      valueTruncated: false,
    });
    expect(parseLine('ratio=0.75', MAX_VALUE)).toEqual({
      ok: true,
      entry: { key: 'ratio', kind: 'double', value: 0.75 },
      valueTruncated: false,
    });
    expect(parseLine('big=3000000000', MAX_VALUE)).toEqual({
      ok: true,
      entry: { key: 'big', kind: 'long', value: 3000000000n },
      valueTruncated: false,
    });
  });

  it('keeps numbers followed by text as strings', () => {
    expect(parseLine('timeout= 42 seconds', MAX_VALUE)).toEqual({
      ok: true,
      entry: { key: 'timeout', kind: 'string', value: '42 seconds' },
      valueTruncated: false,
    });
  });

  it('keeps non-ascii whitespace in values', () => {
    expect(parseLine('k=\u00a0x\u00a0', MAX_VALUE)).toEqual({
      ok: true,
      entry: { key: 'k', kind: 'string', value: '\u00a0x\u00a0' },
      valueTruncated: false,
    });
  });

  it('truncates long string values', () => {
    const result = parseLine(`long=${'a'.repeat(300)}`, MAX_VALUE);
    expect(result).toEqual({
      ok: true,
      entry: { key: 'long', kind: 'string', value: 'a'.repeat(256) },
      valueTruncated: true,
    });
  });

  it('re-trims when the cut lands on whitespace', () => {
    const result = parseLine(`k=${'a'.repeat(255)} ${'b'.repeat(10)}`, MAX_VALUE);
    expect(result).toEqual({
      ok: true,
      entry: { key: 'k', kind: 'string', value: 'a'.repeat(255) },
      valueTruncated: true,
    });
  });
});

describe('parseConfigText', () => {
  it('collects entries in file order and reports skipped lines', () => {
    const diagnostics: ParseDiagnostic[] = [];
    const text = '# header\nint_val=42\n\nbad line\n = 5\nstr_val = hello\n';

    const entries = parseConfigText(
      text,
      resolveLoadOptions({ onDiagnostic: (d) => diagnostics.push(d) }),
    );

    expect(entries).toEqual([
      { key: 'int_val', kind: 'int', value: 42 },
      { key: 'str_val', kind: 'string', value: 'hello' },
    ]);
    expect(diagnostics).toEqual([
      { line: 1, reason: 'comment', text: '# header' },
      { line: 3, reason: 'no-separator', text: '' },
      { line: 4, reason: 'no-separator', text: 'bad line' },
      { line: 5, reason: 'empty-key', text: ' = 5' },
    ]);
  });

  it('truncates lines past the line limit', () => {
    const diagnostics: ParseDiagnostic[] = [];

    const entries = parseConfigText(
      'key=123456789',
      resolveLoadOptions({ maxLineLength: 10, onDiagnostic: (d) => diagnostics.push(d) }),
    );

    expect(entries).toEqual([{ key: 'key', kind: 'int', value: 123456 }]);
    expect(diagnostics).toEqual([{ line: 1, reason: 'line-truncated', text: 'key=123456' }]);
  });

  it('reports truncated values', () => {
    const diagnostics: ParseDiagnostic[] = [];

    parseConfigText(
      'name=abcdef',
      resolveLoadOptions({ maxValueLength: 3, onDiagnostic: (d) => diagnostics.push(d) }),
    );

    expect(diagnostics).toEqual([{ line: 1, reason: 'value-truncated', text: 'name=abcdef' }]);
  });

  it('handles CRLF line endings', () => {
    expect(parseConfigText('a=1\r\nb=x\r\n', resolveLoadOptions())).toEqual([
      { key: 'a', kind: 'int', value: 1 },
      { key: 'b', kind: 'string', value: 'x' },
    ]);
  });

  it('keeps duplicate keys in order', () => {
    expect(parseConfigText('dup=first\ndup=second', resolveLoadOptions())).toEqual([
      { key: 'dup', kind: 'string', value: 'first' },
      { key: 'dup', kind: 'string', value: 'second' },
    ]);
  });
});
