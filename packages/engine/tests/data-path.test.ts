import { describe, expect, it } from 'vitest';
import { InvalidPathError } from '@strata/core';
import { DataPath } from '../src/index';

describe('DataPath', () => {
  it('parses fields and indices', () => {
    const path = DataPath.parse('/a/b[0]/c');
    expect(path.absolute).toBe(true);
    expect(path.segments).toEqual([
      { kind: 'field', name: 'a' },
      { kind: 'field', name: 'b' },
      { kind: 'index', index: 0 },
      { kind: 'field', name: 'c' }
    ]);
    expect(path.toString()).toBe('/a/b[0]/c');
  });

  it('parses consecutive and leading indices', () => {
    expect(DataPath.parse('/grid[1][2]').segments).toEqual([
      { kind: 'field', name: 'grid' },
      { kind: 'index', index: 1 },
      { kind: 'index', index: 2 }
    ]);
    expect(DataPath.parse('/[3]/name').toString()).toBe('/[3]/name');
  });

  it('treats "" and "/" as the root', () => {
    expect(DataPath.parse('').isRoot).toBe(true);
    expect(DataPath.parse('/').isRoot).toBe(true);
    expect(DataPath.parse('/').toString()).toBe('/');
    expect(DataPath.parse('').toString()).toBe('');
  });

  it('keeps relative paths relative', () => {
    const path = DataPath.parse('item/name');
    expect(path.absolute).toBe(false);
    expect(path.toString()).toBe('item/name');
  });

  it('rejects malformed indices', () => {
    expect(() => DataPath.parse('/a[x]')).toThrow(InvalidPathError);
    expect(() => DataPath.parse('/a[0')).toThrow(InvalidPathError);
  });

  it('rejects indices beyond the array range', () => {
    expect(() => DataPath.parse('/a[4294967295]')).toThrow('Invalid data path "/a[4294967295]": index 4294967295 is out of range');
    expect(() => DataPath.parse('/a[99999999999999999999]')).toThrow(InvalidPathError);
    expect(DataPath.parse('/a[4294967294]').segments[1]).toEqual({ kind: 'index', index: 4294967294 });
  });

  it('resolves relative paths against a base and leaves absolute paths alone', () => {
    const base = DataPath.parse('/items[2]');
    expect(base.resolve('name').toString()).toBe('/items[2]/name');
    expect(base.resolve('/title').toString()).toBe('/title');
  });

  it('joins regardless of the leading slash', () => {
    expect(DataPath.parse('/items').join('/[0]').toString()).toBe('/items[0]');
  });

  it('compares by segments', () => {
    const parent = DataPath.parse('/a/b');
    expect(parent.isPrefixOf(DataPath.parse('/a/b/c'))).toBe(true);
    expect(parent.isPrefixOf(DataPath.parse('/a'))).toBe(false);
    expect(parent.equals(DataPath.parse('a/b'))).toBe(true);
    expect(DataPath.parse('/a/b/c').parent().toString()).toBe('/a/b');
  });
});
