import { InvalidPathError } from '@strata/core';

export type PathSegment =
  | { kind: 'field'; name: string }
  | { kind: 'index'; index: number };

const INDEX_SUFFIX = /\[(\d+)\]$/;

/** Largest valid array index. */
export const MAX_PATH_INDEX = 2 ** 32 - 2;

function parseToken(raw: string, token: string): PathSegment[] {
  const indices: number[] = [];
  let rest = token;
  let match = INDEX_SUFFIX.exec(rest);
  while (match) {
    const index = Number(match[1]);
    if (!Number.isSafeInteger(index) || index > MAX_PATH_INDEX) {
      throw new InvalidPathError(raw, `index ${match[1]} is out of range`);
    }
    indices.unshift(index);
    rest = rest.slice(0, match.index);
    match = INDEX_SUFFIX.exec(rest);
  }
  if (rest.includes('[') || rest.includes(']')) {
    throw new InvalidPathError(raw, `malformed index in segment "${token}"`);
  }

  const segments: PathSegment[] = [];
  if (rest.length > 0) {
    segments.push({ kind: 'field', name: rest });
  }
  for (const index of indices) {
    segments.push({ kind: 'index', index });
  }
  return segments;
}

/**
 * An immutable address inside a JSON-like document.
 *
 * Syntax: `/a/b[0]/c`. A leading `/` marks the path absolute; `""` and `"/"`
 * both address the whole document.
 */
export class DataPath {
  public static readonly root = new DataPath([], true);

  public readonly segments: readonly PathSegment[];
  public readonly absolute: boolean;

  private constructor(segments: readonly PathSegment[], absolute: boolean) {
    this.segments = Object.freeze([...segments]);
    this.absolute = absolute;
  }

  public static parse(raw: string): DataPath {
    const absolute = raw.startsWith('/');
    const segments: PathSegment[] = [];
    for (const token of raw.split('/')) {
      if (token.length === 0) continue;
      segments.push(...parseToken(raw, token));
    }
    return new DataPath(segments, absolute);
  }

  public static of(segments: readonly PathSegment[], absolute = true): DataPath {
    return new DataPath(segments, absolute);
  }

  public static from(path: DataPath | string): DataPath {
    return typeof path === 'string' ? DataPath.parse(path) : path;
  }

  public get isRoot(): boolean {
    return this.segments.length === 0;
  }

  public get length(): number {
    return this.segments.length;
  }

  /** Concatenates `relative` onto this path, ignoring whether it was written absolute. */
  public join(relative: DataPath | string): DataPath {
    const other = DataPath.from(relative);
    return new DataPath([...this.segments, ...other.segments], this.absolute);
  }

  /** Absolute paths stand alone; relative ones are joined onto this path. */
  public resolve(other: DataPath | string): DataPath {
    const path = DataPath.from(other);
    return path.absolute ? path : this.join(path);
  }

  public parent(): DataPath {
    return new DataPath(this.segments.slice(0, -1), this.absolute);
  }

  /** True when every segment of this path leads `other`, including when they are equal. */
  public isPrefixOf(other: DataPath): boolean {
    if (this.segments.length > other.segments.length) return false;
    return this.segments.every((segment, i) => segmentsEqual(segment, other.segments[i]));
  }

  public equals(other: DataPath): boolean {
    return this.segments.length === other.segments.length && this.isPrefixOf(other);
  }

  public toString(): string {
    let out = '';
    for (const segment of this.segments) {
      out += segment.kind === 'field' ? `/${segment.name}` : `[${segment.index}]`;
    }
    if (out.startsWith('[')) {
      out = `/${out}`;
    }
    if (out.length === 0) {
      return this.absolute ? '/' : '';
    }
    return this.absolute ? out : out.slice(1);
  }
}

function segmentsEqual(a: PathSegment, b: PathSegment | undefined): boolean {
  if (b === undefined) return false;
  if (a.kind === 'field') return b.kind === 'field' && a.name === b.name;
  return b.kind === 'index' && a.index === b.index;
}
