import { BehaviorSubject, Observable } from 'rxjs';
import {
  DisposedError,
  StructuralConflictError,
  createSilentLogger,
  isJsonMap,
  type JsonMap,
  type JsonValue,
  type Logger
} from '@strata/core';
import { DataPath, type PathSegment } from './path';

export type DataValue = JsonValue | undefined;

export interface DataModelOptions {
  /** How many `null` slots a single write may add past the end of a sequence. */
  maxIndexGap?: number;
}

export const DEFAULT_MAX_INDEX_GAP = 1000;

function describeKind(value: JsonValue): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'a sequence';
  return typeof value === 'object' ? 'a map' : `a ${typeof value}`;
}

function readChild(node: DataValue, segment: PathSegment): DataValue {
  if (segment.kind === 'field') {
    return isJsonMap(node) ? node[segment.name] : undefined;
  }
  return Array.isArray(node) ? node[segment.index] : undefined;
}

/**
 * Returns a copy of `node` with `contents` written at `segments[depth..]`.
 * Only the containers along the path are copied; siblings keep their identity.
 */
function writeIn(
  node: DataValue,
  path: DataPath,
  depth: number,
  contents: JsonValue,
  maxIndexGap: number
): JsonValue {
  const segment = path.segments[depth];
  if (segment === undefined) {
    return contents;
  }
  const isLast = depth === path.segments.length - 1;
  const location = DataPath.of(path.segments.slice(0, depth)).toString();

  if (segment.kind === 'field') {
    let map: JsonMap;
    if (node === undefined || node === null) {
      map = {};
    } else if (isJsonMap(node)) {
      map = { ...node };
    } else {
      throw new StructuralConflictError(
        path.toString(),
        `expected a map at ${location} but found ${describeKind(node)}`
      );
    }
    map[segment.name] = isLast ? contents : writeIn(map[segment.name], path, depth + 1, contents, maxIndexGap);
    return map;
  }

  let list: JsonValue[];
  if (node === undefined || node === null) {
    list = [];
  } else if (Array.isArray(node)) {
    list = [...node];
  } else {
    throw new StructuralConflictError(
      path.toString(),
      `expected a sequence at ${location} but found ${describeKind(node)}`
    );
  }
  if (segment.index - list.length > maxIndexGap) {
    throw new StructuralConflictError(
      path.toString(),
      `index ${segment.index} is more than ${maxIndexGap} past the end of the sequence at ${location}`
    );
  }
  while (list.length < segment.index) {
    list.push(null);
  }
  list[segment.index] = isLast ? contents : writeIn(list[segment.index], path, depth + 1, contents, maxIndexGap);
  return list;
}

/**
 * A path-addressed, observable JSON document owned by one surface.
 */
export class DataModel {
  private root: DataValue;
  private readonly observers = new Map<string, { path: DataPath; subject: BehaviorSubject<DataValue> }>();
  private disposed = false;
  private readonly maxIndexGap: number;

  public constructor(
    initial: DataValue = {},
    private readonly logger: Logger = createSilentLogger(),
    options: DataModelOptions = {}
  ) {
    this.root = initial;
    this.maxIndexGap = options.maxIndexGap ?? DEFAULT_MAX_INDEX_GAP;
  }

  public get data(): DataValue {
    return this.root;
  }

  public get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Writes `contents` at `path`, creating maps and sequences on the way.
   * Throws {@link StructuralConflictError} without touching the document when the
   * path crosses a value of the wrong kind or pads a sequence by more than
   * `maxIndexGap` entries.
   */
  public update(path: DataPath | string, contents: JsonValue): void {
    this.assertAlive();
    const target = DataPath.from(path);

    this.root = target.isRoot ? contents : writeIn(this.root, target, 0, contents, this.maxIndexGap);
    this.logger.debug({ path: target.toString() }, 'Data model updated');
    this.notify(target);
  }

  public getValue(path: DataPath | string): DataValue {
    let node: DataValue = this.root;
    for (const segment of DataPath.from(path).segments) {
      node = readChild(node, segment);
      if (node === undefined) return undefined;
    }
    return node;
  }

  /**
   * Live view of the value at `path`: emits the current value on subscribe, then
   * again whenever a write touches the path, one of its ancestors or a descendant.
   */
  public subscribe(path: DataPath | string): Observable<DataValue> {
    return new Observable<DataValue>((subscriber) => {
      if (this.disposed) {
        subscriber.error(new DisposedError('DataModel'));
        return undefined;
      }

      let target: DataPath;
      try {
        target = DataPath.of(DataPath.from(path).segments);
      } catch (error) {
        subscriber.error(error);
        return undefined;
      }
      const key = target.toString();

      let entry = this.observers.get(key);
      if (!entry) {
        entry = { path: target, subject: new BehaviorSubject(this.getValue(target)) };
        this.observers.set(key, entry);
      }
      const { subject } = entry;
      const subscription = subject.subscribe(subscriber);

      return () => {
        subscription.unsubscribe();
        if (!subject.observed && this.observers.get(key)?.subject === subject) {
          this.observers.delete(key);
          subject.complete();
        }
      };
    });
  }

  public get observerCount(): number {
    return this.observers.size;
  }

  public dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    for (const { subject } of this.observers.values()) {
      subject.complete();
    }
    this.observers.clear();
  }

  private notify(changed: DataPath): void {
    for (const { path, subject } of [...this.observers.values()]) {
      if (!path.isPrefixOf(changed) && !changed.isPrefixOf(path)) continue;
      const next = this.getValue(path);
      if (next !== subject.getValue()) {
        subject.next(next);
      }
    }
  }

  private assertAlive(): void {
    if (this.disposed) {
      throw new DisposedError('DataModel');
    }
  }
}
