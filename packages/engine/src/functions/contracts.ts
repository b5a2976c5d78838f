import { type Observable } from 'rxjs';
import { type z } from 'zod';
import { type JsonValue } from '@strata/core';
import { type DataValue } from '../data/model';
import { type DataPath } from '../data/path';

export type ClientFunctionReturnType = 'string' | 'number' | 'boolean' | 'array' | 'object' | 'any' | 'void';

/**
 * The scope a binding is resolved in: a data model, a current path for
 * relative references, and the functions bindings may call.
 */
export interface ExecutionContext {
  readonly path: DataPath;
  getFunction(name: string): ClientFunction | undefined;
  subscribe(path: DataPath | string): Observable<DataValue>;
  getValue(path: DataPath | string): DataValue;
  update(path: DataPath | string, contents: JsonValue): void;
  nested(relativePath: DataPath | string): ExecutionContext;
  resolvePath(path: DataPath | string): DataPath;
  resolve(value: unknown): Observable<unknown>;
  evaluateCondition(condition: unknown): Observable<boolean>;
}

/**
 * A named computation invocable from bindings.
 *
 * `execute` returns a stream. When any argument changes the resolver cancels
 * the previous stream and calls `execute` again with the new arguments, so an
 * implementation only has to react to its own sources (a clock, a watched
 * path, ...).
 */
export interface ClientFunction<TArgs extends z.ZodTypeAny = z.ZodTypeAny> {
  name: string;
  description: string;
  argumentSchema: TArgs;
  returnType: ClientFunctionReturnType;
  execute(args: z.infer<TArgs>, context: ExecutionContext): Observable<unknown>;
}
