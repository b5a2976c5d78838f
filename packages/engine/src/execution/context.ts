import {
  combineLatest,
  defer,
  distinctUntilChanged,
  map,
  of,
  switchMap,
  throwError,
  type Observable
} from 'rxjs';
import {
  FunctionArgumentError,
  UnknownFunctionError,
  createSilentLogger,
  type JsonValue,
  type Logger
} from '@strata/core';
import { type DataModel, type DataValue } from '../data/model';
import { DataPath } from '../data/path';
import { type ClientFunction, type ExecutionContext } from '../functions/contracts';
import { FunctionRegistry } from '../functions/registry';
import { isFunctionCall, isPathBinding, isTruthy, type FunctionCallBinding } from './bindings';

/**
 * Resolves binding descriptors against a data model.
 *
 * - literals emit once;
 * - `{ path }` follows the data model at the path resolved against `this.path`;
 * - `{ function, args }` resolves every argument, then re-invokes the function
 *   each time any argument emits, cancelling the previous invocation.
 *
 * Unsubscribing tears down every nested path subscription and invocation.
 */
export class DataContext implements ExecutionContext {
  public constructor(
    private readonly dataModel: DataModel,
    public readonly path: DataPath = DataPath.root,
    private readonly functions: FunctionRegistry = new FunctionRegistry(),
    private readonly logger: Logger = createSilentLogger()
  ) {}

  public getFunction(name: string): ClientFunction | undefined {
    return this.functions.get(name);
  }

  public resolvePath(path: DataPath | string): DataPath {
    return this.path.resolve(path);
  }

  public subscribe(path: DataPath | string): Observable<DataValue> {
    return this.dataModel.subscribe(this.resolvePath(path));
  }

  public getValue(path: DataPath | string): DataValue {
    return this.dataModel.getValue(this.resolvePath(path));
  }

  public update(path: DataPath | string, contents: JsonValue): void {
    this.dataModel.update(this.resolvePath(path), contents);
  }

  public nested(relativePath: DataPath | string): DataContext {
    return new DataContext(this.dataModel, this.path.join(relativePath), this.functions, this.logger);
  }

  public resolve(value: unknown): Observable<unknown> {
    if (isPathBinding(value)) {
      const { path } = value;
      return defer(() => this.subscribe(path));
    }
    if (isFunctionCall(value)) {
      return this.call(value);
    }
    if (Array.isArray(value)) {
      return value.length === 0 ? of([]) : combineLatest(value.map((item) => this.resolve(item)));
    }
    return of(value);
  }

  public evaluateCondition(condition: unknown): Observable<boolean> {
    return this.resolve(condition).pipe(map(isTruthy), distinctUntilChanged());
  }

  private call(binding: FunctionCallBinding): Observable<unknown> {
    return defer(() => {
      const fn = this.functions.get(binding.function);
      if (!fn) {
        this.logger.warn({ function: binding.function, path: this.path.toString() }, 'Unknown function in binding');
        return throwError(() => new UnknownFunctionError(binding.function));
      }

      const entries = Object.entries(binding.args ?? {});
      const args$: Observable<Record<string, unknown>> = entries.length === 0
        ? of({})
        : combineLatest(Object.fromEntries(entries.map(([key, arg]) => [key, this.resolve(arg)])));

      return args$.pipe(switchMap((args) => this.invoke(fn, args)));
    });
  }

  private invoke(fn: ClientFunction, args: Record<string, unknown>): Observable<unknown> {
    const parsed = fn.argumentSchema.safeParse(args);
    if (!parsed.success) {
      return throwError(() => new FunctionArgumentError(fn.name, parsed.error.message));
    }
    return defer(() => fn.execute(parsed.data, this));
  }
}
