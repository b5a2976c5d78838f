import { BehaviorSubject, type Observable } from 'rxjs';
import {
  DisposedError,
  SurfaceMismatchError,
  assertNever,
  createSilentLogger,
  createUiDefinition,
  type Component,
  type Logger,
  type ServerMessage,
  type UiDefinition,
  type UiEvent
} from '@strata/core';
import { DataContext, DataModel, FunctionRegistry } from '@strata/engine';

export interface SurfaceOptions {
  surfaceId: string;
  onUiEvent?: (event: UiEvent) => void;
  functions?: FunctionRegistry;
  logger?: Logger;
}

/**
 * One independently addressable UI region: a UI definition plus the data
 * model its components bind against. All mutation goes through {@link apply}.
 */
export class Surface {
  public readonly surfaceId: string;
  public readonly dataModel: DataModel;

  private readonly definitionSubject = new BehaviorSubject<UiDefinition | null>(null);
  private readonly functions: FunctionRegistry;
  private readonly logger: Logger;
  private readonly onUiEvent: ((event: UiEvent) => void) | undefined;
  private disposed = false;

  public constructor(options: SurfaceOptions) {
    this.surfaceId = options.surfaceId;
    this.functions = options.functions ?? new FunctionRegistry();
    this.logger = (options.logger ?? createSilentLogger()).child({ surfaceId: options.surfaceId });
    this.onUiEvent = options.onUiEvent;
    this.dataModel = new DataModel({}, this.logger);
  }

  /** Current definition, or null until the first structural message arrives. */
  public get definition(): UiDefinition | null {
    return this.definitionSubject.getValue();
  }

  /** Emits the current definition on subscribe and every replacement after it. */
  public get definition$(): Observable<UiDefinition | null> {
    return this.definitionSubject.asObservable();
  }

  public get isDisposed(): boolean {
    return this.disposed;
  }

  public apply(message: ServerMessage): void {
    this.assertAlive();
    if (message.surfaceId !== this.surfaceId) {
      throw new SurfaceMismatchError(this.surfaceId, message.surfaceId);
    }

    switch (message.type) {
      case 'surfaceUpdate': {
        const current = this.definition ?? createUiDefinition(this.surfaceId);
        const components: Record<string, Component> = { ...current.components };
        for (const component of message.components) {
          components[component.id] = structuredClone(component);
        }
        this.definitionSubject.next({ ...current, components });
        this.logger.debug({ count: message.components.length }, 'Components upserted');
        break;
      }
      case 'beginRendering': {
        const current = this.definition ?? createUiDefinition(this.surfaceId);
        this.definitionSubject.next({ ...current, rootComponentId: message.root });
        this.logger.debug({ root: message.root }, 'Root component set');
        break;
      }
      case 'dataModelUpdate':
        this.dataModel.update(message.path ?? '/', message.contents);
        break;
      case 'surfaceDeletion':
        // Owned by the registry, which is the only place a surface is destroyed.
        break;
      default:
        assertNever(message, 'server message');
    }
  }

  /** Execution context rooted at the document root, for binding component properties. */
  public createContext(functions: FunctionRegistry = this.functions): DataContext {
    this.assertAlive();
    return new DataContext(this.dataModel, undefined, functions, this.logger);
  }

  public dispatchEvent(event: UiEvent): void {
    this.assertAlive();
    this.onUiEvent?.(event);
  }

  /** Idempotent. Completes `definition$` and disposes the data model. */
  public dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.definitionSubject.complete();
    this.dataModel.dispose();
  }

  private assertAlive(): void {
    if (this.disposed) {
      throw new DisposedError(`Surface ${this.surfaceId}`);
    }
  }
}
