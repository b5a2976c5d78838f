import { Subject, type Observable } from 'rxjs';
import {
  DisposedError,
  assertNever,
  createSilentLogger,
  encodeUserAction,
  type Logger,
  type ServerMessage,
  type UiEvent,
  type UserMessage
} from '@strata/core';
import { FunctionRegistry } from '@strata/engine';
import { Surface } from './surface';

export type SurfaceLifecycleEvent =
  | { type: 'surfaceAdded'; surface: Surface }
  | { type: 'surfaceUpdated'; surface: Surface }
  | { type: 'surfaceRemoved'; surface: Surface };

export interface SurfaceRegistryOptions {
  functions?: FunctionRegistry;
  logger?: Logger;
}

/**
 * Owns every live surface, routes inbound messages to them and turns user
 * actions into outbound user messages.
 *
 * `lifecycle$` and `userMessages$` are hot: subscribers only see what is
 * emitted after they subscribe.
 */
export class SurfaceRegistry {
  private readonly surfaces = new Map<string, Surface>();
  private readonly lifecycleSubject = new Subject<SurfaceLifecycleEvent>();
  private readonly userMessageSubject = new Subject<UserMessage>();
  private readonly functions: FunctionRegistry;
  private readonly logger: Logger;
  private disposed = false;

  public constructor(options: SurfaceRegistryOptions = {}) {
    this.functions = options.functions ?? new FunctionRegistry();
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'surface-registry' });
  }

  public get lifecycle$(): Observable<SurfaceLifecycleEvent> {
    return this.lifecycleSubject.asObservable();
  }

  public get userMessages$(): Observable<UserMessage> {
    return this.userMessageSubject.asObservable();
  }

  public get surfaceIds(): string[] {
    return [...this.surfaces.keys()];
  }

  public get isDisposed(): boolean {
    return this.disposed;
  }

  public get(surfaceId: string): Surface | undefined {
    return this.surfaces.get(surfaceId);
  }

  public has(surfaceId: string): boolean {
    return this.surfaces.has(surfaceId);
  }

  public getOrCreate(surfaceId: string): Surface {
    this.assertAlive();
    const existing = this.surfaces.get(surfaceId);
    if (existing) return existing;

    this.logger.debug({ surfaceId }, 'Creating surface');
    const surface = new Surface({
      surfaceId,
      functions: this.functions,
      logger: this.logger,
      onUiEvent: (event) => this.handleInteraction(event)
    });
    this.surfaces.set(surfaceId, surface);
    this.lifecycleSubject.next({ type: 'surfaceAdded', surface });
    return surface;
  }

  public dispatch(message: ServerMessage): void {
    this.assertAlive();
    switch (message.type) {
      case 'surfaceUpdate':
      case 'beginRendering': {
        const surface = this.getOrCreate(message.surfaceId);
        surface.apply(message);
        this.lifecycleSubject.next({ type: 'surfaceUpdated', surface });
        break;
      }
      case 'dataModelUpdate':
        this.getOrCreate(message.surfaceId).apply(message);
        break;
      case 'surfaceDeletion': {
        const surface = this.surfaces.get(message.surfaceId);
        if (!surface) return;
        this.logger.info({ surfaceId: message.surfaceId }, 'Deleting surface');
        this.surfaces.delete(message.surfaceId);
        this.lifecycleSubject.next({ type: 'surfaceRemoved', surface });
        surface.dispose();
        break;
      }
      default:
        assertNever(message, 'server message');
    }
  }

  /**
   * Publishes user actions as `{"userAction": {...}}` user messages. Other
   * event kinds stay local to the client and are ignored.
   */
  public handleInteraction(event: UiEvent): void {
    this.assertAlive();
    if (event.kind !== 'userAction') return;

    this.userMessageSubject.next({
      role: 'user',
      source: 'interaction',
      content: encodeUserAction(event)
    });
  }

  /** Idempotent. Completes both channels and disposes every surface. */
  public dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.lifecycleSubject.complete();
    this.userMessageSubject.complete();
    for (const surface of this.surfaces.values()) {
      surface.dispose();
    }
    this.surfaces.clear();
  }

  private assertAlive(): void {
    if (this.disposed) {
      throw new DisposedError('SurfaceRegistry');
    }
  }
}
