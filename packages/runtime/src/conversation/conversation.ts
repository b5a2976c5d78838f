import { BehaviorSubject, type Observable, type Subscription } from 'rxjs';
import {
  DisposedError,
  assertNever,
  assistantText,
  createSilentLogger,
  describeError,
  userText,
  type ChatMessage,
  type Logger,
  type ServerMessage,
  type SurfaceSnapshotMessage,
  type UserMessage
} from '@strata/core';
import { type Surface } from '../surface/surface';
import { type SurfaceLifecycleEvent, type SurfaceRegistry } from '../surface/registry';
import { type AgentContentGenerator, type ContentGeneratorError } from './content-generator';

export interface SurfaceConversationOptions<TTool, TContent, TResponse> {
  generator: AgentContentGenerator<TTool, TContent, TResponse>;
  registry: SurfaceRegistry;
  onSurfaceAdded?: (surface: Surface) => void;
  onSurfaceUpdated?: (surface: Surface) => void;
  onSurfaceDeleted?: (surface: Surface) => void;
  onTextResponse?: (text: string) => void;
  onError?: (error: ContentGeneratorError) => void;
  logger?: Logger;
}

/**
 * Connects a content generator to a surface registry and keeps the chat
 * history, including a snapshot entry per live surface.
 */
export class SurfaceConversation<TTool, TContent, TResponse> {
  public readonly generator: AgentContentGenerator<TTool, TContent, TResponse>;
  public readonly registry: SurfaceRegistry;

  private readonly historySubject = new BehaviorSubject<ChatMessage[]>([]);
  private readonly subscriptions: Subscription[] = [];
  private readonly options: SurfaceConversationOptions<TTool, TContent, TResponse>;
  private readonly logger: Logger;
  private disposed = false;

  public constructor(options: SurfaceConversationOptions<TTool, TContent, TResponse>) {
    this.options = options;
    this.generator = options.generator;
    this.registry = options.registry;
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'conversation' });

    this.subscriptions.push(
      this.generator.messages$.subscribe((message) => this.handleServerMessage(message)),
      this.registry.userMessages$.subscribe((message) => {
        this.sendRequest(message).catch((error: unknown) => this.handleError({ error, message: describeError(error) }));
      }),
      this.registry.lifecycle$.subscribe((event) => this.handleLifecycle(event)),
      this.generator.textResponses$.subscribe((text) => this.handleTextResponse(text)),
      this.generator.errors$.subscribe((error) => this.handleError(error))
    );
  }

  public get history(): ChatMessage[] {
    return this.historySubject.getValue();
  }

  public get history$(): Observable<ChatMessage[]> {
    return this.historySubject.asObservable();
  }

  public get processing$(): Observable<boolean> {
    return this.generator.processing$;
  }

  public getSurface(surfaceId: string): Surface {
    return this.registry.getOrCreate(surfaceId);
  }

  /**
   * Sends a request with the history that preceded it. Messages synthesized
   * from UI interactions are sent but not recorded in the history.
   */
  public async sendRequest(message: UserMessage | string): Promise<void> {
    if (this.disposed) {
      throw new DisposedError('SurfaceConversation');
    }

    const request = typeof message === 'string' ? userText(message) : message;
    const history = this.history;
    if (request.source !== 'interaction') {
      this.historySubject.next([...history, request]);
    }
    await this.generator.sendRequest(request, history);
  }

  /** Idempotent. Disposes the generator and the registry along with the conversation. */
  public dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    for (const subscription of this.subscriptions) {
      subscription.unsubscribe();
    }
    this.generator.dispose();
    this.registry.dispose();
    this.historySubject.complete();
  }

  private handleServerMessage(message: ServerMessage): void {
    try {
      this.registry.dispatch(message);
    } catch (error) {
      this.logger.warn({ surfaceId: message.surfaceId, type: message.type, error: describeError(error) }, 'Failed to apply server message');
      this.handleError({ error, message: describeError(error) });
    }
  }

  private handleLifecycle(event: SurfaceLifecycleEvent): void {
    const { surface } = event;
    switch (event.type) {
      case 'surfaceAdded':
        this.options.onSurfaceAdded?.(surface);
        this.upsertSnapshot(surface);
        break;
      case 'surfaceUpdated':
        this.options.onSurfaceUpdated?.(surface);
        this.upsertSnapshot(surface);
        break;
      case 'surfaceRemoved':
        this.options.onSurfaceDeleted?.(surface);
        this.historySubject.next(
          this.history.filter((entry) => entry.role !== 'surface' || entry.surfaceId !== surface.surfaceId)
        );
        break;
      default:
        assertNever(event, 'surface lifecycle event');
    }
  }

  private upsertSnapshot(surface: Surface): void {
    const definition = surface.definition;
    if (definition === null) return;

    const snapshot: SurfaceSnapshotMessage = { role: 'surface', surfaceId: surface.surfaceId, definition };
    const next = [...this.history];
    for (let index = next.length - 1; index >= 0; index--) {
      const entry = next[index];
      if (entry?.role === 'surface' && entry.surfaceId === surface.surfaceId) {
        next[index] = snapshot;
        this.historySubject.next(next);
        return;
      }
    }
    next.push(snapshot);
    this.historySubject.next(next);
  }

  private handleTextResponse(text: string): void {
    this.historySubject.next([...this.history, assistantText(text)]);
    this.options.onTextResponse?.(text);
  }

  private handleError(error: ContentGeneratorError): void {
    this.historySubject.next([...this.history, assistantText(`An error occurred: ${error.message}`)]);
    this.options.onError?.(error);
  }
}
