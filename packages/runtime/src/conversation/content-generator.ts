import { BehaviorSubject, Subject, type Observable } from 'rxjs';
import {
  DisposedError,
  createSilentLogger,
  describeError,
  resolveStrataConfig,
  withTimeout,
  type ChatMessage,
  type Logger,
  type ModelAdapter,
  type ServerMessage,
  type StrataConfig,
  type Tool
} from '@strata/core';
import { LocalAgent, type LocalAgentOptions } from '../agent/local-agent';
import { ToolRegistry } from '../tools/registry';
import { buildSurfaceToolsPrompt, createSurfaceTools } from '../tools/surface-tools';

export interface ContentGeneratorError {
  error: unknown;
  message: string;
}

export interface ContentGeneratorOptions<TTool, TContent, TResponse> {
  adapter: ModelAdapter<TTool, TContent, TResponse>;
  config?: StrataConfig;
  /** Prepended to the surface tool instructions in the system message. */
  systemInstruction?: string;
  /** Offered to the model alongside the surface tools. */
  additionalTools?: Tool[];
  logger?: Logger;
}

/**
 * Turns chat requests into surface messages by running a {@link LocalAgent}
 * whose tools publish protocol messages instead of touching surfaces directly.
 */
export class AgentContentGenerator<TTool, TContent, TResponse> {
  private readonly messagesSubject = new Subject<ServerMessage>();
  private readonly textSubject = new Subject<string>();
  private readonly errorSubject = new Subject<ContentGeneratorError>();
  private readonly processingSubject = new BehaviorSubject<boolean>(false);
  private readonly adapter: ModelAdapter<TTool, TContent, TResponse>;
  private readonly config: StrataConfig;
  private readonly systemInstruction: string | undefined;
  private readonly additionalTools: Tool[];
  private readonly logger: Logger;
  private disposed = false;

  public constructor(options: ContentGeneratorOptions<TTool, TContent, TResponse>) {
    this.adapter = options.adapter;
    this.config = options.config ?? resolveStrataConfig();
    this.systemInstruction = options.systemInstruction;
    this.additionalTools = options.additionalTools ?? [];
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'content-generator' });
  }

  public get messages$(): Observable<ServerMessage> {
    return this.messagesSubject.asObservable();
  }

  public get textResponses$(): Observable<string> {
    return this.textSubject.asObservable();
  }

  public get errors$(): Observable<ContentGeneratorError> {
    return this.errorSubject.asObservable();
  }

  public get processing$(): Observable<boolean> {
    return this.processingSubject.asObservable();
  }

  public get isProcessing(): boolean {
    return this.processingSubject.getValue();
  }

  /**
   * Runs one request to completion. Failures are published on `errors$`
   * rather than rejected; only calling a disposed generator throws.
   */
  public async sendRequest(message: ChatMessage, history: readonly ChatMessage[] = []): Promise<void> {
    if (this.disposed) {
      throw new DisposedError('AgentContentGenerator');
    }

    this.processingSubject.next(true);
    const request = new AbortController();
    try {
      const surfaceTools = createSurfaceTools({
        handleMessage: (serverMessage) => {
          if (request.signal.aborted) {
            this.logger.warn({ surfaceId: serverMessage.surfaceId }, 'Dropping message from an abandoned request');
            return;
          }
          this.messagesSubject.next(serverMessage);
        },
        config: this.config
      });
      const toolRegistry = new ToolRegistry([...surfaceTools, ...this.additionalTools], {
        timeoutMs: this.config.toolTimeoutMs,
        logger: this.logger
      });
      const agentOptions: LocalAgentOptions<TTool, TContent, TResponse> = {
        adapter: this.adapter,
        toolRegistry,
        logger: this.logger
      };
      if (this.config.maxToolIterations !== undefined) {
        agentOptions.maxIterations = this.config.maxToolIterations;
      }
      const agent = new LocalAgent(agentOptions);

      const conversation: ChatMessage[] = [
        { role: 'system', content: this.buildSystemPrompt(surfaceTools.map((tool) => tool.name)) },
        ...history,
        message
      ];

      const text = await withTimeout({
        timeoutMs: this.config.requestTimeoutMs,
        label: 'Content generation',
        run: (signal) => {
          signal.addEventListener('abort', () => request.abort(signal.reason), { once: true });
          return agent.execute(conversation, signal);
        }
      });

      if (text !== null && text.length > 0 && !this.disposed) {
        this.textSubject.next(text);
      }
    } catch (error) {
      request.abort(error);
      this.logger.error({ error: describeError(error) }, 'Content generation failed');
      if (!this.disposed) {
        this.errorSubject.next({ error, message: describeError(error) });
      }
    } finally {
      if (!this.disposed) {
        this.processingSubject.next(false);
      }
    }
  }

  /** Idempotent. Completes every stream. */
  public dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.messagesSubject.complete();
    this.textSubject.complete();
    this.errorSubject.complete();
    this.processingSubject.complete();
  }

  private buildSystemPrompt(toolNames: string[]): string {
    if (toolNames.length === 0) {
      return this.systemInstruction ?? '';
    }
    const toolsPrompt = buildSurfaceToolsPrompt(toolNames, this.config.rootComponentId);
    return this.systemInstruction === undefined
      ? toolsPrompt
      : `${this.systemInstruction}\n\n${toolsPrompt}`;
  }
}
