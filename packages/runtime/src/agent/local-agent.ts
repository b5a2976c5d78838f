import {
  ToolLoopLimitError,
  createSilentLogger,
  type ChatMessage,
  type Logger,
  type ModelAdapter
} from '@strata/core';
import { type ToolRegistry } from '../tools/registry';

export interface LocalAgentOptions<TTool, TContent, TResponse> {
  adapter: ModelAdapter<TTool, TContent, TResponse>;
  toolRegistry: ToolRegistry;
  /** Model turns allowed per call to {@link LocalAgent.execute}; unbounded when unset. */
  maxIterations?: number;
  logger?: Logger;
}

/**
 * Runs the tool-call loop: ask the model, execute whatever tools it calls,
 * feed the results back, and stop at the first turn without tool calls.
 */
export class LocalAgent<TTool, TContent, TResponse> {
  private readonly adapter: ModelAdapter<TTool, TContent, TResponse>;
  private readonly toolRegistry: ToolRegistry;
  private readonly maxIterations: number | undefined;
  private readonly logger: Logger;

  public constructor(options: LocalAgentOptions<TTool, TContent, TResponse>) {
    this.adapter = options.adapter;
    this.toolRegistry = options.toolRegistry;
    this.maxIterations = options.maxIterations;
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'local-agent' });
  }

  /**
   * Appends the assistant tool-call turns and their aggregate results to
   * `history` in place, and resolves with the final text of the last turn.
   * An aborted `signal` stops the loop before its next model turn and before
   * the tool calls of a turn that finished after the abort.
   */
  public async execute(history: ChatMessage[], signal?: AbortSignal): Promise<string | null> {
    const tools = this.adapter.adaptTools(this.toolRegistry.list());
    let iteration = 0;

    while (true) {
      signal?.throwIfAborted();
      if (this.maxIterations !== undefined && iteration >= this.maxIterations) {
        throw new ToolLoopLimitError(this.maxIterations);
      }
      iteration += 1;

      const content = this.adapter.convertMessages(history);
      const response = await this.adapter.generateContent(content, tools);
      signal?.throwIfAborted();
      const turn = this.adapter.processResponse(response);
      this.logger.info({ iteration, toolCalls: turn.toolCalls.length }, 'Model turn completed');

      if (turn.toolCalls.length === 0) {
        return turn.text;
      }

      history.push({ role: 'assistant', content: turn.text, toolCalls: turn.toolCalls });
      const results = await Promise.all(turn.toolCalls.map((call) => this.toolRegistry.execute(call)));
      history.push({ role: 'tool', results });
    }
  }
}
