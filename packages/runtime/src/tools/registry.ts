import type { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import {
  createSilentLogger,
  describeError,
  isJsonMap,
  withTimeout,
  type JsonMap,
  type Logger,
  type Tool,
  type ToolCall,
  type ToolLifecycleResult,
  type ToolResult
} from '@strata/core';

export interface ToolDeclaration {
  name: string;
  description: string;
  parameters: JsonMap;
}

export interface ToolRegistryOptions {
  /** Deadline per tool invocation, hooks included. */
  timeoutMs?: number;
  logger?: Logger;
}

function formatToolFailure(toolName: string, error: unknown): string {
  return `Tool ${toolName} failed: ${describeError(error)}`;
}

/**
 * Declares the tools offered to the model and executes its calls.
 *
 * Execution never rejects: unknown tools, invalid arguments, hook or handler
 * failures and timeouts all come back as an `{ error }` payload.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();
  private readonly timeoutMs: number | undefined;
  private readonly logger: Logger;

  public constructor(tools: readonly Tool[] = [], options: ToolRegistryOptions = {}) {
    this.timeoutMs = options.timeoutMs;
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'tool-registry' });
    for (const tool of tools) {
      this.register(tool);
    }
  }

  public register<TParameters extends z.ZodTypeAny>(tool: Tool<TParameters>): this {
    this.tools.set(tool.name, tool);
    return this;
  }

  public get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  public list(): Tool[] {
    return [...this.tools.values()];
  }

  public describe(): ToolDeclaration[] {
    return this.list().map((tool) => {
      const schema: unknown = JSON.parse(
        JSON.stringify(zodToJsonSchema(tool.parameters, { $refStrategy: 'none' }))
      );
      const parameters: JsonMap = isJsonMap(schema) ? schema : {};
      delete parameters['$schema'];
      return { name: tool.name, description: tool.description, parameters };
    });
  }

  public async execute(call: ToolCall): Promise<ToolResult> {
    const outcome = await this.dispatch(call);
    this.logger.debug({ toolCallId: call.id, toolName: call.name, status: outcome.status }, 'Tool execution completed');

    if (outcome.status === 'ok') {
      return { toolCallId: call.id, name: call.name, result: outcome.result };
    }
    this.logger.warn({ toolCallId: call.id, toolName: call.name, error: outcome.formatted }, 'Tool execution failed');
    return { toolCallId: call.id, name: call.name, result: { error: outcome.formatted } };
  }

  private async dispatch(call: ToolCall): Promise<ToolLifecycleResult> {
    const tool = this.tools.get(call.name);
    if (!tool) {
      return { status: 'recoverable_error', formatted: `Tool ${call.name} failed: tool not found` };
    }

    const parsed = tool.parameters.safeParse(call.arguments);
    if (!parsed.success) {
      return {
        status: 'recoverable_error',
        formatted: `Invalid tool params for ${call.name}: ${parsed.error.message}`
      };
    }

    try {
      const result = await withTimeout({
        timeoutMs: this.timeoutMs,
        label: `Tool ${tool.name}`,
        run: () => this.runLifecycle(tool, parsed.data)
      });
      return { status: 'ok', result };
    } catch (error) {
      return { status: 'recoverable_error', formatted: formatToolFailure(tool.name, error) };
    }
  }

  private async runLifecycle<TParameters extends z.ZodTypeAny>(
    tool: Tool<TParameters>,
    params: z.infer<TParameters>
  ): Promise<JsonMap> {
    let effectiveParams = params;
    if (tool.before) {
      const modified = await tool.before(effectiveParams);
      if (modified !== undefined) {
        effectiveParams = modified;
      }
    }

    const result = await tool.handler(effectiveParams);
    if (tool.after) {
      const modified = await tool.after(effectiveParams, result);
      if (modified !== undefined) {
        return modified;
      }
    }
    return result;
  }
}
