import OpenAI from 'openai';
import { zodToJsonSchema } from 'zod-to-json-schema';
import {
    createSilentLogger,
    describeError,
    isJsonMap,
    type ChatMessage,
    type Logger,
    type ModelAdapter,
    type ModelTurnResult,
    type Tool,
    type ToolCall
} from '@strata/core';

type OpenAITool = OpenAI.Chat.Completions.ChatCompletionTool;
type OpenAIMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type OpenAICompletion = OpenAI.Chat.Completions.ChatCompletion;
type OpenAIToolCall = OpenAI.Chat.Completions.ChatCompletionMessageToolCall;
type OpenAIRequest = OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming;

/** The slice of the OpenAI client the adapter calls. */
export interface ChatCompletionsClient {
    chat: {
        completions: {
            create(params: OpenAIRequest): Promise<OpenAICompletion>;
        };
    };
}

export interface OpenAIModelAdapterOptions {
    model: string;
    apiKey?: string;
    baseUrl?: string;
    client?: ChatCompletionsClient;
    temperature?: number;
    logger?: Logger;
}

export class OpenAIModelAdapter implements ModelAdapter<OpenAITool, OpenAIMessage, OpenAICompletion> {
    private readonly client: ChatCompletionsClient;
    private readonly model: string;
    private readonly temperature: number | undefined;
    private readonly logger: Logger;

    public constructor(options: OpenAIModelAdapterOptions) {
        this.model = options.model;
        this.temperature = options.temperature;
        this.logger = (options.logger ?? createSilentLogger()).child({ component: 'openai-model-adapter' });
        this.client = options.client ?? new OpenAI({
            baseURL: options.baseUrl,
            apiKey: options.apiKey
        });
    }

    public adaptTools(tools: readonly Tool[]): OpenAITool[] {
        return tools.map((tool) => {
            const schema: unknown = JSON.parse(
                JSON.stringify(zodToJsonSchema(tool.parameters, { $refStrategy: 'none' }))
            );
            const parameters = isJsonMap(schema) ? schema : {};
            delete parameters['$schema'];
            return {
                type: 'function',
                function: { name: tool.name, description: tool.description, parameters }
            };
        });
    }

    public convertMessages(messages: readonly ChatMessage[]): OpenAIMessage[] {
        return messages.flatMap((message): OpenAIMessage[] => {
            switch (message.role) {
                case 'system':
                    return [{ role: 'system', content: message.content }];
                case 'user':
                    return [{ role: 'user', content: message.content }];
                case 'assistant':
                    if (message.toolCalls && message.toolCalls.length > 0) {
                        return [{
                            role: 'assistant',
                            content: message.content,
                            tool_calls: message.toolCalls.map(toOpenAIToolCall)
                        }];
                    }
                    return [{ role: 'assistant', content: message.content }];
                case 'tool':
                    return message.results.map((result): OpenAIMessage => ({
                        role: 'tool',
                        tool_call_id: result.toolCallId,
                        content: JSON.stringify(result.result)
                    }));
                case 'surface':
                    return [{
                        role: 'system',
                        content: `Surface ${message.surfaceId} currently shows: ${JSON.stringify(message.definition)}`
                    }];
            }
        });
    }

    public async generateContent(content: OpenAIMessage[], tools: OpenAITool[]): Promise<OpenAICompletion> {
        const params: OpenAIRequest = { model: this.model, messages: content };
        if (tools.length > 0) {
            params.tools = tools;
        }
        if (this.temperature !== undefined) {
            params.temperature = this.temperature;
        }

        const start = Date.now();
        const response = await this.client.chat.completions.create(params);
        this.logger.debug({
            model: response.model,
            latencyMs: Date.now() - start,
            promptTokens: response.usage?.prompt_tokens ?? 0,
            completionTokens: response.usage?.completion_tokens ?? 0
        }, 'Chat completion received');
        return response;
    }

    public processResponse(response: OpenAICompletion): ModelTurnResult {
        const message = response.choices[0]?.message;
        return {
            toolCalls: (message?.tool_calls ?? [])
                .filter((call) => call.type === 'function')
                .map((call) => this.fromOpenAIToolCall(call)),
            text: message?.content ?? null
        };
    }

    private fromOpenAIToolCall(call: OpenAIToolCall): ToolCall {
        return {
            id: call.id,
            name: call.function.name,
            arguments: this.parseToolArguments(call.function.name, call.function.arguments)
        };
    }

    /** Unparseable arguments become `{}`, which then fails the tool's own validation. */
    private parseToolArguments(toolName: string, raw: string): Record<string, unknown> {
        if (!raw) return {};
        try {
            const parsed: unknown = JSON.parse(raw);
            return isJsonMap(parsed) ? parsed : {};
        } catch (error) {
            this.logger.warn({ toolName, error: describeError(error) }, 'Tool call arguments are not valid JSON');
            return {};
        }
    }
}

function toOpenAIToolCall(call: ToolCall): OpenAIToolCall {
    return {
        id: call.id,
        type: 'function',
        function: { name: call.name, arguments: JSON.stringify(call.arguments) }
    };
}
