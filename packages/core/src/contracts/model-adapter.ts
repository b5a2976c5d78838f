import { type ChatMessage, type ToolCall } from '../entities/chat';
import { type Tool } from './tool';

/** What a single model turn produced: tool calls to run, or final text. */
export interface ModelTurnResult {
    toolCalls: ToolCall[];
    text: string | null;
}

/**
 * Bridges the tool-call loop to one provider. The type parameters are the
 * provider's own tool, message and response shapes.
 */
export interface ModelAdapter<TTool, TContent, TResponse> {
    adaptTools(tools: readonly Tool[]): TTool[];
    convertMessages(messages: readonly ChatMessage[]): TContent[];
    generateContent(content: TContent[], tools: TTool[]): Promise<TResponse>;
    processResponse(response: TResponse): ModelTurnResult;
}

