import { type UiDefinition } from './component';
import { type JsonMap } from './json';

export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface ToolResult {
  toolCallId: string;
  name: string;
  result: JsonMap;
}

export interface SystemMessage {
  role: 'system';
  content: string;
}

/**
 * A user turn. `source: 'interaction'` marks messages synthesized from UI
 * events rather than typed by the user.
 */
export interface UserMessage {
  role: 'user';
  content: string;
  source?: 'text' | 'interaction';
}

export interface AssistantMessage {
  role: 'assistant';
  content: string | null;
  toolCalls?: ToolCall[];
}

/** One aggregate message carrying every result of a single tool-calling turn. */
export interface ToolResultsMessage {
  role: 'tool';
  results: ToolResult[];
}

/** A snapshot of a surface as it currently appears in a conversation. */
export interface SurfaceSnapshotMessage {
  role: 'surface';
  surfaceId: string;
  definition: UiDefinition;
}

export type ChatMessage =
  | SystemMessage
  | UserMessage
  | AssistantMessage
  | ToolResultsMessage
  | SurfaceSnapshotMessage;

export function userText(content: string): UserMessage {
  return { role: 'user', content, source: 'text' };
}

export function assistantText(content: string): AssistantMessage {
  return { role: 'assistant', content };
}
