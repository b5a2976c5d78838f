import { describe, expect, it, vi } from 'vitest';
import type OpenAI from 'openai';
import { z } from 'zod';
import { defineTool, userText, type ChatMessage } from '@strata/core';
import { FakeLogger, OpenAIModelAdapter } from '../src/index';

type Completion = OpenAI.Chat.Completions.ChatCompletion;
type CompletionMessage = OpenAI.Chat.Completions.ChatCompletionMessage;

function completion(message: Partial<CompletionMessage>): Completion {
  return {
    id: 'chatcmpl-1',
    object: 'chat.completion',
    created: 0,
    model: 'gpt-4o-mini',
    usage: { prompt_tokens: 12, completion_tokens: 5, total_tokens: 17 },
    choices: [{
      index: 0,
      finish_reason: 'stop',
      logprobs: null,
      message: { role: 'assistant', content: null, refusal: null, ...message }
    }]
  };
}

function createAdapter(response: Completion) {
  const create = vi.fn(async (_params: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming) => response);
  const adapter = new OpenAIModelAdapter({
    model: 'gpt-4o-mini',
    apiKey: 'test-secret',
    temperature: 0,
    client: { chat: { completions: { create } } }
  });
  return { adapter, create };
}

describe('OpenAIModelAdapter', () => {
  it('declares tools as functions with JSON Schema parameters', () => {
    const { adapter } = createAdapter(completion({}));
    const tool = defineTool({
      name: 'deleteSurface',
      description: 'Removes a UI surface.',
      parameters: z.object({ surfaceId: z.string() }),
      handler: async () => ({ status: 'ok' })
    });

    expect(adapter.adaptTools([tool])).toEqual([{
      type: 'function',
      function: {
        name: 'deleteSurface',
        description: 'Removes a UI surface.',
        parameters: {
          type: 'object',
          properties: { surfaceId: { type: 'string' } },
          required: ['surfaceId'],
          additionalProperties: false
        }
      }
    }]);
  });

  it('converts the chat history', () => {
    const { adapter } = createAdapter(completion({}));
    const history: ChatMessage[] = [
      { role: 'system', content: 'Build UI.' },
      userText('Show a form'),
      {
        role: 'assistant',
        content: null,
        toolCalls: [{ id: 'call_1', name: 'beginRendering', arguments: { surfaceId: 's1', root: 'root' } }]
      },
      { role: 'tool', results: [{ toolCallId: 'call_1', name: 'beginRendering', result: { status: 'ok' } }] },
      { role: 'surface', surfaceId: 's1', definition: { surfaceId: 's1', components: {} } },
      { role: 'assistant', content: 'Done' }
    ];

    expect(adapter.convertMessages(history)).toEqual([
      { role: 'system', content: 'Build UI.' },
      { role: 'user', content: 'Show a form' },
      {
        role: 'assistant',
        content: null,
        tool_calls: [{
          id: 'call_1',
          type: 'function',
          function: { name: 'beginRendering', arguments: '{"surfaceId":"s1","root":"root"}' }
        }]
      },
      { role: 'tool', tool_call_id: 'call_1', content: '{"status":"ok"}' },
      { role: 'system', content: 'Surface s1 currently shows: {"surfaceId":"s1","components":{}}' },
      { role: 'assistant', content: 'Done' }
    ]);
  });

  it('sends the request with tools and options', async () => {
    const response = completion({ content: 'hi' });
    const { adapter, create } = createAdapter(response);
    const tools = adapter.adaptTools([]);

    await expect(adapter.generateContent([{ role: 'user', content: 'hey' }], tools)).resolves.toBe(response);
    expect(create).toHaveBeenCalledWith({
      model: 'gpt-4o-mini',
      messages: [{ role: 'user', content: 'hey' }],
      temperature: 0
    });
  });

  it('extracts tool calls and text from a completion', () => {
    const { adapter } = createAdapter(completion({}));
    const turn = adapter.processResponse(completion({
      content: 'Working on it',
      tool_calls: [
        { id: 'call_1', type: 'function', function: { name: 'surfaceUpdate', arguments: '{"surfaceId":"s1","components":[]}' } },
        { id: 'call_2', type: 'function', function: { name: 'deleteSurface', arguments: '' } }
      ]
    }));

    expect(turn).toEqual({
      text: 'Working on it',
      toolCalls: [
        { id: 'call_1', name: 'surfaceUpdate', arguments: { surfaceId: 's1', components: [] } },
        { id: 'call_2', name: 'deleteSurface', arguments: {} }
      ]
    });
  });

  it('replaces unparseable arguments with an empty object and logs it', () => {
    const logger = new FakeLogger();
    const adapter = new OpenAIModelAdapter({
      model: 'gpt-4o-mini',
      client: { chat: { completions: { create: async () => completion({}) } } },
      logger
    });

    const turn = adapter.processResponse(completion({
      tool_calls: [{ id: 'call_1', type: 'function', function: { name: 'surfaceUpdate', arguments: '{not json' } }]
    }));

    expect(turn).toEqual({ text: null, toolCalls: [{ id: 'call_1', name: 'surfaceUpdate', arguments: {} }] });
    expect(logger.messages('warn')).toEqual(['Tool call arguments are not valid JSON']);
  });
});
