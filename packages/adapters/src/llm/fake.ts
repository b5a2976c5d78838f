import {
    type ChatMessage,
    type ModelAdapter,
    type ModelTurnResult,
    type Tool
} from '@strata/core';

export interface FakeToolDeclaration {
    name: string;
    description: string;
}

export interface FakeModelRequest {
    messages: ChatMessage[];
    tools: FakeToolDeclaration[];
}

/** A scripted turn, or an error the fake rejects with on that turn. */
export type FakeModelTurn = ModelTurnResult | Error;

/**
 * Replays scripted turns in order and records every request it receives.
 * Once the script runs out it answers with a plain text turn.
 */
export class FakeModelAdapter implements ModelAdapter<FakeToolDeclaration, ChatMessage, FakeModelTurn> {
    public readonly requests: FakeModelRequest[] = [];
    private turns: FakeModelTurn[];
    private readonly fallbackText: string;

    public constructor(turns: FakeModelTurn[] = [], fallbackText = 'Fake response') {
        this.turns = [...turns];
        this.fallbackText = fallbackText;
    }

    public setTurns(turns: FakeModelTurn[]): void {
        this.turns = [...turns];
    }

    public get callCount(): number {
        return this.requests.length;
    }

    public adaptTools(tools: readonly Tool[]): FakeToolDeclaration[] {
        return tools.map((tool) => ({ name: tool.name, description: tool.description }));
    }

    public convertMessages(messages: readonly ChatMessage[]): ChatMessage[] {
        return [...messages];
    }

    public async generateContent(content: ChatMessage[], tools: FakeToolDeclaration[]): Promise<FakeModelTurn> {
        this.requests.push({ messages: content, tools });
        const turn = this.turns.shift();
        if (turn instanceof Error) {
            throw turn;
        }
        return turn ?? { toolCalls: [], text: this.fallbackText };
    }

    public processResponse(response: FakeModelTurn): ModelTurnResult {
        if (response instanceof Error) {
            throw response;
        }
        return response;
    }
}
