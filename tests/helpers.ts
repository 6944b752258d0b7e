import sinon from 'sinon';
import { ChatMessage, ILLMClient, PlannerReply, ToolCallRequest } from '../src/agents/ILLMClient';
import { ToolSpec } from '../src/tools/types';

/** Noon, so whole-day counts from local midnight are unambiguous. */
export const NOW = new Date(2025, 0, 20, 12);
export const clock = () => NOW;

/**
 * Silences console output for the current test. Callers restore with sinon.restore().
 */
export function stubConsole() {
    return {
        log: sinon.stub(console, 'log'),
        debug: sinon.stub(console, 'debug'),
        warn: sinon.stub(console, 'warn'),
        error: sinon.stub(console, 'error'),
    };
}

export async function rejectionOf(promise: Promise<unknown>): Promise<Error> {
    try {
        await promise;
    } catch (error) {
        if (error instanceof Error) {
            return error;
        }
        throw new Error(`Expected an Error instance, got ${String(error)}`);
    }
    throw new Error('Expected the promise to reject');
}

export function thrownBy(fn: () => unknown): Error {
    try {
        fn();
    } catch (error) {
        if (error instanceof Error) {
            return error;
        }
        throw new Error(`Expected an Error instance, got ${String(error)}`);
    }
    throw new Error('Expected the call to throw');
}

export function toolCall(id: string, name: string, args: Record<string, unknown> | string): ToolCallRequest {
    return { id, name, arguments: typeof args === 'string' ? args : JSON.stringify(args) };
}

export const answer = (content: string): PlannerReply => ({ content, toolCalls: [] });
export const requestTools = (...toolCalls: ToolCallRequest[]): PlannerReply => ({ content: '', toolCalls });

interface RecordedCall {
    messages: ChatMessage[];
    tools: ToolSpec[];
    modelName?: string;
}

/**
 * Plays back a fixed list of replies, one per chatCompletion call.
 * An Error in the list is thrown instead of returned.
 */
export class ScriptedLLMClient implements ILLMClient {
    readonly calls: RecordedCall[] = [];
    private readonly replies: (PlannerReply | Error)[];

    constructor(replies: (PlannerReply | Error)[]) {
        this.replies = [...replies];
    }

    async chatCompletion(messages: ChatMessage[], tools: ToolSpec[], options?: { modelName?: string }): Promise<PlannerReply> {
        this.calls.push({ messages: [...messages], tools, modelName: options?.modelName });
        const next = this.replies.shift();
        if (next === undefined) {
            throw new Error('ScriptedLLMClient ran out of replies');
        }
        if (next instanceof Error) {
            throw next;
        }
        return next;
    }
}

/** Replies with the same tool request forever. */
export class LoopingLLMClient implements ILLMClient {
    callCount = 0;
    private readonly call: ToolCallRequest;

    constructor(call: ToolCallRequest) {
        this.call = call;
    }

    async chatCompletion(): Promise<PlannerReply> {
        this.callCount++;
        return requestTools({ ...this.call, id: `${this.call.id}-${this.callCount}` });
    }
}
