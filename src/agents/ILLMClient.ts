import type { ToolSpec } from '../tools/types';

/** A tool invocation requested by the model. `arguments` is the raw JSON text the model produced. */
export type ToolCallRequest = {
    id: string;
    name: string;
    arguments: string;
};

export type ChatMessage =
    | { role: 'system' | 'user'; content: string }
    | { role: 'assistant'; content: string; toolCalls?: ToolCallRequest[] }
    | { role: 'tool'; content: string; toolCallId: string };

export type PlannerReply = {
    /** Text the model produced this turn; empty when it only asked for tools. */
    content: string;
    toolCalls: ToolCallRequest[];
};

export interface ILLMClient {
    /**
     * Calls the underlying LLM provider's chat completions API with the tools it may call.
     *
     * @param messages The full conversation so far, including tool results.
     * @param tools Tools the model may request this turn.
     * @param options Optional parameters like model name.
     * @throws Error on API errors or missing configuration.
     */
    chatCompletion(
        messages: ChatMessage[],
        tools: ToolSpec[],
        options?: { modelName?: string }
    ): Promise<PlannerReply>;
}
