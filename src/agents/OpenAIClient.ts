import OpenAI from "openai";
import { ILLMClient, ChatMessage, PlannerReply, ToolCallRequest } from "./ILLMClient";
import { OPENAI_API_KEY_ENV_VAR, BASE_URL_ENV_VAR, DEFAULT_MODEL_NAME, DEFAULT_TEMPERATURE, MAX_COMPLETION_TOKENS } from "./llmConstants";
import { ToolSpec } from "../tools/types";
import { ConfigurationError, errorMessage } from "../errors";
import { dbg } from "../utils";

export type CreateCompletionFn = (
    body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming
) => Promise<OpenAI.Chat.ChatCompletion>;

/**
 * Maps internal chat messages onto OpenAI's message params.
 */
export function toOpenAIMessages(messages: ChatMessage[]): OpenAI.Chat.ChatCompletionMessageParam[] {
    return messages.map((msg): OpenAI.Chat.ChatCompletionMessageParam => {
        switch (msg.role) {
            case 'system':
                return { role: 'system', content: msg.content };
            case 'user':
                return { role: 'user', content: msg.content };
            case 'tool':
                return { role: 'tool', content: msg.content, tool_call_id: msg.toolCallId };
            case 'assistant':
                if (msg.toolCalls && msg.toolCalls.length > 0) {
                    return {
                        role: 'assistant',
                        content: msg.content || null,
                        tool_calls: msg.toolCalls.map(call => ({
                            id: call.id,
                            type: 'function',
                            function: { name: call.name, arguments: call.arguments },
                        })),
                    };
                }
                return { role: 'assistant', content: msg.content };
        }
    });
}

export function toOpenAITools(tools: ToolSpec[]): OpenAI.Chat.ChatCompletionTool[] {
    return tools.map(tool => ({
        type: 'function',
        function: { name: tool.name, description: tool.description, parameters: tool.parameters },
    }));
}

/**
 * OpenAIClient implements the ILLMClient interface on top of OpenAI's chat
 * completions API with function calling. It handles API authentication,
 * base URL configuration, and message formatting.
 */
export class OpenAIClient implements ILLMClient {
    private readonly createCompletion: CreateCompletionFn;

    /**
     * Sets up the OpenAI client with API key and optional base URL from environment variables.
     * @param createCompletion - Replaces the SDK call; used by tests.
     * @throws ConfigurationError if the OpenAI API key is not set in environment variables
     */
    constructor(createCompletion?: CreateCompletionFn) {
        if (createCompletion) {
            this.createCompletion = createCompletion;
            return;
        }

        const apiKey = process.env[OPENAI_API_KEY_ENV_VAR] || '';
        if (!apiKey) {
            const message = `OpenAI API key (${OPENAI_API_KEY_ENV_VAR}) is not set in environment variables.`;
            console.warn(message);
            throw new ConfigurationError(message);
        }

        const baseURL = process.env[BASE_URL_ENV_VAR] || '';
        let openai: OpenAI;
        if (!baseURL) {
            dbg(`${BASE_URL_ENV_VAR} is not set in environment variables. Using default OpenAI URL.`);
            openai = new OpenAI({ apiKey });
        } else {
            console.log(`Using base URL: ${baseURL}`);
            openai = new OpenAI({ apiKey, baseURL });
        }
        this.createCompletion = body => openai.chat.completions.create(body);
    }

    /**
     * Makes a chat completion request, offering the given tools.
     * @returns The reply text and any function calls the model asked for.
     * @throws Error if the API call fails or returns neither content nor tool calls
     */
    async chatCompletion(
        messages: ChatMessage[],
        tools: ToolSpec[],
        options?: { modelName?: string }
    ): Promise<PlannerReply> {
        const effectiveModel = options?.modelName && options.modelName.trim() !== ''
            ? options.modelName
            : DEFAULT_MODEL_NAME;

        try {
            dbg('\n--- Calling OpenAI API --- (via OpenAIClient)');
            dbg(`Using model for API call: ${effectiveModel}, ${tools.length} tools offered`);

            const completion = await this.createCompletion({
                model: effectiveModel,
                messages: toOpenAIMessages(messages),
                ...(tools.length > 0 ? { tools: toOpenAITools(tools), tool_choice: 'auto' as const } : {}),
                temperature: DEFAULT_TEMPERATURE,
                max_tokens: MAX_COMPLETION_TOKENS,
            });
            dbg('--- OpenAI API Call Complete --- (via OpenAIClient)');

            const message = completion.choices[0]?.message;
            const toolCalls: ToolCallRequest[] = (message?.tool_calls ?? [])
                .filter(call => call.type === 'function')
                .map(call => ({ id: call.id, name: call.function.name, arguments: call.function.arguments }));
            const content = message?.content ?? '';

            if (!content && toolCalls.length === 0) {
                throw new Error("OpenAI API call returned successfully but contained no content or tool calls.");
            }

            return { content, toolCalls };
        } catch (error) {
            console.error("Error calling OpenAI API via OpenAIClient:", error);
            throw new Error(`Failed to communicate with OpenAI: ${errorMessage(error)}`);
        }
    }
}
