import { RunnableConfig } from "@langchain/core/runnables";
import { format } from "date-fns";
import type { AuditState } from "./graph";
import { ChatMessage } from "./ILLMClient";
import { DATE_FORMAT } from "../config";
import { PromptService } from "../services/PromptService";
import { ToolRegistry } from "../tools/ToolRegistry";
import { dbg, safeAuditConfig } from "../utils";

export const PLANNER_PROMPT_AGENT = 'auditPlanner';
export const PLANNER_PROMPT_KEY = 'system';

/**
 * Builds the messages that open a run: the system prompt (when a prompt
 * service is available) followed by the user's instruction.
 */
export async function buildOpeningMessages(
    instruction: string,
    toolRegistry: ToolRegistry,
    now: Date,
    promptService?: PromptService
): Promise<ChatMessage[]> {
    const opening: ChatMessage[] = [];
    if (promptService) {
        const toolList = toolRegistry.toToolSpecs().map(t => `- ${t.name}: ${t.description}`).join('\n');
        const systemPrompt = await promptService.getFormattedPrompt(PLANNER_PROMPT_AGENT, PLANNER_PROMPT_KEY, {
            currentDate: format(now, DATE_FORMAT),
            toolList,
        });
        opening.push({ role: 'system', content: systemPrompt });
    } else {
        dbg("PlannerNode: no PromptService in config, running without a system prompt.");
    }
    opening.push({ role: 'user', content: instruction });
    return opening;
}

/**
 * One planner turn: sends the conversation and the tool catalog to the model
 * and records its reply. A reply without tool calls is the final answer.
 */
export async function plannerNode(state: AuditState, config: RunnableConfig): Promise<Partial<AuditState>> {
    const { llmClient, toolRegistry, promptService, modelName, now } = safeAuditConfig(config);
    const iteration = state.iterations + 1;
    dbg(`--- Planner Node Running (iteration ${iteration}/${state.maxIterations}) ---`);

    const newMessages: ChatMessage[] = state.messages.length === 0
        ? await buildOpeningMessages(state.instruction, toolRegistry, (now ?? (() => new Date()))(), promptService)
        : [];

    const reply = await llmClient.chatCompletion(
        [...state.messages, ...newMessages],
        toolRegistry.toToolSpecs(),
        { modelName }
    );

    const assistantMessage: ChatMessage = reply.toolCalls.length > 0
        ? { role: 'assistant', content: reply.content, toolCalls: reply.toolCalls }
        : { role: 'assistant', content: reply.content };
    dbg(`Planner requested ${reply.toolCalls.length} tool call(s): ${reply.toolCalls.map(c => c.name).join(', ') || 'none'}`);

    return {
        messages: [...newMessages, assistantMessage],
        pendingToolCalls: reply.toolCalls,
        iterations: iteration,
        ...(reply.toolCalls.length === 0 ? { finalAnswer: reply.content } : {}),
    };
}
