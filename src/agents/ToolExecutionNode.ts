import { RunnableConfig } from "@langchain/core/runnables";
import type { AuditState } from "./graph";
import { ChatMessage, ToolCallRequest } from "./ILLMClient";
import { isRecoverableToolError } from "../errors";
import { ToolRegistry } from "../tools/ToolRegistry";
import { dbg, safeAuditConfig } from "../utils";

/**
 * Runs one requested tool call and returns the observation text for the planner.
 * Malformed calls and rejected inputs come back as an error observation the
 * planner can correct; anything else propagates.
 */
export async function executeToolCall(toolRegistry: ToolRegistry, call: ToolCallRequest): Promise<string> {
    try {
        const output = await toolRegistry.invokeRaw(call.name, call.arguments);
        return output.text;
    } catch (error) {
        if (isRecoverableToolError(error)) {
            dbg(`Tool call ${call.name} rejected: ${error.message}`);
            return `Error: ${error.message.replace(/\.$/, '')}. Please correct the tool call and try again.`;
        }
        throw error;
    }
}

/**
 * Executes the planner's pending tool calls one after another and appends
 * each observation as a tool message.
 */
export async function toolExecutionNode(state: AuditState, config: RunnableConfig): Promise<Partial<AuditState>> {
    const { toolRegistry } = safeAuditConfig(config);
    dbg(`--- Tool Execution Node Running (${state.pendingToolCalls.length} call(s)) ---`);

    const observations: ChatMessage[] = [];
    for (const call of state.pendingToolCalls) {
        const content = await executeToolCall(toolRegistry, call);
        observations.push({ role: 'tool', toolCallId: call.id, content });
    }

    return { messages: observations, pendingToolCalls: [] };
}
