import type { AuditState } from "./graph";
import { ChatMessage } from "./ILLMClient";
import { dbg } from "../utils";

/**
 * The best answer available when the run is cut off: the planner's latest
 * non-empty text, otherwise a stop notice carrying the last tool observation.
 */
export function partialAnswer(messages: ChatMessage[], maxIterations: number): string {
    const lastText = [...messages].reverse().find(m => m.role === 'assistant' && m.content.trim() !== '');
    if (lastText) {
        return lastText.content;
    }
    const notice = `Agent stopped after reaching the maximum of ${maxIterations} iterations.`;
    const lastObservation = [...messages].reverse().find(m => m.role === 'tool');
    return lastObservation ? `${notice}\n\nLast observation:\n${lastObservation.content}` : notice;
}

/**
 * Ends a run that used up its iterations without a final answer.
 */
export async function iterationLimitNode(state: AuditState): Promise<Partial<AuditState>> {
    dbg(`--- Iteration Limit Node Running: stopping after ${state.iterations} iterations ---`);
    return { finalAnswer: partialAnswer(state.messages, state.maxIterations), stoppedEarly: true };
}
