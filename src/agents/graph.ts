import { StateGraph, END, START } from "@langchain/langgraph";
import { RunnableConfig } from "@langchain/core/runnables";
import { ChatMessage, ToolCallRequest } from "./ILLMClient";
import { plannerNode } from "./PlannerNode";
import { toolExecutionNode } from "./ToolExecutionNode";
import { iterationLimitNode } from "./IterationLimitNode";
import { dbg } from "../utils";

// Define node names as constants
export const PLANNER = "planner";
export const TOOL_EXECUTION = "toolExecution";
export const ITERATION_LIMIT = "iterationLimit";

// Define the state interface that will flow through the graph
export interface AuditState {
    instruction: string;
    messages: ChatMessage[]; // Full planner conversation, tool observations included
    pendingToolCalls: ToolCallRequest[]; // Calls requested by the latest planner turn
    iterations: number; // Planner turns taken so far
    maxIterations: number;
    finalAnswer: string;
    stoppedEarly: boolean; // True when the iteration bound ended the run
}

export type AuditNode = (state: AuditState, config: RunnableConfig) => Promise<Partial<AuditState>>;

export interface AuditGraphNodes {
    [PLANNER]: AuditNode;
    [TOOL_EXECUTION]: AuditNode;
    [ITERATION_LIMIT]: AuditNode;
}

const DEFAULT_NODES: AuditGraphNodes = {
    [PLANNER]: plannerNode,
    [TOOL_EXECUTION]: toolExecutionNode,
    [ITERATION_LIMIT]: iterationLimitNode,
};

export function routeAfterPlanner(state: AuditState): typeof TOOL_EXECUTION | typeof END {
    const next = state.pendingToolCalls.length > 0 ? TOOL_EXECUTION : END;
    dbg(`Routing after planner: ${next}`);
    return next;
}

export function routeAfterTools(state: AuditState): typeof PLANNER | typeof ITERATION_LIMIT {
    const next = state.iterations >= state.maxIterations ? ITERATION_LIMIT : PLANNER;
    dbg(`Routing after tool execution (${state.iterations}/${state.maxIterations}): ${next}`);
    return next;
}

/**
 * Builds the audit loop: the planner asks the model what to do, tool calls are
 * executed and fed back, and the loop repeats until the model answers without
 * calling a tool or the iteration bound is reached.
 *
 * @param nodes - Node implementations; tests replace them with stubs.
 */
export function createAuditWorkflow(nodes: AuditGraphNodes = DEFAULT_NODES) {
    return new StateGraph<AuditState>({
        channels: {
            instruction: { value: (x, y) => y ?? x, default: () => "" },
            messages: { value: (x, y) => (x || []).concat(y || []), default: () => [] },   // Append new messages
            pendingToolCalls: { value: (x, y) => y ?? x, default: () => [] },
            iterations: { value: (x, y) => y ?? x, default: () => 0 },
            maxIterations: { value: (x, y) => y ?? x, default: () => 0 },
            finalAnswer: { value: (x, y) => y ?? x, default: () => "" },
            stoppedEarly: { value: (x, y) => y ?? x, default: () => false },
        },
    })
        .addNode(PLANNER, nodes[PLANNER])
        .addNode(TOOL_EXECUTION, nodes[TOOL_EXECUTION])
        .addNode(ITERATION_LIMIT, nodes[ITERATION_LIMIT])
        .addEdge(START, PLANNER)
        .addConditionalEdges(PLANNER, routeAfterPlanner, {
            [TOOL_EXECUTION]: TOOL_EXECUTION,
            [END]: END,
        })
        .addConditionalEdges(TOOL_EXECUTION, routeAfterTools, {
            [PLANNER]: PLANNER,
            [ITERATION_LIMIT]: ITERATION_LIMIT,
        })
        .addEdge(ITERATION_LIMIT, END);
}

// No checkpointer: runs never pause or resume.
export const app = createAuditWorkflow().compile();
