import { z } from 'zod';
import type { IKnowledgeRetriever } from '../knowledge/types';
import type { MockOperationalStore } from '../store/MockOperationalStore';

/** What every tool gets handed besides its own input. */
export interface ToolContext {
    store: MockOperationalStore;
    /** Absent when no directive corpus is configured; directive search then falls back. */
    retriever?: IKnowledgeRetriever;
    now: () => Date;
    searchTimeoutMs: number;
}

export interface ToolOutput {
    /** Human-readable summary handed back to the planner. */
    text: string;
    /** Structured result for programmatic callers. */
    data?: unknown;
}

export interface AuditTool<S extends z.ZodTypeAny> {
    name: string;
    description: string;
    schema: S;
    run(input: z.infer<S>, context: ToolContext): Promise<ToolOutput>;
}

/** Tool description in the shape a function-calling model consumes. */
export interface ToolSpec {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
}

export function defineTool<S extends z.ZodTypeAny>(tool: AuditTool<S>): AuditTool<S> {
    return tool;
}
