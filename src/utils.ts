import * as uuid from 'uuid';
import { RunnableConfig } from '@langchain/core/runnables';
import type { ILLMClient } from './agents/ILLMClient';
import type { ToolRegistry } from './tools/ToolRegistry';
import type { PromptService } from './services/PromptService';
import { CollaboratorUnavailableError } from './errors';

export interface AuditGraphConfigurable {
    thread_id: string;
    llmClient?: ILLMClient;
    toolRegistry?: ToolRegistry;
    promptService?: PromptService;
    modelName?: string;
    maxIterations?: number;
    /** Clock used for the "current date" shown to the planner. */
    now?: () => Date;
}

export interface AuditRunnableConfig extends RunnableConfig {
    configurable: AuditGraphConfigurable;
}

export function dbg(s: string) {
    console.debug(s);
}

export function say(s: string) {
    console.log(s);
}

export function newGraphConfig(): AuditRunnableConfig {
    const thread_id = uuid.v4();
    const configurable: AuditGraphConfigurable = { thread_id };
    return { configurable };
}

/**
 * Races a promise against a timer. The timer is cleared either way so nothing
 * is left pending on the event loop.
 *
 * @param promise - The work to wait for.
 * @param timeoutMs - Maximum wait in milliseconds.
 * @param label - Names the collaborator in the rejection.
 * @throws CollaboratorUnavailableError when the timer wins.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new CollaboratorUnavailableError(label, `timed out after ${timeoutMs}ms`)), timeoutMs);
    });
    try {
        return await Promise.race([promise, timeout]);
    } finally {
        clearTimeout(timer);
    }
}

/**
 * Reads the audit dependencies out of a graph node's config.
 * @throws Error when the LLM client or tool registry was not supplied.
 */
export function safeAuditConfig(config: RunnableConfig): AuditGraphConfigurable & Required<Pick<AuditGraphConfigurable, 'llmClient' | 'toolRegistry'>> {
    const configurable: Partial<AuditGraphConfigurable> = config.configurable ?? {};
    const { llmClient, toolRegistry } = configurable;
    if (!llmClient || !toolRegistry) {
        throw new Error('Audit graph config is missing llmClient or toolRegistry in configurable.');
    }
    return { ...configurable, thread_id: configurable.thread_id ?? '', llmClient, toolRegistry };
}
