import { app as agentApp, AuditState } from "../agents/graph";
import { ILLMClient } from "../agents/ILLMClient";
import { DEFAULT_MAX_ITERATIONS } from "../config";
import { errorMessage } from "../errors";
import { PromptService } from "../services/PromptService";
import { ToolRegistry } from "../tools/ToolRegistry";
import { AuditRunnableConfig, dbg, newGraphConfig, say } from "../utils";

export interface AuditDependencies {
    llmClient: ILLMClient;
    toolRegistry: ToolRegistry;
    promptService?: PromptService;
    modelName?: string;
    maxIterations?: number;
    now?: () => Date;
}

export interface AuditResult {
    output: string;
    iterations: number;
    stoppedEarly: boolean;
    error?: string;
}

type AuditOutcome = Pick<AuditState, 'finalAnswer' | 'iterations' | 'stoppedEarly'>;
export type InvokeGraphFn = (input: Partial<AuditState>, config: AuditRunnableConfig) => Promise<AuditOutcome>;

const invokeAuditGraph: InvokeGraphFn = (input, config) => agentApp.invoke(input, config);

// Each iteration is a planner step plus a tool step; the rest is headroom for the limit node.
export const recursionLimitFor = (maxIterations: number) => maxIterations * 2 + 5;

/**
 * Runs one natural-language instruction through the audit graph.
 *
 * Never throws: a failure of the model provider or an unexpected tool error
 * is returned as an "Audit failed" output so an interactive session survives it.
 *
 * @param invokeGraphFn Injected dependency for running the graph.
 */
export async function runAudit(
    instruction: string,
    deps: AuditDependencies,
    invokeGraphFn: InvokeGraphFn = invokeAuditGraph
): Promise<AuditResult> {
    const maxIterations = deps.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    const config = newGraphConfig();
    config.configurable = {
        ...config.configurable,
        llmClient: deps.llmClient,
        toolRegistry: deps.toolRegistry,
        promptService: deps.promptService,
        modelName: deps.modelName,
        maxIterations,
        now: deps.now,
    };
    config.recursionLimit = recursionLimitFor(maxIterations);

    dbg(`Running audit on thread ${config.configurable.thread_id}: "${instruction}"`);
    try {
        const result = await invokeGraphFn({ instruction, maxIterations, messages: [], iterations: 0 }, config);
        if (result.stoppedEarly) {
            console.warn(`Audit stopped after ${result.iterations} iterations without a final answer.`);
        }
        return {
            output: result.finalAnswer || "No response generated.",
            iterations: result.iterations,
            stoppedEarly: result.stoppedEarly,
        };
    } catch (error) {
        console.error("Error during audit graph execution:", error);
        return {
            output: `Audit failed with error: ${errorMessage(error)}`,
            iterations: 0,
            stoppedEarly: false,
            error: errorMessage(error),
        };
    }
}

/**
 * Prints the agent's answer for an instruction. Used by the `audit` command and the shell.
 */
export async function runAuditCommand(instruction: string, deps: AuditDependencies): Promise<AuditResult> {
    say("\n--- Audit Agent Starting ---");
    say(`Instruction: ${instruction}`);
    const result = await runAudit(instruction, deps);
    say(`\nAgent: ${result.output}\n`);
    return result;
}
