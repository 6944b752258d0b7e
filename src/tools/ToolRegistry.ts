import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { MalformedToolCallError, SchemaValidationError } from '../errors';
import { dbg } from '../utils';
import { AuditTool, ToolContext, ToolOutput, ToolSpec } from './types';

interface RegisteredTool {
    spec: ToolSpec;
    invoke(args: unknown): Promise<ToolOutput>;
}

function describeIssue(issue: z.ZodIssue): string {
    if (issue.code === z.ZodIssueCode.invalid_type) {
        return issue.received === 'undefined' ? 'is required' : `must be ${issue.expected}, received ${issue.received}`;
    }
    return issue.message;
}

/**
 * Converts the first zod issue into a SchemaValidationError naming the field.
 */
export function toSchemaValidationError(toolName: string, error: z.ZodError): SchemaValidationError {
    const issue = error.issues[0];
    if (!issue) {
        return new SchemaValidationError(toolName, '(input)', 'is invalid');
    }
    const field = issue.path.length > 0 ? issue.path.join('.') : '(input)';
    return new SchemaValidationError(toolName, field, describeIssue(issue));
}

/**
 * The catalog of named tools the planner may call. Inputs are validated
 * against each tool's schema before the tool runs, so a rejected call never
 * reaches the store. Call order is up to the caller.
 */
export class ToolRegistry {
    private readonly tools = new Map<string, RegisteredTool>();
    private readonly context: ToolContext;

    constructor(context: ToolContext) {
        this.context = context;
    }

    register<S extends z.ZodTypeAny>(tool: AuditTool<S>): this {
        if (this.tools.has(tool.name)) {
            throw new Error(`Tool '${tool.name}' is already registered.`);
        }
        const { $schema: _schemaUri, ...parameters } = zodToJsonSchema(tool.schema);
        this.tools.set(tool.name, {
            spec: { name: tool.name, description: tool.description, parameters },
            invoke: async (args: unknown) => {
                const parsed = tool.schema.safeParse(args);
                if (!parsed.success) {
                    throw toSchemaValidationError(tool.name, parsed.error);
                }
                return tool.run(parsed.data, this.context);
            },
        });
        return this;
    }

    names(): string[] {
        return Array.from(this.tools.keys());
    }

    toToolSpecs(): ToolSpec[] {
        return Array.from(this.tools.values()).map(t => t.spec);
    }

    /**
     * Runs a tool with structured arguments.
     * @throws MalformedToolCallError for an unknown tool name.
     * @throws SchemaValidationError when the arguments do not match the tool's schema.
     */
    async invoke(name: string, args: unknown): Promise<ToolOutput> {
        const tool = this.tools.get(name);
        if (!tool) {
            throw new MalformedToolCallError(name, `Unknown tool '${name}'. Available tools: ${this.names().join(', ')}.`);
        }
        dbg(`ToolRegistry: invoking ${name}`);
        return tool.invoke(args);
    }

    /**
     * Runs a tool with the JSON argument string a model produced.
     * An empty string is read as no arguments.
     */
    async invokeRaw(name: string, argumentsJson: string): Promise<ToolOutput> {
        let args: unknown = {};
        if (argumentsJson.trim() !== '') {
            try {
                args = JSON.parse(argumentsJson);
            } catch {
                throw new MalformedToolCallError(name, `Arguments for tool '${name}' are not valid JSON: ${argumentsJson}`);
            }
        }
        return this.invoke(name, args);
    }
}
