import { errorMessage } from '../errors';
import { ToolRegistry } from '../tools/ToolRegistry';
import { dbg, say } from '../utils';

/**
 * Calls one tool directly, without the planner, and prints its text.
 * Lets `facilities` and `check` work without a model provider.
 *
 * @throws whatever the tool throws, after printing it.
 */
export async function runToolCommand(toolRegistry: ToolRegistry, toolName: string, args: Record<string, string>): Promise<string> {
    dbg(`Running tool ${toolName} directly with ${JSON.stringify(args)}`);
    try {
        const { text } = await toolRegistry.invoke(toolName, args);
        say(text);
        return text;
    } catch (error) {
        console.error(`Tool ${toolName} failed: ${errorMessage(error)}`);
        throw error;
    }
}
