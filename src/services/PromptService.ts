import * as fs from 'fs/promises';
import * as path from 'path';
import { FullPromptsConfig, isFullPromptsConfig } from './promptTypes';
import { errorMessage } from '../errors';

export const DEFAULT_PROMPTS_DIR = 'src/agents/prompts';

export interface PromptServiceDependencies {
    readFileFn?: (path: string, encoding: BufferEncoding) => Promise<string>;
    resolvePathFn?: (...paths: string[]) => string;
    dirnameFn?: (p: string) => string;
    isAbsoluteFn?: (p: string) => boolean;
}

export type PromptContext = Record<string, string | number>;

/**
 * Loads prompt templates and fills in their {{placeholders}}.
 *
 * Templates default to `src/agents/prompts/<agent>/<key>.txt` under the working
 * directory. A JSON config file can point individual prompts elsewhere; its
 * relative paths resolve against the config file's directory.
 */
export class PromptService {
    private loadedConfig?: FullPromptsConfig;
    private readonly configFilePath?: string;
    private readonly configDir?: string;

    private readonly readFileFn: (path: string, encoding: BufferEncoding) => Promise<string>;
    private readonly resolvePathFn: (...paths: string[]) => string;
    private readonly dirnameFn: (p: string) => string;
    private readonly isAbsoluteFn: (p: string) => boolean;

    constructor(configFilePath?: string, deps?: PromptServiceDependencies) {
        this.readFileFn = deps?.readFileFn || fs.readFile;
        this.resolvePathFn = deps?.resolvePathFn || path.resolve;
        this.dirnameFn = deps?.dirnameFn || path.dirname;
        this.isAbsoluteFn = deps?.isAbsoluteFn || path.isAbsolute;

        if (configFilePath) {
            this.configFilePath = this.resolvePathFn(configFilePath);
            this.configDir = this.dirnameFn(this.configFilePath);
        }
    }

    private async ensureConfigLoaded(): Promise<void> {
        if (!this.configFilePath || this.loadedConfig) {
            return;
        }
        try {
            const parsed: unknown = JSON.parse(await this.readFile(this.configFilePath));
            if (!isFullPromptsConfig(parsed)) {
                throw new Error('expected an object with a "prompts" map of { inputs, path } entries');
            }
            this.loadedConfig = parsed;
        } catch (error) {
            throw new Error(`Failed to load or parse prompt configuration file: ${this.configFilePath}. Original error: ${errorMessage(error)}`);
        }
    }

    /**
     * Returns the prompt for an agent with every `{{key}}` of `context` substituted.
     * @throws Error if the config or the template cannot be read, or the template is empty.
     */
    public async getFormattedPrompt(agentName: string, promptKey: string, context: PromptContext): Promise<string> {
        await this.ensureConfigLoaded();

        const customPromptConfig = this.loadedConfig?.prompts[agentName]?.[promptKey];
        const promptPath = customPromptConfig
            ? this.resolveCustomPath(customPromptConfig.path)
            : this.resolvePathFn(`${DEFAULT_PROMPTS_DIR}/${agentName}/${promptKey}.txt`);

        let promptText: string;
        try {
            promptText = await this.readFile(promptPath);
        } catch (error) {
            const kind = customPromptConfig ? 'custom' : 'default';
            throw new Error(`Error loading ${kind} prompt file ${promptPath} for agent ${agentName}, prompt ${promptKey}. Original error: ${errorMessage(error)}`);
        }

        if (!promptText) {
            throw new Error(`Failed to load prompt for agent ${agentName}, prompt ${promptKey}.`);
        }

        for (const [key, value] of Object.entries(context)) {
            const escapedKey = key.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
            promptText = promptText.replace(new RegExp(`{{${escapedKey}}}`, 'g'), () => String(value));
        }
        return promptText;
    }

    private async readFile(filePath: string): Promise<string> {
        try {
            return await this.readFileFn(filePath, 'utf-8');
        } catch (error) {
            throw new Error(`Reading file ${filePath} failed: ${errorMessage(error)}`);
        }
    }

    // Relative custom paths belong to the config file's directory
    private resolveCustomPath(promptPath: string): string {
        if (this.isAbsoluteFn(promptPath) || !this.configDir) {
            return promptPath;
        }
        return this.resolvePathFn(this.configDir, promptPath);
    }
}
