export interface PromptConfigEntry {
  inputs: string[];
  path: string;
}

export type AgentPromptsConfig = Record<string, PromptConfigEntry>;

export interface FullPromptsConfig {
  prompts: Record<string, AgentPromptsConfig>;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function isPromptConfigEntry(value: unknown): value is PromptConfigEntry {
  return isRecord(value)
    && typeof value.path === 'string'
    && Array.isArray(value.inputs)
    && value.inputs.every(input => typeof input === 'string');
}

export function isFullPromptsConfig(value: unknown): value is FullPromptsConfig {
  return isRecord(value)
    && isRecord(value.prompts)
    && Object.values(value.prompts).every(agent => isRecord(agent) && Object.values(agent).every(isPromptConfigEntry));
}
