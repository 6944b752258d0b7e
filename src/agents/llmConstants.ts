export const OPENAI_API_KEY_ENV_VAR = 'OPENAI_API_KEY';
export const BASE_URL_ENV_VAR = 'BASE_URL';
export const DEFAULT_MODEL_NAME = 'gpt-4o'; // General default
// Compliance work should be repeatable
export const DEFAULT_TEMPERATURE = 0;
export const MAX_COMPLETION_TOKENS = 1500;
