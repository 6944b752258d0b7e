import * as dotenv from 'dotenv';
import { OpenAIClient } from './OpenAIClient';
import { ILLMClient } from './ILLMClient';

// Load environment variables
dotenv.config();

// Singleton instance for the LLM client
let clientInstance: ILLMClient | null = null;

/**
 * Factory function to get the configured LLM client instance.
 * Creates the instance on first call based on environment variables.
 * @returns The singleton instance of the configured ILLMClient.
 * @throws ConfigurationError if the API key is missing.
 */
export function getLLMClient(): ILLMClient {
    if (clientInstance) {
        return clientInstance;
    }

    try {
        clientInstance = new OpenAIClient();
        console.log('Using OpenAI provider.');
    } catch (error) {
        console.error(`Failed to initialize OpenAIClient: ${error}`);
        throw error; // Re-throw error after logging
    }

    return clientInstance;
}
