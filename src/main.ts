#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { DEFAULT_MODEL_NAME } from './agents/llmConstants';
import { getLLMClient } from './agents/LLMUtils';
import { ILLMClient } from './agents/ILLMClient';
import { createAuditAppContext } from './appContext';
import { startShell } from './cli/shell';
import { AuditDependencies, runAuditCommand } from './commands/audit';
import { formatStatusSummary } from './commands/status';
import { runToolCommand } from './commands/tools';
import { DEFAULT_DIRECTIVES_DIR, DEFAULT_MAX_ITERATIONS } from './config';
import { ConfigurationError, errorMessage } from './errors';
import { PromptService } from './services/PromptService';
import { dbg, say } from './utils';

const GENERAL_ERROR = 1;
const CONFIGURATION_ERROR = 2;
const AUDIT_ERROR = 3;
const COMMAND_PARSING_ERROR = 4;
const UNHANDLED_ERROR = 5;

// Load environment variables from .env file
dotenv.config();

type GlobalOptions = {
  model?: string;
  maxIterations: number;
  promptsConfig?: string;
  directivesDir: string;
};

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function exitOnConfigurationError(error: unknown): never {
  say(`Configuration error: ${errorMessage(error)}`);
  process.exit(CONFIGURATION_ERROR);
}

async function main() {
  const program = new Command();

  // --- Global Options ---
  program
    .name('audit-agent')
    .version('1.0.0')
    .description('Compliance audit agent for simulated facility calibration audits (CLI Mode)')
    .option('-m, --model <model_name>', 'Global AI model to use')
    .option('--max-iterations <n>', 'Planner turns allowed per instruction', parsePositiveInt, DEFAULT_MAX_ITERATIONS)
    .option('--prompts-config <path>', 'Global path to a JSON file for custom prompt configurations')
    .option('--directives-dir <path>', 'Directory with the directive documents used by search_directives', DEFAULT_DIRECTIVES_DIR);

  const context = () => {
    const globalOpts = program.opts<GlobalOptions>();
    dbg(`Using directives directory: ${path.resolve(globalOpts.directivesDir)}`);
    return { globalOpts, app: createAuditAppContext({ directivesDir: globalOpts.directivesDir }) };
  };

  const auditDependencies = (globalOpts: GlobalOptions, app: ReturnType<typeof createAuditAppContext>): AuditDependencies => {
    let llmClient: ILLMClient;
    try {
      llmClient = getLLMClient();
    } catch (error) {
      if (error instanceof ConfigurationError) {
        exitOnConfigurationError(error);
      }
      throw error;
    }
    const modelName = globalOpts.model || DEFAULT_MODEL_NAME;
    say(`Using model: ${modelName}`);
    if (globalOpts.promptsConfig) {
      dbg(`Using prompts configuration file: ${path.resolve(globalOpts.promptsConfig)}`);
    }
    return {
      llmClient,
      toolRegistry: app.toolRegistry,
      promptService: new PromptService(globalOpts.promptsConfig),
      modelName,
      maxIterations: globalOpts.maxIterations,
    };
  };

  // --- Define Commands ---

  program
    .command('audit')
    .description('Run one audit instruction through the agent')
    .argument('<instruction...>', 'The natural-language instruction for the agent')
    .action(async (instructionParts: string[]) => {
      const { globalOpts, app } = context();
      const result = await runAuditCommand(instructionParts.join(' '), auditDependencies(globalOpts, app));
      if (result.error) {
        dbg(`Audit command failed: ${result.error}`);
        process.exit(AUDIT_ERROR);
      }
      dbg('Audit command finished successfully.');
    });

  program
    .command('shell')
    .description('Start an interactive audit session')
    .action(async () => {
      const { globalOpts, app } = context();
      await startShell({ store: app.store, audit: auditDependencies(globalOpts, app) });
    });

  program
    .command('facilities')
    .description('List the facilities in the operational store')
    .action(async () => {
      const { app } = context();
      await runToolCommand(app.toolRegistry, 'list_facilities', {});
    });

  program
    .command('check')
    .description('Run the calibration compliance check for one facility')
    .argument('<facilityId>', 'Facility identifier, e.g. FAC-AB-001')
    .action(async (facilityId: string) => {
      const { app } = context();
      try {
        await runToolCommand(app.toolRegistry, 'check_calibration_compliance', { facility_id: facilityId });
      } catch (error) {
        dbg(`Check command failed: ${error}`);
        process.exit(GENERAL_ERROR);
      }
    });

  program
    .command('status')
    .description('Show record counts for a fresh session')
    .action(() => {
      const { app } = context();
      say(formatStatusSummary(app.store));
    });

  // --- Parse and Execute ---
  try {
    if (process.argv.length <= 2) {
      program.help();
    }
    await program.parseAsync(process.argv);
  } catch (error) {
    dbg(`Error during command parsing or execution: ${error}`);
    process.exit(COMMAND_PARSING_ERROR);
  }
}

main().catch(error => {
  dbg(`Unhandled application error: ${error}`);
  process.exit(UNHANDLED_ERROR);
});
