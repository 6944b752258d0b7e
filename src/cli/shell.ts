import inquirer from 'inquirer';
import { AuditDependencies, runAuditCommand } from '../commands/audit';
import { formatStatusSummary } from '../commands/status';
import { runToolCommand } from '../commands/tools';
import { EXAMPLE_INSTRUCTIONS } from '../config';
import { errorMessage } from '../errors';
import { MockOperationalStore } from '../store/MockOperationalStore';
import { say } from '../utils';

const EXIT_COMMANDS = ['exit', 'quit'];
const HELP_COMMAND = 'help';
const RESET_COMMAND = 'reset';
const STATUS_COMMAND = 'status';
const FACILITIES_COMMAND = 'facilities';
const CHECK_COMMAND = 'check';

export interface ShellSession {
    store: MockOperationalStore;
    audit: AuditDependencies;
}

export type ReadInputFn = () => Promise<string>;

/**
 * Prompts for the next line of input, trimmed.
 */
export async function getCommandInput(): Promise<string> {
    const answers = await inquirer.prompt<{ command: string }>([
        { type: 'input', name: 'command', message: 'audit> ' }
    ]);
    return answers.command.trim();
}

/**
 * Parses a command line input string into a command and arguments.
 *
 * Quoted arguments keep their spaces and lose their quotes:
 * `check "FAC-AB-001"` becomes `{ command: 'check', args: ['FAC-AB-001'] }`.
 * The command word is lowercased.
 */
export function parseCommand(commandInput: string): { command: string, args: string[] } {
    const parts = commandInput.match(/(?:[^\s"']+|"[^"]*"|'[^']*')+/g) || [];
    const command = parts[0]?.toLowerCase() || '';
    const args = parts.slice(1).map((arg: string) =>
        (arg.startsWith('"') && arg.endsWith('"')) || (arg.startsWith("'") && arg.endsWith("'"))
        ? arg.slice(1, -1)
        : arg
    );
    return { command, args };
}

export function helpText(): string {
    return [
        'Commands:',
        '  help                 Show this help',
        '  status               Show record counts',
        '  reset                Clear sent emails, scheduled tasks and maintenance logs',
        '  facilities           List facilities without asking the agent',
        '  check <facility_id>  Run the calibration check without asking the agent',
        '  exit | quit          Leave the shell',
        'Anything else is sent to the audit agent. For example:',
        ...EXAMPLE_INSTRUCTIONS.map(example => `  - ${example}`),
    ].join('\n');
}

/**
 * Handles one line of shell input.
 * @returns false once the user asked to leave.
 */
export async function handleShellInput(commandInput: string, session: ShellSession): Promise<boolean> {
    const { command, args } = parseCommand(commandInput);

    if (command === '') {
        return true;
    }
    if (EXIT_COMMANDS.includes(command)) {
        say('Exiting audit shell...');
        return false;
    }

    switch (command) {
        case HELP_COMMAND:
            say(helpText());
            break;
        case STATUS_COMMAND:
            say(formatStatusSummary(session.store, session.audit.now?.()));
            break;
        case RESET_COMMAND:
            session.store.reset();
            say('Session reset: sent emails, scheduled tasks and maintenance logs were cleared.');
            break;
        case FACILITIES_COMMAND:
            await runToolCommand(session.audit.toolRegistry, 'list_facilities', {});
            break;
        case CHECK_COMMAND:
            if (args.length === 0) {
                say('Usage: check <facility_id>');
                break;
            }
            await runToolCommand(session.audit.toolRegistry, 'check_calibration_compliance', { facility_id: args[0] });
            break;
        default:
            await runAuditCommand(commandInput, session.audit);
            break;
    }
    return true;
}

/**
 * Starts the interactive audit shell. Every line that is not a shell command
 * is handed to the audit agent; the store keeps its records between lines.
 *
 * @param readInputFn Injected dependency for reading a line.
 */
export async function startShell(session: ShellSession, readInputFn: ReadInputFn = getCommandInput) {
    say('Starting compliance audit shell. Type "help" for commands, "exit" to quit.');

    let shellRunning = true;
    while (shellRunning) {
        const commandInput = await readInputFn();
        try {
            shellRunning = await handleShellInput(commandInput, session);
        } catch (error) {
            say(`Error: ${errorMessage(error)}`);
        }
    }
}
