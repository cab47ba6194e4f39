import type { WorkPhase, WorkflowMode } from './types.js';
import { isWorkPhase, isWorkflowMode } from './config.js';

// ─── CLI Arguments ───────────────────────────────────────────────────────────

export const COMMANDS = ['new', 'paths', 'tasks', 'status', 'run', 'resume', 'skip', 'reset'] as const;

export type Command = (typeof COMMANDS)[number];

export interface CliArgs {
    command: Command | null;
    positional: string[];
    json: boolean;
    root: string | null;
    feature: string | null;
    mode: WorkflowMode | null;
    skip: WorkPhase[];
    proceed: boolean;
    fromPhase: WorkPhase | null;
    shortName: string | null;
    pathsOnly: boolean;
    requireTasks: boolean;
    includeTasks: boolean;
    /** `--archive` / `--delete`; null leaves the configured choice. */
    archive: boolean | null;
    help: boolean;
}

export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

function isCommand(value: string): value is Command {
    return COMMANDS.some((command) => command === value);
}

function phaseArg(flag: string, value: string | undefined): WorkPhase {
    if (value === undefined || !isWorkPhase(value)) {
        throw new UsageError(`${flag} expects a phase, got "${value ?? ''}"`);
    }
    return value;
}

function valueArg(flag: string, value: string | undefined): string {
    if (value === undefined || value.startsWith('--')) {
        throw new UsageError(`${flag} expects a value`);
    }
    return value;
}

export function parseArgs(argv: string[]): CliArgs {
    // argv[0] = node, argv[1] = script path, rest = user args
    const args = argv.slice(2);

    const result: CliArgs = {
        command: null,
        positional: [],
        json: false,
        root: null,
        feature: null,
        mode: null,
        skip: [],
        proceed: false,
        fromPhase: null,
        shortName: null,
        pathsOnly: false,
        requireTasks: false,
        includeTasks: false,
        archive: null,
        help: false,
    };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--json') {
            result.json = true;
        } else if (arg === '--help' || arg === '-h') {
            result.help = true;
        } else if (arg === '--root') {
            result.root = valueArg(arg, args[++i]);
        } else if (arg === '--feature') {
            result.feature = valueArg(arg, args[++i]);
        } else if (arg === '--mode') {
            const mode = valueArg(arg, args[++i]);
            if (!isWorkflowMode(mode)) {
                throw new UsageError(`Unknown mode "${mode}"; expected interactive, staged or unattended`);
            }
            result.mode = mode;
        } else if (arg === '--skip') {
            result.skip.push(phaseArg(arg, args[++i]));
        } else if (arg === '--from') {
            result.fromPhase = phaseArg(arg, args[++i]);
        } else if (arg === '--proceed' || arg === '--yes' || arg === '-y') {
            result.proceed = true;
        } else if (arg === '--short-name') {
            result.shortName = valueArg(arg, args[++i]);
        } else if (arg === '--paths-only') {
            result.pathsOnly = true;
        } else if (arg === '--require-tasks') {
            result.requireTasks = true;
        } else if (arg === '--include-tasks') {
            result.includeTasks = true;
        } else if (arg === '--archive') {
            result.archive = true;
        } else if (arg === '--delete') {
            result.archive = false;
        } else if (arg.startsWith('-')) {
            throw new UsageError(`Unknown option "${arg}"`);
        } else if (result.command === null) {
            if (!isCommand(arg)) {
                throw new UsageError(`Unknown command "${arg}"; expected one of ${COMMANDS.join(', ')}`);
            }
            result.command = arg;
        } else {
            result.positional.push(arg);
        }
    }

    return result;
}

export const USAGE = `Usage: specflow <command> [options]

Commands:
  new <description...>   Allocate a numbered feature (--short-name <name>)
  paths                  Print the active feature's artifact paths
                         (--paths-only, --require-tasks, --include-tasks)
  tasks                  Parse the task list and report progress
  status                 Show workflow state, artifacts and the next step
  run [description...]   Start a workflow (--mode, --skip <phase>, --proceed)
  resume                 Continue the workflow (--proceed, --mode, --from <phase>)
  skip <phase>           Skip an optional phase (clarify, analyze)
  reset                  Remove the workflow state (--archive to keep a copy)

Global options:
  --json                 Print one JSON document on stdout
  --root <dir>           Repository root (default: discovered from cwd)
  --feature <id>         Feature id override (NNN or NNN-name)`;
