import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { ARTIFACT_KINDS, WORK_PHASES, WORKFLOW_MODES } from './types.js';
import type { WorkPhase, WorkflowMode } from './types.js';

// ─── Config Schema ───────────────────────────────────────────────────────────

export const CONFIG_RELATIVE_PATH = path.join('.specflow', 'config.json');

const DEFAULT_COMMANDS: Record<WorkPhase, string> = {
    principles: '/constitution',
    specify: '/specify',
    clarify: '/clarify',
    plan: '/plan',
    tasks: '/tasks',
    analyze: '/analyze',
    implement: '/implement',
};

const workPhaseSchema = z.enum(['principles', 'specify', 'clarify', 'plan', 'tasks', 'analyze', 'implement']);

const executorSchema = z.object({
    command: z.string().min(1).default('claude'),
    model: z.string().optional(),
    maxTurns: z.number().int().positive().optional(),
    maxBudgetUsd: z.number().positive().optional(),
    timeoutMinutes: z.number().positive().default(30),
    retries: z.number().int().min(0).default(1),
    allowedTools: z.array(z.string()).default(['Read', 'Write', 'Edit', 'Grep', 'Glob', 'Bash']),
    commands: z.record(workPhaseSchema, z.string().min(1)).default({}),
});

export const configSchema = z.object({
    specsDir: z.string().min(1).default('specs'),
    principlesFile: z.string().min(1).default(path.join('memory', 'constitution.md')),
    templatesDir: z.string().min(1).default(path.join('.specflow', 'templates')),
    logsDir: z.string().min(1).default(path.join('.specflow', 'logs')),
    stateFile: z.string().min(1).default('.specflow-state.json'),
    archiveDir: z.string().min(1).default(path.join('.specflow', 'archive')),
    featureEnvVar: z.string().min(1).default('SPECFLOW_FEATURE'),
    defaultMode: z.enum(['interactive', 'staged', 'unattended']).default('interactive'),
    onDone: z.enum(['archive', 'delete']).default('archive'),
    slugWordLimit: z.number().int().min(0).default(3),
    seedKinds: z.array(z.enum(ARTIFACT_KINDS)).default(['spec']),
    skipPhases: z.array(workPhaseSchema).default([]),
    executor: executorSchema.default({}),
});

export type SpecflowConfig = z.infer<typeof configSchema>;
export type ExecutorConfig = SpecflowConfig['executor'];

export function defaultConfig(): SpecflowConfig {
    return configSchema.parse({});
}

export function phaseCommand(config: ExecutorConfig, phase: WorkPhase): string {
    return config.commands[phase] ?? DEFAULT_COMMANDS[phase];
}

// ─── Loading ─────────────────────────────────────────────────────────────────

export class ConfigError extends Error {
    constructor(readonly configPath: string, readonly issues: string[]) {
        super(`Invalid config at ${configPath}:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
        this.name = 'ConfigError';
    }
}

/**
 * Reads `.specflow/config.json` under the repository root. A missing file
 * yields the defaults.
 */
export function loadConfig(root: string): SpecflowConfig {
    const configPath = path.join(root, CONFIG_RELATIVE_PATH);
    if (!fs.existsSync(configPath)) {
        return defaultConfig();
    }

    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    } catch (err) {
        throw new ConfigError(configPath, [err instanceof Error ? err.message : String(err)]);
    }

    const parsed = configSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigError(
            configPath,
            parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        );
    }
    return parsed.data;
}

export function isWorkPhase(value: string): value is WorkPhase {
    return WORK_PHASES.some((phase) => phase === value);
}

export function isWorkflowMode(value: string): value is WorkflowMode {
    return WORKFLOW_MODES.some((mode) => mode === value);
}
