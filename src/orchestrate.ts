#!/usr/bin/env node

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as readline from 'node:readline';
import type { ArtifactKind, RepositoryContext } from './lib/types.js';
import type { CliArgs } from './lib/args.js';
import { USAGE, UsageError, parseArgs } from './lib/args.js';
import { ConfigError, isWorkPhase } from './lib/config.js';
import { MissingArtifactError, isWorkflowError } from './lib/errors.js';
import type { Result } from './lib/errors.js';
import { colors, configureLogger, log } from './lib/logger.js';
import type { RunReport } from './lib/orchestrator.js';
import { readTaskProgress } from './lib/orchestrator.js';
import type { OutputMode } from './lib/output.js';
import {
    describeFeature,
    describeProgress,
    describeRun,
    describeStatus,
    describeTask,
    emit,
    emitError,
    kindLabel,
    newFeatureDocument,
} from './lib/output.js';
import { parseTasks } from './lib/tasks.js';
import type { Workspace } from './lib/workspace.js';
import { openWorkspace } from './lib/workspace.js';
import * as control from './lib/control.js';

// ═══════════════════════════════════════════════════════════════════════════════
// Prompt
// ═══════════════════════════════════════════════════════════════════════════════

function promptContinue(phase: string): Promise<boolean> {
    const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
    });

    return new Promise((resolve) => {
        rl.question(`${colors.cyan}${colors.bold}Continue with ${phase}?${colors.reset} [Y/n] `, (answer) => {
            rl.close();
            resolve(!/^n/i.test(answer.trim()));
        });
    });
}

// ═══════════════════════════════════════════════════════════════════════════════
// Commands
// ═══════════════════════════════════════════════════════════════════════════════

interface CommandContext {
    args: CliArgs;
    output: OutputMode;
    workspace: Workspace;
    context: RepositoryContext;
}

function newFeature({ args, output, workspace, context }: CommandContext): number {
    const description = args.positional.join(' ').trim();
    if (!description && !args.shortName) {
        throw new UsageError('new needs a feature description');
    }

    const feature = workspace.registry.allocate(context, description, { shortName: args.shortName ?? undefined });
    const specFile = workspace.resolver.resolve(context, feature).paths.spec;
    emit(output, newFeatureDocument(feature, specFile, context.hasVersionControl), () => [
        ...describeFeature(feature),
        `SPEC_FILE: ${specFile}`,
    ]);
    return 0;
}

function showPaths({ args, output, workspace, context }: CommandContext): number {
    const feature = workspace.registry.resolveCurrent(context);
    const artifacts = workspace.resolver.resolve(context, feature);

    if (args.pathsOnly) {
        const document = {
            REPO_ROOT: context.root,
            BRANCH: feature.branchName,
            FEATURE_DIR: artifacts.featureDir,
            FEATURE_SPEC: artifacts.paths.spec,
            IMPL_PLAN: artifacts.paths.plan,
            TASKS: artifacts.paths.tasks,
        };
        emit(output, document, () => Object.entries(document).map(([key, value]) => `${key}: ${value}`));
        return 0;
    }

    const required: ArtifactKind[] = args.requireTasks ? ['plan', 'tasks'] : ['plan'];
    const gate = workspace.gate.check(required, artifacts);
    if (!gate.ok) {
        return emitError(output, gate.error);
    }

    const docs = gate.value.availableDocs.filter(
        (kind) => kind !== 'principles' && kind !== 'spec' && kind !== 'plan' && (kind !== 'tasks' || args.includeTasks)
    );
    emit(output, { FEATURE_DIR: artifacts.featureDir, AVAILABLE_DOCS: docs.map(kindLabel) }, () => [
        `FEATURE_DIR: ${artifacts.featureDir}`,
        'AVAILABLE_DOCS:',
        ...docs.map((kind) => `  ✓ ${kindLabel(kind)}`),
    ]);
    return 0;
}

function showTasks({ output, workspace, context }: CommandContext): number {
    const feature = workspace.registry.resolveCurrent(context);
    const artifacts = workspace.resolver.resolve(context, feature);
    const progress = readTaskProgress(artifacts);
    if (!progress) {
        return emitError(output, new MissingArtifactError(['tasks'], [artifacts.paths.tasks]));
    }

    const items = parseTasks(fs.readFileSync(artifacts.paths.tasks, 'utf-8'));
    emit(output, { feature: feature.branchName, progress, tasks: items }, () => [
        ...items.map(describeTask),
        '',
        ...describeProgress(progress),
    ]);
    return 0;
}

function showStatus({ output, workspace, context }: CommandContext): number {
    const result = workspace.orchestrator.status(context);
    if (!result.ok) return emitError(output, result.error);

    emit(output, result.value, () => describeStatus(result.value, context.root));
    return 0;
}

/**
 * Reports a run and, in a terminal, offers to continue one phase at a time
 * while the workflow is paused.
 */
async function followRun(command: CommandContext, first: Result<RunReport>): Promise<number> {
    const { output, workspace } = command;
    let result = first;

    for (;;) {
        if (!result.ok) return emitError(output, result.error);
        const report = result.value;

        const canPrompt = output === 'narrative' && process.stdin.isTTY === true && !control.isPauseRequested();
        if (report.outcome !== 'paused' || !canPrompt) {
            emit(output, report, () => describeRun(report));
            return 0;
        }

        if (report.phasesRun.length > 0) log('success', `Completed: ${report.phasesRun.join(', ')}`);
        if (!(await promptContinue(report.nextPhase))) {
            emit(output, report, () => describeRun(report));
            return 0;
        }
        result = await workspace.orchestrator.resume(workspace.refreshContext(), {
            proceed: true,
            onDone: onDoneOf(command.args),
        });
    }
}

function onDoneOf(args: CliArgs): 'archive' | 'delete' | undefined {
    if (args.archive === null) return undefined;
    return args.archive ? 'archive' : 'delete';
}

async function runWorkflow(command: CommandContext): Promise<number> {
    const { args, workspace, context } = command;
    const description = args.positional.join(' ').trim();

    const result = await workspace.orchestrator.start(context, {
        description: description || undefined,
        shortName: args.shortName ?? undefined,
        mode: args.mode ?? undefined,
        skip: args.skip,
        proceed: args.proceed,
        onDone: onDoneOf(args),
    });
    return followRun(command, result);
}

async function resumeWorkflow(command: CommandContext): Promise<number> {
    const { args, workspace, context } = command;
    const result = await workspace.orchestrator.resume(context, {
        proceed: args.proceed,
        mode: args.mode ?? undefined,
        fromPhase: args.fromPhase ?? undefined,
        onDone: onDoneOf(args),
    });
    return followRun(command, result);
}

function skipPhase({ args, output, workspace, context }: CommandContext): number {
    const [phase] = args.positional;
    if (phase === undefined || !isWorkPhase(phase)) {
        throw new UsageError('skip needs a phase name');
    }

    const result = workspace.orchestrator.skip(context, phase);
    if (!result.ok) return emitError(output, result.error);

    const state = result.value;
    emit(output, state, () => [`Skipped ${phase}; next phase is ${state.currentPhase}`]);
    return 0;
}

function resetWorkflow({ args, output, workspace, context }: CommandContext): number {
    const result = workspace.orchestrator.reset(context, { archive: args.archive === true });
    if (!result.ok) return emitError(output, result.error);

    const report = result.value;
    emit(output, report, () => [
        !report.removed
            ? 'No workflow state to remove'
            : report.archivedTo
              ? `Workflow state archived to ${path.relative(context.root, report.archivedTo)}`
              : 'Workflow state removed',
    ]);
    return 0;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Entry Point
// ═══════════════════════════════════════════════════════════════════════════════

async function dispatch(command: CommandContext): Promise<number> {
    switch (command.args.command) {
        case 'new':
            return newFeature(command);
        case 'paths':
            return showPaths(command);
        case 'tasks':
            return showTasks(command);
        case 'status':
            return showStatus(command);
        case 'run':
            return runWorkflow(command);
        case 'resume':
            return resumeWorkflow(command);
        case 'skip':
            return skipPhase(command);
        case 'reset':
            return resetWorkflow(command);
        case null:
            console.log(USAGE);
            return 1;
    }
}

async function main(): Promise<number> {
    let args: CliArgs;
    try {
        args = parseArgs(process.argv);
    } catch (err) {
        if (!(err instanceof UsageError)) throw err;
        console.error(`${err.message}\n\n${USAGE}`);
        return 1;
    }
    if (args.help) {
        console.log(USAGE);
        return 0;
    }

    const output: OutputMode = args.json ? 'json' : 'narrative';
    configureLogger({ stderr: args.json });

    // First Ctrl-C stops the running agent; the phase is checkpointed as failed
    process.once('SIGINT', () => {
        log('warn', 'Interrupted; stopping the current phase');
        control.requestHardStop();
    });

    const workspace = openWorkspace({ root: args.root ?? undefined, featureId: args.feature ?? undefined });
    const command: CommandContext = { args, output, workspace, context: workspace.context };

    try {
        return await dispatch(command);
    } catch (err) {
        if (isWorkflowError(err)) return emitError(output, err);
        if (err instanceof UsageError) {
            console.error(`${err.message}\n\n${USAGE}`);
            return 1;
        }
        throw err;
    }
}

main()
    .then((code) => process.exit(code))
    .catch((err) => {
        if (err instanceof ConfigError) {
            log('error', err.message);
            process.exit(1);
        }
        log('error', `specflow crashed: ${err instanceof Error ? err.message : String(err)}`);
        if (err instanceof Error && err.stack) {
            console.error(err.stack);
        }
        process.exit(1);
    });
