import * as fs from 'node:fs';
import { OPTIONAL_PHASES } from './types.js';
import type {
    ArtifactSet,
    CheckpointMetadata,
    Feature,
    Phase,
    PhaseExecutor,
    RepositoryContext,
    TaskProgress,
    ValidatedArtifactSet,
    WorkPhase,
    WorkflowMode,
    WorkflowState,
} from './types.js';
import type { Clock, StateStore } from './state.js';
import { createState, nextOpenPhase } from './state.js';
import type { FeatureRegistry } from './features.js';
import type { PathResolver } from './paths.js';
import { artifactPresent } from './paths.js';
import type { PrerequisiteGate } from './prerequisites.js';
import { computeProgress, parseTasks } from './tasks.js';
import { getMode } from './modes.js';
import {
    InvalidModeTransitionError,
    NoFeatureContextError,
    PhaseExecutionFailedError,
    StateCorruptedError,
    fail,
    isWorkflowError,
    ok,
} from './errors.js';
import type { Result } from './errors.js';
import { log } from './logger.js';
import * as control from './control.js';

// ─── Phase Definitions ───────────────────────────────────────────────────────

const NEXT_STEPS: Record<Phase, string> = {
    principles: 'Write the project principles',
    specify: 'Write the feature specification',
    clarify: 'Resolve the open questions in the specification (optional)',
    plan: 'Produce the implementation plan',
    tasks: 'Break the plan into tasks',
    analyze: 'Cross-check specification, plan and tasks (optional)',
    implement: 'Work through the task list',
    done: 'All phases complete',
};

export type DoneAction = 'archive' | 'delete';

// ─── Reports ─────────────────────────────────────────────────────────────────

export type RunOutcome = 'paused' | 'incomplete' | 'done';

export interface RunReport {
    outcome: RunOutcome;
    feature: Feature;
    state: WorkflowState;
    /** Phases completed during this call, in order. */
    phasesRun: WorkPhase[];
    /** Phase the run stopped in front of (or inside, when incomplete). */
    nextPhase: Phase;
    progress: TaskProgress | null;
    executorMetadata: Partial<Record<WorkPhase, Record<string, unknown>>>;
    /** Where the state file went on reaching `done`; null when deleted or not done. */
    archivedTo: string | null;
}

export interface StatusReport {
    feature: Feature;
    state: WorkflowState | null;
    artifacts: ValidatedArtifactSet;
    progress: TaskProgress | null;
    clarificationMarkers: number;
    nextPhase: Phase | null;
    nextStep: string;
}

export interface ResetReport {
    removed: boolean;
    archivedTo: string | null;
}

// ─── Options ─────────────────────────────────────────────────────────────────

interface LoopOptions {
    /** One-shot continue signal: authorizes exactly one paused phase. */
    proceed?: boolean;
    onDone?: DoneAction;
}

export interface StartOptions extends LoopOptions {
    /** Allocates a new feature; without it the current feature is resolved. */
    description?: string;
    shortName?: string;
    mode?: WorkflowMode;
    skip?: readonly WorkPhase[];
}

export interface ResumeOptions extends LoopOptions {
    mode?: WorkflowMode;
    /** Re-enter a completed phase, or name the next open one explicitly. */
    fromPhase?: WorkPhase;
}

export interface OrchestratorDependencies {
    store: StateStore;
    registry: FeatureRegistry;
    resolver: PathResolver;
    gate: PrerequisiteGate;
    executor: PhaseExecutor;
    defaultMode?: WorkflowMode;
    onDone?: DoneAction;
    /** Optional phases skipped in every new workflow. */
    skipPhases?: readonly WorkPhase[];
    /** External pause request, checked before every phase. */
    pauseRequested?: () => boolean;
    clock?: Clock;
}

// ─── Task Progress ───────────────────────────────────────────────────────────

/** Fresh parse of the tasks artifact; null when there is none. */
export function readTaskProgress(artifacts: ArtifactSet): TaskProgress | null {
    if (!artifactPresent('tasks', artifacts.paths.tasks)) return null;
    return computeProgress(parseTasks(fs.readFileSync(artifacts.paths.tasks, 'utf-8')));
}

function progressMetadata(progress: TaskProgress): CheckpointMetadata {
    return {
        tasksCompleted: progress.completed,
        tasksTotal: progress.total,
        currentTaskRef: progress.nextPending?.id ?? null,
    };
}

// ─── Orchestrator ────────────────────────────────────────────────────────────

/**
 * Drives one feature through the phase sequence. Workflow errors come back
 * as `Result` failures; anything else (I/O, bugs) propagates.
 */
export class PhaseOrchestrator {
    private readonly store: StateStore;
    private readonly registry: FeatureRegistry;
    private readonly resolver: PathResolver;
    private readonly gate: PrerequisiteGate;
    private readonly executor: PhaseExecutor;
    private readonly defaultMode: WorkflowMode;
    private readonly onDone: DoneAction;
    private readonly skipPhases: readonly WorkPhase[];
    private readonly pauseRequested: () => boolean;
    private readonly clock: Clock;

    constructor(deps: OrchestratorDependencies) {
        this.store = deps.store;
        this.registry = deps.registry;
        this.resolver = deps.resolver;
        this.gate = deps.gate;
        this.executor = deps.executor;
        this.defaultMode = deps.defaultMode ?? 'interactive';
        this.onDone = deps.onDone ?? 'archive';
        this.skipPhases = deps.skipPhases ?? [];
        this.pauseRequested = deps.pauseRequested ?? control.isPauseRequested;
        this.clock = deps.clock ?? (() => new Date());
    }

    // ─── Operations ──────────────────────────────────────────────────────────

    start(context: RepositoryContext, options: StartOptions = {}): Promise<Result<RunReport>> {
        return this.captureAsync(async () => {
            const existing = this.store.load(context.root);
            if (existing) {
                throw new InvalidModeTransitionError(
                    `A workflow for ${existing.featureId} is already in progress; resume it or reset first`
                );
            }

            const skips = [...this.skipPhases, ...(options.skip ?? [])];
            skips.forEach((phase) => this.assertSkippable(phase));

            const feature =
                options.description !== undefined
                    ? this.registry.allocate(context, options.description, { shortName: options.shortName })
                    : this.registry.resolveCurrent(context);

            const mode = options.mode ?? this.defaultMode;
            let state = createState(feature.branchName, mode, this.now());
            this.store.save(context.root, state);
            for (const phase of skips) {
                state = this.store.skip(context.root, state, phase);
            }

            log('info', `Workflow started for ${feature.branchName} (mode: ${mode} - ${getMode(mode).description})`);
            return this.runLoop(context, feature, state, options, []);
        });
    }

    resume(context: RepositoryContext, options: ResumeOptions = {}): Promise<Result<RunReport>> {
        return this.captureAsync(async () => {
            const loaded = this.requireState(context.root);
            const feature = this.featureFor(context, loaded);

            let state = options.fromPhase ? this.rewind(loaded, options.fromPhase) : loaded;
            if (options.mode && options.mode !== state.mode) {
                log('info', `Switching mode ${state.mode} -> ${options.mode}`);
                state = { ...state, mode: options.mode };
            }
            if (state !== loaded) {
                state = { ...state, lastUpdated: this.now() };
                this.store.save(context.root, state);
            }

            log('info', `Resuming ${feature.branchName} at ${state.currentPhase}`);
            const reconciled = this.reconcileTasks(context, feature, state);
            return this.runLoop(context, feature, reconciled.state, options, reconciled.completed);
        });
    }

    skip(context: RepositoryContext, phase: WorkPhase): Result<WorkflowState> {
        return this.capture(() => {
            this.assertSkippable(phase);
            const state = this.requireState(context.root);
            const next = this.store.skip(context.root, state, phase);
            log('info', `Skipped ${phase}`);
            return next;
        });
    }

    status(context: RepositoryContext): Result<StatusReport> {
        return this.capture(() => {
            const state = this.store.load(context.root);
            const feature = state ? this.featureFor(context, state) : this.registry.resolveCurrent(context);
            const artifacts = this.resolver.resolve(context, feature, { validate: true });

            return {
                feature,
                state,
                artifacts,
                progress: readTaskProgress(artifacts),
                clarificationMarkers: this.gate.clarificationMarkers(artifacts),
                nextPhase: state ? state.currentPhase : null,
                nextStep: describeNextStep(state),
            };
        });
    }

    /** Explicit removal of the state file; the way out of `StateCorrupted`. */
    reset(context: RepositoryContext, options: { archive?: boolean } = {}): Result<ResetReport> {
        return this.capture(() => {
            if (options.archive) {
                const archivedTo = this.store.archive(context.root);
                return { removed: archivedTo !== null, archivedTo };
            }

            let existed: boolean;
            try {
                existed = this.store.load(context.root) !== null;
            } catch (err) {
                if (!(err instanceof StateCorruptedError)) throw err;
                existed = true;
            }
            this.store.remove(context.root);
            return { removed: existed, archivedTo: null };
        });
    }

    // ─── Phase Loop ──────────────────────────────────────────────────────────

    private async runLoop(
        context: RepositoryContext,
        feature: Feature,
        initial: WorkflowState,
        options: LoopOptions,
        alreadyCompleted: WorkPhase[]
    ): Promise<RunReport> {
        const root = context.root;
        const phasesRun = [...alreadyCompleted];
        const executorMetadata: RunReport['executorMetadata'] = {};
        let state = initial;
        let progress: TaskProgress | null = null;
        let proceedAvailable = options.proceed === true;

        const report = (outcome: RunOutcome, archivedTo: string | null = null): RunReport => ({
            outcome,
            feature,
            state,
            phasesRun,
            nextPhase: state.currentPhase,
            progress,
            executorMetadata,
            archivedTo,
        });

        for (;;) {
            const phase = state.currentPhase;
            if (phase === 'done') break;

            if (this.pauseRequested()) {
                log('warn', `Pause requested; stopping before ${phase}`);
                return report('paused');
            }
            if (getMode(state.mode).pausesBefore(phase)) {
                if (!proceedAvailable) {
                    log('info', `Paused before ${phase} (${state.mode} mode)`);
                    return report('paused');
                }
                proceedAvailable = false;
            }

            log('phase', `Phase: ${phase}`);
            const artifacts = this.resolver.resolve(context, feature);

            const gate = this.gate.checkPhase(phase, artifacts);
            if (!gate.ok) {
                state = this.store.checkpoint(root, state, phase, 'blocked', { failureReason: gate.error.message });
                throw gate.error;
            }
            if (gate.value.availableDocs.length > 0) {
                log('debug', `Available docs: ${gate.value.availableDocs.join(', ')}`);
            }

            const result = await this.executor.execute(phase, artifacts, feature);
            if (!result.ok) {
                state = this.store.checkpoint(root, state, phase, 'failed', { failureReason: result.reason });
                throw new PhaseExecutionFailedError(phase, result.reason);
            }
            executorMetadata[phase] = result.metadata;

            let metadata: CheckpointMetadata = {};
            if (phase === 'implement') {
                progress = readTaskProgress(artifacts) ?? computeProgress([]);
                metadata = progressMetadata(progress);
                if (progress.nextPending) {
                    state = this.store.checkpoint(root, state, phase, 'in_progress', metadata);
                    log(
                        'warn',
                        `${progress.total - progress.completed} of ${progress.total} task(s) still open; next is ${progress.nextPending.id}`
                    );
                    return report('incomplete');
                }
            }

            state = this.store.checkpoint(root, state, phase, 'complete', metadata);
            phasesRun.push(phase);
            log('success', `Phase ${phase} complete`);
        }

        const archivedTo = this.finish(root, options.onDone ?? this.onDone);
        log('success', `Workflow for ${feature.branchName} finished`);
        return report('done', archivedTo);
    }

    private finish(root: string, action: DoneAction): string | null {
        if (action === 'delete') {
            this.store.remove(root);
            return null;
        }
        const archivedTo = this.store.archive(root);
        if (archivedTo) log('info', `Workflow state archived to ${archivedTo}`);
        return archivedTo;
    }

    // ─── Resume Helpers ──────────────────────────────────────────────────────

    /**
     * The tasks artifact wins over the cached counts. An `implement` phase
     * whose tasks are all ticked is completed without running the executor.
     */
    private reconcileTasks(
        context: RepositoryContext,
        feature: Feature,
        state: WorkflowState
    ): { state: WorkflowState; completed: WorkPhase[] } {
        const cached = state.checkpoints.implement;
        if (state.currentPhase !== 'implement' && !cached) return { state, completed: [] };

        const progress = readTaskProgress(this.resolver.resolve(context, feature));
        if (!progress) return { state, completed: [] };

        if (state.currentPhase === 'implement' && progress.total > 0 && !progress.nextPending) {
            log('info', `All ${progress.total} tasks are ticked; completing implement`);
            const next = this.store.checkpoint(context.root, state, 'implement', 'complete', progressMetadata(progress));
            return { state: next, completed: ['implement'] };
        }

        if (
            cached &&
            (cached.tasksCompleted !== progress.completed ||
                cached.tasksTotal !== progress.total ||
                cached.currentTaskRef !== (progress.nextPending?.id ?? null))
        ) {
            log(
                'info',
                `Task counts reconciled: ${cached.tasksCompleted}/${cached.tasksTotal} -> ${progress.completed}/${progress.total}`
            );
            const next = this.store.checkpoint(context.root, state, 'implement', cached.status, progressMetadata(progress));
            return { state: next, completed: [] };
        }
        return { state, completed: [] };
    }

    /** Moves the current phase back to `phase` without saving. */
    private rewind(state: WorkflowState, phase: WorkPhase): WorkflowState {
        if (state.skippedPhases.includes(phase)) {
            throw new InvalidModeTransitionError(`Cannot resume from "${phase}": it was skipped`);
        }
        const open = nextOpenPhase(state.completedPhases, state.skippedPhases);
        if (!state.completedPhases.includes(phase) && phase !== open) {
            throw new InvalidModeTransitionError(`Cannot resume from "${phase}": "${open}" comes first`);
        }
        if (phase === state.currentPhase) return state;
        return { ...state, currentPhase: phase };
    }

    // ─── Internals ───────────────────────────────────────────────────────────

    private assertSkippable(phase: WorkPhase): void {
        if (!OPTIONAL_PHASES.has(phase)) {
            throw new InvalidModeTransitionError(
                `"${phase}" is required and cannot be skipped (optional: ${[...OPTIONAL_PHASES].join(', ')})`
            );
        }
    }

    private requireState(root: string): WorkflowState {
        const state = this.store.load(root);
        if (!state) {
            throw new NoFeatureContextError('No workflow in progress; start one first');
        }
        return state;
    }

    /** The state file owns the feature; a differing override is ignored. */
    private featureFor(context: RepositoryContext, state: WorkflowState): Feature {
        if (context.activeFeatureId && !state.featureId.startsWith(context.activeFeatureId)) {
            log('warn', `Ignoring feature override ${context.activeFeatureId}; workflow in progress is ${state.featureId}`);
        }
        return this.registry.resolveCurrent({ ...context, activeFeatureId: state.featureId });
    }

    private now(): string {
        return this.clock().toISOString();
    }

    private capture<T>(operation: () => T): Result<T> {
        try {
            return ok(operation());
        } catch (err) {
            if (isWorkflowError(err)) return fail(err);
            throw err;
        }
    }

    private async captureAsync<T>(operation: () => Promise<T>): Promise<Result<T>> {
        try {
            return ok(await operation());
        } catch (err) {
            if (isWorkflowError(err)) return fail(err);
            throw err;
        }
    }
}

function describeNextStep(state: WorkflowState | null): string {
    if (!state) return 'Start the workflow';

    const phase = state.currentPhase;
    if (phase === 'done') return NEXT_STEPS.done;

    const checkpoint = state.checkpoints[phase];
    if (!checkpoint) return NEXT_STEPS[phase];

    switch (checkpoint.status) {
        case 'failed':
            return `Resume to retry ${phase} (last failure: ${checkpoint.failureReason ?? 'unknown'})`;
        case 'blocked':
            return `Create the missing artifacts for ${phase}, then resume`;
        case 'in_progress':
            return `Resume ${phase}: ${checkpoint.tasksCompleted}/${checkpoint.tasksTotal} tasks done`;
        default:
            return NEXT_STEPS[phase];
    }
}
