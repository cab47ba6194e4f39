import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { OPTIONAL_PHASES, WORK_PHASES } from './types.js';
import type {
    Checkpoint,
    CheckpointMetadata,
    CheckpointStatus,
    Phase,
    WorkPhase,
    WorkflowState,
} from './types.js';
import { InvalidModeTransitionError, StateCorruptedError } from './errors.js';

// ─── Schema ──────────────────────────────────────────────────────────────────

export const CURRENT_SCHEMA_VERSION = 2;

const workPhaseSchema = z.enum(['principles', 'specify', 'clarify', 'plan', 'tasks', 'analyze', 'implement']);
const phaseSchema = z.enum(['principles', 'specify', 'clarify', 'plan', 'tasks', 'analyze', 'implement', 'done']);
const modeSchema = z.enum(['interactive', 'staged', 'unattended']);
const statusSchema = z.enum(['in_progress', 'complete', 'failed', 'blocked', 'skipped']);

const checkpointSchema = z.object({
    status: statusSchema,
    tasksCompleted: z.number().int().min(0),
    tasksTotal: z.number().int().min(0),
    currentTaskRef: z.string().nullable(),
    failureReason: z.string().optional(),
});

const stateSchema = z
    .object({
        schemaVersion: z.literal(CURRENT_SCHEMA_VERSION),
        featureId: z.string().min(1),
        currentPhase: phaseSchema,
        completedPhases: z.array(workPhaseSchema),
        skippedPhases: z.array(workPhaseSchema),
        mode: modeSchema,
        startedAt: z.string(),
        lastUpdated: z.string(),
        checkpoints: z.record(workPhaseSchema, checkpointSchema),
    })
    .superRefine((state, ctx) => {
        const issue = (field: string, message: string): void => {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: [field], message });
        };
        const completed = new Set(state.completedPhases);
        const skipped = new Set(state.skippedPhases);
        const positions = state.completedPhases.map((phase) => WORK_PHASES.indexOf(phase));

        if (completed.size !== state.completedPhases.length) {
            issue('completedPhases', 'lists a phase more than once');
        } else if (positions.some((position, i) => i > 0 && position < positions[i - 1])) {
            issue('completedPhases', 'is not in phase order');
        }

        const last = Math.max(-1, ...positions);
        const open = WORK_PHASES.slice(0, Math.max(last, 0)).filter(
            (phase) => !completed.has(phase) && !skipped.has(phase)
        );
        if (open.length > 0) {
            issue('completedPhases', `"${WORK_PHASES[last]}" is complete but ${open.join(', ')} still open`);
        }

        if (skipped.size !== state.skippedPhases.length) {
            issue('skippedPhases', 'lists a phase more than once');
        }
        for (const phase of skipped) {
            if (!OPTIONAL_PHASES.has(phase)) issue('skippedPhases', `"${phase}" is not optional`);
            if (completed.has(phase)) issue('skippedPhases', `"${phase}" is also complete`);
        }

        // A completed phase is current only after a rewind
        const expected = nextOpenPhase(state.completedPhases, state.skippedPhases);
        if (state.currentPhase !== expected && !state.completedPhases.some((phase) => phase === state.currentPhase)) {
            issue('currentPhase', `expected "${expected}" or a completed phase, got "${state.currentPhase}"`);
        }
    });

// Version 1 predates phase skipping and task references
const legacyV1Schema = z.object({
    schemaVersion: z.literal(1),
    featureId: z.string().min(1),
    currentPhase: phaseSchema,
    completedPhases: z.array(workPhaseSchema),
    mode: modeSchema,
    startedAt: z.string(),
    lastUpdated: z.string(),
    checkpoints: z.record(
        workPhaseSchema,
        z.object({
            status: statusSchema,
            tasksCompleted: z.number().int().min(0),
            tasksTotal: z.number().int().min(0),
            failureReason: z.string().optional(),
        })
    ),
});

type Migration = (raw: unknown) => unknown;

/** Keyed on the version being migrated *from*. */
const MIGRATIONS: Record<number, Migration> = {
    1: (raw) => {
        const v1 = legacyV1Schema.parse(raw);
        const checkpoints: Partial<Record<WorkPhase, Checkpoint>> = {};
        for (const [name, checkpoint] of Object.entries(v1.checkpoints)) {
            const parsed = workPhaseSchema.safeParse(name);
            if (parsed.success && checkpoint) {
                checkpoints[parsed.data] = { ...checkpoint, currentTaskRef: null };
            }
        }
        return { ...v1, schemaVersion: 2, skippedPhases: [], checkpoints };
    },
};

function versionOf(raw: unknown): number | null {
    if (typeof raw !== 'object' || raw === null || !('schemaVersion' in raw)) return null;
    const version = raw.schemaVersion;
    return typeof version === 'number' ? version : null;
}

/**
 * Brings a parsed document up to the current schema, then validates it.
 * Throws `StateCorruptedError` for anything it cannot account for.
 */
export function migrateState(raw: unknown, sourcePath: string): WorkflowState {
    let document = raw;
    let version = versionOf(document);

    if (version === null) {
        throw new StateCorruptedError(sourcePath, ['missing schemaVersion']);
    }
    if (version > CURRENT_SCHEMA_VERSION) {
        throw new StateCorruptedError(sourcePath, [
            `schemaVersion ${version} is newer than supported version ${CURRENT_SCHEMA_VERSION}`,
        ]);
    }

    while (version < CURRENT_SCHEMA_VERSION) {
        const migrate = MIGRATIONS[version];
        if (!migrate) {
            throw new StateCorruptedError(sourcePath, [`no migration from schemaVersion ${version}`]);
        }
        try {
            document = migrate(document);
        } catch (err) {
            const issues = err instanceof z.ZodError ? formatIssues(err) : [String(err)];
            throw new StateCorruptedError(sourcePath, issues);
        }
        version += 1;
    }

    const parsed = stateSchema.safeParse(document);
    if (!parsed.success) {
        throw new StateCorruptedError(sourcePath, formatIssues(parsed.error));
    }
    return parsed.data;
}

function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

// ─── Pure Transitions ────────────────────────────────────────────────────────

export function nextOpenPhase(completed: readonly WorkPhase[], skipped: readonly WorkPhase[]): Phase {
    const closed = new Set<WorkPhase>([...completed, ...skipped]);
    return WORK_PHASES.find((candidate) => !closed.has(candidate)) ?? 'done';
}

export function createState(featureId: string, mode: WorkflowState['mode'], now: string): WorkflowState {
    return {
        schemaVersion: CURRENT_SCHEMA_VERSION,
        featureId,
        currentPhase: 'principles',
        completedPhases: [],
        skippedPhases: [],
        mode,
        startedAt: now,
        lastUpdated: now,
        checkpoints: {},
    };
}

export function applyCheckpoint(
    state: WorkflowState,
    phase: WorkPhase,
    status: CheckpointStatus,
    metadata: CheckpointMetadata,
    now: string
): WorkflowState {
    const previous = state.checkpoints[phase];
    const checkpoint: Checkpoint = {
        status,
        tasksCompleted: metadata.tasksCompleted ?? previous?.tasksCompleted ?? 0,
        tasksTotal: metadata.tasksTotal ?? previous?.tasksTotal ?? 0,
        currentTaskRef: metadata.currentTaskRef !== undefined ? metadata.currentTaskRef : previous?.currentTaskRef ?? null,
    };
    if (metadata.failureReason !== undefined) {
        checkpoint.failureReason = metadata.failureReason;
    }

    let completedPhases = state.completedPhases;
    if (status === 'complete' && !completedPhases.includes(phase)) {
        const expected = nextOpenPhase(state.completedPhases, state.skippedPhases);
        if (expected !== phase) {
            throw new InvalidModeTransitionError(
                `Cannot complete "${phase}" before "${expected}"`
            );
        }
        completedPhases = [...completedPhases, phase];
    }

    return {
        ...state,
        completedPhases,
        currentPhase: status === 'complete' ? nextOpenPhase(completedPhases, state.skippedPhases) : state.currentPhase,
        lastUpdated: now,
        checkpoints: { ...state.checkpoints, [phase]: checkpoint },
    };
}

export function applySkip(state: WorkflowState, phase: WorkPhase, now: string): WorkflowState {
    if (state.completedPhases.includes(phase)) {
        throw new InvalidModeTransitionError(`Cannot skip "${phase}": it is already complete`);
    }
    if (state.skippedPhases.includes(phase)) {
        return state;
    }

    const skippedPhases = [...state.skippedPhases, phase];
    const checkpoint: Checkpoint = { status: 'skipped', tasksCompleted: 0, tasksTotal: 0, currentTaskRef: null };
    return {
        ...state,
        skippedPhases,
        currentPhase:
            state.currentPhase === phase ? nextOpenPhase(state.completedPhases, skippedPhases) : state.currentPhase,
        lastUpdated: now,
        checkpoints: { ...state.checkpoints, [phase]: checkpoint },
    };
}

// ─── Store Contract ──────────────────────────────────────────────────────────

/**
 * One writer at a time is assumed: there is no lock and the last save wins.
 */
export interface StateStore {
    load(root: string): WorkflowState | null;
    save(root: string, state: WorkflowState): void;
    checkpoint(
        root: string,
        state: WorkflowState,
        phase: WorkPhase,
        status: CheckpointStatus,
        metadata?: CheckpointMetadata
    ): WorkflowState;
    skip(root: string, state: WorkflowState, phase: WorkPhase): WorkflowState;
    remove(root: string): void;
    /** Moves the state document aside; returns where it went, or null if there was none. */
    archive(root: string): string | null;
}

export type Clock = () => Date;

abstract class BaseStateStore implements StateStore {
    constructor(protected readonly clock: Clock) {}

    abstract load(root: string): WorkflowState | null;
    abstract save(root: string, state: WorkflowState): void;
    abstract remove(root: string): void;
    abstract archive(root: string): string | null;

    checkpoint(
        root: string,
        state: WorkflowState,
        phase: WorkPhase,
        status: CheckpointStatus,
        metadata: CheckpointMetadata = {}
    ): WorkflowState {
        const next = applyCheckpoint(state, phase, status, metadata, this.clock().toISOString());
        this.save(root, next);
        return next;
    }

    skip(root: string, state: WorkflowState, phase: WorkPhase): WorkflowState {
        const next = applySkip(state, phase, this.clock().toISOString());
        if (next !== state) this.save(root, next);
        return next;
    }
}

// ─── File Store ──────────────────────────────────────────────────────────────

/** The subset of node:fs the file store writes through. */
export interface StateFileSystem {
    writeFileSync(file: string, data: string, encoding: 'utf-8'): void;
    renameSync(from: string, to: string): void;
    rmSync(file: string, options: { force: boolean }): void;
}

export interface FileStateStoreOptions {
    fileName: string;
    archiveDir: string;
    clock?: Clock;
    fileSystem?: StateFileSystem;
}

export class FileStateStore extends BaseStateStore {
    private readonly fileName: string;
    private readonly archiveDir: string;
    private readonly fileSystem: StateFileSystem;

    constructor(options: FileStateStoreOptions) {
        super(options.clock ?? (() => new Date()));
        this.fileName = options.fileName;
        this.archiveDir = options.archiveDir;
        this.fileSystem = options.fileSystem ?? fs;
    }

    statePath(root: string): string {
        return path.join(root, this.fileName);
    }

    load(root: string): WorkflowState | null {
        const file = this.statePath(root);
        if (!fs.existsSync(file)) return null;

        let raw: unknown;
        try {
            raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
        } catch (err) {
            throw new StateCorruptedError(file, [err instanceof Error ? err.message : String(err)]);
        }
        return migrateState(raw, file);
    }

    /**
     * Writes beside the target and renames over it, so a crash at any point
     * leaves either the old document or the new one.
     */
    save(root: string, state: WorkflowState): void {
        const file = this.statePath(root);
        const temp = `${file}.${process.pid}.tmp`;
        fs.mkdirSync(path.dirname(file), { recursive: true });

        this.fileSystem.writeFileSync(temp, `${JSON.stringify(state, null, 2)}\n`, 'utf-8');
        try {
            this.fileSystem.renameSync(temp, file);
        } catch (err) {
            this.fileSystem.rmSync(temp, { force: true });
            throw err;
        }
    }

    remove(root: string): void {
        fs.rmSync(this.statePath(root), { force: true });
    }

    archive(root: string): string | null {
        const file = this.statePath(root);
        if (!fs.existsSync(file)) return null;

        let label = 'workflow';
        try {
            label = this.load(root)?.featureId ?? label;
        } catch (err) {
            if (!(err instanceof StateCorruptedError)) throw err;
            label = 'corrupted';
        }
        const stamp = this.clock().toISOString().replace(/[:.]/g, '-');
        const target = path.join(root, this.archiveDir, `${label}-${stamp}.json`);
        fs.mkdirSync(path.dirname(target), { recursive: true });
        fs.renameSync(file, target);
        return target;
    }
}

// ─── Memory Store ────────────────────────────────────────────────────────────

export class MemoryStateStore extends BaseStateStore {
    private readonly documents = new Map<string, string>();
    readonly archived = new Map<string, WorkflowState[]>();

    constructor(clock: Clock = () => new Date()) {
        super(clock);
    }

    load(root: string): WorkflowState | null {
        const text = this.documents.get(root);
        if (text === undefined) return null;
        return migrateState(JSON.parse(text), `memory:${root}`);
    }

    save(root: string, state: WorkflowState): void {
        this.documents.set(root, JSON.stringify(state));
    }

    remove(root: string): void {
        this.documents.delete(root);
    }

    archive(root: string): string | null {
        const state = this.load(root);
        if (!state) return null;
        const list = this.archived.get(root) ?? [];
        list.push(state);
        this.archived.set(root, list);
        this.documents.delete(root);
        return `memory:${root}#${list.length}`;
    }
}
