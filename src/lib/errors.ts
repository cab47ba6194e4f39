import type { ArtifactKind, WorkPhase } from './types.js';

// ─── Result ──────────────────────────────────────────────────────────────────

export type Result<T, E = WorkflowError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
    return { ok: true, value };
}

export function fail<E>(error: E): { ok: false; error: E } {
    return { ok: false, error };
}

// ─── Error Taxonomy ──────────────────────────────────────────────────────────

export type WorkflowErrorKind =
    | 'NoFeatureContext'
    | 'AmbiguousFeature'
    | 'MissingArtifact'
    | 'StateCorrupted'
    | 'PhaseExecutionFailed'
    | 'InvalidModeTransition';

export const EXIT_CODES: Record<WorkflowErrorKind, number> = {
    NoFeatureContext: 2,
    AmbiguousFeature: 3,
    MissingArtifact: 4,
    StateCorrupted: 5,
    PhaseExecutionFailed: 6,
    InvalidModeTransition: 7,
};

export abstract class WorkflowError extends Error {
    abstract readonly kind: WorkflowErrorKind;

    get exitCode(): number {
        return EXIT_CODES[this.kind];
    }

    /** Machine-readable details for structured output. */
    abstract details(): Record<string, unknown>;
}

export class NoFeatureContextError extends WorkflowError {
    readonly kind = 'NoFeatureContext';

    constructor(message = 'No active feature: set an explicit feature id, switch to a numbered branch, or create a feature first') {
        super(message);
        this.name = 'NoFeatureContextError';
    }

    details(): Record<string, unknown> {
        return {};
    }
}

export class AmbiguousFeatureError extends WorkflowError {
    readonly kind = 'AmbiguousFeature';

    constructor(readonly candidates: string[]) {
        super(`Several feature directories match: ${candidates.join(', ')}. Pass an explicit feature id.`);
        this.name = 'AmbiguousFeatureError';
    }

    details(): Record<string, unknown> {
        return { candidates: this.candidates };
    }
}

export class MissingArtifactError extends WorkflowError {
    readonly kind = 'MissingArtifact';

    constructor(readonly kinds: ArtifactKind[], readonly paths: string[] = []) {
        super(`Missing required artifacts: ${kinds.join(', ')}`);
        this.name = 'MissingArtifactError';
    }

    details(): Record<string, unknown> {
        return { missing: this.kinds, paths: this.paths };
    }
}

export class StateCorruptedError extends WorkflowError {
    readonly kind = 'StateCorrupted';

    constructor(readonly statePath: string, readonly issues: string[]) {
        super(
            `Workflow state at ${statePath} is unreadable (${issues.join('; ')}). ` +
            'Fix the file by hand or reset the workflow.'
        );
        this.name = 'StateCorruptedError';
    }

    details(): Record<string, unknown> {
        return { path: this.statePath, issues: this.issues };
    }
}

export class PhaseExecutionFailedError extends WorkflowError {
    readonly kind = 'PhaseExecutionFailed';

    constructor(readonly phase: WorkPhase, readonly reason: string) {
        super(`Phase "${phase}" failed: ${reason}`);
        this.name = 'PhaseExecutionFailedError';
    }

    details(): Record<string, unknown> {
        return { phase: this.phase, reason: this.reason };
    }
}

export class InvalidModeTransitionError extends WorkflowError {
    readonly kind = 'InvalidModeTransition';

    constructor(message: string) {
        super(message);
        this.name = 'InvalidModeTransitionError';
    }

    details(): Record<string, unknown> {
        return {};
    }
}

export function isWorkflowError(err: unknown): err is WorkflowError {
    return err instanceof WorkflowError;
}
