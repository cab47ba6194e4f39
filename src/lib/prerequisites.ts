import * as fs from 'node:fs';
import type { ArtifactKind, ArtifactSet, WorkPhase } from './types.js';
import { artifactPresent, inspectArtifacts } from './paths.js';
import { MissingArtifactError, fail, ok } from './errors.js';
import type { Result } from './errors.js';

// ─── Phase Requirements ──────────────────────────────────────────────────────

/** Artifacts that must exist before each phase may start. */
export const PHASE_REQUIREMENTS: Record<WorkPhase, readonly ArtifactKind[]> = {
    principles: [],
    specify: ['principles'],
    clarify: ['spec'],
    plan: ['spec'],
    tasks: ['spec', 'plan'],
    analyze: ['spec', 'plan', 'tasks'],
    implement: ['plan', 'tasks'],
};

export interface GatePass {
    availableDocs: ArtifactKind[];
}

const CLARIFICATION_MARKER = '[NEEDS CLARIFICATION';

// ─── Gate ────────────────────────────────────────────────────────────────────

/**
 * Read-only: reports every missing kind at once, and always lists every
 * kind that happens to be present.
 */
export class PrerequisiteGate {
    check(requiredKinds: readonly ArtifactKind[], artifacts: ArtifactSet): Result<GatePass, MissingArtifactError> {
        const inventory = inspectArtifacts(artifacts);
        const missing = requiredKinds.filter((kind) => !inventory.exists[kind]);

        if (missing.length > 0) {
            return fail(new MissingArtifactError(missing, missing.map((kind) => artifacts.paths[kind])));
        }
        return ok({ availableDocs: inventory.availableDocs });
    }

    checkPhase(phase: WorkPhase, artifacts: ArtifactSet): Result<GatePass, MissingArtifactError> {
        return this.check(PHASE_REQUIREMENTS[phase], artifacts);
    }

    /** Unresolved-ambiguity markers in the spec; 0 when the spec is absent. */
    clarificationMarkers(artifacts: ArtifactSet): number {
        if (!artifactPresent('spec', artifacts.paths.spec)) return 0;
        const text = fs.readFileSync(artifacts.paths.spec, 'utf-8');
        return text.split(CLARIFICATION_MARKER).length - 1;
    }
}
