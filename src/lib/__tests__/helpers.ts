import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type {
    ArtifactKind,
    ArtifactSet,
    Feature,
    PhaseExecutionResult,
    PhaseExecutor,
    RepositoryContext,
    TemplateProvider,
    WorkPhase,
} from '../types.js';
import type { VersionControl } from '../git.js';
import type { Result, WorkflowError } from '../errors.js';

// ---------------------------------------------------------------------------
// File system
// ---------------------------------------------------------------------------

export function makeTempRoot(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'specflow-'));
}

export function writeFile(file: string, content: string): void {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content, 'utf-8');
}

export function makeContext(root: string, overrides: Partial<RepositoryContext> = {}): RepositoryContext {
    return { root, hasVersionControl: false, activeFeatureId: null, branch: null, ...overrides };
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export function unwrap<T>(result: Result<T>): T {
    if (!result.ok) {
        throw new Error(`Expected success, got ${result.error.kind}: ${result.error.message}`);
    }
    return result.value;
}

export function unwrapError<T>(result: Result<T>): WorkflowError {
    if (result.ok) {
        throw new Error('Expected a workflow error');
    }
    return result.error;
}

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

export class FakeVersionControl implements VersionControl {
    readonly created: string[] = [];

    constructor(
        private readonly branches: string[] = [],
        private readonly current: string | null = null
    ) {}

    repositoryRoot(cwd: string): string {
        return cwd;
    }

    currentBranch(): string | null {
        return this.current;
    }

    listBranches(): string[] {
        return [...this.branches, ...this.created];
    }

    createBranch(_root: string, name: string): void {
        this.created.push(name);
    }
}

export class RecordingTemplates implements TemplateProvider {
    readonly calls: Array<[ArtifactKind, string]> = [];

    createFromTemplate(kind: ArtifactKind, destinationPath: string): void {
        this.calls.push([kind, destinationPath]);
        if (kind === 'contracts') {
            fs.mkdirSync(destinationPath, { recursive: true });
        } else {
            writeFile(destinationPath, '');
        }
    }
}

export const TASKS_DOCUMENT = '# Tasks\n\n- [ ] T001 Scaffold the module\n- [ ] T002 Build the endpoint\n';

function tickTasks(file: string, leaveOpen: number): void {
    const lines = fs.readFileSync(file, 'utf-8').split('\n');
    const pending = lines.flatMap((line, index) => (/^- \[ \]/.test(line) ? [index] : []));
    for (const index of pending.slice(0, Math.max(0, pending.length - leaveOpen))) {
        lines[index] = lines[index].replace('- [ ]', '- [x]');
    }
    fs.writeFileSync(file, lines.join('\n'), 'utf-8');
}

/**
 * Writes each phase's outputs the way a real agent would, so the gates of
 * later phases pass.
 */
export class ScriptedExecutor implements PhaseExecutor {
    readonly calls: WorkPhase[] = [];
    /** Tasks the implement phase leaves unticked. */
    leaveOpen = 0;
    private readonly failures = new Map<WorkPhase, string>();
    private readonly withoutOutput = new Set<WorkPhase>();

    failOnce(phase: WorkPhase, reason: string): this {
        this.failures.set(phase, reason);
        return this;
    }

    produceNothing(phase: WorkPhase): this {
        this.withoutOutput.add(phase);
        return this;
    }

    async execute(phase: WorkPhase, artifacts: ArtifactSet, _feature: Feature): Promise<PhaseExecutionResult> {
        this.calls.push(phase);

        const reason = this.failures.get(phase);
        if (reason !== undefined) {
            this.failures.delete(phase);
            return { ok: false, reason };
        }
        if (!this.withoutOutput.has(phase)) {
            this.writeOutputs(phase, artifacts);
        }
        return { ok: true, metadata: { phase } };
    }

    private writeOutputs(phase: WorkPhase, artifacts: ArtifactSet): void {
        const { paths } = artifacts;
        switch (phase) {
            case 'principles':
                writeFile(paths.principles, '# Principles\n');
                break;
            case 'specify':
                writeFile(paths.spec, '# Spec\n');
                break;
            case 'clarify':
                writeFile(paths.spec, '# Spec\n\nClarified.\n');
                break;
            case 'plan':
                writeFile(paths.plan, '# Plan\n');
                writeFile(paths.research, '# Research\n');
                break;
            case 'tasks':
                writeFile(paths.tasks, TASKS_DOCUMENT);
                break;
            case 'analyze':
                break;
            case 'implement':
                tickTasks(paths.tasks, this.leaveOpen);
                break;
        }
    }
}

/** Holds every call until `release()`. */
export class BlockingExecutor implements PhaseExecutor {
    private released = false;
    private readonly waiters: Array<() => void> = [];

    constructor(private readonly inner: PhaseExecutor) {}

    release(): void {
        this.released = true;
        this.waiters.splice(0).forEach((wake) => wake());
    }

    async execute(phase: WorkPhase, artifacts: ArtifactSet, feature: Feature): Promise<PhaseExecutionResult> {
        if (!this.released) {
            await new Promise<void>((resolve) => this.waiters.push(resolve));
        }
        return this.inner.execute(phase, artifacts, feature);
    }
}
