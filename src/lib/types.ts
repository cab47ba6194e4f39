// ─── Phases ──────────────────────────────────────────────────────────────────

export const PHASE_ORDER = [
    'principles',
    'specify',
    'clarify',
    'plan',
    'tasks',
    'analyze',
    'implement',
    'done',
] as const;

export type Phase = (typeof PHASE_ORDER)[number];

/** Every phase that does work; `done` is terminal. */
export type WorkPhase = Exclude<Phase, 'done'>;

export const WORK_PHASES: readonly WorkPhase[] = PHASE_ORDER.filter(
    (phase): phase is WorkPhase => phase !== 'done'
);

/** Phases a workflow may skip; every other work phase must complete. */
export const OPTIONAL_PHASES: ReadonlySet<WorkPhase> = new Set<WorkPhase>(['clarify', 'analyze']);

export type WorkflowMode = 'interactive' | 'staged' | 'unattended';

export const WORKFLOW_MODES: readonly WorkflowMode[] = ['interactive', 'staged', 'unattended'];

// ─── Artifacts ───────────────────────────────────────────────────────────────

export const ARTIFACT_KINDS = [
    'principles',
    'spec',
    'plan',
    'research',
    'dataModel',
    'contracts',
    'quickstart',
    'tasks',
] as const;

export type ArtifactKind = (typeof ARTIFACT_KINDS)[number];

export type ArtifactPaths = Record<ArtifactKind, string>;

export interface ArtifactSet {
    featureDir: string;
    paths: ArtifactPaths;
}

export interface ValidatedArtifactSet extends ArtifactSet {
    exists: Record<ArtifactKind, boolean>;
    availableDocs: ArtifactKind[];
}

// ─── Features & Repository Context ───────────────────────────────────────────

export interface Feature {
    number: string;
    slug: string;
    branchName: string;
    directoryPath: string;
}

export interface RepositoryContext {
    root: string;
    hasVersionControl: boolean;
    /** Explicit override (environment or --feature). Wins over everything else. */
    activeFeatureId: string | null;
    branch: string | null;
}

// ─── Tasks ───────────────────────────────────────────────────────────────────

export interface TaskItem {
    id: string;
    text: string;
    completed: boolean;
    parallelEligible: boolean;
    labels: string[];
    /** 1-based line number in the tasks artifact. */
    line: number;
    section: string | null;
}

export interface TaskProgress {
    completed: number;
    total: number;
    percentage: number;
    nextPending: TaskItem | null;
    nextBatch: TaskItem[];
}

// ─── Workflow State ──────────────────────────────────────────────────────────

export type CheckpointStatus = 'in_progress' | 'complete' | 'failed' | 'blocked' | 'skipped';

export interface Checkpoint {
    status: CheckpointStatus;
    tasksCompleted: number;
    tasksTotal: number;
    currentTaskRef: string | null;
    failureReason?: string;
}

export type CheckpointMetadata = Partial<Omit<Checkpoint, 'status'>>;

export interface WorkflowState {
    schemaVersion: number;
    featureId: string;
    currentPhase: Phase;
    completedPhases: WorkPhase[];
    skippedPhases: WorkPhase[];
    mode: WorkflowMode;
    startedAt: string;
    lastUpdated: string;
    checkpoints: Partial<Record<WorkPhase, Checkpoint>>;
}

// ─── Collaborators ───────────────────────────────────────────────────────────

export interface TemplateProvider {
    createFromTemplate(kind: ArtifactKind, destinationPath: string): void;
}

export type PhaseExecutionResult =
    | { ok: true; metadata: Record<string, unknown> }
    | { ok: false; reason: string };

export interface PhaseExecutor {
    execute(phase: WorkPhase, artifacts: ArtifactSet, feature: Feature): Promise<PhaseExecutionResult>;
}

// ─── Logging Types ───────────────────────────────────────────────────────────

export type LogLevel = 'info' | 'success' | 'warn' | 'error' | 'phase' | 'debug';

export type LogEvent =
    | {
          type: 'system';
          level: LogLevel;
          message: string;
          timestamp: string;
      }
    | {
          type: 'agent';
          agent: string;
          invocationId: string;
          message: string;
          timestamp: string;
      };
