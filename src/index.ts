export * from './lib/types.js';
export * from './lib/errors.js';
export { PathResolver, ARTIFACT_FILES, artifactPresent, inspectArtifacts } from './lib/paths.js';
export type { PathLayout } from './lib/paths.js';
export { FeatureRegistry, slugify, formatNumber, parseFeatureName } from './lib/features.js';
export type { AllocateOptions, FeatureRegistryOptions } from './lib/features.js';
export { FileTemplateProvider } from './lib/templates.js';
export { PrerequisiteGate, PHASE_REQUIREMENTS } from './lib/prerequisites.js';
export type { GatePass } from './lib/prerequisites.js';
export { tokenizeTaskLine, parseTasks, computeProgress } from './lib/tasks.js';
export type { TaskToken } from './lib/tasks.js';
export {
    CURRENT_SCHEMA_VERSION,
    FileStateStore,
    MemoryStateStore,
    migrateState,
    createState,
    nextOpenPhase,
} from './lib/state.js';
export type { Clock, StateStore, StateFileSystem } from './lib/state.js';
export { GitVersionControl, NO_VERSION_CONTROL, detectContext } from './lib/git.js';
export type { VersionControl } from './lib/git.js';
export { PhaseOrchestrator, readTaskProgress } from './lib/orchestrator.js';
export type {
    OrchestratorDependencies,
    ResetReport,
    ResumeOptions,
    RunOutcome,
    RunReport,
    StartOptions,
    StatusReport,
} from './lib/orchestrator.js';
export { getMode, listModes } from './lib/modes.js';
export type { ModePolicy } from './lib/modes.js';
export { AgentPhaseExecutor } from './lib/runner.js';
export { loadConfig, defaultConfig, configSchema, ConfigError } from './lib/config.js';
export type { SpecflowConfig, ExecutorConfig } from './lib/config.js';
export { openWorkspace } from './lib/workspace.js';
export type { Workspace, WorkspaceOptions } from './lib/workspace.js';
export { createApp } from './app.js';
export type { MonitorApp } from './app.js';
