import * as path from 'node:path';
import type { PhaseExecutor, RepositoryContext } from './types.js';
import type { SpecflowConfig } from './config.js';
import { defaultConfig, loadConfig } from './config.js';
import type { VersionControl } from './git.js';
import { GitVersionControl, detectContext } from './git.js';
import { PathResolver } from './paths.js';
import { FeatureRegistry } from './features.js';
import { FileTemplateProvider } from './templates.js';
import { PrerequisiteGate } from './prerequisites.js';
import type { StateStore } from './state.js';
import { FileStateStore } from './state.js';
import { AgentPhaseExecutor } from './runner.js';
import { PhaseOrchestrator } from './orchestrator.js';

export interface WorkspaceOptions {
    cwd?: string;
    root?: string;
    /** Explicit feature id (--feature); beats the environment override. */
    featureId?: string;
    env?: NodeJS.ProcessEnv;
    vcs?: VersionControl;
    store?: StateStore;
    executor?: PhaseExecutor;
    pauseRequested?: () => boolean;
}

export interface Workspace {
    config: SpecflowConfig;
    context: RepositoryContext;
    /** Fresh context for a later request, optionally with another feature override. */
    refreshContext(featureId?: string): RepositoryContext;
    resolver: PathResolver;
    registry: FeatureRegistry;
    gate: PrerequisiteGate;
    store: StateStore;
    orchestrator: PhaseOrchestrator;
}

/**
 * Wires the default collaborators for one repository: config from
 * `.specflow/config.json`, git when available, the file state store and the
 * agent CLI executor.
 */
export function openWorkspace(options: WorkspaceOptions = {}): Workspace {
    const cwd = options.cwd ?? process.cwd();
    const vcs = options.vcs ?? new GitVersionControl();

    // The root decides where the config lives; the config names the override variable
    const detected = detectContext(cwd, {
        vcs,
        root: options.root,
        featureEnvVar: defaultConfig().featureEnvVar,
        env: options.env,
    });
    const config = loadConfig(detected.root);

    const refreshContext = (featureId?: string): RepositoryContext =>
        detectContext(cwd, {
            vcs,
            root: detected.root,
            featureId: featureId ?? options.featureId,
            featureEnvVar: config.featureEnvVar,
            env: options.env,
        });
    const context = refreshContext();

    const resolver = new PathResolver({ specsDir: config.specsDir, principlesFile: config.principlesFile });
    const registry = new FeatureRegistry({
        resolver,
        vcs,
        templates: new FileTemplateProvider(path.resolve(context.root, config.templatesDir)),
        seedKinds: config.seedKinds,
        slugWordLimit: config.slugWordLimit,
    });
    const gate = new PrerequisiteGate();
    const store = options.store ?? new FileStateStore({ fileName: config.stateFile, archiveDir: config.archiveDir });
    const executor =
        options.executor ??
        new AgentPhaseExecutor({
            config: config.executor,
            cwd: context.root,
            logsDir: path.resolve(context.root, config.logsDir),
        });

    const orchestrator = new PhaseOrchestrator({
        store,
        registry,
        resolver,
        gate,
        executor,
        defaultMode: config.defaultMode,
        onDone: config.onDone,
        skipPhases: config.skipPhases,
        pauseRequested: options.pauseRequested,
    });

    return { config, context, refreshContext, resolver, registry, gate, store, orchestrator };
}
