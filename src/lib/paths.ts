import * as fs from 'node:fs';
import * as path from 'node:path';
import { ARTIFACT_KINDS } from './types.js';
import type {
    ArtifactKind,
    ArtifactPaths,
    ArtifactSet,
    Feature,
    RepositoryContext,
    ValidatedArtifactSet,
} from './types.js';

// ─── Layout ──────────────────────────────────────────────────────────────────

/** Feature-level artifact names. `principles` lives at repository level. */
export const ARTIFACT_FILES: Record<Exclude<ArtifactKind, 'principles'>, string> = {
    spec: 'spec.md',
    plan: 'plan.md',
    research: 'research.md',
    dataModel: 'data-model.md',
    contracts: 'contracts',
    quickstart: 'quickstart.md',
    tasks: 'tasks.md',
};

export const DIRECTORY_KINDS: ReadonlySet<ArtifactKind> = new Set<ArtifactKind>(['contracts']);

export interface PathLayout {
    specsDir: string;
    principlesFile: string;
}

// ─── Resolver ────────────────────────────────────────────────────────────────

export class PathResolver {
    constructor(private readonly layout: PathLayout) {}

    featureRoot(context: RepositoryContext): string {
        return path.join(context.root, this.layout.specsDir);
    }

    featureDir(context: RepositoryContext, branchName: string): string {
        return path.join(this.featureRoot(context), branchName);
    }

    /**
     * Paths only by default: usable before the feature directory exists.
     * With `validate`, each kind is also checked against the file system.
     */
    resolve(context: RepositoryContext, feature: Feature): ArtifactSet;
    resolve(context: RepositoryContext, feature: Feature, options: { validate: true }): ValidatedArtifactSet;
    resolve(
        context: RepositoryContext,
        feature: Feature,
        options?: { validate: boolean }
    ): ArtifactSet | ValidatedArtifactSet {
        const featureDir = feature.directoryPath;
        const paths: ArtifactPaths = {
            principles: path.join(context.root, this.layout.principlesFile),
            spec: path.join(featureDir, ARTIFACT_FILES.spec),
            plan: path.join(featureDir, ARTIFACT_FILES.plan),
            research: path.join(featureDir, ARTIFACT_FILES.research),
            dataModel: path.join(featureDir, ARTIFACT_FILES.dataModel),
            contracts: path.join(featureDir, ARTIFACT_FILES.contracts),
            quickstart: path.join(featureDir, ARTIFACT_FILES.quickstart),
            tasks: path.join(featureDir, ARTIFACT_FILES.tasks),
        };

        const set: ArtifactSet = { featureDir, paths };
        return options?.validate ? inspectArtifacts(set) : set;
    }
}

// ─── Live Inspection ─────────────────────────────────────────────────────────

export function artifactPresent(kind: ArtifactKind, artifactPath: string): boolean {
    let stat: fs.Stats;
    try {
        stat = fs.statSync(artifactPath);
    } catch {
        return false;
    }
    if (DIRECTORY_KINDS.has(kind)) {
        // An empty contracts/ directory does not count
        return stat.isDirectory() && fs.readdirSync(artifactPath).length > 0;
    }
    return stat.isFile();
}

export function inspectArtifacts(set: ArtifactSet): ValidatedArtifactSet {
    const present = (kind: ArtifactKind): boolean => artifactPresent(kind, set.paths[kind]);
    const exists: Record<ArtifactKind, boolean> = {
        principles: present('principles'),
        spec: present('spec'),
        plan: present('plan'),
        research: present('research'),
        dataModel: present('dataModel'),
        contracts: present('contracts'),
        quickstart: present('quickstart'),
        tasks: present('tasks'),
    };
    const availableDocs = ARTIFACT_KINDS.filter((kind) => exists[kind]);

    return { ...set, exists, availableDocs };
}
