import * as fs from 'node:fs';
import type { ArtifactKind, Feature, RepositoryContext, TemplateProvider } from './types.js';
import type { PathResolver } from './paths.js';
import type { VersionControl } from './git.js';
import { AmbiguousFeatureError, NoFeatureContextError } from './errors.js';
import { log } from './logger.js';

// ─── Naming ──────────────────────────────────────────────────────────────────

// Numbers are zero-padded to three digits and grow past 999
const FEATURE_NAME = /^(\d{3,})-(.+)$/;
const NUMBER_ONLY = /^(\d{3,})$/;
// Branches may carry a path prefix, e.g. "jdoe/004-fix-login"
const BRANCH_FEATURE = /(?:^|\/)(\d{3,}-[^/]+)$/;

export const FALLBACK_SLUG = 'feature';

/**
 * Kebab-case slug of a free-text description, capped at `wordLimit` tokens
 * (0 means no cap). Applying it twice changes nothing.
 */
export function slugify(description: string, wordLimit = 3): string {
    const tokens = description
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '')
        .split('-')
        .filter((token) => token !== '');

    const kept = wordLimit > 0 ? tokens.slice(0, wordLimit) : tokens;
    return kept.length > 0 ? kept.join('-') : FALLBACK_SLUG;
}

export function formatNumber(value: number): string {
    return String(value).padStart(3, '0');
}

export function parseFeatureName(name: string): { number: string; slug: string } | null {
    const match = FEATURE_NAME.exec(name);
    return match ? { number: match[1], slug: match[2] } : null;
}

// ─── Registry ────────────────────────────────────────────────────────────────

export interface AllocateOptions {
    /** Explicit short name; slugged without a word cap and preferred over the description. */
    shortName?: string;
}

export interface FeatureRegistryOptions {
    resolver: PathResolver;
    vcs: VersionControl;
    templates: TemplateProvider;
    /** Kinds created from templates when a feature directory is first made. */
    seedKinds?: readonly ArtifactKind[];
    slugWordLimit?: number;
}

/**
 * Allocation is not locked across processes: two concurrent `allocate` calls
 * in one repository may hand out the same number.
 */
export class FeatureRegistry {
    private readonly resolver: PathResolver;
    private readonly vcs: VersionControl;
    private readonly templates: TemplateProvider;
    private readonly seedKinds: readonly ArtifactKind[];
    private readonly slugWordLimit: number;

    /** Highest number handed out per feature root during this process. */
    private readonly allocated = new Map<string, number>();

    constructor(options: FeatureRegistryOptions) {
        this.resolver = options.resolver;
        this.vcs = options.vcs;
        this.templates = options.templates;
        this.seedKinds = options.seedKinds ?? ['spec'];
        this.slugWordLimit = options.slugWordLimit ?? 3;
    }

    // ─── Allocation ──────────────────────────────────────────────────────────

    highestNumber(context: RepositoryContext): number {
        const featureRoot = this.resolver.featureRoot(context);
        let highest = this.allocated.get(featureRoot) ?? 0;

        for (const name of this.directoryNames(context)) {
            const parsed = parseFeatureName(name);
            if (parsed) highest = Math.max(highest, Number(parsed.number));
        }

        if (context.hasVersionControl) {
            for (const branch of this.vcs.listBranches(context.root)) {
                const match = BRANCH_FEATURE.exec(branch);
                const parsed = match ? parseFeatureName(match[1]) : null;
                if (parsed) highest = Math.max(highest, Number(parsed.number));
            }
        }

        return highest;
    }

    allocate(context: RepositoryContext, description: string, options: AllocateOptions = {}): Feature {
        const next = this.highestNumber(context) + 1;
        const number = formatNumber(next);
        const slug = options.shortName
            ? slugify(options.shortName, 0)
            : slugify(description, this.slugWordLimit);

        const feature = this.toFeature(context, `${number}-${slug}`, number, slug);
        this.allocated.set(this.resolver.featureRoot(context), next);

        if (context.hasVersionControl) {
            this.vcs.createBranch(context.root, feature.branchName);
        } else {
            log('warn', `Version control not detected; skipped branch creation for ${feature.branchName}`);
        }

        if (!fs.existsSync(feature.directoryPath)) {
            fs.mkdirSync(feature.directoryPath, { recursive: true });
            const artifacts = this.resolver.resolve(context, feature);
            for (const kind of this.seedKinds) {
                this.templates.createFromTemplate(kind, artifacts.paths[kind]);
            }
        }

        log('success', `Allocated feature ${feature.branchName}`);
        return feature;
    }

    // ─── Resolution ──────────────────────────────────────────────────────────

    /**
     * Explicit override, then a numbered branch, then the single
     * highest-numbered feature directory.
     */
    resolveCurrent(context: RepositoryContext): Feature {
        if (context.activeFeatureId) {
            return this.lookup(context, context.activeFeatureId);
        }

        if (context.branch) {
            const match = BRANCH_FEATURE.exec(context.branch);
            if (match && parseFeatureName(match[1])) {
                return this.lookup(context, match[1]);
            }
        }

        const features = this.list(context);
        if (features.length === 0) {
            throw new NoFeatureContextError();
        }

        const highest = features[features.length - 1].number;
        const top = features.filter((feature) => Number(feature.number) === Number(highest));
        if (top.length > 1) {
            throw new AmbiguousFeatureError(top.map((feature) => feature.branchName));
        }
        return top[0];
    }

    /** Numbered feature directories in ascending number order. */
    list(context: RepositoryContext): Feature[] {
        const features: Feature[] = [];
        for (const name of this.directoryNames(context)) {
            const parsed = parseFeatureName(name);
            if (parsed) features.push(this.toFeature(context, name, parsed.number, parsed.slug));
        }
        return features.sort((a, b) => Number(a.number) - Number(b.number) || a.slug.localeCompare(b.slug));
    }

    /**
     * Looks a feature up by numeric prefix, so several branches
     * (`004-fix-bug`, `004-add-field`) can share one `specs/004-*` directory.
     */
    private lookup(context: RepositoryContext, id: string): Feature {
        const numberOnly = NUMBER_ONLY.exec(id);
        const named = parseFeatureName(id);
        const number = numberOnly ? numberOnly[1] : named?.number;

        if (!number) {
            throw new NoFeatureContextError(`"${id}" is not a feature id; expected NNN or NNN-name`);
        }

        const matches = this.list(context).filter((feature) => Number(feature.number) === Number(number));
        if (matches.length === 1) return matches[0];

        if (matches.length > 1) {
            const exact = matches.find((feature) => feature.branchName === id);
            if (exact) return exact;
            throw new AmbiguousFeatureError(matches.map((feature) => feature.branchName));
        }

        if (named) {
            // Not created yet; the paths are still well-defined
            return this.toFeature(context, id, named.number, named.slug);
        }
        throw new NoFeatureContextError(`No feature directory with number ${number}`);
    }

    private toFeature(context: RepositoryContext, branchName: string, number: string, slug: string): Feature {
        return {
            number,
            slug,
            branchName,
            directoryPath: this.resolver.featureDir(context, branchName),
        };
    }

    private directoryNames(context: RepositoryContext): string[] {
        const featureRoot = this.resolver.featureRoot(context);
        if (!fs.existsSync(featureRoot)) return [];
        return fs
            .readdirSync(featureRoot, { withFileTypes: true })
            .filter((entry) => entry.isDirectory())
            .map((entry) => entry.name);
    }
}
