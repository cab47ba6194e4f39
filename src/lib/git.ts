import * as fs from 'node:fs';
import * as path from 'node:path';
import { execFileSync } from 'node:child_process';
import type { RepositoryContext } from './types.js';
import { log } from './logger.js';

// ─── Version Control Seam ────────────────────────────────────────────────────

export interface VersionControl {
    /** Top-level directory of the repository containing `cwd`, or null outside one. */
    repositoryRoot(cwd: string): string | null;
    currentBranch(root: string): string | null;
    /** Local and remote branch names, remote prefixes stripped. */
    listBranches(root: string): string[];
    createBranch(root: string, name: string): void;
}

export const NO_VERSION_CONTROL: VersionControl = {
    repositoryRoot: () => null,
    currentBranch: () => null,
    listBranches: () => [],
    createBranch: () => {
        throw new Error('No version control available');
    },
};

// ─── Git ─────────────────────────────────────────────────────────────────────

function git(cwd: string, args: string[]): string {
    return execFileSync('git', args, {
        cwd,
        encoding: 'utf-8',
        stdio: ['ignore', 'pipe', 'pipe'],
    }).trim();
}

export class GitVersionControl implements VersionControl {
    repositoryRoot(cwd: string): string | null {
        try {
            return git(cwd, ['rev-parse', '--show-toplevel']);
        } catch {
            return null;
        }
    }

    currentBranch(root: string): string | null {
        try {
            const branch = git(root, ['rev-parse', '--abbrev-ref', 'HEAD']);
            return branch === 'HEAD' ? null : branch;
        } catch {
            // Fresh repository without commits has no HEAD yet
            return null;
        }
    }

    listBranches(root: string): string[] {
        let output: string;
        try {
            output = git(root, ['branch', '-a', '--format=%(refname:short)']);
        } catch {
            return [];
        }
        return output
            .split('\n')
            .map((line) => line.trim())
            .filter((line) => line !== '')
            .map((name) => name.replace(/^[^/]+\/(?=\d{3,}-)/, ''));
    }

    createBranch(root: string, name: string): void {
        git(root, ['checkout', '-b', name]);
        log('info', `Switched to new branch ${name}`);
    }
}

// ─── Repository Context ──────────────────────────────────────────────────────

const PROJECT_MARKERS = ['.specflow', '.git'];

function findMarkedRoot(start: string): string | null {
    let dir = path.resolve(start);
    for (;;) {
        if (PROJECT_MARKERS.some((marker) => fs.existsSync(path.join(dir, marker)))) {
            return dir;
        }
        const parent = path.dirname(dir);
        if (parent === dir) return null;
        dir = parent;
    }
}

export interface DetectContextOptions {
    vcs: VersionControl;
    /** Explicit root; skips discovery. */
    root?: string;
    /** Explicit feature id, e.g. from --feature. Beats the environment. */
    featureId?: string;
    featureEnvVar: string;
    env?: NodeJS.ProcessEnv;
}

/**
 * Recomputed on every invocation; nothing here is cached across processes.
 */
export function detectContext(cwd: string, options: DetectContextOptions): RepositoryContext {
    const env = options.env ?? process.env;
    const vcsRoot = options.vcs.repositoryRoot(options.root ?? cwd);
    const root = options.root
        ? path.resolve(options.root)
        : vcsRoot ?? findMarkedRoot(cwd) ?? path.resolve(cwd);

    const hasVersionControl = vcsRoot !== null;
    const override = options.featureId ?? env[options.featureEnvVar];

    return {
        root,
        hasVersionControl,
        activeFeatureId: override && override.trim() !== '' ? override.trim() : null,
        branch: hasVersionControl ? options.vcs.currentBranch(root) : null,
    };
}
