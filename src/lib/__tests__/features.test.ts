import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { FeatureRegistry, slugify } from '../features.js';
import { PathResolver } from '../paths.js';
import { NO_VERSION_CONTROL } from '../git.js';
import { AmbiguousFeatureError, NoFeatureContextError } from '../errors.js';
import type { VersionControl } from '../git.js';
import { FakeVersionControl, RecordingTemplates, makeContext, makeTempRoot } from './helpers.js';

function makeRegistry(vcs: VersionControl = NO_VERSION_CONTROL) {
    const templates = new RecordingTemplates();
    const resolver = new PathResolver({ specsDir: 'specs', principlesFile: 'memory/constitution.md' });
    return { templates, registry: new FeatureRegistry({ resolver, vcs, templates }) };
}

// ---------------------------------------------------------------------------
// slugify
// ---------------------------------------------------------------------------

describe('slugify', () => {
    it('keeps the first three words in kebab case', () => {
        expect(slugify('Add OAuth2 login')).toBe('add-oauth2-login');
        expect(slugify('Fix   the  LOGIN!! page now')).toBe('fix-the-login');
    });

    it('falls back to a fixed slug when nothing survives', () => {
        expect(slugify('')).toBe('feature');
        expect(slugify('!!! ???')).toBe('feature');
    });

    it('does not cap words when the limit is 0', () => {
        expect(slugify('one two three four five', 0)).toBe('one-two-three-four-five');
    });

    it('changes nothing when applied twice', () => {
        for (const input of ['Add OAuth2 login', '  --Weird__Input-- here ', 'feature', 'ÄÖ ümlaut text']) {
            const once = slugify(input);
            expect(slugify(once)).toBe(once);
        }
    });
});

// ---------------------------------------------------------------------------
// Allocation
// ---------------------------------------------------------------------------

describe('FeatureRegistry.allocate', () => {
    let root: string;

    beforeEach(() => {
        root = makeTempRoot();
    });

    afterEach(() => {
        fs.rmSync(root, { recursive: true, force: true });
    });

    it('allocates 001 in an empty repository and seeds the spec from a template', () => {
        const { registry, templates } = makeRegistry();
        const feature = registry.allocate(makeContext(root), 'Add OAuth2 login');

        expect(feature).toEqual({
            number: '001',
            slug: 'add-oauth2-login',
            branchName: '001-add-oauth2-login',
            directoryPath: path.join(root, 'specs', '001-add-oauth2-login'),
        });
        expect(fs.statSync(feature.directoryPath).isDirectory()).toBe(true);
        expect(templates.calls).toEqual([['spec', path.join(feature.directoryPath, 'spec.md')]]);
    });

    it('never reuses a number within a process, even after directories are removed', () => {
        const { registry } = makeRegistry();
        const context = makeContext(root);

        const first = registry.allocate(context, 'first feature');
        const second = registry.allocate(context, 'second feature');
        fs.rmSync(second.directoryPath, { recursive: true });
        const third = registry.allocate(context, 'third feature');
        fs.rmSync(path.join(root, 'specs'), { recursive: true });
        const fourth = registry.allocate(context, 'fourth feature');

        expect([first, second, third, fourth].map((feature) => feature.number)).toEqual(['001', '002', '003', '004']);
    });

    it('continues after the highest existing directory', () => {
        fs.mkdirSync(path.join(root, 'specs', '005-old-thing'), { recursive: true });
        fs.mkdirSync(path.join(root, 'specs', '002-older-thing'), { recursive: true });
        fs.mkdirSync(path.join(root, 'specs', 'notes'), { recursive: true });
        const { registry } = makeRegistry();

        expect(registry.allocate(makeContext(root), 'next one').number).toBe('006');
    });

    it('keeps counting past 999 across fresh registries', () => {
        fs.mkdirSync(path.join(root, 'specs', '999-last'), { recursive: true });
        const context = makeContext(root);

        const first = makeRegistry().registry.allocate(context, 'one thing');
        const second = makeRegistry().registry.allocate(context, 'other thing');

        expect(first.branchName).toBe('1000-one-thing');
        expect(second.branchName).toBe('1001-other-thing');

        const { registry } = makeRegistry();
        expect(registry.list(context).map((feature) => feature.branchName)).toEqual([
            '999-last',
            '1000-one-thing',
            '1001-other-thing',
        ]);
        expect(registry.resolveCurrent(context).branchName).toBe('1001-other-thing');
    });

    it('counts branches numbered past 999', () => {
        const vcs = new FakeVersionControl(['main', 'jdoe/1204-big-change']);
        const { registry } = makeRegistry(vcs);

        expect(registry.allocate(makeContext(root, { hasVersionControl: true }), 'Add search').number).toBe('1205');
    });

    it('counts numbered branches, including prefixed ones, and creates the new branch', () => {
        const vcs = new FakeVersionControl(['main', 'jdoe/009-remote-work', '003-local']);
        const { registry } = makeRegistry(vcs);

        const feature = registry.allocate(makeContext(root, { hasVersionControl: true }), 'Add search');

        expect(feature.branchName).toBe('010-add-search');
        expect(vcs.created).toEqual(['010-add-search']);
    });

    it('prefers an explicit short name without the word cap', () => {
        const { registry } = makeRegistry();
        const feature = registry.allocate(makeContext(root), 'ignored description', {
            shortName: 'User Auth Flow Rework',
        });

        expect(feature.branchName).toBe('001-user-auth-flow-rework');
    });
});

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

describe('FeatureRegistry.resolveCurrent', () => {
    let root: string;

    const makeDirs = (...names: string[]): void => {
        for (const name of names) fs.mkdirSync(path.join(root, 'specs', name), { recursive: true });
    };

    beforeEach(() => {
        root = makeTempRoot();
    });

    afterEach(() => {
        fs.rmSync(root, { recursive: true, force: true });
    });

    it('lets an explicit override beat the branch', () => {
        makeDirs('003-bar', '007-foo');
        const { registry } = makeRegistry();
        const context = makeContext(root, { activeFeatureId: '007-foo', branch: '003-bar', hasVersionControl: true });

        expect(registry.resolveCurrent(context).branchName).toBe('007-foo');
    });

    it('resolves a prefixed numbered branch', () => {
        makeDirs('001-first', '004-fix-login');
        const { registry } = makeRegistry();
        const context = makeContext(root, { branch: 'feature/004-fix-login', hasVersionControl: true });

        expect(registry.resolveCurrent(context).branchName).toBe('004-fix-login');
    });

    it('maps branches sharing a number onto the one directory', () => {
        makeDirs('004-add-field');
        const { registry } = makeRegistry();
        const context = makeContext(root, { branch: '004-fix-bug', hasVersionControl: true });

        expect(registry.resolveCurrent(context).branchName).toBe('004-add-field');
    });

    it('falls back to the highest-numbered directory on an unnumbered branch', () => {
        makeDirs('001-a', '002-b');
        const { registry } = makeRegistry();

        expect(registry.resolveCurrent(makeContext(root, { branch: 'main' })).branchName).toBe('002-b');
    });

    it('reports ambiguity instead of guessing', () => {
        makeDirs('002-b', '002-a');
        const { registry } = makeRegistry();

        let caught: unknown = null;
        try {
            registry.resolveCurrent(makeContext(root));
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(AmbiguousFeatureError);
        expect(caught instanceof AmbiguousFeatureError && caught.candidates).toEqual(['002-a', '002-b']);
    });

    it('reports ambiguity for a bare number matching several directories', () => {
        makeDirs('002-a', '002-b');
        const { registry } = makeRegistry();

        expect(() => registry.resolveCurrent(makeContext(root, { activeFeatureId: '002' }))).toThrow(
            AmbiguousFeatureError
        );
        expect(registry.resolveCurrent(makeContext(root, { activeFeatureId: '002-b' })).branchName).toBe('002-b');
    });

    it('fails without any feature context', () => {
        const { registry } = makeRegistry();

        expect(() => registry.resolveCurrent(makeContext(root))).toThrow(NoFeatureContextError);
        expect(() => registry.resolveCurrent(makeContext(root, { activeFeatureId: 'abc' }))).toThrow(
            NoFeatureContextError
        );
    });

    it('accepts an override for a feature whose directory does not exist yet', () => {
        const { registry } = makeRegistry();
        const feature = registry.resolveCurrent(makeContext(root, { activeFeatureId: '012-planned' }));

        expect(feature).toEqual({
            number: '012',
            slug: 'planned',
            branchName: '012-planned',
            directoryPath: path.join(root, 'specs', '012-planned'),
        });
    });
});
