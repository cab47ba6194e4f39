import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { NO_VERSION_CONTROL, detectContext } from '../git.js';
import { FileTemplateProvider } from '../templates.js';
import { openWorkspace } from '../workspace.js';
import { FakeVersionControl, makeTempRoot, writeFile } from './helpers.js';

let root: string;

beforeEach(() => {
    root = makeTempRoot();
});

afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// Repository context
// ---------------------------------------------------------------------------

describe('detectContext', () => {
    it('reads the branch from version control', () => {
        const vcs = new FakeVersionControl([], '004-fix-login');

        expect(detectContext(root, { vcs, featureEnvVar: 'SPECFLOW_FEATURE', env: {} })).toEqual({
            root,
            hasVersionControl: true,
            activeFeatureId: null,
            branch: '004-fix-login',
        });
    });

    it('prefers an explicit feature id over the environment', () => {
        const env = { SPECFLOW_FEATURE: '002' };

        expect(detectContext(root, { vcs: NO_VERSION_CONTROL, featureEnvVar: 'SPECFLOW_FEATURE', env }).activeFeatureId).toBe(
            '002'
        );
        expect(
            detectContext(root, { vcs: NO_VERSION_CONTROL, featureId: '007-foo', featureEnvVar: 'SPECFLOW_FEATURE', env })
                .activeFeatureId
        ).toBe('007-foo');
        expect(
            detectContext(root, { vcs: NO_VERSION_CONTROL, featureEnvVar: 'SPECFLOW_FEATURE', env: { SPECFLOW_FEATURE: '  ' } })
                .activeFeatureId
        ).toBeNull();
    });

    it('finds the root through a project marker without version control', () => {
        fs.mkdirSync(path.join(root, '.specflow'));
        const nested = path.join(root, 'src', 'deep');
        fs.mkdirSync(nested, { recursive: true });

        const context = detectContext(nested, { vcs: NO_VERSION_CONTROL, featureEnvVar: 'SPECFLOW_FEATURE', env: {} });

        expect(context.root).toBe(root);
        expect(context.hasVersionControl).toBe(false);
        expect(context.branch).toBeNull();
    });
});

// ---------------------------------------------------------------------------
// Templates
// ---------------------------------------------------------------------------

describe('FileTemplateProvider', () => {
    it('copies a template, falls back to an empty file and never overwrites', () => {
        const templates = path.join(root, 'templates');
        writeFile(path.join(templates, 'spec-template.md'), '# Feature Specification\n');
        const provider = new FileTemplateProvider(templates);

        const spec = path.join(root, 'specs', '001-a', 'spec.md');
        const plan = path.join(root, 'specs', '001-a', 'plan.md');
        provider.createFromTemplate('spec', spec);
        provider.createFromTemplate('plan', plan);
        fs.writeFileSync(spec, 'edited', 'utf-8');
        provider.createFromTemplate('spec', spec);

        expect(fs.readFileSync(spec, 'utf-8')).toBe('edited');
        expect(fs.readFileSync(plan, 'utf-8')).toBe('');
    });
});

// ---------------------------------------------------------------------------
// Workspace wiring
// ---------------------------------------------------------------------------

describe('openWorkspace', () => {
    it('applies the repository config to the collaborators', () => {
        writeFile(path.join(root, '.specflow', 'config.json'), JSON.stringify({ specsDir: 'docs/features', slugWordLimit: 2 }));

        const workspace = openWorkspace({ root, vcs: NO_VERSION_CONTROL, env: {} });
        const feature = workspace.registry.allocate(workspace.context, 'Add OAuth2 login flow');

        expect(workspace.context.root).toBe(root);
        expect(feature.branchName).toBe('001-add-oauth2');
        expect(feature.directoryPath).toBe(path.join(root, 'docs', 'features', '001-add-oauth2'));
        expect(fs.existsSync(path.join(feature.directoryPath, 'spec.md'))).toBe(true);
    });

    it('reads the override variable the config names', () => {
        writeFile(path.join(root, '.specflow', 'config.json'), JSON.stringify({ featureEnvVar: 'ACTIVE_FEATURE' }));

        const workspace = openWorkspace({ root, vcs: NO_VERSION_CONTROL, env: { ACTIVE_FEATURE: '003-x' } });

        expect(workspace.context.activeFeatureId).toBe('003-x');
        expect(workspace.refreshContext('005-y').activeFeatureId).toBe('005-y');
    });
});
