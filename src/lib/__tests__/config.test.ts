import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { ConfigError, defaultConfig, loadConfig, phaseCommand } from '../config.js';
import { makeTempRoot, writeFile } from './helpers.js';

describe('loadConfig', () => {
    let root: string;
    let configPath: string;

    beforeEach(() => {
        root = makeTempRoot();
        configPath = path.join(root, '.specflow', 'config.json');
    });

    afterEach(() => {
        fs.rmSync(root, { recursive: true, force: true });
    });

    it('returns the defaults without a config file', () => {
        const config = loadConfig(root);

        expect(config).toEqual(defaultConfig());
        expect(config.specsDir).toBe('specs');
        expect(config.defaultMode).toBe('interactive');
        expect(config.executor.command).toBe('claude');
        expect(config.executor.retries).toBe(1);
    });

    it('merges a partial file over the defaults', () => {
        writeFile(configPath, JSON.stringify({ defaultMode: 'staged', executor: { model: 'sonnet' } }));

        const config = loadConfig(root);

        expect(config.defaultMode).toBe('staged');
        expect(config.executor.model).toBe('sonnet');
        expect(config.executor.timeoutMinutes).toBe(30);
        expect(config.stateFile).toBe('.specflow-state.json');
    });

    it('names the offending field', () => {
        writeFile(configPath, JSON.stringify({ executor: { retries: -1 } }));

        let caught: unknown = null;
        try {
            loadConfig(root);
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(ConfigError);
        expect(caught instanceof ConfigError && caught.issues).toHaveLength(1);
        expect(caught instanceof ConfigError && caught.issues[0]).toMatch(/^executor\.retries: /);
    });

    it('rejects a file that is not JSON', () => {
        writeFile(configPath, '{ defaultMode: staged }');
        expect(() => loadConfig(root)).toThrow(ConfigError);
    });
});

describe('phaseCommand', () => {
    it('maps phases to slash commands unless overridden', () => {
        const executor = defaultConfig().executor;

        expect(phaseCommand(executor, 'principles')).toBe('/constitution');
        expect(phaseCommand(executor, 'plan')).toBe('/plan');
        expect(phaseCommand({ ...executor, commands: { plan: '/design' } }, 'plan')).toBe('/design');
    });
});
