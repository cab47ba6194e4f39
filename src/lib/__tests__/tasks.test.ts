import { describe, it, expect } from 'vitest';
import { computeProgress, parseTasks, tokenizeTaskLine } from '../tasks.js';

// ---------------------------------------------------------------------------
// Tokenizer
// ---------------------------------------------------------------------------

describe('tokenizeTaskLine', () => {
    it('splits identifier, parallel marker and labels', () => {
        expect(tokenizeTaskLine('- [ ] T012 [P] [US1] Build model')).toEqual([
            { type: 'checkbox', completed: false },
            { type: 'identifier', value: 'T012' },
            { type: 'parallel' },
            { type: 'label', value: 'US1' },
            { type: 'text', value: 'Build model' },
        ]);
    });

    it('accepts a bracketed identifier and an upper-case tick', () => {
        expect(tokenizeTaskLine('- [X] [T001] Done thing')).toEqual([
            { type: 'checkbox', completed: true },
            { type: 'identifier', value: 'T001' },
            { type: 'text', value: 'Done thing' },
        ]);
    });

    it('treats an ID-shaped bracket after the first marker as a label', () => {
        expect(tokenizeTaskLine('  - [x] T004 [T009] Cross-reference')).toEqual([
            { type: 'checkbox', completed: true },
            { type: 'identifier', value: 'T004' },
            { type: 'label', value: 'T009' },
            { type: 'text', value: 'Cross-reference' },
        ]);
    });

    it('returns null for lines that are not tasks', () => {
        expect(tokenizeTaskLine('Some prose')).toBeNull();
        expect(tokenizeTaskLine('-[ ] squashed')).toBeNull();
        expect(tokenizeTaskLine('* [ ] other bullet')).toBeNull();
    });
});

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

describe('parseTasks', () => {
    it('skips fenced blocks and records sections and line numbers', () => {
        const text = [
            '# Phase 1',
            '- [ ] T001 Setup',
            '```md',
            '- [ ] T999 Example',
            '```',
            '## Phase 2',
            '- [x] T002 [P] [US1] Model',
            '- [ ] Write docs',
        ].join('\n');

        expect(parseTasks(text)).toEqual([
            {
                id: 'T001',
                text: 'Setup',
                completed: false,
                parallelEligible: false,
                labels: [],
                line: 2,
                section: 'Phase 1',
            },
            {
                id: 'T002',
                text: 'Model',
                completed: true,
                parallelEligible: true,
                labels: ['US1'],
                line: 7,
                section: 'Phase 2',
            },
            {
                id: '#3',
                text: 'Write docs',
                completed: false,
                parallelEligible: false,
                labels: [],
                line: 8,
                section: 'Phase 2',
            },
        ]);
    });

    it('handles CRLF line endings', () => {
        const items = parseTasks('- [x] T001 a\r\n- [ ] T002 b\r\n');
        expect(items.map((item) => [item.id, item.text, item.completed])).toEqual([
            ['T001', 'a', true],
            ['T002', 'b', false],
        ]);
    });
});

// ---------------------------------------------------------------------------
// Progress
// ---------------------------------------------------------------------------

describe('computeProgress', () => {
    it('reports 30% with the fourth task next when three of ten are done', () => {
        const lines = Array.from({ length: 10 }, (_, i) => {
            const id = `T${String(i + 1).padStart(3, '0')}`;
            return `- [${i < 3 ? 'x' : ' '}] ${id} Task ${i + 1}`;
        });

        const progress = computeProgress(parseTasks(lines.join('\n')));

        expect(progress.completed).toBe(3);
        expect(progress.total).toBe(10);
        expect(progress.percentage).toBe(30);
        expect(progress.nextPending?.id).toBe('T004');
        expect(progress.nextPending?.line).toBe(4);
        expect(progress.nextBatch.map((item) => item.id)).toEqual(['T004']);
    });

    it('rounds the percentage down', () => {
        const progress = computeProgress(parseTasks('- [x] T001 a\n- [x] T002 b\n- [ ] T003 c\n'));
        expect(progress.percentage).toBe(66);
    });

    it('extends the batch over the parallel pending tasks after the next one', () => {
        const text = [
            '- [x] T001 Scaffold',
            '- [ ] T002 [P] Model A',
            '- [x] T003 [P] Model B',
            '- [ ] T004 [P] Model C',
            '- [ ] T005 Wire up',
            '- [ ] T006 [P] Docs',
        ].join('\n');

        const progress = computeProgress(parseTasks(text));

        expect(progress.nextPending?.id).toBe('T002');
        expect(progress.nextBatch.map((item) => item.id)).toEqual(['T002', 'T004']);
    });

    it('is empty for an empty list', () => {
        expect(computeProgress([])).toEqual({
            completed: 0,
            total: 0,
            percentage: 0,
            nextPending: null,
            nextBatch: [],
        });
    });
});
