import type { TaskItem, TaskProgress } from './types.js';

// ─── Tokens ──────────────────────────────────────────────────────────────────

export type TaskToken =
    | { type: 'checkbox'; completed: boolean }
    | { type: 'identifier'; value: string }
    | { type: 'parallel' }
    | { type: 'label'; value: string }
    | { type: 'text'; value: string };

const CHECKBOX = /^\s*-\s\[([ xX])\](?:\s+|$)/;
const BRACKETED = /^\[([^\]\s]+)\](?:\s+|$)/;
const BARE_IDENTIFIER = /^([A-Z]+-?\d+)(?:\s+|$)/;
const IDENTIFIER = /^[A-Z]+-?\d+$/;
const HEADING = /^#{1,6}\s+(.+?)\s*#*\s*$/;
const FENCE = /^\s*(```|~~~)/;

/**
 * Splits one line into tokens, or returns null when the line is not a task.
 * Only the first marker may be an identifier; later ID-shaped brackets are
 * labels (`- [ ] T012 [P] [US1] Build model`).
 */
export function tokenizeTaskLine(line: string): TaskToken[] | null {
    const checkbox = CHECKBOX.exec(line);
    if (!checkbox) return null;

    const tokens: TaskToken[] = [{ type: 'checkbox', completed: checkbox[1] !== ' ' }];
    let rest = line.slice(checkbox[0].length);
    let first = true;

    for (;;) {
        const bracketed = BRACKETED.exec(rest);
        if (bracketed) {
            const value = bracketed[1];
            if (value === 'P' || value === 'p') {
                tokens.push({ type: 'parallel' });
            } else if (first && IDENTIFIER.test(value)) {
                tokens.push({ type: 'identifier', value });
            } else {
                tokens.push({ type: 'label', value });
            }
            rest = rest.slice(bracketed[0].length);
            first = false;
            continue;
        }

        const bare = first ? BARE_IDENTIFIER.exec(rest) : null;
        if (bare) {
            tokens.push({ type: 'identifier', value: bare[1] });
            rest = rest.slice(bare[0].length);
            first = false;
            continue;
        }
        break;
    }

    tokens.push({ type: 'text', value: rest.trim() });
    return tokens;
}

// ─── Parser ──────────────────────────────────────────────────────────────────

export function parseTasks(text: string): TaskItem[] {
    const items: TaskItem[] = [];
    let section: string | null = null;
    let inFence = false;

    const lines = text.split(/\r?\n/);
    for (let index = 0; index < lines.length; index++) {
        const line = lines[index];

        if (FENCE.test(line)) {
            inFence = !inFence;
            continue;
        }
        if (inFence) continue;

        const heading = HEADING.exec(line);
        if (heading) {
            section = heading[1];
            continue;
        }

        const tokens = tokenizeTaskLine(line);
        if (!tokens) continue;

        const item: TaskItem = {
            id: `#${items.length + 1}`,
            text: '',
            completed: false,
            parallelEligible: false,
            labels: [],
            line: index + 1,
            section,
        };
        for (const token of tokens) {
            switch (token.type) {
                case 'checkbox':
                    item.completed = token.completed;
                    break;
                case 'identifier':
                    item.id = token.value;
                    break;
                case 'parallel':
                    item.parallelEligible = true;
                    break;
                case 'label':
                    item.labels.push(token.value);
                    break;
                case 'text':
                    item.text = token.value;
                    break;
            }
        }
        items.push(item);
    }

    return items;
}

// ─── Progress ────────────────────────────────────────────────────────────────

/**
 * Order is the author's order. When the next pending task is marked
 * parallel, the batch extends over the parallel pending tasks right after it.
 */
export function computeProgress(items: readonly TaskItem[]): TaskProgress {
    const total = items.length;
    const completed = items.filter((item) => item.completed).length;
    const percentage = total === 0 ? 0 : Math.floor((completed * 100) / total);

    const nextIndex = items.findIndex((item) => !item.completed);
    const nextPending = nextIndex === -1 ? null : items[nextIndex];

    const nextBatch: TaskItem[] = [];
    if (nextPending) {
        nextBatch.push(nextPending);
        if (nextPending.parallelEligible) {
            for (let i = nextIndex + 1; i < items.length; i++) {
                const item = items[i];
                if (item.completed) continue;
                if (!item.parallelEligible) break;
                nextBatch.push(item);
            }
        }
    }

    return { completed, total, percentage, nextPending, nextBatch };
}
