import * as path from 'node:path';
import type { ArtifactKind, Feature, TaskItem, TaskProgress, ValidatedArtifactSet, WorkPhase } from './types.js';
import { ARTIFACT_KINDS, WORK_PHASES } from './types.js';
import type { WorkflowError } from './errors.js';
import type { RunReport, StatusReport } from './orchestrator.js';
import { colors, log } from './logger.js';

// ─── Output Mode ─────────────────────────────────────────────────────────────

export type OutputMode = 'json' | 'narrative';

/** `--json` prints one document on stdout; narrative mode prints lines. */
export function emit(mode: OutputMode, document: unknown, lines: () => string[]): void {
    if (mode === 'json') {
        console.log(JSON.stringify(document, null, 2));
        return;
    }
    for (const line of lines()) {
        console.log(line);
    }
}

export interface ErrorBody {
    error: WorkflowError['kind'];
    message: string;
    details: Record<string, unknown>;
}

export function errorBody(error: WorkflowError): ErrorBody {
    return { error: error.kind, message: error.message, details: error.details() };
}

export function emitError(mode: OutputMode, error: WorkflowError): number {
    if (mode === 'json') {
        console.log(JSON.stringify(errorBody(error), null, 2));
    } else {
        log('error', error.message);
    }
    return error.exitCode;
}

// ─── Documents ───────────────────────────────────────────────────────────────

export interface NewFeatureDocument {
    BRANCH_NAME: string;
    SPEC_FILE: string;
    FEATURE_NUM: string;
    HAS_GIT: boolean;
}

/** What `new --json` prints; agent prompts read these keys. */
export function newFeatureDocument(feature: Feature, specFile: string, hasGit: boolean): NewFeatureDocument {
    return { BRANCH_NAME: feature.branchName, SPEC_FILE: specFile, FEATURE_NUM: feature.number, HAS_GIT: hasGit };
}

// ─── Narratives ──────────────────────────────────────────────────────────────

const KIND_LABELS: Record<ArtifactKind, string> = {
    principles: 'principles',
    spec: 'spec.md',
    plan: 'plan.md',
    research: 'research.md',
    dataModel: 'data-model.md',
    contracts: 'contracts/',
    quickstart: 'quickstart.md',
    tasks: 'tasks.md',
};

export function kindLabel(kind: ArtifactKind): string {
    return KIND_LABELS[kind];
}

export function describeFeature(feature: Feature): string[] {
    return [`BRANCH_NAME: ${feature.branchName}`, `FEATURE_NUM: ${feature.number}`, `FEATURE_DIR: ${feature.directoryPath}`];
}

export function describeArtifacts(artifacts: ValidatedArtifactSet, root: string): string[] {
    return ARTIFACT_KINDS.map((kind) => {
        const mark = artifacts.exists[kind] ? `${colors.green}✓${colors.reset}` : `${colors.dim}✗${colors.reset}`;
        return `  ${mark} ${kindLabel(kind).padEnd(14)} ${path.relative(root, artifacts.paths[kind])}`;
    });
}

export function describeProgress(progress: TaskProgress): string[] {
    const lines = [`Tasks: ${progress.completed}/${progress.total} (${progress.percentage}%)`];
    if (progress.nextPending) {
        lines.push(`Next: ${progress.nextPending.id} ${progress.nextPending.text}`);
    }
    if (progress.nextBatch.length > 1) {
        lines.push(`Parallel batch: ${progress.nextBatch.map((item) => item.id).join(', ')}`);
    }
    return lines;
}

export function describeTask(item: TaskItem): string {
    const box = item.completed ? '[x]' : '[ ]';
    const markers = [item.parallelEligible ? '[P]' : '', ...item.labels.map((label) => `[${label}]`)]
        .filter((marker) => marker !== '')
        .join(' ');
    return `${box} ${item.id}${markers ? ` ${markers}` : ''} ${item.text}`;
}

function phaseMark(status: StatusReport['state'], phase: WorkPhase): string {
    if (!status) return ' ';
    if (status.completedPhases.includes(phase)) return '✓';
    if (status.skippedPhases.includes(phase)) return '-';
    if (status.currentPhase === phase) return '>';
    return ' ';
}

export function describeStatus(report: StatusReport, root: string): string[] {
    const lines = [`Feature: ${report.feature.branchName}`];
    if (report.state) {
        lines.push(`Mode: ${report.state.mode}`, 'Phases:');
        for (const phase of WORK_PHASES) {
            const checkpoint = report.state.checkpoints[phase];
            const note = checkpoint && checkpoint.status !== 'complete' ? ` (${checkpoint.status})` : '';
            lines.push(`  [${phaseMark(report.state, phase)}] ${phase}${note}`);
        }
    } else {
        lines.push('No workflow in progress');
    }
    lines.push('Artifacts:', ...describeArtifacts(report.artifacts, root));
    if (report.progress) lines.push(...describeProgress(report.progress));
    if (report.clarificationMarkers > 0) {
        lines.push(`Open clarification markers: ${report.clarificationMarkers}`);
    }
    lines.push(`Next step: ${report.nextStep}`);
    return lines;
}

export function describeRun(report: RunReport): string[] {
    const lines: string[] = [];
    if (report.phasesRun.length > 0) {
        lines.push(`Completed: ${report.phasesRun.join(', ')}`);
    }
    switch (report.outcome) {
        case 'done':
            lines.push(`${report.feature.branchName}: all phases complete`);
            if (report.archivedTo) lines.push(`State archived to ${report.archivedTo}`);
            break;
        case 'paused':
            lines.push(`Paused before ${report.nextPhase}; resume with --proceed to continue`);
            break;
        case 'incomplete':
            lines.push(`Implement stopped with open tasks`);
            if (report.progress) lines.push(...describeProgress(report.progress));
            break;
    }
    return lines;
}
