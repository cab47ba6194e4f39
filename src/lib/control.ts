import type { ChildProcess } from 'node:child_process';
import type { WorkPhase } from './types.js';

// ─── Run Control ─────────────────────────────────────────────────────────────

let pauseRequested = false;
let hardStopRequested = false;
let agent: { process: ChildProcess; phase: WorkPhase } | null = null;

export interface ControlSnapshot {
    pauseRequested: boolean;
    hardStopRequested: boolean;
    /** Phase whose agent process is running right now. */
    activePhase: WorkPhase | null;
    agentPid: number | null;
}

/**
 * Soft pause: the phase loop stops before its next phase.
 */
export function requestSoftPause(): void {
    pauseRequested = true;
}

/**
 * Hard stop: also terminates the running agent, whose phase is then
 * checkpointed as failed. Returns whether a process was signalled.
 */
export function requestHardStop(): boolean {
    hardStopRequested = true;
    pauseRequested = true;
    if (agent && !agent.process.killed) {
        agent.process.kill('SIGTERM');
        return true;
    }
    return false;
}

export function isPauseRequested(): boolean {
    return pauseRequested;
}

export function isHardStopRequested(): boolean {
    return hardStopRequested;
}

/** Registers the agent process running `phase` so a hard stop can reach it. */
export function trackAgent(child: ChildProcess, phase: WorkPhase): void {
    agent = { process: child, phase };
}

export function releaseAgent(): void {
    agent = null;
}

export function snapshot(): ControlSnapshot {
    return {
        pauseRequested,
        hardStopRequested,
        activePhase: agent?.phase ?? null,
        agentPid: agent?.process.pid ?? null,
    };
}

/** Clears every flag; called before each run. */
export function reset(): void {
    pauseRequested = false;
    hardStopRequested = false;
    agent = null;
}
