import type { WorkPhase, WorkflowMode } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// Mode Registry
// ═══════════════════════════════════════════════════════════════════════════════

export interface ModePolicy {
    name: WorkflowMode;
    description: string;
    /** Whether the run must stop for a continue signal before `phase` starts. */
    pausesBefore(phase: WorkPhase): boolean;
}

const MODE_REGISTRY: Map<WorkflowMode, ModePolicy> = new Map();

function registerMode(mode: ModePolicy): void {
    MODE_REGISTRY.set(mode.name, mode);
}

export function getMode(name: WorkflowMode): ModePolicy {
    const mode = MODE_REGISTRY.get(name);
    if (!mode) {
        const available = Array.from(MODE_REGISTRY.keys()).join(', ');
        throw new Error(`Unknown mode: "${name}". Available modes: ${available}`);
    }
    return mode;
}

export function listModes(): ModePolicy[] {
    return Array.from(MODE_REGISTRY.values());
}

// ═══════════════════════════════════════════════════════════════════════════════
// Built-in Modes
// ═══════════════════════════════════════════════════════════════════════════════

registerMode({
    name: 'interactive',
    description: 'Pause before every phase until told to continue',
    pausesBefore: () => true,
});

registerMode({
    name: 'staged',
    description: 'Run the design phases straight through, pause before implement',
    pausesBefore: (phase) => phase === 'implement',
});

registerMode({
    name: 'unattended',
    description: 'Run to the end without pausing',
    pausesBefore: () => false,
});
