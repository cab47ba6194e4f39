import express from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import { emitter, log } from './lib/logger.js';
import * as control from './lib/control.js';
import type { WorkflowError, WorkflowErrorKind } from './lib/errors.js';
import type { Result } from './lib/errors.js';
import type { RunReport } from './lib/orchestrator.js';
import { errorBody } from './lib/output.js';
import type { ErrorBody } from './lib/output.js';
import type { LogEvent } from './lib/types.js';
import type { Workspace } from './lib/workspace.js';

// ─── Request Bodies ──────────────────────────────────────────────────────────

const workPhase = z.enum(['principles', 'specify', 'clarify', 'plan', 'tasks', 'analyze', 'implement']);
const mode = z.enum(['interactive', 'staged', 'unattended']);
const onDone = z.enum(['archive', 'delete']);

const featureBody = z.object({
    description: z.string().min(1),
    shortName: z.string().min(1).optional(),
});

const runBody = z.object({
    description: z.string().min(1).optional(),
    shortName: z.string().min(1).optional(),
    feature: z.string().min(1).optional(),
    mode: mode.optional(),
    skip: z.array(workPhase).default([]),
    proceed: z.boolean().default(false),
    onDone: onDone.optional(),
});

const resumeBody = z.object({
    proceed: z.boolean().default(false),
    mode: mode.optional(),
    fromPhase: workPhase.optional(),
    onDone: onDone.optional(),
});

const skipBody = z.object({ phase: workPhase });
const resetBody = z.object({ archive: z.boolean().default(false) });

// ─── Error Mapping ───────────────────────────────────────────────────────────

const HTTP_STATUS: Record<WorkflowErrorKind, number> = {
    NoFeatureContext: 404,
    AmbiguousFeature: 409,
    MissingArtifact: 422,
    StateCorrupted: 409,
    PhaseExecutionFailed: 422,
    InvalidModeTransition: 409,
};

function sendError(res: Response, error: WorkflowError): void {
    res.status(HTTP_STATUS[error.kind]).json(errorBody(error));
}

function parseBody<S extends z.ZodTypeAny>(schema: S, req: Request, res: Response): z.output<S> | null {
    const parsed = schema.safeParse(req.body ?? {});
    if (!parsed.success) {
        res.status(400).json({
            error: 'InvalidRequest',
            message: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(body)'}: ${issue.message}`).join('; '),
        });
        return null;
    }
    return parsed.data;
}

// ─── App ─────────────────────────────────────────────────────────────────────

export type RunSummary =
    | { ok: true; outcome: RunReport['outcome']; feature: string; nextPhase: RunReport['nextPhase']; phasesRun: RunReport['phasesRun'] }
    | { ok: false; error: ErrorBody | { error: 'Unexpected'; message: string } };

export interface MonitorApp {
    app: express.Express;
    /** Resolves once no run is active. */
    whenIdle(): Promise<void>;
}

/**
 * The monitor runs workflows in this process, one at a time, so pause and
 * stop requests reach the running orchestrator directly.
 */
export function createApp(workspace: Workspace): MonitorApp {
    const app = express();
    let activeRun: Promise<void> | null = null;
    let lastRun: RunSummary | null = null;

    app.use(express.json());

    const launch = (label: string, run: () => Promise<Result<RunReport>>): void => {
        control.reset();
        log('phase', label);

        activeRun = run()
            .then((result) => {
                if (result.ok) {
                    const report = result.value;
                    lastRun = {
                        ok: true,
                        outcome: report.outcome,
                        feature: report.feature.branchName,
                        nextPhase: report.nextPhase,
                        phasesRun: report.phasesRun,
                    };
                    log('success', `Run ${report.outcome} (${report.feature.branchName}, next: ${report.nextPhase})`);
                } else {
                    lastRun = { ok: false, error: errorBody(result.error) };
                    log('error', result.error.message);
                }
            })
            .catch((err: unknown) => {
                const message = err instanceof Error ? err.message : String(err);
                lastRun = { ok: false, error: { error: 'Unexpected', message } };
                log('error', `Run crashed: ${message}`);
            })
            .finally(() => {
                activeRun = null;
                control.releaseAgent();
            });
    };

    const rejectWhileRunning = (res: Response): boolean => {
        if (activeRun) {
            res.status(409).json({ error: 'RunInProgress', message: 'A workflow run is already active' });
            return true;
        }
        return false;
    };

    // ─── SSE Endpoint ────────────────────────────────────────────────────────

    app.get('/api/stream', (req, res) => {
        res.setHeader('Content-Type', 'text/event-stream');
        res.setHeader('Cache-Control', 'no-cache');
        res.setHeader('Connection', 'keep-alive');
        res.setHeader('X-Accel-Buffering', 'no'); // Disable nginx buffering

        const connectEvent: LogEvent = {
            type: 'system',
            level: 'info',
            message: 'Connected to workflow monitor',
            timestamp: new Date().toISOString(),
        };
        res.write(`data: ${JSON.stringify(connectEvent)}\n\n`);

        const onLog = (event: LogEvent): void => {
            res.write(`data: ${JSON.stringify(event)}\n\n`);
        };
        emitter.on('log', onLog);

        req.on('close', () => {
            emitter.off('log', onLog);
        });
    });

    // ─── Queries ─────────────────────────────────────────────────────────────

    app.get('/api/status', (_req, res) => {
        const result = workspace.orchestrator.status(workspace.refreshContext());
        res.json({
            running: activeRun !== null,
            control: control.snapshot(),
            lastRun,
            status: result.ok ? result.value : null,
            error: result.ok ? null : errorBody(result.error),
        });
    });

    app.get('/api/features', (_req, res) => {
        res.json({ features: workspace.registry.list(workspace.refreshContext()) });
    });

    app.post('/api/features', (req, res) => {
        const body = parseBody(featureBody, req, res);
        if (!body) return;

        const feature = workspace.registry.allocate(workspace.refreshContext(), body.description, {
            shortName: body.shortName,
        });
        res.status(201).json(feature);
    });

    // ─── Control Endpoints ───────────────────────────────────────────────────

    app.post('/api/run', (req, res) => {
        const body = parseBody(runBody, req, res);
        if (!body || rejectWhileRunning(res)) return;

        const context = workspace.refreshContext(body.feature);
        launch(`Starting workflow${body.description ? `: ${body.description.slice(0, 100)}` : ''}`, () =>
            workspace.orchestrator.start(context, body)
        );
        res.status(202).json({ status: 'started' });
    });

    app.post('/api/resume', (req, res) => {
        const body = parseBody(resumeBody, req, res);
        if (!body || rejectWhileRunning(res)) return;

        launch('Resuming workflow', () => workspace.orchestrator.resume(workspace.refreshContext(), body));
        res.status(202).json({ status: 'resumed' });
    });

    app.post('/api/skip', (req, res) => {
        const body = parseBody(skipBody, req, res);
        if (!body || rejectWhileRunning(res)) return;

        const result = workspace.orchestrator.skip(workspace.refreshContext(), body.phase);
        if (!result.ok) {
            sendError(res, result.error);
            return;
        }
        res.json(result.value);
    });

    // Soft pause (stop before the next phase)
    app.post('/api/pause', (_req, res) => {
        control.requestSoftPause();
        log('warn', 'Soft pause requested - will stop before the next phase');
        res.json({ status: 'pause_requested' });
    });

    // Hard stop (kill the running agent process)
    app.post('/api/stop', (_req, res) => {
        const signalled = control.requestHardStop();
        log('error', signalled ? 'Hard stop requested - killing the current agent process' : 'Hard stop requested');
        res.json({ status: 'stop_requested', signalled });
    });

    app.post('/api/reset', (req, res) => {
        const body = parseBody(resetBody, req, res);
        if (!body || rejectWhileRunning(res)) return;

        const result = workspace.orchestrator.reset(workspace.refreshContext(), { archive: body.archive });
        if (!result.ok) {
            sendError(res, result.error);
            return;
        }
        control.reset();
        log('success', result.value.removed ? 'Workflow state cleared' : 'No workflow state to clear');
        res.json(result.value);
    });

    return {
        app,
        whenIdle: async () => {
            while (activeRun) {
                await activeRun;
            }
        },
    };
}
