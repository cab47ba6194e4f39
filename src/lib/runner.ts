import { spawn, execFileSync } from 'node:child_process';
import * as path from 'node:path';
import { z } from 'zod';
import type { ArtifactSet, Feature, PhaseExecutionResult, PhaseExecutor, WorkPhase } from './types.js';
import type { ExecutorConfig } from './config.js';
import { phaseCommand } from './config.js';
import { createAgentLogger, generateInvocationId, log } from './logger.js';
import * as control from './control.js';

// ─── Agent Response ──────────────────────────────────────────────────────────

const agentResponseSchema = z
    .object({
        result: z.string().default(''),
        is_error: z.boolean().default(false),
        session_id: z.string().optional(),
        total_cost_usd: z.number().optional(),
        cost_usd: z.number().optional(),
        num_turns: z.number().optional(),
        duration_ms: z.number().optional(),
    })
    .passthrough();

export type AgentResponse = z.infer<typeof agentResponseSchema>;

// ─── Build CLI Arguments ─────────────────────────────────────────────────────

export function buildPhasePrompt(phase: WorkPhase, config: ExecutorConfig, artifacts: ArtifactSet, feature: Feature): string {
    const lines = [
        `${phaseCommand(config, phase)} ${feature.branchName}`,
        '',
        `Feature directory: ${artifacts.featureDir}`,
        `Specification: ${artifacts.paths.spec}`,
        `Plan: ${artifacts.paths.plan}`,
        `Tasks: ${artifacts.paths.tasks}`,
        `Principles: ${artifacts.paths.principles}`,
    ];
    if (phase === 'implement') {
        lines.push('', 'Tick each task checkbox in the tasks file as soon as the task is done.');
    }
    return lines.join('\n');
}

export function buildAgentArgs(config: ExecutorConfig, prompt: string): string[] {
    const args: string[] = ['-p', '--output-format', 'json'];

    if (config.model) {
        args.push('--model', config.model);
    }

    // Max turns (limits autonomous tool-call actions per session)
    if (config.maxTurns) {
        args.push('--max-turns', String(config.maxTurns));
    }

    if (config.maxBudgetUsd) {
        args.push('--max-budget-usd', String(config.maxBudgetUsd));
    }

    // Allowed tools (auto-approve for unattended execution)
    if (config.allowedTools.length > 0) {
        args.push('--allowedTools', ...config.allowedTools);
    }

    args.push(prompt);
    return args;
}

// ─── Pre-flight Check ────────────────────────────────────────────────────────

const checkedCommands = new Set<string>();

export function checkAgentCli(command: string): string | null {
    if (checkedCommands.has(command)) return null;
    try {
        const version = execFileSync(command, ['--version'], {
            encoding: 'utf-8',
            timeout: 15_000,
        }).trim();
        log('info', `Agent CLI found: ${version}`);
        checkedCommands.add(command);
        return null;
    } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        return `Agent CLI "${command}" not found or not working: ${msg}`;
    }
}

// ─── Async Spawn Helper ──────────────────────────────────────────────────────

export interface SpawnResult {
    stdout: string;
    stderr: string;
    exitCode: number | null;
    signal: string | null;
    timedOut: boolean;
}

interface SpawnOptions {
    phase: WorkPhase;
    command: string;
    args: string[];
    cwd: string;
    timeoutMs: number;
    transcript: (text: string) => void;
}

function spawnAgent(options: SpawnOptions): Promise<SpawnResult> {
    const { phase, command, args, cwd, timeoutMs, transcript } = options;

    return new Promise((resolve) => {
        const child = spawn(command, args, {
            cwd,
            env: process.env,
            stdio: ['pipe', 'pipe', 'pipe'],
        });
        control.trackAgent(child, phase);

        // stdin must be a pipe (not /dev/null) or the CLI may hang
        child.stdin.end();

        const stdoutChunks: Buffer[] = [];
        let stderrText = '';
        let timedOut = false;
        const startTime = Date.now();

        const heartbeat = setInterval(() => {
            const elapsed = Math.round((Date.now() - startTime) / 60000);
            log('debug', `  [agent] still running... (${elapsed} min elapsed)`);
        }, 60_000);

        child.stderr.on('data', (chunk: Buffer) => {
            const text = chunk.toString();
            stderrText += text;
            transcript(text);
            for (const line of text.split('\n').filter((l) => l.trim())) {
                log('debug', `  [agent] ${line.trim()}`);
            }
        });

        child.stdout.on('data', (chunk: Buffer) => {
            stdoutChunks.push(chunk);
            transcript(chunk.toString());
        });

        const totalTimer = setTimeout(() => {
            timedOut = true;
            log('error', `Agent process exceeded total timeout of ${Math.round(timeoutMs / 60000)} minutes; killing`);
            child.kill('SIGTERM');
            setTimeout(() => {
                if (child.exitCode === null) child.kill('SIGKILL');
            }, 5000).unref();
        }, timeoutMs);

        const finish = (result: SpawnResult): void => {
            clearTimeout(totalTimer);
            clearInterval(heartbeat);
            control.releaseAgent();
            resolve(result);
        };

        child.on('close', (code, signal) => {
            finish({
                stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
                stderr: stderrText,
                exitCode: code,
                signal,
                timedOut,
            });
        });

        child.on('error', (err) => {
            log('error', `Failed to spawn ${command}: ${err.message}`);
            finish({ stdout: '', stderr: err.message, exitCode: -1, signal: null, timedOut: false });
        });
    });
}

// ─── Parse Agent Response ────────────────────────────────────────────────────

export class AgentRunError extends Error {
    constructor(message: string, readonly retryable: boolean = true) {
        super(message);
        this.name = 'AgentRunError';
    }
}

export function parseAgentResponse(phase: WorkPhase, result: SpawnResult): AgentResponse {
    if (result.timedOut) {
        throw new AgentRunError(`Phase ${phase} timed out (exitCode=${result.exitCode}, signal=${result.signal})`);
    }

    if (result.exitCode !== 0) {
        const hint = result.stderr.slice(-500) || result.stdout.slice(-500) || '(no output)';
        throw new AgentRunError(
            `Phase ${phase} exited with code ${result.exitCode}${result.signal ? ` (signal: ${result.signal})` : ''}.\n` +
                `Last output: ${hint}`
        );
    }

    if (!result.stdout.trim()) {
        throw new AgentRunError(`Phase ${phase} produced no stdout output. stderr: ${result.stderr.slice(-300)}`);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(result.stdout);
    } catch {
        throw new AgentRunError(
            `Phase ${phase}: failed to parse JSON response.\n` + `stdout preview: ${result.stdout.slice(0, 500)}`
        );
    }

    const parsed = agentResponseSchema.safeParse(raw);
    if (!parsed.success) {
        throw new AgentRunError(`Phase ${phase}: unexpected response shape: ${parsed.error.issues[0]?.message ?? ''}`);
    }

    const response = parsed.data;
    if (response.is_error) {
        throw new AgentRunError(`Phase ${phase} returned error: ${response.result}`, false);
    }
    return response;
}

// ─── Executor ────────────────────────────────────────────────────────────────

export interface AgentPhaseExecutorOptions {
    config: ExecutorConfig;
    /** Working directory of the agent; the repository root. */
    cwd: string;
    /** Transcript directory, absolute. */
    logsDir: string;
}

/**
 * Runs one phase by invoking the agent CLI with the phase's slash command.
 * Failures become `{ ok: false }`; only a hard stop skips the remaining retries.
 */
export class AgentPhaseExecutor implements PhaseExecutor {
    constructor(private readonly options: AgentPhaseExecutorOptions) {}

    async execute(phase: WorkPhase, artifacts: ArtifactSet, feature: Feature): Promise<PhaseExecutionResult> {
        const { config, cwd, logsDir } = this.options;

        const unavailable = checkAgentCli(config.command);
        if (unavailable) {
            return { ok: false, reason: unavailable };
        }

        const prompt = buildPhasePrompt(phase, config, artifacts, feature);
        const args = buildAgentArgs(config, prompt);
        const timeoutMs = config.timeoutMinutes * 60 * 1000;

        log('info', `Running phase ${phase} for ${feature.branchName} (model: ${config.model ?? 'default'})`);
        log('debug', `Command: ${config.command} ${args.slice(0, -1).join(' ')} '<prompt>'`);

        let lastError: AgentRunError | null = null;

        for (let attempt = 0; attempt <= config.retries; attempt++) {
            if (attempt > 0) {
                log('warn', `Retry ${attempt}/${config.retries} for phase ${phase}`);
            }

            const transcript = createAgentLogger(logsDir, phase, generateInvocationId());
            transcript.write(`$ ${config.command} ${args.join(' ')}\n\n`);
            try {
                const result = await spawnAgent({
                    phase,
                    command: config.command,
                    args,
                    cwd,
                    timeoutMs,
                    transcript: (text) => transcript.write(text),
                });
                const response = parseAgentResponse(phase, result);

                const costUsd = response.total_cost_usd ?? response.cost_usd;
                log('success', `Phase ${phase} finished${costUsd !== undefined ? ` (cost=$${costUsd.toFixed(4)})` : ''}`);
                return {
                    ok: true,
                    metadata: {
                        costUsd,
                        turns: response.num_turns,
                        durationMs: response.duration_ms,
                        sessionId: response.session_id,
                        transcript: path.relative(cwd, transcript.logFile),
                    },
                };
            } catch (err) {
                if (!(err instanceof AgentRunError)) throw err;
                lastError = err;
                log('error', `Phase ${phase} failed: ${err.message.slice(0, 500)}`);
                if (!err.retryable || control.isHardStopRequested()) break;
            } finally {
                transcript.close();
            }
        }

        return {
            ok: false,
            reason: control.isHardStopRequested()
                ? 'stopped by request'
                : lastError?.message ?? `Phase ${phase} failed`,
        };
    }
}
