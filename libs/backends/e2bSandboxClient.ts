import { Sandbox } from '@e2b/code-interpreter';
import { OrchestrationError } from '../errors/sanitizer.js';
import { logger } from '../logging/logger.js';

/**
 * Outcome of one code run. `error` is set when the code itself raised.
 */
export interface SandboxRun {
    readonly text?: string;
    readonly stdout: readonly string[];
    readonly stderr: readonly string[];
    readonly results: readonly (string | null)[];
    readonly error?: {
        readonly name: string;
        readonly value: string;
        readonly traceback: string;
    };
}

export interface SandboxRunOptions {
    readonly templateId: string;
    readonly timeoutMs: number;
    readonly signal: AbortSignal;
}

export interface SandboxClient {
    run(code: string, options: SandboxRunOptions): Promise<SandboxRun>;
    /** True when the provider is configured */
    ping(): Promise<boolean>;
    close(): Promise<void>;
}

// Sandbox lifetime beyond the code deadline, so the run reports its own timeout
const SANDBOX_GRACE_MS = 5_000;

/**
 * E2B code interpreter client. One sandbox per run, killed when the run
 * settles or its signal aborts.
 */
export class E2BSandboxClient implements SandboxClient {
    private readonly live = new Set<Sandbox>();

    constructor(private readonly config: { apiKey?: string }) { }

    async run(code: string, options: SandboxRunOptions): Promise<SandboxRun> {
        if (!this.config.apiKey) {
            throw new OrchestrationError('BackendUnavailable', { reason: 'E2B_API_KEY not configured' }, {
                contextLabel: 'E2BSandboxClient:Run'
            });
        }

        const sandbox = await Sandbox.create(options.templateId, {
            apiKey: this.config.apiKey,
            timeoutMs: options.timeoutMs + SANDBOX_GRACE_MS
        });
        this.live.add(sandbox);

        const onAbort = () => this.kill(sandbox, 'abort');
        options.signal.addEventListener('abort', onAbort, { once: true });

        try {
            if (options.signal.aborted) {
                throw new OrchestrationError('Cancelled', { sandboxId: sandbox.sandboxId }, {
                    contextLabel: 'E2BSandboxClient:Run'
                });
            }

            const execution = await sandbox.runCode(code, { timeoutMs: options.timeoutMs });
            return {
                ...(execution.text !== undefined ? { text: execution.text } : {}),
                stdout: execution.logs.stdout,
                stderr: execution.logs.stderr,
                results: execution.results.map(result => result.text ?? null),
                ...(execution.error
                    ? {
                        error: {
                            name: execution.error.name,
                            value: execution.error.value,
                            traceback: execution.error.traceback
                        }
                    }
                    : {})
            };
        } finally {
            options.signal.removeEventListener('abort', onAbort);
            this.kill(sandbox, 'settled');
        }
    }

    async ping(): Promise<boolean> {
        return Boolean(this.config.apiKey);
    }

    async close(): Promise<void> {
        const pending = [...this.live].map(sandbox => sandbox.kill());
        const results = await Promise.allSettled(pending);
        const failed = results.filter(r => r.status === 'rejected').length;
        if (failed > 0) {
            logger.warn({ failed }, 'Some sandboxes could not be killed on close');
        }
        this.live.clear();
    }

    private kill(sandbox: Sandbox, reason: 'abort' | 'settled'): void {
        if (!this.live.delete(sandbox)) return;
        sandbox.kill().then(
            () => logger.debug({ sandboxId: sandbox.sandboxId, reason }, 'Sandbox killed'),
            (error: unknown) => logger.warn({ sandboxId: sandbox.sandboxId, reason, error }, 'Sandbox kill failed')
        );
    }
}
