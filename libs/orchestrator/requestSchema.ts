import { z } from 'zod';
import crypto from 'crypto';
import { validate } from '../validation/zod-middleware.js';

/**
 * Analysis request schemas. The task body is opaque to the orchestrator
 * beyond what is needed to route it and fingerprint it.
 */

export const SandboxTaskSchema = z.object({
    type: z.literal('sandbox'),
    code: z.string().min(1).max(200_000),
    templateId: z.string().min(1).max(128).optional(),
}).strict();

export const GraphTaskSchema = z.object({
    type: z.literal('graph'),
    query: z.string().min(1).max(50_000),
    parameters: z.record(z.unknown()).optional(),
    mode: z.enum(['read', 'write']).optional(),
}).strict();

export const AnalysisTaskSchema = z.discriminatedUnion('type', [SandboxTaskSchema, GraphTaskSchema]);

export const PRIORITY_CLASSES = ['interactive', 'batch'] as const;
export const ARTIFACT_NAMESPACES = ['results', 'vectors'] as const;

export const AnalysisRequestSchema = z.object({
    requestId: z.string().regex(/^[A-Za-z0-9._:-]{1,128}$/, 'must be 1-128 characters of [A-Za-z0-9._:-]').optional(),
    priority: z.enum(PRIORITY_CLASSES).default('interactive'),
    task: AnalysisTaskSchema,
    parameters: z.record(z.unknown()).default({}),
    artifactNamespace: z.enum(ARTIFACT_NAMESPACES).default('results'),
    timeoutMs: z.number().int().positive().optional(),
}).strict();

export type AnalysisTask = z.infer<typeof AnalysisTaskSchema>;
export type PriorityClass = typeof PRIORITY_CLASSES[number];
export type ArtifactNamespace = typeof ARTIFACT_NAMESPACES[number];
export type AnalysisRequestInput = z.input<typeof AnalysisRequestSchema>;

export interface AnalysisRequest {
    readonly requestId: string;
    readonly priority: PriorityClass;
    readonly task: AnalysisTask;
    readonly parameters: Readonly<Record<string, unknown>>;
    readonly artifactNamespace: ArtifactNamespace;
    readonly timeoutMs?: number;
    readonly submittedAt: string;
}

/**
 * Validate a raw request body and freeze it. A missing requestId is
 * generated.
 */
export function parseAnalysisRequest(raw: unknown, now: Date = new Date()): AnalysisRequest {
    const input = validate(AnalysisRequestSchema, raw, 'AnalysisRequest');
    return Object.freeze({
        requestId: input.requestId ?? crypto.randomUUID(),
        priority: input.priority,
        task: input.task,
        parameters: input.parameters,
        artifactNamespace: input.artifactNamespace,
        ...(input.timeoutMs !== undefined ? { timeoutMs: input.timeoutMs } : {}),
        submittedAt: now.toISOString(),
    });
}
