import crypto from "crypto";
import { stableStringify } from "./stableStringify.js";
import type { AnalysisTask } from "../orchestrator/requestSchema.js";

/**
 * Normalized form of a task: equivalent submissions produce the same
 * canonical JSON, and so the same fingerprint.
 */
export function normalizeTask(task: AnalysisTask): AnalysisTask {
    switch (task.type) {
        case "sandbox":
            return {
                type: "sandbox",
                code: task.code.replace(/\r\n?/g, "\n").trim(),
                ...(task.templateId ? { templateId: task.templateId } : {})
            };
        case "graph":
            return {
                type: "graph",
                query: task.query.replace(/\s+/g, " ").trim(),
                parameters: task.parameters ?? {},
                mode: task.mode ?? "read"
            };
    }
}

/**
 * Deterministic content key: SHA-256 over the canonical JSON of the
 * normalized task and the request parameters.
 */
export function computeFingerprint(task: AnalysisTask, parameters: Record<string, unknown> = {}): string {
    const canonical = stableStringify({ task: normalizeTask(task), parameters });
    return crypto.createHash("sha256").update(canonical).digest("hex");
}
