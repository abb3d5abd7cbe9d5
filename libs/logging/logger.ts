import pino from "pino";
import { RequestContext, RequestScope } from "../context/requestContext.js";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

const LEVELS = new Set(Object.keys(pino.levels.values));
const configuredLevel = (process.env.LOG_LEVEL ?? "info").toLowerCase();

export const logger = pino({
  level: LEVELS.has(configuredLevel) ? configuredLevel : "info",
  base: {
    system: "analyst-orchestrator"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

export type Logger = typeof logger;

/**
 * Returns a child logger with request scope attached.
 */
export function getContextLogger(scope: RequestScope): Logger {
  return logger.child({
    requestId: scope.requestId,
    subject: scope.subject,
    priority: scope.priority
  });
}

/**
 * Logger for the active request scope, or the root logger outside one.
 */
export function currentLogger(): Logger {
  const scope = RequestContext.tryGet();
  return scope ? getContextLogger(scope) : logger;
}
