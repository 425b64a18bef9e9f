import pino from "pino";
import { RequestContext } from "../context/requestContext.js";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

/**
 * Fields of the current invocation scope. pino merges the call's own fields
 * into the returned object, so this is always a fresh copy.
 */
export function contextFields(): Record<string, unknown> {
  const ctx = RequestContext.current();
  return ctx ? { ...ctx } : {};
}

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: {
    system: "gmsa-provisioner"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  },
  // Correlates every line emitted inside an invocation scope.
  mixin: contextFields
});

