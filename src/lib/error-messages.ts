// src/lib/error-messages.ts
export const ERR_MSG = {
  BAD_INPUT_SCHEMA: "Request validation failed",
  UNKNOWN_TASK_TYPE: "Unknown task type: {type}",
  TENANT_REQUIRED: "Tenant identifier is required",
  RATE_LIMIT_RPM: "Too many requests, please try again shortly",
  TIMEOUT_UPSTREAM: "The service took too long to respond",
  TASK_TIMEOUT: "Task exceeded its time limit",
  RETRYABLE_UPSTREAM: "Temporary problem, please try again shortly",
  QUEUE_UNAVAILABLE: "Task queue is unavailable, please retry",
  RETRIES_EXHAUSTED: "Task failed after {attempts} attempts",
  TASK_CANCELLED: "Task was cancelled",
  TASK_NOT_FOUND: "Task not found",
  TENANT_MISMATCH: "Task belongs to another tenant",
  INVALID_STATE: "Task is not in a state that allows this operation",
  UNAUTHORIZED: "Missing or invalid credentials",
  DOWNSTREAM_FAILED: "A dependent service returned an error",
  INTERNAL_UNEXPECTED: "Something went wrong",
  BREAKER_OPEN: "Service temporarily unavailable, please try again shortly",
} as const;

export type ErrKey = keyof typeof ERR_MSG;

export function msg(key: ErrKey): string {
  return ERR_MSG[key];
}

// Tiny templating for counts and names
export function fmt(key: ErrKey, vars: Record<string, string | number> = {}): string {
  let s: string = ERR_MSG[key];
  for (const [k, v] of Object.entries(vars)) s = s.replace(new RegExp(`{${k}}`, "g"), String(v));
  return s;
}
