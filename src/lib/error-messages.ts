// src/lib/error-messages.ts
export const ERR_MSG = {
  BAD_INPUT_SCHEMA: "Request validation failed",
  BAD_PATH_PARAMS: "Invalid path parameters",
  EMPTY_BATCH: "Batch must include at least one parameter set",
  MISSING_ENDPOINT: "No endpoint given and no default upstream URL configured",
  MISSING_BASE_URL: "Relative endpoint given but no upstream base URL configured",
  INVALID_ENDPOINT: "Endpoint is not a valid http(s) URL",
  BATCH_TOO_LARGE: "Batch exceeds the maximum of {max} parameter sets",
  RECORDS_LIMIT_EXCEEDED: "Expected record volume {count} exceeds the limit of {limit}",
  NO_ALLOWLIST_CONFIGURED: "Absolute endpoints are not allowed without an upstream allowlist",
  NOT_ALLOWLISTED: "Endpoint host is not in the upstream allowlist",
  PRIVATE_ADDRESS_BLOCKED: "Endpoint resolves to a private or loopback address",
  JOB_NOT_FOUND: "Job not found",
  RESULT_NOT_FOUND: "Job result not found",
  RESULT_EXPIRED: "Job result has expired",
  JOB_NOT_FINISHED: "Job has not finished yet",
  QUEUE_FULL: "Too many pending jobs, please try again shortly",
  RATE_LIMIT_RPM: "Too many requests, please try again shortly",
  UPSTREAM_ERROR: "Upstream request failed",
  UPSTREAM_TIMEOUT: "The upstream service took too long to respond",
  STORE_UNAVAILABLE: "Job store is unavailable",
  SERIALIZATION_FAILED: "Job data could not be serialized",
  INTERNAL_UNEXPECTED: "Something went wrong",
} as const;

export type ErrKey = keyof typeof ERR_MSG;

export function msg(key: ErrKey): string {
  return ERR_MSG[key];
}

// Optional tiny templating for limits/caps
export function fmt(key: ErrKey, vars: Record<string, string | number> = {}): string {
  let s: string = ERR_MSG[key];
  for (const [k, v] of Object.entries(vars)) s = s.replace(new RegExp(`{${k}}`, "g"), String(v));
  return s;
}
