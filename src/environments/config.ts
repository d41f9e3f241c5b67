import { type Env, intFromEnv } from "../envConfig.js";
import type { RetryPolicy } from "./retry.js";

export interface LifecycleConfig {
  workflowConcurrency: number;
  retry: RetryPolicy;
}

export function loadLifecycleConfig(env: Env = process.env): LifecycleConfig {
  const baseDelayMs = intFromEnv(env, "ENVPLANE_WORKFLOW_RETRY_DELAY_MS", 5000, { min: 0 });
  return {
    workflowConcurrency: intFromEnv(env, "ENVPLANE_WORKFLOW_CONCURRENCY", 4, { min: 1, max: 64 }),
    retry: {
      maxAttempts: intFromEnv(env, "ENVPLANE_WORKFLOW_MAX_ATTEMPTS", 1, { min: 1, max: 10 }),
      baseDelayMs,
      maxDelayMs: baseDelayMs * 8
    }
  };
}
