import type { EnvironmentStatus } from "./types.js";

export type EnvironmentEvent =
  | "provisioning_started"
  | "provisioning_succeeded"
  | "update_requested"
  | "update_succeeded"
  | "delete_requested"
  | "teardown_succeeded"
  | "workflow_failed";

/**
 * Returns the status an event moves an environment to, or null when the
 * event is not accepted in the current status.
 */
export function reduceEnvironmentStatus(current: EnvironmentStatus, event: EnvironmentEvent): EnvironmentStatus | null {
  if (event === "provisioning_started" && current === "CREATING") return "PROVISIONING";
  if (event === "provisioning_succeeded" && current === "PROVISIONING") return "ACTIVE";

  // ERROR stays put until an operator issues a new update or delete.
  if (event === "update_requested" && (current === "ACTIVE" || current === "ERROR")) return "UPDATING";
  if (event === "update_succeeded" && current === "UPDATING") return "ACTIVE";

  if (event === "delete_requested" && (current === "ACTIVE" || current === "ERROR")) return "DELETING";
  if (event === "teardown_succeeded" && current === "DELETING") return "DELETED";

  if (event === "workflow_failed" && current !== "DELETED") return "ERROR";

  return null;
}

export function hasWorkflowInFlight(status: EnvironmentStatus): boolean {
  return status === "CREATING" || status === "PROVISIONING" || status === "UPDATING" || status === "DELETING";
}
