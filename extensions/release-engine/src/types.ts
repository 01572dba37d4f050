/**
 * Release engine types for releases, hooks, charts and wait strategies.
 */

import type { Static } from "@sinclair/typebox";
import type {
  ChartBundleSchema,
  ChartDependencySchema,
  ChartMetadataSchema,
  ChartSchema,
  ChartTemplateSchema,
  HookPhaseSchema,
  V1HookSchema,
  V1ReleaseSchema,
  V2HookSchema,
  V2ReleaseSchema,
} from "./schemas.js";

/* ---------- Charts ---------- */

export type Chart = Static<typeof ChartSchema>;
export type ChartMetadata = Static<typeof ChartMetadataSchema>;
export type ChartDependency = Static<typeof ChartDependencySchema>;
export type ChartTemplate = Static<typeof ChartTemplateSchema>;
export type ChartBundle = Static<typeof ChartBundleSchema>;

/** Annotation on a subchart listing (as a JSON array) the siblings it depends on. */
export const DEPENDS_ON_ANNOTATION = "chartwise.io/depends-on";

/* ---------- Releases ---------- */

export type V1Release = Static<typeof V1ReleaseSchema>;
export type V1Hook = Static<typeof V1HookSchema>;
export type V2Release = Static<typeof V2ReleaseSchema>;
export type V2Hook = Static<typeof V2HookSchema>;

/** Any release layout the engine knows how to operate on. */
export type ReleaseSnapshot = V1Release | V2Release;

export type SchemaVersion = "v1" | "v2";

export type ReleaseStatus =
  | "unknown"
  | "deployed"
  | "uninstalled"
  | "superseded"
  | "failed"
  | "uninstalling"
  | "pending-install"
  | "pending-upgrade"
  | "pending-rollback";

export type ApplyMethod = "csa" | "ssa";

/* ---------- Hooks ---------- */

export type HookPhase = Static<typeof HookPhaseSchema>;

export const HookPhases = {
  Unknown: "Unknown",
  Running: "Running",
  Succeeded: "Succeeded",
  Failed: "Failed",
} as const satisfies Record<HookPhase, HookPhase>;

export type HookEvent =
  | "pre-install"
  | "post-install"
  | "pre-delete"
  | "post-delete"
  | "pre-upgrade"
  | "post-upgrade"
  | "pre-rollback"
  | "post-rollback"
  | "test";

export const HOOK_EVENTS: readonly HookEvent[] = [
  "pre-install",
  "post-install",
  "pre-delete",
  "post-delete",
  "pre-upgrade",
  "post-upgrade",
  "pre-rollback",
  "post-rollback",
  "test",
];

export type HookDeletePolicy = "before-hook-creation" | "hook-succeeded" | "hook-failed";

export type HookOutputLogPolicy = "hook-succeeded" | "hook-failed";

export const HOOK_DELETE_BEFORE_CREATION: HookDeletePolicy = "before-hook-creation";
export const HOOK_DELETE_SUCCEEDED: HookDeletePolicy = "hook-succeeded";
export const HOOK_DELETE_FAILED: HookDeletePolicy = "hook-failed";
export const HOOK_OUTPUT_SUCCEEDED: HookOutputLogPolicy = "hook-succeeded";
export const HOOK_OUTPUT_FAILED: HookOutputLogPolicy = "hook-failed";

/** Read-only view of a hook's last execution. */
export interface HookRunRecord {
  startedAt?: string;
  completedAt?: string;
  phase: HookPhase;
}

/* ---------- Waiting ---------- */

/**
 * How installs block on readiness. `hookOnly` waits for hooks only, `legacy`
 * and `watcher` wait for everything at once, `ordered` installs subcharts in
 * dependency tiers.
 */
export type WaitStrategy = "hookOnly" | "legacy" | "watcher" | "ordered";

export const WAIT_STRATEGIES: readonly WaitStrategy[] = ["hookOnly", "legacy", "watcher", "ordered"];

export function isHookEvent(value: string): value is HookEvent {
  return HOOK_EVENTS.some((event) => event === value);
}
