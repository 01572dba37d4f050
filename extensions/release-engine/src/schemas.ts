/**
 * Release and chart schemas: the two on-disk release layouts (v1 snake_case,
 * v2 camelCase with an `apiVersion: "v2"` marker) and the pre-rendered chart
 * bundle shape. Types in types.ts are derived from these.
 */

import { Type } from "@sinclair/typebox";

/* ---------- Hook enums ---------- */

export const HookPhaseSchema = Type.Union([
  Type.Literal("Unknown"),
  Type.Literal("Running"),
  Type.Literal("Succeeded"),
  Type.Literal("Failed"),
]);

/* ---------- Chart ---------- */

export const ChartDependencySchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  version: Type.Optional(Type.String()),
  repository: Type.Optional(Type.String()),
  /** Sibling subcharts that must be ready before this one is installed. */
  dependsOn: Type.Optional(Type.Array(Type.String())),
});

export const ChartMetadataSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  version: Type.String(),
  appVersion: Type.Optional(Type.String()),
  description: Type.Optional(Type.String()),
  annotations: Type.Optional(Type.Record(Type.String(), Type.String())),
  dependencies: Type.Optional(Type.Array(ChartDependencySchema)),
});

export const ChartTemplateSchema = Type.Object({
  name: Type.String(),
  data: Type.String(),
});

export const ChartSchema = Type.Recursive(
  (This) =>
    Type.Object({
      metadata: ChartMetadataSchema,
      templates: Type.Optional(Type.Array(ChartTemplateSchema)),
      subcharts: Type.Optional(Type.Array(This)),
    }),
  { $id: "Chart" },
);

/* ---------- v1 release (snake_case) ---------- */

export const V1HookExecutionSchema = Type.Object({
  started_at: Type.Optional(Type.String()),
  completed_at: Type.Optional(Type.String()),
  phase: Type.Optional(HookPhaseSchema),
});

export const V1HookSchema = Type.Object({
  name: Type.String(),
  kind: Type.String(),
  path: Type.String(),
  manifest: Type.String(),
  events: Type.Optional(Type.Array(Type.String())),
  last_run: Type.Optional(V1HookExecutionSchema),
  weight: Type.Optional(Type.Integer()),
  delete_policies: Type.Optional(Type.Array(Type.String())),
  output_log_policies: Type.Optional(Type.Array(Type.String())),
});

export const V1ReleaseInfoSchema = Type.Object({
  first_deployed: Type.Optional(Type.String()),
  last_deployed: Type.Optional(Type.String()),
  deleted: Type.Optional(Type.String()),
  description: Type.Optional(Type.String()),
  status: Type.String(),
  notes: Type.Optional(Type.String()),
});

export const V1ReleaseSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  namespace: Type.String(),
  version: Type.Integer({ minimum: 1 }),
  info: V1ReleaseInfoSchema,
  chart: Type.Optional(ChartSchema),
  config: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  manifest: Type.Optional(Type.String()),
  hooks: Type.Optional(Type.Array(V1HookSchema)),
  labels: Type.Optional(Type.Record(Type.String(), Type.String())),
  apply_method: Type.Optional(Type.String()),
});

/* ---------- v2 release (camelCase) ---------- */

export const V2HookExecutionSchema = Type.Object({
  startedAt: Type.Optional(Type.String()),
  completedAt: Type.Optional(Type.String()),
  phase: Type.Optional(HookPhaseSchema),
});

export const V2HookSchema = Type.Object({
  apiVersion: Type.Literal("v2"),
  name: Type.String(),
  kind: Type.String(),
  path: Type.String(),
  manifest: Type.String(),
  events: Type.Optional(Type.Array(Type.String())),
  lastRun: Type.Optional(V2HookExecutionSchema),
  weight: Type.Optional(Type.Integer()),
  deletePolicies: Type.Optional(Type.Array(Type.String())),
  outputLogPolicies: Type.Optional(Type.Array(Type.String())),
});

export const V2ReleaseInfoSchema = Type.Object({
  firstDeployed: Type.Optional(Type.String()),
  lastDeployed: Type.Optional(Type.String()),
  deleted: Type.Optional(Type.String()),
  description: Type.Optional(Type.String()),
  status: Type.String(),
  notes: Type.Optional(Type.String()),
});

export const V2ReleaseSchema = Type.Object({
  apiVersion: Type.Literal("v2"),
  name: Type.String({ minLength: 1 }),
  namespace: Type.String(),
  version: Type.Integer({ minimum: 1 }),
  info: V2ReleaseInfoSchema,
  chart: Type.Optional(ChartSchema),
  config: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  manifest: Type.Optional(Type.String()),
  hooks: Type.Optional(Type.Array(V2HookSchema)),
  labels: Type.Optional(Type.Record(Type.String(), Type.String())),
  applyMethod: Type.Optional(Type.String()),
});

/* ---------- Bundle ---------- */

/** A pre-rendered chart plus the hooks extracted from its templates. */
export const ChartBundleSchema = Type.Object({
  chart: ChartSchema,
  hooks: Type.Optional(Type.Array(V1HookSchema)),
  notes: Type.Optional(Type.String()),
});
