/**
 * Release capability accessors.
 *
 * The hook engine and the scheduler only ever see {@link ReleaseAccessor} and
 * {@link HookAccessor}; the concrete v1/v2 layouts stay behind the two
 * factories below. Accessors wrap the caller's objects by reference, so
 * mutations (hook LastRun, default delete policy, manifest) land in the
 * snapshot that is later persisted.
 */

import { Value } from "@sinclair/typebox/value";
import { UnsupportedSchemaError } from "./errors.js";
import { V1HookSchema, V1ReleaseSchema, V2HookSchema, V2ReleaseSchema } from "./schemas.js";
import {
  HOOK_DELETE_BEFORE_CREATION,
  HookPhases,
  type Chart,
  type HookPhase,
  type HookRunRecord,
  type ReleaseSnapshot,
  type SchemaVersion,
  type V1Hook,
  type V1Release,
  type V2Hook,
  type V2Release,
} from "./types.js";

// =============================================================================
// Contracts
// =============================================================================

export interface ReleaseAccessor {
  schemaVersion(): SchemaVersion;
  name(): string;
  namespace(): string;
  version(): number;
  hooks(): HookAccessor[];
  manifest(): string;
  notes(): string;
  labels(): Record<string, string>;
  chart(): Chart | undefined;
  status(): string;
  applyMethod(): string;
  deployedAt(): Date | undefined;
  /** The wrapped snapshot, for persistence. */
  raw(): ReleaseSnapshot;

  setManifest(manifest: string): void;
  setStatus(status: string): void;
  setDeployedAt(at: Date): void;
}

export interface HookAccessor {
  path(): string;
  manifest(): string;
  name(): string;
  kind(): string;
  weight(): number;
  hasEvent(event: string): boolean;
  hasDeletePolicy(policy: string): boolean;
  /** Default an empty delete-policy set to before-hook-creation. Idempotent. */
  setDefaultDeletePolicy(): void;
  hasOutputLogPolicy(policy: string): boolean;
  setLastRunStarted(): void;
  setLastRunPhase(phase: HookPhase): void;
  setLastRunCompleted(): void;
  lastRun(): HookRunRecord;
}

// =============================================================================
// Factories
// =============================================================================

function isV2Marked(value: unknown): boolean {
  return typeof value === "object" && value !== null && "apiVersion" in value && value.apiVersion === "v2";
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value !== "object") return typeof value;
  if (isV2Marked(value)) return "v2 object not matching the v2 schema";
  return "object not matching any known schema";
}

export function newReleaseAccessor(value: unknown): ReleaseAccessor {
  if (isV2Marked(value)) {
    if (Value.Check(V2ReleaseSchema, value)) return new V2ReleaseAccessor(value);
  } else if (Value.Check(V1ReleaseSchema, value)) {
    return new V1ReleaseAccessor(value);
  }
  throw new UnsupportedSchemaError("release", describe(value));
}

export function newHookAccessor(value: unknown): HookAccessor {
  if (isV2Marked(value)) {
    if (Value.Check(V2HookSchema, value)) return new V2HookAccessor(value);
  } else if (Value.Check(V1HookSchema, value)) {
    return new V1HookAccessor(value);
  }
  throw new UnsupportedSchemaError("hook", describe(value));
}

// =============================================================================
// v1
// =============================================================================

class V1ReleaseAccessor implements ReleaseAccessor {
  constructor(private readonly rel: V1Release) {}

  schemaVersion(): SchemaVersion {
    return "v1";
  }
  name(): string {
    return this.rel.name;
  }
  namespace(): string {
    return this.rel.namespace;
  }
  version(): number {
    return this.rel.version;
  }
  hooks(): HookAccessor[] {
    return (this.rel.hooks ?? []).map((h) => new V1HookAccessor(h));
  }
  manifest(): string {
    return this.rel.manifest ?? "";
  }
  notes(): string {
    return this.rel.info.notes ?? "";
  }
  labels(): Record<string, string> {
    return this.rel.labels ?? {};
  }
  chart(): Chart | undefined {
    return this.rel.chart;
  }
  status(): string {
    return this.rel.info.status;
  }
  applyMethod(): string {
    return this.rel.apply_method ?? "";
  }
  deployedAt(): Date | undefined {
    return parseTime(this.rel.info.last_deployed);
  }
  raw(): ReleaseSnapshot {
    return this.rel;
  }
  setManifest(manifest: string): void {
    this.rel.manifest = manifest;
  }
  setStatus(status: string): void {
    this.rel.info.status = status;
  }
  setDeployedAt(at: Date): void {
    this.rel.info.last_deployed = at.toISOString();
    this.rel.info.first_deployed ??= at.toISOString();
  }
}

class V1HookAccessor implements HookAccessor {
  constructor(private readonly hook: V1Hook) {}

  path(): string {
    return this.hook.path;
  }
  manifest(): string {
    return this.hook.manifest;
  }
  name(): string {
    return this.hook.name;
  }
  kind(): string {
    return this.hook.kind;
  }
  weight(): number {
    return this.hook.weight ?? 0;
  }
  hasEvent(event: string): boolean {
    return (this.hook.events ?? []).includes(event);
  }
  hasDeletePolicy(policy: string): boolean {
    return (this.hook.delete_policies ?? []).includes(policy);
  }
  setDefaultDeletePolicy(): void {
    if (!this.hook.delete_policies || this.hook.delete_policies.length === 0) {
      this.hook.delete_policies = [HOOK_DELETE_BEFORE_CREATION];
    }
  }
  hasOutputLogPolicy(policy: string): boolean {
    return (this.hook.output_log_policies ?? []).includes(policy);
  }
  setLastRunStarted(): void {
    this.hook.last_run = { started_at: new Date().toISOString(), phase: HookPhases.Running };
  }
  setLastRunPhase(phase: HookPhase): void {
    this.hook.last_run = { ...this.hook.last_run, phase };
  }
  setLastRunCompleted(): void {
    this.hook.last_run = { ...this.hook.last_run, completed_at: new Date().toISOString() };
  }
  lastRun(): HookRunRecord {
    const run = this.hook.last_run;
    return {
      startedAt: run?.started_at,
      completedAt: run?.completed_at,
      phase: run?.phase ?? HookPhases.Unknown,
    };
  }
}

// =============================================================================
// v2
// =============================================================================

class V2ReleaseAccessor implements ReleaseAccessor {
  constructor(private readonly rel: V2Release) {}

  schemaVersion(): SchemaVersion {
    return "v2";
  }
  name(): string {
    return this.rel.name;
  }
  namespace(): string {
    return this.rel.namespace;
  }
  version(): number {
    return this.rel.version;
  }
  hooks(): HookAccessor[] {
    return (this.rel.hooks ?? []).map((h) => new V2HookAccessor(h));
  }
  manifest(): string {
    return this.rel.manifest ?? "";
  }
  notes(): string {
    return this.rel.info.notes ?? "";
  }
  labels(): Record<string, string> {
    return this.rel.labels ?? {};
  }
  chart(): Chart | undefined {
    return this.rel.chart;
  }
  status(): string {
    return this.rel.info.status;
  }
  applyMethod(): string {
    return this.rel.applyMethod ?? "";
  }
  deployedAt(): Date | undefined {
    return parseTime(this.rel.info.lastDeployed);
  }
  raw(): ReleaseSnapshot {
    return this.rel;
  }
  setManifest(manifest: string): void {
    this.rel.manifest = manifest;
  }
  setStatus(status: string): void {
    this.rel.info.status = status;
  }
  setDeployedAt(at: Date): void {
    this.rel.info.lastDeployed = at.toISOString();
    this.rel.info.firstDeployed ??= at.toISOString();
  }
}

class V2HookAccessor implements HookAccessor {
  constructor(private readonly hook: V2Hook) {}

  path(): string {
    return this.hook.path;
  }
  manifest(): string {
    return this.hook.manifest;
  }
  name(): string {
    return this.hook.name;
  }
  kind(): string {
    return this.hook.kind;
  }
  weight(): number {
    return this.hook.weight ?? 0;
  }
  hasEvent(event: string): boolean {
    return (this.hook.events ?? []).includes(event);
  }
  hasDeletePolicy(policy: string): boolean {
    return (this.hook.deletePolicies ?? []).includes(policy);
  }
  setDefaultDeletePolicy(): void {
    if (!this.hook.deletePolicies || this.hook.deletePolicies.length === 0) {
      this.hook.deletePolicies = [HOOK_DELETE_BEFORE_CREATION];
    }
  }
  hasOutputLogPolicy(policy: string): boolean {
    return (this.hook.outputLogPolicies ?? []).includes(policy);
  }
  setLastRunStarted(): void {
    this.hook.lastRun = { startedAt: new Date().toISOString(), phase: HookPhases.Running };
  }
  setLastRunPhase(phase: HookPhase): void {
    this.hook.lastRun = { ...this.hook.lastRun, phase };
  }
  setLastRunCompleted(): void {
    this.hook.lastRun = { ...this.hook.lastRun, completedAt: new Date().toISOString() };
  }
  lastRun(): HookRunRecord {
    const run = this.hook.lastRun;
    return {
      startedAt: run?.startedAt,
      completedAt: run?.completedAt,
      phase: run?.phase ?? HookPhases.Unknown,
    };
  }
}

function parseTime(value: string | undefined): Date | undefined {
  if (!value) return undefined;
  const at = new Date(value);
  return Number.isNaN(at.getTime()) ? undefined : at;
}
