/**
 * Collaborator contracts the engine consumes: the cluster resource client,
 * readiness waiters, pod log retrieval, chart rendering.
 */

import type { ResourceList } from "./manifest.js";
import type { Chart, WaitStrategy } from "./types.js";

export type DeletePropagation = "background" | "foreground" | "orphan";

export interface CreateOptions {
  /** Use server-side apply instead of a plain create. */
  serverSideApply: boolean;
  /** With server-side apply, take ownership of conflicting fields. */
  forceConflicts?: boolean;
}

export interface Waiter {
  /** Block until every resource reports ready. */
  wait(resources: ResourceList, timeoutMs: number): Promise<void>;
  /** Block until hook resources (Jobs, Pods) have run to completion. */
  watchUntilReady(resources: ResourceList, timeoutMs: number): Promise<void>;
  waitForDelete(resources: ResourceList, timeoutMs: number): Promise<void>;
}

export interface ResourceClient {
  /** Turn manifest text into resource objects; `validate` enforces required fields. */
  build(manifest: string, validate: boolean): Promise<ResourceList>;
  create(resources: ResourceList, options: CreateOptions): Promise<void>;
  /** Returns one error per resource that could not be deleted. */
  delete(resources: ResourceList, propagation: DeletePropagation): Promise<Error[]>;
  getWaiter(strategy: WaitStrategy): Promise<Waiter>;
}

/* ---------- Pods / logs ---------- */

export interface PodSelector {
  labelSelector?: string;
  fieldSelector?: string;
}

export interface PodSummary {
  name: string;
  namespace: string;
  containers: string[];
}

export interface ContainerLog {
  namespace: string;
  pod: string;
  container: string;
  log: string;
}

export type HookOutputSink = (entry: ContainerLog) => void;

export interface PodLogClient {
  getPodList(namespace: string, selector: PodSelector): Promise<PodSummary[]>;
  outputContainerLogs(pods: PodSummary[], namespace: string, sink: HookOutputSink): Promise<void>;
}

/* ---------- Rendering ---------- */

export interface ChartRenderer {
  /** Render the chart's own resources, excluding its subcharts. */
  render(chart: Chart): Promise<string>;
}
