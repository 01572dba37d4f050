/**
 * In-process stand-in for a cluster, used by the engine tests.
 *
 * Every call is appended to `events` as a short line (`create a,b`,
 * `watch job`, `gone job`), so tests can assert exact call order.
 */

import type {
  CreateOptions,
  DeletePropagation,
  HookOutputSink,
  PodLogClient,
  PodSelector,
  PodSummary,
  ResourceClient,
  Waiter,
} from "./client.js";
import { parseManifest, type ResourceList } from "./manifest.js";
import type { WaitStrategy } from "./types.js";

function names(resources: ResourceList): string {
  return resources.resources.map((r) => r.metadata.name).join(",");
}

export class MockCluster implements ResourceClient, PodLogClient {
  readonly events: string[] = [];
  readonly createOptions: CreateOptions[] = [];
  readonly waitStrategies: WaitStrategy[] = [];

  /** Resource names whose create call is rejected. */
  readonly failCreate = new Set<string>();
  /** Resource names whose hook watch fails. */
  readonly failWatch = new Set<string>();
  /** Resource names whose readiness wait fails. */
  readonly failWait = new Set<string>();
  /** Resource names the cluster refuses to delete. */
  readonly failDelete = new Set<string>();
  /** When set, getWaiter rejects with this error. */
  waiterError: Error | null = null;
  /** Delay, in ms, before a create call containing the named resource settles. */
  readonly createDelayMs = new Map<string, number>();

  pods: PodSummary[] = [];

  async build(manifest: string, validate: boolean): Promise<ResourceList> {
    return parseManifest(manifest, validate);
  }

  async create(resources: ResourceList, options: CreateOptions): Promise<void> {
    const delay = Math.max(0, ...resources.resources.map((r) => this.createDelayMs.get(r.metadata.name) ?? 0));
    if (delay > 0) await new Promise((resolve) => setTimeout(resolve, delay));

    this.events.push(`create ${names(resources)}`);
    this.createOptions.push(options);
    const rejected = resources.resources.find((r) => this.failCreate.has(r.metadata.name));
    if (rejected) throw new Error(`create ${rejected.metadata.name} rejected`);
  }

  async delete(resources: ResourceList, _propagation: DeletePropagation): Promise<Error[]> {
    this.events.push(`delete ${names(resources)}`);
    return resources.resources
      .filter((r) => this.failDelete.has(r.metadata.name))
      .map((r) => new Error(`delete ${r.metadata.name} refused`));
  }

  async getWaiter(strategy: WaitStrategy): Promise<Waiter> {
    if (this.waiterError) throw this.waiterError;
    this.waitStrategies.push(strategy);
    return {
      wait: async (resources) => {
        this.events.push(`wait ${names(resources)}`);
        const failed = resources.resources.find((r) => this.failWait.has(r.metadata.name));
        if (failed) throw new Error(`${failed.metadata.name} not ready`);
      },
      watchUntilReady: async (resources) => {
        this.events.push(`watch ${names(resources)}`);
        const failed = resources.resources.find((r) => this.failWatch.has(r.metadata.name));
        if (failed) throw new Error(`watch ${failed.metadata.name} failed`);
      },
      waitForDelete: async (resources) => {
        this.events.push(`gone ${names(resources)}`);
      },
    };
  }

  async getPodList(namespace: string, selector: PodSelector): Promise<PodSummary[]> {
    this.events.push(`pods ${namespace} ${selector.labelSelector ?? selector.fieldSelector ?? ""}`);
    return this.pods;
  }

  async outputContainerLogs(pods: PodSummary[], namespace: string, sink: HookOutputSink): Promise<void> {
    this.events.push(`logs ${pods.map((p) => p.name).join(",")}`);
    for (const pod of pods) {
      for (const container of pod.containers) {
        sink({ namespace, pod: pod.name, container, log: `log of ${pod.name}/${container}` });
      }
    }
  }
}

/** A minimal Job manifest. */
export function jobManifest(name: string, namespace?: string): string {
  const ns = namespace ? `\n  namespace: ${namespace}` : "";
  return `apiVersion: batch/v1\nkind: Job\nmetadata:\n  name: ${name}${ns}\n`;
}

/** A minimal ConfigMap manifest. */
export function configMapManifest(name: string): string {
  return `apiVersion: v1\nkind: ConfigMap\nmetadata:\n  name: ${name}\n`;
}
