/**
 * kubectl-backed resource client. Creates, deletes, waits on and reads pod
 * logs by wrapping the `kubectl` binary.
 */

import { execFile } from "node:child_process";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { promisify } from "node:util";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
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
import { formatKubectlTimeout } from "./duration.js";
import { KubectlCommandError, ReleaseEngineError, toError } from "./errors.js";
import { getReleaseLogger, type ReleaseLogger } from "./logger.js";
import { parseManifest, resourceKey, type K8sResource, type ResourceList } from "./manifest.js";
import type { WaitStrategy } from "./types.js";

const execFileAsync = promisify(execFile);

export interface KubectlClientOptions {
  binary?: string;
  /** Namespace for resources that do not name one. */
  namespace?: string;
  context?: string;
  kubeconfig?: string;
  env?: Record<string, string>;
  logger?: ReleaseLogger;
}

function hasStderr(err: unknown): err is { stderr: string } {
  return typeof err === "object" && err !== null && "stderr" in err && typeof err.stderr === "string";
}

const PodListSchema = Type.Object({
  items: Type.Array(
    Type.Object({
      metadata: Type.Object({ name: Type.String(), namespace: Type.Optional(Type.String()) }),
      spec: Type.Object({ containers: Type.Array(Type.Object({ name: Type.String() })) }),
    }),
  ),
});

/** `kind/name` reference understood by `kubectl wait` and `kubectl delete`. */
export function resourceRef(resource: K8sResource): string {
  return `${resource.kind.toLowerCase()}/${resource.metadata.name}`;
}

/** Readiness condition for regular resources, or null for kinds that need no wait. */
export function readyCondition(kind: string): string | null {
  switch (kind) {
    case "Deployment":
      return "condition=Available";
    case "Pod":
      return "condition=Ready";
    case "Job":
      return "condition=complete";
    default:
      return null;
  }
}

/** Completion condition for hook resources. */
export function hookCondition(kind: string): string | null {
  switch (kind) {
    case "Job":
      return "condition=complete";
    case "Pod":
      return "jsonpath={.status.phase}=Succeeded";
    default:
      return null;
  }
}

export class KubectlClient implements ResourceClient, PodLogClient {
  private readonly binary: string;
  private readonly namespace: string;
  private readonly logger: ReleaseLogger;

  constructor(private readonly options: KubectlClientOptions = {}) {
    this.binary = options.binary ?? "kubectl";
    this.namespace = options.namespace ?? "default";
    this.logger = options.logger ?? getReleaseLogger("kubectl");
  }

  /** Run a kubectl command and return stdout. */
  async run(args: string[], namespace?: string): Promise<string> {
    const fullArgs = [...args];
    if (namespace) fullArgs.push("-n", namespace);
    if (this.options.context) fullArgs.push("--context", this.options.context);
    if (this.options.kubeconfig) fullArgs.push("--kubeconfig", this.options.kubeconfig);

    this.logger.debug(`${this.binary} ${fullArgs.join(" ")}`);
    try {
      const { stdout } = await execFileAsync(this.binary, fullArgs, {
        env: { ...process.env, ...this.options.env },
        maxBuffer: 50 * 1024 * 1024,
      });
      return stdout;
    } catch (err) {
      throw new KubectlCommandError(fullArgs, hasStderr(err) ? err.stderr : "", err);
    }
  }

  /* ---------- ResourceClient ---------- */

  async build(manifest: string, validate: boolean): Promise<ResourceList> {
    return parseManifest(manifest, validate);
  }

  async create(resources: ResourceList, options: CreateOptions): Promise<void> {
    if (resources.resources.length === 0) return;
    await this.withResourceFile(resources.resources, async (file) => {
      const args = options.serverSideApply ? ["apply", "--server-side", "-f", file] : ["create", "-f", file];
      if (options.serverSideApply && options.forceConflicts) args.push("--force-conflicts");
      await this.run(args, this.namespace);
    });
  }

  async delete(resources: ResourceList, propagation: DeletePropagation): Promise<Error[]> {
    const errors: Error[] = [];
    for (const resource of resources.resources) {
      try {
        await this.run(
          ["delete", resourceRef(resource), `--cascade=${propagation}`, "--ignore-not-found", "--wait=false"],
          resource.metadata.namespace ?? this.namespace,
        );
      } catch (err) {
        errors.push(toError(err));
      }
    }
    return errors;
  }

  async getWaiter(strategy: WaitStrategy): Promise<Waiter> {
    return new KubectlWaiter(this, strategy, this.namespace);
  }

  /* ---------- PodLogClient ---------- */

  async getPodList(namespace: string, selector: PodSelector): Promise<PodSummary[]> {
    const args = ["get", "pods", "-o", "json"];
    if (selector.labelSelector) args.push("-l", selector.labelSelector);
    if (selector.fieldSelector) args.push("--field-selector", selector.fieldSelector);

    const parsed: unknown = JSON.parse(await this.run(args, namespace));
    if (!Value.Check(PodListSchema, parsed)) {
      throw new ReleaseEngineError("unexpected output from kubectl get pods");
    }
    return parsed.items.map((pod) => ({
      name: pod.metadata.name,
      namespace: pod.metadata.namespace ?? namespace,
      containers: pod.spec.containers.map((c) => c.name),
    }));
  }

  async outputContainerLogs(pods: PodSummary[], namespace: string, sink: HookOutputSink): Promise<void> {
    for (const pod of pods) {
      for (const container of pod.containers) {
        const log = await this.run(["logs", pod.name, "-c", container], namespace);
        sink({ namespace, pod: pod.name, container, log });
      }
    }
  }

  /** Write resources to a temporary kubectl `List` file for the duration of `fn`. */
  private async withResourceFile(resources: K8sResource[], fn: (file: string) => Promise<void>): Promise<void> {
    const dir = await mkdtemp(join(tmpdir(), "chartwise-"));
    const file = join(dir, "resources.json");
    try {
      await writeFile(file, JSON.stringify({ apiVersion: "v1", kind: "List", items: resources }), "utf-8");
      await fn(file);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }
}

/**
 * Readiness waits through `kubectl wait`. Resources are waited on one after
 * another against a single deadline, so one call never exceeds its timeout.
 */
export class KubectlWaiter implements Waiter {
  constructor(
    private readonly kubectl: KubectlClient,
    private readonly strategy: WaitStrategy,
    private readonly namespace: string,
  ) {}

  async wait(resources: ResourceList, timeoutMs: number): Promise<void> {
    if (this.strategy === "hookOnly") return;
    await this.waitFor(resources, timeoutMs, readyCondition);
  }

  async watchUntilReady(resources: ResourceList, timeoutMs: number): Promise<void> {
    await this.waitFor(resources, timeoutMs, hookCondition);
  }

  async waitForDelete(resources: ResourceList, timeoutMs: number): Promise<void> {
    await this.waitFor(resources, timeoutMs, () => "delete");
  }

  private async waitFor(
    resources: ResourceList,
    timeoutMs: number,
    condition: (kind: string) => string | null,
  ): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    for (const resource of resources.resources) {
      const forCondition = condition(resource.kind);
      if (!forCondition) continue;

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new ReleaseEngineError(`${resourceKey(resource)} not ready: timed out after ${formatKubectlTimeout(timeoutMs)}`);
      }
      try {
        await this.kubectl.run(
          ["wait", resourceRef(resource), `--for=${forCondition}`, `--timeout=${formatKubectlTimeout(remaining)}`],
          resource.metadata.namespace ?? this.namespace,
        );
      } catch (err) {
        throw new ReleaseEngineError(`${resourceKey(resource)} not ready: ${toError(err).message}`, { cause: err });
      }
    }
  }
}
