/**
 * Hook execution engine
 *
 * Runs the hooks bound to one lifecycle event strictly one after another:
 * delete any stale instance, build, record the in-progress state, create,
 * watch until ready. The outcome comes back together with a deferred
 * shutdown so the caller can persist the release before hook resources are
 * torn down.
 */

import { newReleaseAccessor, type HookAccessor, type ReleaseAccessor } from "./accessor.js";
import type { HookOutputSink, PodLogClient, PodSelector, ResourceClient } from "./client.js";
import {
  HookApplyError,
  HookCleanupError,
  HookFailedError,
  ManifestParseError,
  ReleaseEngineError,
  errorMessage,
  toError,
} from "./errors.js";
import { getReleaseLogger, type ReleaseLogger } from "./logger.js";
import { deriveNamespace, type ResourceList } from "./manifest.js";
import type { ReleaseStore } from "./storage.js";
import {
  HOOK_DELETE_BEFORE_CREATION,
  HOOK_DELETE_FAILED,
  HOOK_DELETE_SUCCEEDED,
  HOOK_OUTPUT_FAILED,
  HOOK_OUTPUT_SUCCEEDED,
  HookPhases,
  type HookDeletePolicy,
  type HookEvent,
  type HookOutputLogPolicy,
  type WaitStrategy,
} from "./types.js";

// =============================================================================
// Results
// =============================================================================

export type ShutdownFn = () => Promise<void>;

export const shutdownNoOp: ShutdownFn = async () => {};

/**
 * Two-phase result of running an event's hooks. `shutdown` performs the
 * delete/log policies and must be awaited by the caller once it has finished
 * its own bookkeeping; it is a no-op when nothing needs cleaning up.
 */
export type HookExecution =
  | { status: "succeeded"; shutdown: ShutdownFn }
  | { status: "failed"; error: Error; shutdown: ShutdownFn };

export interface HookRunOptions {
  waitStrategy: WaitStrategy;
  timeoutMs: number;
  serverSideApply?: boolean;
}

/** Release-specific side effects the core loop delegates to. */
export interface HookCallbacks {
  recordRelease(): Promise<void>;
  deleteByPolicy(hook: HookAccessor, policy: HookDeletePolicy): Promise<void>;
  outputLogsByPolicy(hook: HookAccessor, policy: HookOutputLogPolicy): Promise<void>;
}

// =============================================================================
// Ordering
// =============================================================================

/** Compare hooks by weight, then by name. */
export function compareHooks(a: HookAccessor, b: HookAccessor): number {
  if (a.weight() !== b.weight()) return a.weight() - b.weight();
  if (a.name() === b.name()) return 0;
  return a.name() < b.name() ? -1 : 1;
}

/** Stable sort into execution order; the input array is left untouched. */
export function sortHooks(hooks: readonly HookAccessor[]): HookAccessor[] {
  return [...hooks].sort(compareHooks);
}

// =============================================================================
// Executor
// =============================================================================

export interface HookExecutorDeps {
  client: ResourceClient;
  store: ReleaseStore;
  logs?: PodLogClient;
  /** Receives container logs of hooks whose output-log policy matches. */
  output?: HookOutputSink;
  logger?: ReleaseLogger;
}

export class HookExecutor {
  private readonly client: ResourceClient;
  private readonly store: ReleaseStore;
  private readonly logs?: PodLogClient;
  private readonly output: HookOutputSink;
  private readonly logger: ReleaseLogger;

  constructor(deps: HookExecutorDeps) {
    this.client = deps.client;
    this.store = deps.store;
    this.logs = deps.logs;
    this.output = deps.output ?? ((entry) => process.stdout.write(`${entry.pod}/${entry.container}: ${entry.log}`));
    this.logger = deps.logger ?? getReleaseLogger("hooks");
  }

  /**
   * Run every hook bound to `event` and return the outcome together with a
   * deferred shutdown.
   */
  async execute(release: unknown, event: HookEvent, options: HookRunOptions): Promise<HookExecution> {
    const rel = newReleaseAccessor(release);
    const hooks = rel.hooks().filter((h) => h.hasEvent(event));
    const logger = this.logger.withContext({ release: rel.name(), event });

    const callbacks: HookCallbacks = {
      recordRelease: () => this.recordRelease(rel, logger),
      deleteByPolicy: (hook, policy) => this.deleteByPolicy(hook, policy, options),
      outputLogsByPolicy: (hook, policy) => this.outputLogsByPolicy(hook, rel.namespace(), policy),
    };

    return executeHooks(hooks, event, options, this.client, callbacks, logger);
  }

  /** Execute and immediately shut down; throws the first error encountered. */
  async run(release: unknown, event: HookEvent, options: HookRunOptions): Promise<void> {
    const result = await this.execute(release, event, options);
    await result.shutdown();
    if (result.status === "failed") throw result.error;
  }

  private async recordRelease(rel: ReleaseAccessor, logger: ReleaseLogger): Promise<void> {
    try {
      await this.store.update(rel.raw());
    } catch (err) {
      logger.warn(`failed to record release: ${errorMessage(err)}`);
    }
  }

  /**
   * Delete a hook's resources when it carries `policy`. CustomResourceDefinitions
   * are never deleted; removing one garbage-collects every custom resource of
   * that type.
   */
  async deleteByPolicy(hook: HookAccessor, policy: HookDeletePolicy, options: HookRunOptions): Promise<void> {
    if (hook.kind() === "CustomResourceDefinition") return;
    if (!hook.hasDeletePolicy(policy)) return;

    let resources: ResourceList;
    try {
      resources = await this.client.build(hook.manifest(), false);
    } catch (err) {
      throw new ManifestParseError(`unable to build kubernetes object for deleting hook ${hook.path()}`, err);
    }

    const errors = await this.client.delete(resources, "background");
    if (errors.length > 0) {
      throw new HookCleanupError(hook.path(), errors);
    }

    const waiter = await this.client.getWaiter(options.waitStrategy);
    await waiter.waitForDelete(resources, options.timeoutMs);
  }

  /** Copy container logs of a Job or Pod hook to the output sink. */
  async outputLogsByPolicy(hook: HookAccessor, releaseNamespace: string, policy: HookOutputLogPolicy): Promise<void> {
    if (!hook.hasOutputLogPolicy(policy)) return;

    const selector = podSelectorFor(hook);
    if (!selector || !this.logs) return;

    const namespace = deriveHookNamespace(hook, releaseNamespace);
    const pods = await this.logs.getPodList(namespace, selector);
    await this.logs.outputContainerLogs(pods, namespace, this.output);
  }
}

/** Pod selector for a hook's log output, or null for kinds without pods. */
export function podSelectorFor(hook: HookAccessor): PodSelector | null {
  switch (hook.kind()) {
    case "Job":
      return { labelSelector: `job-name=${hook.name()}` };
    case "Pod":
      return { fieldSelector: `metadata.name=${hook.name()}` };
    default:
      return null;
  }
}

export function deriveHookNamespace(hook: HookAccessor, releaseNamespace: string): string {
  try {
    return deriveNamespace(hook.manifest(), releaseNamespace);
  } catch (err) {
    throw new ManifestParseError(
      `unable to parse metadata.namespace from kubernetes manifest for output logs hook ${hook.path()}`,
      err,
    );
  }
}

// =============================================================================
// Core loop
// =============================================================================

/**
 * Execute `hooks` for `event` in weight/name order. Independent of the release
 * layout: everything release-specific goes through `callbacks`.
 */
export async function executeHooks(
  hooks: readonly HookAccessor[],
  event: string,
  options: HookRunOptions,
  kube: ResourceClient,
  callbacks: HookCallbacks,
  logger: ReleaseLogger,
): Promise<HookExecution> {
  const executing = sortHooks(hooks);

  for (const [index, hook] of executing.entries()) {
    const hookLogger = logger.withContext({ hook: hook.path() });
    hook.setDefaultDeletePolicy();

    try {
      await callbacks.deleteByPolicy(hook, HOOK_DELETE_BEFORE_CREATION);
    } catch (err) {
      return { status: "failed", error: toError(err), shutdown: shutdownNoOp };
    }

    let resources: ResourceList;
    try {
      resources = await kube.build(hook.manifest(), true);
    } catch (err) {
      return {
        status: "failed",
        error: new ManifestParseError(`unable to build kubernetes object for ${event} hook ${hook.path()}`, err),
        shutdown: shutdownNoOp,
      };
    }

    hook.setLastRunStarted();
    await callbacks.recordRelease();
    // Replaced by Succeeded or Failed below; stays Unknown if the run is cut short.
    hook.setLastRunPhase(HookPhases.Unknown);

    try {
      await kube.create(resources, { serverSideApply: options.serverSideApply ?? false });
    } catch (err) {
      hook.setLastRunCompleted();
      hook.setLastRunPhase(HookPhases.Failed);
      return { status: "failed", error: new HookApplyError(event, hook.path(), err), shutdown: shutdownNoOp };
    }

    let waitError: unknown = null;
    try {
      const waiter = await kube.getWaiter(options.waitStrategy);
      try {
        await waiter.watchUntilReady(resources, options.timeoutMs);
      } catch (err) {
        waitError = err ?? new Error("watch failed");
      }
    } catch (err) {
      return {
        status: "failed",
        error: new ReleaseEngineError(`unable to get waiter: ${errorMessage(err)}`, { cause: err }),
        shutdown: shutdownNoOp,
      };
    }
    hook.setLastRunCompleted();

    if (waitError !== null) {
      hook.setLastRunPhase(HookPhases.Failed);
      const failure = new HookFailedError(event, hook.path(), waitError);
      hookLogger.error(failure.message);

      try {
        await callbacks.outputLogsByPolicy(hook, HOOK_OUTPUT_FAILED);
      } catch (err) {
        hookLogger.warn(`error outputting logs for hook failure: ${errorMessage(err)}`);
      }

      const succeeded = executing.slice(0, index);
      return {
        status: "failed",
        error: failure,
        shutdown: async () => {
          try {
            await callbacks.deleteByPolicy(hook, HOOK_DELETE_FAILED);
          } catch (err) {
            hookLogger.warn(`error deleting the hook resource on hook failure: ${errorMessage(err)}`);
          }
          for (const previous of succeeded) {
            await callbacks.deleteByPolicy(previous, HOOK_DELETE_SUCCEEDED);
          }
          throw failure;
        },
      };
    }

    hook.setLastRunPhase(HookPhases.Succeeded);
    hookLogger.debug("hook succeeded");
  }

  return {
    status: "succeeded",
    shutdown: async () => {
      for (const hook of [...executing].reverse()) {
        try {
          await callbacks.outputLogsByPolicy(hook, HOOK_OUTPUT_SUCCEEDED);
        } catch (err) {
          logger.warn(`error outputting logs for hook success: ${errorMessage(err)}`, { hook: hook.path() });
        }
        await callbacks.deleteByPolicy(hook, HOOK_DELETE_SUCCEEDED);
      }
    },
  };
}
