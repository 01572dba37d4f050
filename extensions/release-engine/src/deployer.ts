/**
 * Release deployer
 *
 * Install action: pre-install hooks, chart installation along the configured
 * wait strategy, post-install hooks, with the release recorded at every step.
 */

import { newReleaseAccessor, type ReleaseAccessor } from "./accessor.js";
import type { ChartRenderer, HookOutputSink, PodLogClient, ResourceClient } from "./client.js";
import { ReleaseNotFoundError, errorMessage } from "./errors.js";
import { HookExecutor, type HookRunOptions } from "./hooks.js";
import { getReleaseLogger, type ReleaseLogger } from "./logger.js";
import { ChartInstaller } from "./scheduler.js";
import type { ReleaseStore } from "./storage.js";
import type { ChartBundle, HookEvent, ReleaseSnapshot, V1Release, WaitStrategy } from "./types.js";

export interface DeployOptions {
  namespace: string;
  waitStrategy: WaitStrategy;
  wait: boolean;
  timeoutMs: number;
  serverSideApply: boolean;
}

export interface ReleaseDeployerDeps {
  client: ResourceClient;
  renderer: ChartRenderer;
  store: ReleaseStore;
  logs?: PodLogClient;
  output?: HookOutputSink;
  logger?: ReleaseLogger;
}

export class ReleaseDeployer {
  private readonly store: ReleaseStore;
  private readonly hooks: HookExecutor;
  private readonly installer: ChartInstaller;
  private readonly logger: ReleaseLogger;

  constructor(deps: ReleaseDeployerDeps) {
    this.store = deps.store;
    this.logger = deps.logger ?? getReleaseLogger("deployer");
    this.hooks = new HookExecutor({
      client: deps.client,
      store: deps.store,
      logs: deps.logs,
      output: deps.output,
      logger: this.logger.child("hooks"),
    });
    this.installer = new ChartInstaller({
      client: deps.client,
      renderer: deps.renderer,
      logger: this.logger.child("installer"),
    });
  }

  /** Install `bundle` as the next revision of release `name`. */
  async install(name: string, bundle: ChartBundle, options: DeployOptions): Promise<ReleaseSnapshot> {
    const version = (await this.latestVersion(name)) + 1;
    const snapshot: V1Release = {
      name,
      namespace: options.namespace,
      version,
      info: { status: "pending-install", description: "Initial install underway" },
      chart: structuredClone(bundle.chart),
      manifest: "",
      hooks: structuredClone(bundle.hooks ?? []),
      apply_method: options.serverSideApply ? "ssa" : "csa",
    };
    if (bundle.notes) snapshot.info.notes = bundle.notes;

    const rel = newReleaseAccessor(snapshot);
    const logger = this.logger.withContext({ release: name });
    const hookOptions: HookRunOptions = {
      waitStrategy: options.waitStrategy,
      timeoutMs: options.timeoutMs,
      serverSideApply: options.serverSideApply,
    };

    await this.store.create(snapshot);
    logger.info(`installing revision ${version} with wait strategy ${options.waitStrategy}`);

    try {
      await this.hooks.run(snapshot, "pre-install", hookOptions);
    } catch (err) {
      return this.fail(rel, err, logger);
    }

    try {
      const result = await this.installer.install(bundle.chart, {
        waitStrategy: options.waitStrategy,
        wait: options.wait,
        timeoutMs: options.timeoutMs,
        serverSideApply: options.serverSideApply,
      });
      rel.setManifest(result.manifest);
    } catch (err) {
      return this.fail(rel, err, logger);
    }

    const post = await this.hooks.execute(snapshot, "post-install", hookOptions);
    if (post.status === "failed") {
      await this.markFailed(rel, post.error, logger);
      await post.shutdown();
      throw post.error;
    }

    rel.setStatus("deployed");
    rel.setDeployedAt(new Date());
    await this.store.update(snapshot);
    logger.info(`revision ${version} deployed`);

    await post.shutdown();
    return snapshot;
  }

  /**
   * Run the hooks of `event` against the latest revision of a release,
   * recording the hook state before cleaning up.
   */
  async runHooks(name: string, event: HookEvent, options: HookRunOptions): Promise<ReleaseSnapshot> {
    const release = await this.store.last(name);
    const result = await this.hooks.execute(release, event, options);
    await this.store.update(release);
    await result.shutdown();
    if (result.status === "failed") throw result.error;
    return release;
  }

  private async latestVersion(name: string): Promise<number> {
    try {
      return newReleaseAccessor(await this.store.last(name)).version();
    } catch (err) {
      if (err instanceof ReleaseNotFoundError) return 0;
      throw err;
    }
  }

  private async markFailed(rel: ReleaseAccessor, err: unknown, logger: ReleaseLogger): Promise<void> {
    logger.error(`release failed: ${errorMessage(err)}`);
    rel.setStatus("failed");
    try {
      await this.store.update(rel.raw());
    } catch (updateErr) {
      logger.warn(`failed to record failed release: ${errorMessage(updateErr)}`);
    }
  }

  private async fail(rel: ReleaseAccessor, err: unknown, logger: ReleaseLogger): Promise<never> {
    await this.markFailed(rel, err, logger);
    throw err;
  }
}
