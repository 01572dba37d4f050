/**
 * Chart installation
 *
 * The ordered path installs a chart's subcharts tier by tier along their
 * dependency graph, running the nodes of one tier concurrently and waiting
 * for a tier to become ready before starting the next. The flat path installs
 * everything in one batch and ignores declared dependencies.
 */

import type { ChartRenderer, ResourceClient } from "./client.js";
import {
  buildDependencyGraph,
  computeInstallationBatches,
  type DependencyGraph,
  type InstallationBatches,
} from "./dependency-graph.js";
import { ManifestParseError, TierInstallError } from "./errors.js";
import { getReleaseLogger, type ReleaseLogger } from "./logger.js";
import { joinManifests, type ResourceList } from "./manifest.js";
import type { Chart, WaitStrategy } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export interface OrderedInstallOptions {
  /** Wait for each tier to become ready before starting the next. */
  wait: boolean;
  timeoutMs: number;
  serverSideApply?: boolean;
  signal?: AbortSignal;
}

export interface FlatInstallOptions {
  waitStrategy: WaitStrategy;
  wait: boolean;
  timeoutMs: number;
  serverSideApply?: boolean;
}

export type ChartInstallOptions = FlatInstallOptions & { signal?: AbortSignal };

export interface ChartInstallResult {
  /** Every installed document, earliest tier first, the chart's own resources last. */
  manifest: string;
  /** Top-level tiers; null on the flat path. */
  batches: InstallationBatches | null;
}

export interface InstallerDeps {
  client: ResourceClient;
  renderer: ChartRenderer;
  logger?: ReleaseLogger;
}

/** What one tier node contributes: a recursively installed subtree or a rendered leaf. */
interface NodeOutcome {
  installed: boolean;
  manifest: string;
}

// =============================================================================
// Ordered
// =============================================================================

export class OrderedInstaller {
  private readonly client: ResourceClient;
  private readonly renderer: ChartRenderer;
  private readonly logger: ReleaseLogger;

  constructor(deps: InstallerDeps) {
    this.client = deps.client;
    this.renderer = deps.renderer;
    this.logger = deps.logger ?? getReleaseLogger("scheduler");
  }

  async installOrdered(chart: Chart, options: OrderedInstallOptions): Promise<ChartInstallResult> {
    const graph = buildDependencyGraph(chart);
    const batches = computeInstallationBatches(graph);
    const logger = this.logger.withContext({ chart: graph.chart });

    logger.debug("computed installation tiers", {
      tiers: batches.tiers,
      deferred: batches.deferred,
    });

    const manifests: string[] = [];

    for (const [index, tier] of batches.tiers.entries()) {
      options.signal?.throwIfAborted();
      logger.info(`installing tier ${index}: ${tier.join(", ")}`);
      manifests.push(await this.installTier(graph, index, tier, [], options));
    }

    const finalIndex = batches.tiers.length;
    options.signal?.throwIfAborted();
    const own = await this.renderOwn(graph, finalIndex, chart);
    logger.info(
      batches.deferred.length > 0
        ? `installing tier ${finalIndex}: ${batches.deferred.join(", ")} with chart resources`
        : `installing tier ${finalIndex}: chart resources`,
    );
    manifests.push(await this.installTier(graph, finalIndex, batches.deferred, [own], options));

    return { manifest: joinManifests(manifests), batches };
  }

  private async renderOwn(graph: DependencyGraph, index: number, chart: Chart): Promise<string> {
    try {
      return await this.renderer.render(chart);
    } catch (err) {
      throw new TierInstallError(graph.chart, index, err);
    }
  }

  /**
   * Install one tier: run every node concurrently, submit the rendered leaf
   * manifests (plus `extra`) in one create call and optionally wait.
   */
  private async installTier(
    graph: DependencyGraph,
    index: number,
    names: readonly string[],
    extra: readonly string[],
    options: OrderedInstallOptions,
  ): Promise<string> {
    const controller = new AbortController();
    const forward = () => controller.abort(options.signal?.reason);
    options.signal?.addEventListener("abort", forward, { once: true });

    const outcomes = await Promise.allSettled(
      names.map(async (name): Promise<NodeOutcome> => {
        try {
          return await this.installNode(graph, name, { ...options, signal: controller.signal });
        } catch (err) {
          controller.abort(err);
          throw err;
        }
      }),
    );
    options.signal?.removeEventListener("abort", forward);

    const parts: string[] = [];
    const leaves: string[] = [];
    for (const outcome of outcomes) {
      if (outcome.status === "rejected") {
        throw new TierInstallError(graph.chart, index, outcome.reason);
      }
      parts.push(outcome.value.manifest);
      if (!outcome.value.installed) leaves.push(outcome.value.manifest);
    }
    parts.push(...extra);
    leaves.push(...extra);

    try {
      await this.submit(joinManifests(leaves), options);
    } catch (err) {
      throw new TierInstallError(graph.chart, index, err);
    }
    return joinManifests(parts);
  }

  private async installNode(graph: DependencyGraph, name: string, options: OrderedInstallOptions): Promise<NodeOutcome> {
    const node = graph.nodes.get(name);
    if (!node) throw new Error(`subchart ${name} is not part of chart ${graph.chart}`);
    options.signal?.throwIfAborted();

    if ((node.chart.subcharts ?? []).length > 0) {
      const result = await this.installOrdered(node.chart, options);
      return { installed: true, manifest: result.manifest };
    }
    return { installed: false, manifest: await this.renderer.render(node.chart) };
  }

  private async submit(manifest: string, options: OrderedInstallOptions): Promise<void> {
    if (manifest === "") return;

    let resources: ResourceList;
    try {
      resources = await this.client.build(manifest, true);
    } catch (err) {
      throw new ManifestParseError("unable to build kubernetes objects from tier manifest", err);
    }
    if (resources.resources.length === 0) return;

    await this.client.create(resources, { serverSideApply: options.serverSideApply ?? false });
    if (options.wait) {
      const waiter = await this.client.getWaiter("ordered");
      await waiter.wait(resources, options.timeoutMs);
    }
  }
}

// =============================================================================
// Flat
// =============================================================================

export class FlatInstaller {
  private readonly client: ResourceClient;
  private readonly renderer: ChartRenderer;
  private readonly logger: ReleaseLogger;

  constructor(deps: InstallerDeps) {
    this.client = deps.client;
    this.renderer = deps.renderer;
    this.logger = deps.logger ?? getReleaseLogger("installer");
  }

  async installFlat(chart: Chart, options: FlatInstallOptions): Promise<ChartInstallResult> {
    const manifest = joinManifests(await this.renderTree(chart));
    this.logger.info("installing chart in a single batch", { chart: chart.metadata.name });
    if (manifest === "") return { manifest, batches: null };

    let resources: ResourceList;
    try {
      resources = await this.client.build(manifest, true);
    } catch (err) {
      throw new ManifestParseError("unable to build kubernetes objects from chart manifest", err);
    }

    await this.client.create(resources, { serverSideApply: options.serverSideApply ?? false });
    if (options.wait && options.waitStrategy !== "hookOnly") {
      const waiter = await this.client.getWaiter(options.waitStrategy);
      await waiter.wait(resources, options.timeoutMs);
    }
    return { manifest, batches: null };
  }

  /** Subcharts depth-first, then the chart itself. */
  private async renderTree(chart: Chart): Promise<string[]> {
    const parts: string[] = [];
    for (const sub of chart.subcharts ?? []) {
      parts.push(...(await this.renderTree(sub)));
    }
    parts.push(await this.renderer.render(chart));
    return parts;
  }
}

// =============================================================================
// Router
// =============================================================================

/** Routes the `ordered` strategy to tiered installation and everything else to the flat path. */
export class ChartInstaller {
  private readonly ordered: OrderedInstaller;
  private readonly flat: FlatInstaller;

  constructor(deps: InstallerDeps) {
    this.ordered = new OrderedInstaller(deps);
    this.flat = new FlatInstaller(deps);
  }

  async install(chart: Chart, options: ChartInstallOptions): Promise<ChartInstallResult> {
    if (options.waitStrategy === "ordered") {
      return this.ordered.installOrdered(chart, {
        wait: options.wait,
        timeoutMs: options.timeoutMs,
        serverSideApply: options.serverSideApply,
        signal: options.signal,
      });
    }
    return this.flat.installFlat(chart, options);
  }
}
