/**
 * Release CLI commands (chartwise release plan/install/hooks/status).
 */

import type { Command } from "commander";
import { newReleaseAccessor, type ReleaseAccessor } from "./accessor.js";
import type { ContainerLog } from "./client.js";
import { loadEngineConfig, type EngineConfig } from "./config.js";
import { buildDependencyGraph, computeInstallationBatches } from "./dependency-graph.js";
import { errorMessage } from "./errors.js";
import { createReleaseLogger, setGlobalReleaseLogger, type ReleaseLogger } from "./logger.js";
import { isHookEvent, type Chart } from "./types.js";

interface ReleaseCliContext {
  program: Command;
}

interface EngineFlags {
  config?: string;
  namespace?: string;
  waitStrategy?: string;
  timeout?: string;
  wait?: boolean;
  serverSide?: boolean;
}

/** Lines describing the tiers `chart` (and every nested parent chart) installs in. */
export function formatInstallPlan(chart: Chart, indent = ""): string[] {
  const { tiers, deferred } = computeInstallationBatches(buildDependencyGraph(chart));
  const lines = [`${indent}${chart.metadata.name}`];
  for (const [index, tier] of tiers.entries()) {
    lines.push(`${indent}  tier ${index}: ${tier.join(", ")}`);
  }
  lines.push(`${indent}  tier ${tiers.length}: ${[...deferred, `(${chart.metadata.name} resources)`].join(", ")}`);

  for (const sub of chart.subcharts ?? []) {
    if ((sub.subcharts ?? []).length > 0) lines.push(...formatInstallPlan(sub, `${indent}  `));
  }
  return lines;
}

export function formatReleaseStatus(rel: ReleaseAccessor): string[] {
  const lines = [
    `NAME: ${rel.name()}`,
    `NAMESPACE: ${rel.namespace()}`,
    `REVISION: ${rel.version()}`,
    `STATUS: ${rel.status()}`,
    `LAST DEPLOYED: ${rel.deployedAt()?.toISOString() ?? "-"}`,
  ];
  const hooks = rel.hooks();
  if (hooks.length > 0) {
    lines.push("HOOKS:");
    for (const hook of hooks) {
      lines.push(`  ${hook.path()} [${hook.kind()}] ${hook.lastRun().phase}`);
    }
  }
  return lines;
}

function printHookLog(entry: ContainerLog): void {
  console.log(`--- ${entry.namespace}/${entry.pod}/${entry.container} ---`);
  console.log(entry.log.trimEnd());
}

async function openEngine(flags: EngineFlags) {
  const overrides: Record<string, unknown> = {};
  if (flags.namespace) overrides.namespace = flags.namespace;
  if (flags.waitStrategy) overrides.waitStrategy = flags.waitStrategy;
  if (flags.timeout) overrides.timeout = flags.timeout;
  if (flags.wait === false) overrides.wait = false;
  if (flags.serverSide) overrides.serverSideApply = true;

  const config: EngineConfig = await loadEngineConfig({ file: flags.config, overrides });
  const logger: ReleaseLogger = createReleaseLogger("chartwise", { level: config.logLevel });
  setGlobalReleaseLogger(logger);

  const { KubectlClient } = await import("./kubectl-client.js");
  const { FileReleaseStore } = await import("./storage.js");

  const client = new KubectlClient({
    binary: config.kubectlBinary,
    namespace: config.namespace,
    context: config.kubeContext,
    kubeconfig: config.kubeconfig,
    logger: logger.child("kubectl"),
  });
  const store = new FileReleaseStore(config.storagePath);
  await store.initialize();

  return { config, logger, client, store };
}

function fail(err: unknown): void {
  console.error(`Error: ${errorMessage(err)}`);
  process.exitCode = 1;
}

export function createReleaseCli() {
  return (ctx: ReleaseCliContext) => {
    const release = ctx.program.command("release").description("Chart release lifecycle operations");

    release
      .command("plan")
      .description("Show the installation tiers of a chart bundle")
      .argument("<bundle>", "path to a chart bundle (YAML or JSON)")
      .action(async (file: string) => {
        const { loadChartBundle } = await import("./bundle.js");
        try {
          const bundle = await loadChartBundle(file);
          for (const line of formatInstallPlan(bundle.chart)) console.log(line);
        } catch (err) {
          fail(err);
        }
      });

    release
      .command("install")
      .description("Install a chart bundle as a new release revision")
      .argument("<name>", "release name")
      .argument("<bundle>", "path to a chart bundle (YAML or JSON)")
      .option("-c, --config <file>", "engine configuration file")
      .option("-n, --namespace <ns>", "release namespace")
      .option("--wait-strategy <strategy>", "hookOnly, legacy, watcher or ordered")
      .option("--timeout <duration>", "per-wait timeout, e.g. 5m0s")
      .option("--no-wait", "do not wait for resources to become ready")
      .option("--server-side", "use server-side apply")
      .action(async (name: string, file: string, opts: EngineFlags) => {
        const { loadChartBundle } = await import("./bundle.js");
        const { ReleaseDeployer } = await import("./deployer.js");
        const { PrerenderedChartRenderer } = await import("./renderer.js");
        try {
          const bundle = await loadChartBundle(file);
          const { config, logger, client, store } = await openEngine(opts);
          try {
            const deployer = new ReleaseDeployer({
              client,
              renderer: new PrerenderedChartRenderer(),
              store,
              logs: client,
              output: printHookLog,
              logger: logger.child("deployer"),
            });
            const snapshot = await deployer.install(name, bundle, {
              namespace: config.namespace,
              waitStrategy: config.waitStrategy,
              wait: config.wait,
              timeoutMs: config.timeoutMs,
              serverSideApply: config.serverSideApply,
            });
            for (const line of formatReleaseStatus(newReleaseAccessor(snapshot))) console.log(line);
          } finally {
            await store.close();
          }
        } catch (err) {
          fail(err);
        }
      });

    release
      .command("hooks")
      .description("Run the hooks of one lifecycle event against the latest revision")
      .argument("<name>", "release name")
      .argument("<event>", "hook event, e.g. test or pre-upgrade")
      .option("-c, --config <file>", "engine configuration file")
      .option("--timeout <duration>", "per-hook timeout, e.g. 5m0s")
      .action(async (name: string, event: string, opts: EngineFlags) => {
        const { ReleaseDeployer } = await import("./deployer.js");
        const { PrerenderedChartRenderer } = await import("./renderer.js");
        try {
          if (!isHookEvent(event)) throw new Error(`unknown hook event "${event}"`);
          const { config, logger, client, store } = await openEngine(opts);
          try {
            const deployer = new ReleaseDeployer({
              client,
              renderer: new PrerenderedChartRenderer(),
              store,
              logs: client,
              output: printHookLog,
              logger: logger.child("deployer"),
            });
            const snapshot = await deployer.runHooks(name, event, {
              waitStrategy: config.waitStrategy,
              timeoutMs: config.timeoutMs,
              serverSideApply: config.serverSideApply,
            });
            for (const line of formatReleaseStatus(newReleaseAccessor(snapshot))) console.log(line);
          } finally {
            await store.close();
          }
        } catch (err) {
          fail(err);
        }
      });

    release
      .command("status")
      .description("Show the latest revision of a release")
      .argument("<name>", "release name")
      .option("-c, --config <file>", "engine configuration file")
      .action(async (name: string, opts: EngineFlags) => {
        try {
          const { store } = await openEngine(opts);
          try {
            const rel = newReleaseAccessor(await store.last(name));
            for (const line of formatReleaseStatus(rel)) console.log(line);
          } finally {
            await store.close();
          }
        } catch (err) {
          fail(err);
        }
      });
  };
}
