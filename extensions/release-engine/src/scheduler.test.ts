/**
 * Chart installation — Unit Tests
 *
 * Runs the ordered and flat installers against the in-process mock cluster.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { ChartRenderer } from "./client.js";
import { MockCluster, configMapManifest } from "./cluster-mock.js";
import { CycleError, TierInstallError } from "./errors.js";
import { MemoryTransport, createReleaseLogger } from "./logger.js";
import { PrerenderedChartRenderer } from "./renderer.js";
import { ChartInstaller, FlatInstaller, OrderedInstaller } from "./scheduler.js";
import { DEPENDS_ON_ANNOTATION, type Chart } from "./types.js";

/* ---------- helpers ---------- */

/** A chart whose only template is a ConfigMap named after the chart. */
function chart(name: string, opts: { dependsOn?: string[]; subcharts?: Chart[] } = {}): Chart {
  return {
    metadata: {
      name,
      version: "0.1.0",
      ...(opts.dependsOn ? { annotations: { [DEPENDS_ON_ANNOTATION]: JSON.stringify(opts.dependsOn) } } : {}),
    },
    templates: [{ name: "configmap.yaml", data: configMapManifest(name) }],
    subcharts: opts.subcharts ?? [],
  };
}

function rendered(name: string): string {
  return `# Source: ${name}/configmap.yaml\n${configMapManifest(name).trim()}`;
}

function foo(): Chart {
  return chart("foo", {
    subcharts: [chart("nginx"), chart("rabbitmq"), chart("bar", { dependsOn: ["nginx", "rabbitmq"] }), chart("orphaned")],
  });
}

let cluster: MockCluster;
let deps: { client: MockCluster; renderer: ChartRenderer; logger: ReturnType<typeof createReleaseLogger> };

beforeEach(() => {
  cluster = new MockCluster();
  deps = {
    client: cluster,
    renderer: new PrerenderedChartRenderer(),
    logger: createReleaseLogger("test", { transports: [new MemoryTransport()] }),
  };
});

/* ================================================================
   OrderedInstaller
   ================================================================ */

describe("OrderedInstaller.installOrdered", () => {
  it("installs tiers in dependency order and waits between them", async () => {
    const result = await new OrderedInstaller(deps).installOrdered(foo(), { wait: true, timeoutMs: 1_000 });

    expect(cluster.events).toEqual([
      "create nginx,rabbitmq",
      "wait nginx,rabbitmq",
      "create bar",
      "wait bar",
      "create orphaned,foo",
      "wait orphaned,foo",
    ]);
    expect(cluster.waitStrategies).toEqual(["ordered", "ordered", "ordered"]);
    expect(result.batches).toEqual({ tiers: [["nginx", "rabbitmq"], ["bar"]], deferred: ["orphaned"] });
  });

  it("returns the manifest in install order", async () => {
    const result = await new OrderedInstaller(deps).installOrdered(foo(), { wait: true, timeoutMs: 1_000 });

    expect(result.manifest).toBe(["nginx", "rabbitmq", "bar", "orphaned", "foo"].map(rendered).join("\n---\n"));
  });

  it("skips readiness waits when wait is off", async () => {
    await new OrderedInstaller(deps).installOrdered(foo(), { wait: false, timeoutMs: 1_000 });

    expect(cluster.events).toEqual(["create nginx,rabbitmq", "create bar", "create orphaned,foo"]);
  });

  it("passes server-side apply to every create", async () => {
    await new OrderedInstaller(deps).installOrdered(foo(), { wait: false, timeoutMs: 1_000, serverSideApply: true });

    expect(cluster.createOptions).toEqual([
      { serverSideApply: true },
      { serverSideApply: true },
      { serverSideApply: true },
    ]);
  });

  it("recurses into subcharts that have their own subcharts", async () => {
    const app = chart("app", {
      subcharts: [
        chart("db"),
        chart("api", {
          dependsOn: ["db"],
          subcharts: [chart("cache"), chart("worker", { dependsOn: ["cache"] })],
        }),
      ],
    });

    const result = await new OrderedInstaller(deps).installOrdered(app, { wait: true, timeoutMs: 1_000 });

    expect(cluster.events).toEqual([
      "create db",
      "wait db",
      "create cache",
      "wait cache",
      "create worker",
      "wait worker",
      "create api",
      "wait api",
      "create app",
      "wait app",
    ]);
    expect(result.manifest).toBe(["db", "cache", "worker", "api", "app"].map(rendered).join("\n---\n"));
  });

  it("installs only the chart's resources when it has no subcharts", async () => {
    const result = await new OrderedInstaller(deps).installOrdered(chart("solo"), { wait: true, timeoutMs: 1_000 });

    expect(cluster.events).toEqual(["create solo", "wait solo"]);
    expect(result.batches).toEqual({ tiers: [], deferred: [] });
  });

  it("rejects a cycle before touching the cluster", async () => {
    const cyclic = chart("foo", { subcharts: [chart("x", { dependsOn: ["y"] }), chart("y", { dependsOn: ["x"] })] });

    await expect(new OrderedInstaller(deps).installOrdered(cyclic, { wait: true, timeoutMs: 1_000 })).rejects.toThrow(
      new CycleError(["x", "y", "x"]),
    );
    expect(cluster.events).toEqual([]);
  });

  it("stops at a tier that does not become ready and reports its index", async () => {
    cluster.failWait.add("bar");

    const err = await new OrderedInstaller(deps)
      .installOrdered(foo(), { wait: true, timeoutMs: 1_000 })
      .catch((e: unknown) => e);

    if (!(err instanceof TierInstallError)) throw new Error("expected a TierInstallError");
    expect(err.chart).toBe("foo");
    expect(err.tierIndex).toBe(1);
    expect(err.message).toBe("chart foo: installation tier 1 failed: bar not ready");
    expect(cluster.events).toEqual(["create nginx,rabbitmq", "wait nginx,rabbitmq", "create bar", "wait bar"]);
  });

  it("fails a tier when one of its nodes cannot be rendered", async () => {
    const renderer: ChartRenderer = {
      render: async (c) => {
        if (c.metadata.name === "rabbitmq") throw new Error("render rabbitmq failed");
        return rendered(c.metadata.name);
      },
    };

    await expect(
      new OrderedInstaller({ ...deps, renderer }).installOrdered(foo(), { wait: true, timeoutMs: 1_000 }),
    ).rejects.toThrow("chart foo: installation tier 0 failed: render rabbitmq failed");
    expect(cluster.events).toEqual([]);
  });

  it("reports a rejected create with the tier index", async () => {
    cluster.failCreate.add("orphaned");

    await expect(
      new OrderedInstaller(deps).installOrdered(foo(), { wait: true, timeoutMs: 1_000 }),
    ).rejects.toThrow("chart foo: installation tier 2 failed: create orphaned rejected");
  });

  it("runs the nodes of a tier concurrently and stops siblings after a failure", async () => {
    const top = chart("top", {
      subcharts: [
        chart("z"),
        chart("a", { dependsOn: ["z"], subcharts: [chart("a1"), chart("a2", { dependsOn: ["a1"] })] }),
        chart("b", { dependsOn: ["z"], subcharts: [chart("b1"), chart("b2", { dependsOn: ["b1"] })] }),
      ],
    });
    cluster.createDelayMs.set("a1", 20);
    cluster.failCreate.add("b1");

    const err = await new OrderedInstaller(deps)
      .installOrdered(top, { wait: true, timeoutMs: 1_000 })
      .catch((e: unknown) => e);

    if (!(err instanceof TierInstallError)) throw new Error("expected a TierInstallError");
    expect(err.tierIndex).toBe(1);
    expect(err.message).toBe(
      "chart top: installation tier 1 failed: chart b: installation tier 0 failed: create b1 rejected",
    );
    // b1 is rejected while a1 is still being created; a never reaches its next tier.
    expect(cluster.events).toEqual(["create z", "wait z", "create b1", "create a1", "wait a1"]);
  });

  it("does not start when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort(new Error("cancelled"));

    await expect(
      new OrderedInstaller(deps).installOrdered(foo(), { wait: true, timeoutMs: 1_000, signal: controller.signal }),
    ).rejects.toThrow("cancelled");
    expect(cluster.events).toEqual([]);
  });
});

/* ================================================================
   FlatInstaller
   ================================================================ */

describe("FlatInstaller.installFlat", () => {
  it("installs everything in one batch regardless of dependencies", async () => {
    const result = await new FlatInstaller(deps).installFlat(foo(), {
      waitStrategy: "watcher",
      wait: true,
      timeoutMs: 1_000,
    });

    expect(cluster.events).toEqual(["create nginx,rabbitmq,bar,orphaned,foo", "wait nginx,rabbitmq,bar,orphaned,foo"]);
    expect(cluster.waitStrategies).toEqual(["watcher"]);
    expect(result).toEqual({
      manifest: ["nginx", "rabbitmq", "bar", "orphaned", "foo"].map(rendered).join("\n---\n"),
      batches: null,
    });
  });

  it("renders nested subcharts depth-first", async () => {
    const app = chart("app", { subcharts: [chart("api", { subcharts: [chart("cache")] }), chart("db")] });

    await new FlatInstaller(deps).installFlat(app, { waitStrategy: "legacy", wait: true, timeoutMs: 1_000 });

    expect(cluster.events[0]).toBe("create cache,api,db,app");
  });

  it("does not wait for regular resources with hookOnly", async () => {
    await new FlatInstaller(deps).installFlat(foo(), { waitStrategy: "hookOnly", wait: true, timeoutMs: 1_000 });

    expect(cluster.events).toEqual(["create nginx,rabbitmq,bar,orphaned,foo"]);
  });

  it("installs charts with cyclic declarations", async () => {
    const cyclic = chart("foo", { subcharts: [chart("x", { dependsOn: ["y"] }), chart("y", { dependsOn: ["x"] })] });

    await new FlatInstaller(deps).installFlat(cyclic, { waitStrategy: "watcher", wait: false, timeoutMs: 1_000 });

    expect(cluster.events).toEqual(["create x,y,foo"]);
  });
});

/* ================================================================
   ChartInstaller
   ================================================================ */

describe("ChartInstaller.install", () => {
  it("uses tiers for the ordered strategy", async () => {
    const result = await new ChartInstaller(deps).install(foo(), {
      waitStrategy: "ordered",
      wait: true,
      timeoutMs: 1_000,
    });

    expect(result.batches?.tiers).toEqual([["nginx", "rabbitmq"], ["bar"]]);
    expect(cluster.events).toHaveLength(6);
  });

  it.each(["hookOnly", "legacy", "watcher"] as const)("uses a single batch for %s", async (waitStrategy) => {
    const result = await new ChartInstaller(deps).install(foo(), { waitStrategy, wait: true, timeoutMs: 1_000 });

    expect(result.batches).toBeNull();
    expect(cluster.events.filter((e) => e.startsWith("create"))).toEqual(["create nginx,rabbitmq,bar,orphaned,foo"]);
  });
});
