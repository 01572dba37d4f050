/**
 * kubectl resource client — Unit Tests
 *
 * Mocks `node:child_process` execFile to verify the kubectl argument arrays
 * and how output and failures are turned into results.
 */

import { readFileSync } from "node:fs";
import { describe, it, expect, vi, beforeEach } from "vitest";

/* ---------- mock setup ---------- */

const execFileMock = vi.hoisted(() => vi.fn());

vi.mock("node:child_process", () => ({
  execFile: execFileMock,
}));

import { KubectlClient, hookCondition, readyCondition, resourceRef } from "./kubectl-client.js";
import { MemoryTransport, createReleaseLogger } from "./logger.js";
import { parseManifest } from "./manifest.js";
import type { ContainerLog } from "./client.js";

/* ---------- helpers ---------- */

type ExecCallback = (err: Error | null, result?: { stdout: string; stderr: string }) => void;

function resolveWith(stdout: string) {
  execFileMock.mockImplementation((_cmd: string, _args: string[], _opts: unknown, cb: ExecCallback) => {
    cb(null, { stdout, stderr: "" });
  });
}

/** Reject calls whose args include `match`, the way execFile reports a non-zero exit. */
function failWhen(match: string, stderr: string) {
  execFileMock.mockImplementation((_cmd: string, args: string[], _opts: unknown, cb: ExecCallback) => {
    if (args.includes(match)) {
      cb(Object.assign(new Error("Command failed"), { stderr }));
    } else {
      cb(null, { stdout: "", stderr: "" });
    }
  });
}

function calledArgs(call = 0): string[] {
  return execFileMock.mock.calls[call][1];
}

function client(options: ConstructorParameters<typeof KubectlClient>[0] = {}): KubectlClient {
  return new KubectlClient({
    logger: createReleaseLogger("test", { transports: [new MemoryTransport()] }),
    ...options,
  });
}

const WEB = parseManifest(`apiVersion: apps/v1
kind: Deployment
metadata:
  name: web
---
apiVersion: v1
kind: ConfigMap
metadata:
  name: settings
  namespace: shop
`);

beforeEach(() => {
  execFileMock.mockReset();
  resolveWith("");
});

/* ================================================================
   helpers
   ================================================================ */

describe("resource conditions", () => {
  it("maps kinds to kubectl wait conditions", () => {
    expect(readyCondition("Deployment")).toBe("condition=Available");
    expect(readyCondition("ConfigMap")).toBeNull();
    expect(hookCondition("Job")).toBe("condition=complete");
    expect(hookCondition("Pod")).toBe("jsonpath={.status.phase}=Succeeded");
    expect(hookCondition("Secret")).toBeNull();
  });

  it("builds lower-cased kind/name references", () => {
    expect(WEB.resources.map(resourceRef)).toEqual(["deployment/web", "configmap/settings"]);
  });
});

/* ================================================================
   run
   ================================================================ */

describe("KubectlClient.run", () => {
  it("appends namespace, context and kubeconfig", async () => {
    resolveWith("v1.30.0");
    const out = await client({ binary: "/usr/local/bin/kubectl", context: "kind-dev", kubeconfig: "/tmp/kc" }).run(
      ["version", "--client"],
      "apps",
    );

    expect(out).toBe("v1.30.0");
    expect(execFileMock.mock.calls[0][0]).toBe("/usr/local/bin/kubectl");
    expect(calledArgs()).toEqual(["version", "--client", "-n", "apps", "--context", "kind-dev", "--kubeconfig", "/tmp/kc"]);
  });

  it("passes extra environment variables", async () => {
    await client({ env: { KUBECACHEDIR: "/tmp/cache" } }).run(["version"]);

    expect(execFileMock.mock.calls[0][2]).toMatchObject({ env: { KUBECACHEDIR: "/tmp/cache" } });
  });

  it("reports stderr of a failed command", async () => {
    failWhen("version", "error: connection refused\n");

    await expect(client().run(["version"])).rejects.toThrow("kubectl version: error: connection refused");
  });

  it("falls back to the error message when stderr is empty", async () => {
    failWhen("version", "");

    await expect(client().run(["version"])).rejects.toThrow("kubectl version: Command failed");
  });
});

/* ================================================================
   create
   ================================================================ */

describe("KubectlClient.create", () => {
  it("creates resources from a temporary List file", async () => {
    let written: unknown;
    execFileMock.mockImplementation((_cmd: string, args: string[], _opts: unknown, cb: ExecCallback) => {
      written = JSON.parse(readFileSync(args[2], "utf-8"));
      cb(null, { stdout: "", stderr: "" });
    });

    await client().create(WEB, { serverSideApply: false });

    expect(calledArgs()).toEqual(["create", "-f", expect.stringMatching(/resources\.json$/), "-n", "default"]);
    expect(written).toEqual({ apiVersion: "v1", kind: "List", items: WEB.resources });
  });

  it("uses server-side apply and forces conflicts when asked", async () => {
    await client({ namespace: "apps" }).create(WEB, { serverSideApply: true, forceConflicts: true });

    expect(calledArgs()).toEqual([
      "apply",
      "--server-side",
      "-f",
      expect.stringMatching(/resources\.json$/),
      "--force-conflicts",
      "-n",
      "apps",
    ]);
  });

  it("ignores forceConflicts without server-side apply", async () => {
    await client().create(WEB, { serverSideApply: false, forceConflicts: true });

    expect(calledArgs()).not.toContain("--force-conflicts");
  });

  it("does nothing for an empty list", async () => {
    await client().create({ manifest: "", resources: [] }, { serverSideApply: false });

    expect(execFileMock).not.toHaveBeenCalled();
  });
});

/* ================================================================
   delete
   ================================================================ */

describe("KubectlClient.delete", () => {
  it("deletes each resource in its own namespace", async () => {
    const errors = await client().delete(WEB, "background");

    expect(errors).toEqual([]);
    expect(calledArgs(0)).toEqual([
      "delete",
      "deployment/web",
      "--cascade=background",
      "--ignore-not-found",
      "--wait=false",
      "-n",
      "default",
    ]);
    expect(calledArgs(1)).toEqual([
      "delete",
      "configmap/settings",
      "--cascade=background",
      "--ignore-not-found",
      "--wait=false",
      "-n",
      "shop",
    ]);
  });

  it("collects failures and keeps going", async () => {
    failWhen("deployment/web", "forbidden");

    const errors = await client().delete(WEB, "foreground");

    expect(execFileMock).toHaveBeenCalledTimes(2);
    expect(errors.map((e) => e.message)).toEqual([
      "kubectl delete deployment/web --cascade=foreground --ignore-not-found --wait=false -n default: forbidden",
    ]);
  });
});

/* ================================================================
   waiter
   ================================================================ */

describe("KubectlWaiter", () => {
  it("waits only for kinds with a readiness condition", async () => {
    const waiter = await client().getWaiter("watcher");
    await waiter.wait(WEB, 90_000);

    expect(execFileMock).toHaveBeenCalledTimes(1);
    expect(calledArgs()).toEqual(["wait", "deployment/web", "--for=condition=Available", "--timeout=90s", "-n", "default"]);
  });

  it("skips readiness waits for hookOnly", async () => {
    const waiter = await client().getWaiter("hookOnly");
    await waiter.wait(WEB, 90_000);

    expect(execFileMock).not.toHaveBeenCalled();
  });

  it("watches hook pods until they succeed", async () => {
    const pod = parseManifest("apiVersion: v1\nkind: Pod\nmetadata:\n  name: smoke\n  namespace: qa\n");
    const waiter = await client().getWaiter("hookOnly");
    await waiter.watchUntilReady(pod, 1_500);

    expect(calledArgs()).toEqual(["wait", "pod/smoke", "--for=jsonpath={.status.phase}=Succeeded", "--timeout=2s", "-n", "qa"]);
  });

  it("waits for deletion of every resource", async () => {
    const waiter = await client().getWaiter("legacy");
    await waiter.waitForDelete(WEB, 60_000);

    expect(execFileMock.mock.calls.map((call) => call[1][2])).toEqual(["--for=delete", "--for=delete"]);
  });

  it("shares one deadline across the resources of a wait call", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2024-05-01T10:00:00.000Z"));
    execFileMock.mockImplementation((_cmd: string, _args: string[], _opts: unknown, cb: ExecCallback) => {
      vi.setSystemTime(Date.now() + 25_000);
      cb(null, { stdout: "", stderr: "" });
    });
    const web = parseManifest(
      [1, 2, 3, 4].map((n) => `apiVersion: apps/v1\nkind: Deployment\nmetadata:\n  name: web-${n}\n`).join("---\n"),
    );

    try {
      const waiter = await client().getWaiter("ordered");
      await expect(waiter.wait(web, 60_000)).rejects.toThrow("Deployment/web-4 not ready: timed out after 60s");
    } finally {
      vi.useRealTimers();
    }

    expect(execFileMock.mock.calls.map((call) => call[1][3])).toEqual(["--timeout=60s", "--timeout=35s", "--timeout=10s"]);
  });

  it("names the resource that did not become ready", async () => {
    failWhen("deployment/web", "timed out waiting for the condition\n");
    const waiter = await client().getWaiter("ordered");

    await expect(waiter.wait(WEB, 90_000)).rejects.toThrow(
      "Deployment/web not ready: kubectl wait deployment/web --for=condition=Available --timeout=90s -n default: " +
        "timed out waiting for the condition",
    );
  });
});

/* ================================================================
   pods and logs
   ================================================================ */

describe("KubectlClient pod logs", () => {
  it("lists pods by label and field selector", async () => {
    resolveWith(
      JSON.stringify({
        items: [
          { metadata: { name: "migrate-x1", namespace: "apps" }, spec: { containers: [{ name: "main" }] } },
          { metadata: { name: "migrate-x2" }, spec: { containers: [{ name: "main" }, { name: "sidecar" }] } },
        ],
      }),
    );

    const pods = await client().getPodList("apps", { labelSelector: "job-name=migrate", fieldSelector: "status.phase=Failed" });

    expect(calledArgs()).toEqual([
      "get",
      "pods",
      "-o",
      "json",
      "-l",
      "job-name=migrate",
      "--field-selector",
      "status.phase=Failed",
      "-n",
      "apps",
    ]);
    expect(pods).toEqual([
      { name: "migrate-x1", namespace: "apps", containers: ["main"] },
      { name: "migrate-x2", namespace: "apps", containers: ["main", "sidecar"] },
    ]);
  });

  it("rejects output that is not a pod list", async () => {
    resolveWith(JSON.stringify({ kind: "Status" }));

    await expect(client().getPodList("apps", {})).rejects.toThrow("unexpected output from kubectl get pods");
  });

  it("sends each container's logs to the sink", async () => {
    execFileMock.mockImplementation((_cmd: string, args: string[], _opts: unknown, cb: ExecCallback) => {
      cb(null, { stdout: `output of ${args[1]}/${args[3]}`, stderr: "" });
    });
    const logs: ContainerLog[] = [];

    await client().outputContainerLogs(
      [{ name: "migrate-x1", namespace: "apps", containers: ["main", "sidecar"] }],
      "apps",
      (entry) => logs.push(entry),
    );

    expect(calledArgs(0)).toEqual(["logs", "migrate-x1", "-c", "main", "-n", "apps"]);
    expect(logs).toEqual([
      { namespace: "apps", pod: "migrate-x1", container: "main", log: "output of migrate-x1/main" },
      { namespace: "apps", pod: "migrate-x1", container: "sidecar", log: "output of migrate-x1/sidecar" },
    ]);
  });
});
