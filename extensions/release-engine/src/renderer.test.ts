/**
 * Pre-rendered chart renderer — Unit Tests
 */

import { describe, it, expect } from "vitest";
import { PrerenderedChartRenderer } from "./renderer.js";

describe("PrerenderedChartRenderer", () => {
  const renderer = new PrerenderedChartRenderer();

  it("labels each template with its source and skips blank ones", async () => {
    const manifest = await renderer.render({
      metadata: { name: "shop", version: "1.0.0" },
      templates: [
        { name: "service.yaml", data: "kind: Service\n" },
        { name: "NOTES.txt", data: "  \n" },
        { name: "deployment.yaml", data: "\nkind: Deployment\n" },
      ],
      subcharts: [{ metadata: { name: "db", version: "1.0.0" }, templates: [{ name: "db.yaml", data: "kind: StatefulSet" }] }],
    });

    expect(manifest).toBe("# Source: shop/service.yaml\nkind: Service\n---\n# Source: shop/deployment.yaml\nkind: Deployment");
  });

  it("renders nothing for a chart without templates", async () => {
    expect(await renderer.render({ metadata: { name: "empty", version: "0.0.1" } })).toBe("");
  });
});
