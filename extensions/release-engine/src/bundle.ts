/**
 * Chart bundles: a pre-rendered chart plus its hooks, read from YAML or JSON.
 */

import { readFile } from "node:fs/promises";
import { Value } from "@sinclair/typebox/value";
import { parse as parseYaml } from "yaml";
import { ReleaseEngineError, errorMessage } from "./errors.js";
import { ChartBundleSchema } from "./schemas.js";
import type { ChartBundle } from "./types.js";

/** Validate an already-parsed bundle document. */
export function parseChartBundle(doc: unknown, source = "bundle"): ChartBundle {
  if (Value.Check(ChartBundleSchema, doc)) return doc;

  const problems = [...Value.Errors(ChartBundleSchema, doc)]
    .slice(0, 5)
    .map((e) => `${e.path || "/"}: ${e.message}`);
  throw new ReleaseEngineError(`${source} is not a valid chart bundle: ${problems.join("; ")}`);
}

export async function loadChartBundle(file: string): Promise<ChartBundle> {
  let text: string;
  try {
    text = await readFile(file, "utf-8");
  } catch (err) {
    throw new ReleaseEngineError(`cannot read ${file}: ${errorMessage(err)}`, { cause: err });
  }

  let doc: unknown;
  try {
    doc = parseYaml(text);
  } catch (err) {
    throw new ReleaseEngineError(`${file} is not valid YAML: ${errorMessage(err)}`, { cause: err });
  }
  return parseChartBundle(doc, file);
}
