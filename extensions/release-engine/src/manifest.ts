/**
 * Kubernetes manifest helpers. Splits multi-document YAML into resources,
 * reads a hook's target namespace and joins rendered manifests in install order.
 */

import { parseAllDocuments } from "yaml";
import { ManifestParseError } from "./errors.js";

/* ---------- Resources ---------- */

export interface K8sMetadata {
  name: string;
  namespace?: string;
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
}

export interface K8sResource {
  apiVersion: string;
  kind: string;
  metadata: K8sMetadata;
  [field: string]: unknown;
}

/** A built set of resources together with the manifest text it came from. */
export interface ResourceList {
  manifest: string;
  resources: K8sResource[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every((v) => typeof v === "string");
}

/** Parse every YAML document of a manifest, skipping empty ones. */
function parseDocuments(manifest: string): unknown[] {
  const docs = parseAllDocuments(manifest);
  const values: unknown[] = [];
  for (const doc of docs) {
    if (doc.errors.length > 0) {
      throw new ManifestParseError("invalid YAML", doc.errors[0]);
    }
    const value: unknown = doc.toJS();
    if (value !== null && value !== undefined) values.push(value);
  }
  return values;
}

/**
 * Convert a document into a K8sResource. With `validate` set, apiVersion,
 * kind and metadata.name must all be present.
 */
export function toResource(doc: unknown, validate: boolean): K8sResource {
  if (!isRecord(doc)) {
    throw new ManifestParseError("manifest document is not a mapping");
  }
  const metadata = isRecord(doc.metadata) ? doc.metadata : {};
  const apiVersion = typeof doc.apiVersion === "string" ? doc.apiVersion : "";
  const kind = typeof doc.kind === "string" ? doc.kind : "";
  const name = typeof metadata.name === "string" ? metadata.name : "";

  if (validate) {
    const missing = [
      apiVersion ? null : "apiVersion",
      kind ? null : "kind",
      name ? null : "metadata.name",
    ].filter((field): field is string => field !== null);
    if (missing.length > 0) {
      throw new ManifestParseError(`resource is missing ${missing.join(", ")}`);
    }
  }

  return {
    ...doc,
    apiVersion,
    kind,
    metadata: {
      ...metadata,
      name,
      namespace: typeof metadata.namespace === "string" ? metadata.namespace : undefined,
      labels: isStringRecord(metadata.labels) ? metadata.labels : undefined,
      annotations: isStringRecord(metadata.annotations) ? metadata.annotations : undefined,
    },
  };
}

export function parseManifest(manifest: string, validate = true): ResourceList {
  let docs: unknown[];
  try {
    docs = parseDocuments(manifest);
  } catch (err) {
    if (err instanceof ManifestParseError) throw err;
    throw new ManifestParseError("unable to parse manifest", err);
  }
  return { manifest, resources: docs.map((doc) => toResource(doc, validate)) };
}

/* ---------- Namespace ---------- */

/**
 * The namespace a hook's resource lives in: `metadata.namespace` of the
 * first document, or `fallback` when that field is absent or empty. Invalid
 * YAML surfaces as the parser's own ManifestParseError.
 */
export function deriveNamespace(manifest: string, fallback: string): string {
  const first = parseDocuments(manifest)[0];
  if (isRecord(first) && isRecord(first.metadata)) {
    const ns = first.metadata.namespace;
    if (typeof ns === "string" && ns !== "") return ns;
  }
  return fallback;
}

/* ---------- Joining ---------- */

export const DOCUMENT_SEPARATOR = "\n---\n";

/** Concatenate manifests in the given order, dropping empty ones. */
export function joinManifests(parts: readonly string[]): string {
  return parts
    .map((part) => part.trim())
    .filter((part) => part !== "")
    .join(DOCUMENT_SEPARATOR);
}

/** `Kind/namespace/name` identity used in logs. */
export function resourceKey(resource: K8sResource): string {
  const ns = resource.metadata.namespace ?? "";
  return ns ? `${resource.kind}/${ns}/${resource.metadata.name}` : `${resource.kind}/${resource.metadata.name}`;
}
