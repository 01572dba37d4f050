/**
 * Subchart dependency graph
 *
 * One graph per chart, scoped to its direct subcharts. An edge A -> B means
 * A must be ready before B is installed. Nested subcharts are resolved by
 * their own graph when the scheduler recurses into them.
 */

import { CycleError, DependencyGraphError, errorMessage } from "./errors.js";
import { DEPENDS_ON_ANNOTATION, type Chart } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export interface DependencyGraphNode {
  name: string;
  chart: Chart;
  /** Sibling names that must be ready first. */
  dependsOn: Set<string>;
}

export interface DependencyGraph {
  /** Owning chart name. */
  chart: string;
  /** Keyed by subchart name, in name order. */
  nodes: Map<string, DependencyGraphNode>;
}

export interface InstallationBatches {
  /** Tiers in install order, each sorted by name. */
  tiers: string[][];
  /** Nodes with no edges at all; installed alongside the owning chart's resources. */
  deferred: string[];
}

// =============================================================================
// Construction
// =============================================================================

function byName(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Parse the depends-on annotation: a JSON array of sibling names. */
export function parseDependsOnAnnotation(chartName: string, value: string | undefined): string[] {
  if (value === undefined || value.trim() === "") return [];
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (err) {
    throw new DependencyGraphError(
      `subchart ${chartName}: annotation ${DEPENDS_ON_ANNOTATION} is not valid JSON: ${errorMessage(err)}`,
    );
  }
  if (!Array.isArray(parsed) || !parsed.every((item): item is string => typeof item === "string")) {
    throw new DependencyGraphError(
      `subchart ${chartName}: annotation ${DEPENDS_ON_ANNOTATION} must be a JSON array of strings`,
    );
  }
  return parsed;
}

/**
 * Build the graph over `chart`'s direct subcharts. Dependencies come from the
 * subchart's depends-on annotation and from the parent's `dependencies[].dependsOn`.
 */
export function buildDependencyGraph(chart: Chart): DependencyGraph {
  const owner = chart.metadata.name;
  const subcharts = [...(chart.subcharts ?? [])].sort((a, b) => byName(a.metadata.name, b.metadata.name));

  const nodes = new Map<string, DependencyGraphNode>();
  for (const sub of subcharts) {
    const name = sub.metadata.name;
    if (nodes.has(name)) {
      throw new DependencyGraphError(`chart ${owner}: duplicate subchart ${name}`);
    }
    const deps = new Set(parseDependsOnAnnotation(name, sub.metadata.annotations?.[DEPENDS_ON_ANNOTATION]));
    nodes.set(name, { name, chart: sub, dependsOn: deps });
  }

  for (const dep of chart.metadata.dependencies ?? []) {
    const node = nodes.get(dep.name);
    if (!node) {
      if (dep.dependsOn && dep.dependsOn.length > 0) {
        throw new DependencyGraphError(`chart ${owner}: dependency ${dep.name} is not a subchart`);
      }
      continue;
    }
    for (const name of dep.dependsOn ?? []) node.dependsOn.add(name);
  }

  for (const node of nodes.values()) {
    for (const name of node.dependsOn) {
      if (!nodes.has(name)) {
        throw new DependencyGraphError(`chart ${owner}: subchart ${node.name} depends on unknown subchart ${name}`);
      }
    }
  }

  return { chart: owner, nodes };
}

// =============================================================================
// Cycle Detection (DFS)
// =============================================================================

const WHITE = 0;
const GRAY = 1;
const BLACK = 2;

/**
 * Find a dependency cycle. Returns the cycle as a closed path
 * (`["x", "y", "x"]`), or null when the graph is acyclic.
 */
export function detectCycle(graph: DependencyGraph): string[] | null {
  const color = new Map<string, number>();
  for (const name of graph.nodes.keys()) color.set(name, WHITE);

  const path: string[] = [];

  const visit = (name: string): string[] | null => {
    color.set(name, GRAY);
    path.push(name);

    const deps = [...(graph.nodes.get(name)?.dependsOn ?? [])].sort(byName);
    for (const dep of deps) {
      const state = color.get(dep);
      if (state === GRAY) {
        return [...path.slice(path.indexOf(dep)), dep];
      }
      if (state === WHITE) {
        const cycle = visit(dep);
        if (cycle) return cycle;
      }
    }

    path.pop();
    color.set(name, BLACK);
    return null;
  };

  for (const name of graph.nodes.keys()) {
    if (color.get(name) !== WHITE) continue;
    const cycle = visit(name);
    if (cycle) return cycle;
  }
  return null;
}

/** Throw a {@link CycleError} if the graph has a cycle. */
export function assertAcyclic(graph: DependencyGraph): void {
  const cycle = detectCycle(graph);
  if (cycle) throw new CycleError(cycle);
}

// =============================================================================
// Tiers
// =============================================================================

/**
 * Peel the graph into installation tiers. Nodes without any edge are not
 * placed in the first tier but deferred to the trailing one.
 */
export function computeInstallationBatches(graph: DependencyGraph): InstallationBatches {
  assertAcyclic(graph);

  const dependedOn = new Set<string>();
  for (const node of graph.nodes.values()) {
    for (const dep of node.dependsOn) dependedOn.add(dep);
  }

  const deferred: string[] = [];
  const pending = new Map<string, Set<string>>();
  for (const node of graph.nodes.values()) {
    if (node.dependsOn.size === 0 && !dependedOn.has(node.name)) {
      deferred.push(node.name);
    } else {
      pending.set(node.name, node.dependsOn);
    }
  }

  const placed = new Set<string>();
  const tiers: string[][] = [];
  while (pending.size > 0) {
    const tier = [...pending.entries()]
      .filter(([, deps]) => [...deps].every((dep) => placed.has(dep)))
      .map(([name]) => name)
      .sort(byName);
    // Unreachable after assertAcyclic.
    if (tier.length === 0) throw new CycleError([...pending.keys()]);

    for (const name of tier) {
      pending.delete(name);
      placed.add(name);
    }
    tiers.push(tier);
  }

  return { tiers, deferred: deferred.sort(byName) };
}
