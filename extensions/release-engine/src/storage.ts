/**
 * Release storage (InMemory + YAML files)
 *
 * Snapshots are stored whole, in whichever schema version they were written,
 * and validated through the release accessor when read back.
 */

import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { basename, join } from "node:path";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { newReleaseAccessor } from "./accessor.js";
import { ReleaseEngineError, ReleaseNotFoundError, errorMessage } from "./errors.js";
import type { ReleaseSnapshot } from "./types.js";

export interface ReleaseStore {
  initialize(): Promise<void>;
  /** Store a new revision; fails if that name/version already exists. */
  create(release: ReleaseSnapshot): Promise<void>;
  /** Overwrite an existing revision. */
  update(release: ReleaseSnapshot): Promise<void>;
  get(name: string, version: number): Promise<ReleaseSnapshot>;
  /** Highest revision of a release. */
  last(name: string): Promise<ReleaseSnapshot>;
  /** Every revision, oldest first. */
  history(name: string): Promise<ReleaseSnapshot[]>;
  close(): Promise<void>;
}

function identity(release: ReleaseSnapshot): { name: string; version: number } {
  const rel = newReleaseAccessor(release);
  return { name: rel.name(), version: rel.version() };
}

function key(name: string, version: number): string {
  return `${name}.v${version}`;
}

// ── InMemory ────────────────────────────────────────────────────

export class InMemoryReleaseStore implements ReleaseStore {
  private releases = new Map<string, ReleaseSnapshot>();

  async initialize(): Promise<void> {}

  async create(release: ReleaseSnapshot): Promise<void> {
    const { name, version } = identity(release);
    if (this.releases.has(key(name, version))) {
      throw new ReleaseEngineError(`release ${name} version ${version} already exists`);
    }
    this.releases.set(key(name, version), structuredClone(release));
  }

  async update(release: ReleaseSnapshot): Promise<void> {
    const { name, version } = identity(release);
    if (!this.releases.has(key(name, version))) throw new ReleaseNotFoundError(name, version);
    this.releases.set(key(name, version), structuredClone(release));
  }

  async get(name: string, version: number): Promise<ReleaseSnapshot> {
    const release = this.releases.get(key(name, version));
    if (!release) throw new ReleaseNotFoundError(name, version);
    return structuredClone(release);
  }

  async last(name: string): Promise<ReleaseSnapshot> {
    const revisions = await this.history(name);
    const latest = revisions.at(-1);
    if (!latest) throw new ReleaseNotFoundError(name);
    return latest;
  }

  async history(name: string): Promise<ReleaseSnapshot[]> {
    return [...this.releases.values()]
      .filter((r) => newReleaseAccessor(r).name() === name)
      .sort((a, b) => newReleaseAccessor(a).version() - newReleaseAccessor(b).version())
      .map((r) => structuredClone(r));
  }

  async close(): Promise<void> {
    this.releases.clear();
  }
}

// ── File ────────────────────────────────────────────────────────

/**
 * One YAML file per release (`<dir>/<name>.yaml`) holding every revision under
 * `revisions`, oldest first. Files are replaced through a rename.
 */
export class FileReleaseStore implements ReleaseStore {
  constructor(private readonly dir: string) {}

  async initialize(): Promise<void> {
    await mkdir(this.dir, { recursive: true });
  }

  async create(release: ReleaseSnapshot): Promise<void> {
    const { name, version } = identity(release);
    const revisions = await this.read(name);
    if (revisions.some((r) => newReleaseAccessor(r).version() === version)) {
      throw new ReleaseEngineError(`release ${name} version ${version} already exists`);
    }
    await this.write(name, [...revisions, release]);
  }

  async update(release: ReleaseSnapshot): Promise<void> {
    const { name, version } = identity(release);
    const revisions = await this.read(name);
    const index = revisions.findIndex((r) => newReleaseAccessor(r).version() === version);
    if (index === -1) throw new ReleaseNotFoundError(name, version);
    revisions[index] = release;
    await this.write(name, revisions);
  }

  async get(name: string, version: number): Promise<ReleaseSnapshot> {
    const release = (await this.read(name)).find((r) => newReleaseAccessor(r).version() === version);
    if (!release) throw new ReleaseNotFoundError(name, version);
    return release;
  }

  async last(name: string): Promise<ReleaseSnapshot> {
    const latest = (await this.history(name)).at(-1);
    if (!latest) throw new ReleaseNotFoundError(name);
    return latest;
  }

  async history(name: string): Promise<ReleaseSnapshot[]> {
    return byVersion(await this.read(name));
  }

  async close(): Promise<void> {}

  private file(name: string): string {
    if (name === "" || name.startsWith(".") || basename(name) !== name) {
      throw new ReleaseEngineError(`invalid release name "${name}"`);
    }
    return join(this.dir, `${name}.yaml`);
  }

  private async read(name: string): Promise<ReleaseSnapshot[]> {
    const file = this.file(name);
    let text: string;
    try {
      text = await readFile(file, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw new ReleaseEngineError(`cannot read ${file}: ${errorMessage(err)}`, { cause: err });
    }

    let doc: unknown;
    try {
      doc = parseYaml(text);
    } catch (err) {
      throw new ReleaseEngineError(`${file} is not valid YAML: ${errorMessage(err)}`, { cause: err });
    }
    if (typeof doc !== "object" || doc === null || !("revisions" in doc) || !Array.isArray(doc.revisions)) {
      throw new ReleaseEngineError(`${file} has no revisions list`);
    }
    return doc.revisions.map((revision: unknown) => newReleaseAccessor(revision).raw());
  }

  private async write(name: string, revisions: ReleaseSnapshot[]): Promise<void> {
    const file = this.file(name);
    const pending = `${file}.tmp`;
    await writeFile(pending, stringifyYaml({ revisions: byVersion(revisions) }), "utf-8");
    await rename(pending, file);
  }
}

// ── Helpers ─────────────────────────────────────────────────────

function byVersion(revisions: ReleaseSnapshot[]): ReleaseSnapshot[] {
  return [...revisions].sort((a, b) => newReleaseAccessor(a).version() - newReleaseAccessor(b).version());
}

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
