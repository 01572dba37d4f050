/**
 * Release engine errors.
 */

export class ReleaseEngineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ReleaseEngineError";
  }
}

export class UnsupportedSchemaError extends ReleaseEngineError {
  constructor(public readonly subject: "release" | "hook", detail: string) {
    super(`unsupported ${subject} type: ${detail}`);
    this.name = "UnsupportedSchemaError";
  }
}

export class ManifestParseError extends ReleaseEngineError {
  constructor(message: string, cause?: unknown) {
    super(cause === undefined ? message : `${message}: ${errorMessage(cause)}`, { cause });
    this.name = "ManifestParseError";
  }
}

export class HookApplyError extends ReleaseEngineError {
  constructor(
    public readonly event: string,
    public readonly hookPath: string,
    cause: unknown,
  ) {
    super(`hook ${event} ${hookPath} failed: ${errorMessage(cause)}`, { cause });
    this.name = "HookApplyError";
  }
}

export class HookFailedError extends ReleaseEngineError {
  constructor(
    public readonly event: string,
    public readonly hookPath: string,
    cause: unknown,
  ) {
    super(`${event} hook ${hookPath} did not become ready: ${errorMessage(cause)}`, { cause });
    this.name = "HookFailedError";
  }
}

export class HookCleanupError extends ReleaseEngineError {
  constructor(
    public readonly hookPath: string,
    public readonly errors: Error[],
  ) {
    super(`unable to delete hook ${hookPath}: ${errors.map((e) => e.message).join("; ")}`);
    this.name = "HookCleanupError";
  }
}

export class CycleError extends ReleaseEngineError {
  constructor(public readonly cycle: string[]) {
    super(`dependency cycle detected: ${cycle.join(" -> ")}`);
    this.name = "CycleError";
  }
}

export class DependencyGraphError extends ReleaseEngineError {
  constructor(message: string) {
    super(message);
    this.name = "DependencyGraphError";
  }
}

export class TierInstallError extends ReleaseEngineError {
  constructor(
    public readonly chart: string,
    public readonly tierIndex: number,
    cause: unknown,
  ) {
    super(`chart ${chart}: installation tier ${tierIndex} failed: ${errorMessage(cause)}`, { cause });
    this.name = "TierInstallError";
  }
}

export class KubectlCommandError extends ReleaseEngineError {
  constructor(
    public readonly args: string[],
    public readonly stderr: string,
    cause: unknown,
  ) {
    super(`kubectl ${args.join(" ")}: ${stderr.trim() || errorMessage(cause)}`, { cause });
    this.name = "KubectlCommandError";
  }
}

export class ConfigError extends ReleaseEngineError {
  constructor(public readonly issues: string[]) {
    super(`invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export class ReleaseNotFoundError extends ReleaseEngineError {
  constructor(
    public readonly releaseName: string,
    public readonly version?: number,
  ) {
    super(
      version === undefined
        ? `release ${releaseName} not found`
        : `release ${releaseName} version ${version} not found`,
    );
    this.name = "ReleaseNotFoundError";
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function errorMessage(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}
