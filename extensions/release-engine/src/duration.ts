/**
 * Duration strings in the `5m0s` / `1h30m` / `250ms` form used by chart tooling.
 */

const UNIT_MS: Record<string, number> = {
  h: 3_600_000,
  m: 60_000,
  s: 1_000,
  ms: 1,
  us: 0.001,
  "µs": 0.001,
  ns: 0.000001,
};

const SEGMENT = /(\d+(?:\.\d+)?)(ms|us|µs|ns|h|m|s)/y;

/** Parse a duration string into milliseconds. Throws on malformed input. */
export function parseDuration(value: string): number {
  const input = value.trim();
  if (input === "0") return 0;
  if (input === "") throw new Error("empty duration");

  SEGMENT.lastIndex = 0;
  let total = 0;
  while (SEGMENT.lastIndex < input.length) {
    const match = SEGMENT.exec(input);
    if (!match) throw new Error(`invalid duration "${value}"`);
    total += Number(match[1]) * UNIT_MS[match[2]];
  }
  return Math.round(total);
}

/** Render milliseconds as a whole-second kubectl `--timeout` value. */
export function formatKubectlTimeout(ms: number): string {
  return `${Math.max(1, Math.ceil(ms / 1000))}s`;
}
