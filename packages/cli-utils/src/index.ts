// packages/cli-utils/src/index.ts
//
// argv helpers shared by the CLIs. Expects process.argv shape:
// [execPath, scriptPath, ...args].

export class CliUsageError extends Error {
  public readonly exitCode = 2;
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export function normalizeArgv(argv: string[]): string[] {
  const out: string[] = [];
  for (const a of argv) {
    if (a.startsWith("--") && a.includes("=")) {
      const idx = a.indexOf("=");
      const key = a.slice(0, idx);
      const val = a.slice(idx + 1);
      out.push(key);
      if (val.length) out.push(val);
    } else {
      out.push(a);
    }
  }
  return out;
}

export function makeArgvHelpers(argv: string[], helpText: string) {
  const ARGV = normalizeArgv(argv);

  function usage(message: string): CliUsageError {
    return new CliUsageError(`${message}\n\n${helpText}`);
  }

  function hasFlag(...names: string[]): boolean {
    return names.some((n) => ARGV.includes(n));
  }

  function getArg(name: string): string | null {
    const idx = ARGV.indexOf(name);
    if (idx === -1) return null;
    const v = ARGV[idx + 1];
    if (!v || v.startsWith("--")) return null;
    return v;
  }

  /** First bare word after the script path, e.g. `run` in `runner run --dataset x`. */
  function command(): string | null {
    const first = ARGV[2];
    if (!first || first.startsWith("-")) return null;
    return first;
  }

  function requireArg(name: string): string {
    const v = getArg(name);
    if (v === null) throw usage(`Missing required option ${name}`);
    return v;
  }

  function assertNoUnknownOptions(allowed: Set<string>): void {
    for (const a of ARGV.slice(2)) {
      if (a.startsWith("--") && !allowed.has(a)) {
        throw usage(`Unknown option: ${a}`);
      }
    }
  }

  function assertHasValue(...flags: string[]): void {
    for (const flag of flags) {
      const idx = ARGV.indexOf(flag);
      if (idx === -1) continue;
      const next = ARGV[idx + 1];
      if (!next || next.startsWith("--")) {
        throw usage(`Missing value for ${flag}`);
      }
    }
  }

  function parseIntFlag(name: string, fallback: number): number;
  function parseIntFlag(name: string, fallback: null): number | null;
  function parseIntFlag(name: string, fallback: number | null): number | null {
    const raw = getArg(name);
    if (raw === null) return fallback;
    const n = Number.parseInt(raw, 10);
    if (!Number.isFinite(n) || String(n) !== raw.trim()) {
      throw usage(`Invalid integer for ${name}: ${raw}`);
    }
    return n;
  }

  return { ARGV, usage, hasFlag, getArg, command, requireArg, assertNoUnknownOptions, assertHasValue, parseIntFlag };
}

export type ArgvHelpers = ReturnType<typeof makeArgvHelpers>;
