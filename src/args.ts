// Demo command-line arguments: [seed] [seconds]

export const DEFAULT_TIME_LIMIT_S = 120;

export interface DemoArgs {
  /** null means unseeded (Math.random). */
  seed: number | null;
  timeLimitS: number;
}

export type ParsedArgs =
  | { ok: true; args: DemoArgs }
  | { ok: false; error: string };

export function parseDemoArgs(argv: readonly string[]): ParsedArgs {
  const [seedArg, limitArg] = argv;

  const seed = seedArg === undefined ? null : Number(seedArg);
  if (seed !== null && !Number.isFinite(seed)) {
    return { ok: false, error: `seed must be a finite number, got ${seedArg}` };
  }

  const timeLimitS = limitArg === undefined ? DEFAULT_TIME_LIMIT_S : Number(limitArg);
  if (!Number.isFinite(timeLimitS) || timeLimitS <= 0) {
    return { ok: false, error: `time limit must be a positive number of seconds, got ${limitArg}` };
  }

  return { ok: true, args: { seed, timeLimitS } };
}
