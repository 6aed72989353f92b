/* ------------------------------------------------------------------
   Tiny, dependency-free logger with five verbosity levels
   ------------------------------------------------------------------ */
export type Verbosity = 0 | 1 | 2 | 3 | 4;  // 0 = warnings only … 4 = per-block trace

export interface Logger {
  level : Verbosity;
  log(lvl: Verbosity, msg: string): void;
}

export function createLogger(
  level: Verbosity = 0,
  sink : (msg: string) => void = console.info,
): Logger {
  return {
    level,
    log(lvl, msg) {
      if (lvl <= this.level) sink(`${lvl}| ${msg}`);
    },
  };
}

export function isVerbosity(n: number): n is Verbosity {
  return Number.isInteger(n) && n >= 0 && n <= 4;
}

/** Clamp an arbitrary count (e.g. repeated -v flags) into a Verbosity. */
export function toVerbosity(n: number): Verbosity {
  const v = Math.max(0, Math.min(4, Math.trunc(n)));
  return isVerbosity(v) ? v : 0;
}
