/* ------------------------------------------------------------------
   Tiny, dependency-free logger with five verbosity levels
   ------------------------------------------------------------------ */
export type Verbosity = 0 | 1 | 2 | 3 | 4;  // 0 = errors only … 4 = trace

export interface Logger {
  level : Verbosity;
  log(lvl: Verbosity, msg: string): void;
  /** Same sink and level, every line prefixed with `[scope]`. */
  scoped(scope: string): Logger;
}

export function isVerbosity(n: unknown): n is Verbosity {
  return n === 0 || n === 1 || n === 2 || n === 3 || n === 4;
}

export function clampVerbosity(n: number): Verbosity {
  const v = Math.max(0, Math.min(4, Math.trunc(n)));
  return isVerbosity(v) ? v : 0;
}

export function createLogger(
  level : Verbosity = 0,
  sink  : (msg: string) => void = console.info,
  scope?: string,
): Logger {
  const prefix = scope ? `[${scope}] ` : '';
  return {
    level,
    log(lvl, msg) {
      if (lvl <= this.level) sink(`${lvl}| ${prefix}${msg}`);
    },
    scoped(next) {
      return createLogger(this.level, sink, scope ? `${scope}:${next}` : next);
    },
  };
}
