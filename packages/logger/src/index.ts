import { pino, type Logger } from "pino";

export type { Logger };

// LEDGERKIT_DEBUG wins over LEDGERKIT_LOG_LEVEL, the same way a debug flag
// would be flipped on a running node.
export function levelFromEnv(env: NodeJS.ProcessEnv): string {
  if (env.LEDGERKIT_DEBUG) return "debug";
  return env.LEDGERKIT_LOG_LEVEL ?? "silent";
}

let root: Logger | undefined;

export function rootLogger(): Logger {
  root ??= pino({ name: "ledgerkit", level: levelFromEnv(process.env) });
  return root;
}

/** Child logger tagged with the package (or module) it is used from. */
export function createLogger(module: string): Logger {
  return rootLogger().child({ module });
}
