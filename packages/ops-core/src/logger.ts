import pino, { type Logger } from "pino";

export type { Logger } from "pino";

let root: Logger | undefined;

export function getRootLogger(): Logger {
  if (!root) {
    root = createRootLogger();
  }
  return root;
}

export function createLogger(scope: string): Logger {
  return getRootLogger().child({ scope });
}

export function createRootLogger(env: Record<string, string | undefined> = process.env): Logger {
  const level = env.SOFTCENTER_LOG_LEVEL?.trim() || "info";
  const file = env.SOFTCENTER_LOG_FILE?.trim();
  const destination = file
    ? pino.destination({ dest: file, mkdir: true, sync: false })
    : pino.destination(2);
  return pino({ name: "softcenter", level }, destination);
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
