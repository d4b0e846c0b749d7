import pino, { Logger } from "pino";

const SERVICE = "bulk-turn-engine";

export let logger: Logger = pino({
  level: "info",
  base: { service: SERVICE },
});

export function initLogger(level: string): void {
  logger = pino({ level, base: { service: SERVICE } });
}
