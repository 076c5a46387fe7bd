import { consola, LogLevels } from "consola";

export type LogLevelName = "silent" | "error" | "warn" | "info" | "debug";

export const logger = consola.withTag("ghps");

export function setLogLevel(level: LogLevelName): void {
	logger.level = LogLevels[level];
}
