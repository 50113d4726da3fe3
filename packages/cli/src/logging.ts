/**
 * tapeconv CLI - Logging
 *
 * Effect log lines go to stderr in logfmt so stdout stays clean for
 * command output (e.g. `tapeconv inspect game.tap --json | jq`).
 */

import { Layer, Logger, LogLevel } from "effect"
import type { TapeconvConfig } from "./config/loader.js"

type LogLevelName = NonNullable<TapeconvConfig["logLevel"]>

const LEVELS: Record<LogLevelName, LogLevel.LogLevel> = {
	debug: LogLevel.Debug,
	info: LogLevel.Info,
	warning: LogLevel.Warning,
	error: LogLevel.Error,
	none: LogLevel.None,
}

/**
 * Resolve the effective level: `--verbose` wins, then the config file,
 * then warnings only.
 */
export function resolveLogLevel(
	verbose: boolean,
	configured: LogLevelName | undefined,
): LogLevel.LogLevel {
	if (verbose) {
		return LogLevel.Debug
	}
	return LEVELS[configured ?? "warning"]
}

export function makeCliLoggerLayer(level: LogLevel.LogLevel): Layer.Layer<never> {
	return Layer.merge(
		Logger.replace(Logger.defaultLogger, Logger.withConsoleError(Logger.logfmtLogger)),
		Logger.minimumLogLevel(level),
	)
}
