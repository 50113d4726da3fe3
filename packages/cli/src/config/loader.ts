import { Data, Effect, Either, Option, Schema } from "effect"
import * as fs from "node:fs"

// ============================================================================
// Config Loading Errors
// ============================================================================

/**
 * Error thrown when a config file cannot be read or parsed.
 */
export class ConfigLoadError extends Data.TaggedError("ConfigLoadError")<{
	readonly configPath: string
	readonly reason: string
	readonly message: string
}> {}

/**
 * Error thrown when a config file has an invalid structure.
 */
export class ConfigValidationError extends Data.TaggedError(
	"ConfigValidationError",
)<{
	readonly configPath: string
	readonly reason: string
	readonly message: string
}> {}

// ============================================================================
// Config Schema
// ============================================================================

export const LOG_LEVELS = ["debug", "info", "warning", "error", "none"] as const

export const TapeconvConfigSchema = Schema.Struct({
	pauseMs: Schema.optional(Schema.Int.pipe(Schema.between(0, 65535))),
	logLevel: Schema.optional(Schema.Literal(...LOG_LEVELS)),
	overwrite: Schema.optional(Schema.Boolean),
})

export type TapeconvConfig = typeof TapeconvConfigSchema.Type

export const DEFAULT_CONFIG: TapeconvConfig = {}

const decodeConfig = Schema.decodeUnknownEither(TapeconvConfigSchema, {
	onExcessProperty: "error",
})

// ============================================================================
// Config Loading Functions
// ============================================================================

function readJson(configPath: string): Effect.Effect<unknown, ConfigLoadError> {
	return Effect.try({
		try: () => JSON.parse(fs.readFileSync(configPath, "utf-8")) as unknown,
		catch: (error) => {
			const errorMessage = error instanceof Error ? error.message : String(error)
			return new ConfigLoadError({
				configPath,
				reason: `Failed to parse JSON config: ${errorMessage}`,
				message: `Failed to load config from ${configPath}: ${errorMessage}`,
			})
		},
	})
}

/**
 * Load and validate a `tapeconv.config.json` file.
 *
 * Every key is optional; unknown keys are rejected so typos surface early.
 *
 * @param configPath - Absolute path to the config file
 */
export function loadConfig(
	configPath: string,
): Effect.Effect<TapeconvConfig, ConfigLoadError | ConfigValidationError> {
	return Effect.gen(function* () {
		const raw = yield* readJson(configPath)
		const decoded = decodeConfig(raw)
		if (Either.isLeft(decoded)) {
			return yield* Effect.fail(
				new ConfigValidationError({
					configPath,
					reason: decoded.left.message,
					message: `Invalid config in ${configPath}:\n${decoded.left.message}`,
				}),
			)
		}
		return decoded.right
	})
}

/**
 * Load the discovered config, or the defaults when none was found.
 */
export function loadConfigOrDefault(
	configPath: Option.Option<string>,
): Effect.Effect<TapeconvConfig, ConfigLoadError | ConfigValidationError> {
	return Option.match(configPath, {
		onNone: () => Effect.succeed(DEFAULT_CONFIG),
		onSome: loadConfig,
	})
}
