import { Data, Effect, Option } from "effect"
import * as path from "node:path"
import * as fs from "node:fs"

// ============================================================================
// Config Discovery Error
// ============================================================================

/**
 * Error raised when an explicitly requested config file does not exist.
 * Discovery without an explicit path never fails: the defaults apply.
 */
export class ConfigNotFoundError extends Data.TaggedError("ConfigNotFoundError")<{
	readonly searchedPaths: readonly string[]
	readonly message: string
}> {}

export const CONFIG_FILE_NAME = "tapeconv.config.json"

// ============================================================================
// Discovery Functions
// ============================================================================

function fileExists(filePath: string): boolean {
	try {
		return fs.statSync(filePath).isFile()
	} catch {
		return false
	}
}

/**
 * Walk from the start directory upward to the filesystem root.
 */
function* walkUpward(startDir: string): Generator<string> {
	let currentDir = startDir
	while (true) {
		yield currentDir
		const parent = path.dirname(currentDir)
		if (parent === currentDir) {
			return
		}
		currentDir = parent
	}
}

/**
 * Locate the tapeconv config file.
 *
 * With `overridePath`, that file must exist (relative paths resolve against
 * `cwd`). Otherwise the search walks from `cwd` up to the root looking for
 * `tapeconv.config.json` and yields `Option.none()` when there is none.
 *
 * @param cwd - The directory to start searching from
 * @param overridePath - Optional explicit path to a config file
 */
export function discoverConfig(
	cwd: string,
	overridePath?: string,
): Effect.Effect<Option.Option<string>, ConfigNotFoundError> {
	return Effect.gen(function* () {
		if (overridePath !== undefined) {
			const absoluteOverridePath = path.resolve(cwd, overridePath)
			if (fileExists(absoluteOverridePath)) {
				return Option.some(absoluteOverridePath)
			}
			return yield* Effect.fail(
				new ConfigNotFoundError({
					searchedPaths: [absoluteOverridePath],
					message: `Config file not found: ${absoluteOverridePath}`,
				}),
			)
		}

		for (const dir of walkUpward(path.resolve(cwd))) {
			const candidate = path.join(dir, CONFIG_FILE_NAME)
			if (fileExists(candidate)) {
				yield* Effect.logDebug(`Using config ${candidate}`)
				return Option.some(candidate)
			}
		}

		yield* Effect.logDebug(`No ${CONFIG_FILE_NAME} found, using defaults`)
		return Option.none()
	})
}
