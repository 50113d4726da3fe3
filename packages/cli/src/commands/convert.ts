/**
 * tapeconv CLI - Convert Command
 *
 * Converts a TAP image to TZX. The input is read as TAP and the output
 * written as TZX whatever their names; only the default output path is
 * derived, by replacing the input's extension with `.tzx`.
 */

import { Effect } from "effect"
import * as path from "node:path"
import { convertFile, makeNodeStorageLayer, replaceExtension } from "@tapeconv/node"

/**
 * Options for the convert command.
 */
export interface ConvertOptions {
	/** Path to the .tap file */
	readonly input: string
	/** Path to write; derived from `input` when omitted */
	readonly output?: string
	/** Pause after each block in milliseconds */
	readonly pauseMs?: number
	/** Replace an existing output file */
	readonly overwrite: boolean
	/** Directory that relative paths resolve against */
	readonly cwd?: string
}

/**
 * Result of the convert command.
 */
export interface ConvertResult {
	readonly success: boolean
	readonly message?: string
	readonly data?: {
		readonly input: string
		readonly output: string
		readonly blockCount: number
		readonly bytesWritten: number
	}
}

/**
 * Default output path for an input tape: same directory and stem, `.tzx`.
 *
 * @example
 * deriveOutputPath('games/manic.tap') // 'games/manic.tzx'
 */
export function deriveOutputPath(input: string): string {
	return replaceExtension(input, "tzx")
}

/**
 * Execute the convert command.
 *
 * Never fails: every error is folded into an unsuccessful ConvertResult
 * carrying the error's message.
 */
export function runConvert(
	options: ConvertOptions,
): Effect.Effect<ConvertResult, never> {
	const cwd = options.cwd ?? process.cwd()
	const input = path.resolve(cwd, options.input)
	const output = path.resolve(cwd, options.output ?? deriveOutputPath(options.input))

	return Effect.gen(function* () {
		yield* Effect.logInfo(`Converting TAP ${input} to TZX at ${output}`)
		const result = yield* convertFile(input, output, {
			overwrite: options.overwrite,
			pauseMs: options.pauseMs,
		})
		return {
			success: true,
			data: {
				input: result.inputPath,
				output: result.outputPath,
				blockCount: result.blockCount,
				bytesWritten: result.bytesWritten,
			},
		}
	}).pipe(
		Effect.provide(makeNodeStorageLayer()),
		Effect.catchAll((error) =>
			Effect.succeed({
				success: false as const,
				message: error.message,
			}),
		),
	)
}
