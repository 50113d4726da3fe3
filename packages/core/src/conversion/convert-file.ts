/**
 * Effect-based file conversion.
 *
 * `convertFile` and `readTap` always treat the input as TAP and the output
 * as TZX, whatever the paths are called. `loadTape` and `saveTape` go through
 * TapeFormatRegistry and pick the format by file extension. The pure codecs
 * never see a path.
 */

import { Effect } from "effect";
import {
	OverwriteRefusedError,
	StorageError,
	type UnsupportedFormatError,
} from "../errors/storage-errors.js";
import type { FormatError, TapDecodeError } from "../errors/tape-errors.js";
import { decodeTap } from "../formats/tap.js";
import { TapeFormatRegistry } from "../formats/tape-format-service.js";
import { StorageAdapter } from "../storage/storage-service.js";
import type { TapeRecord, TzxEncodeOptions } from "../types/tape-types.js";
import { getFileExtension } from "../utils/path.js";
import { convertTape } from "./convert.js";

// ============================================================================
// Helpers
// ============================================================================

/**
 * Extract the file extension from a path, failing with StorageError if none found.
 */
const resolveExtension = (
	filePath: string,
	operation: StorageError["operation"],
): Effect.Effect<string, StorageError> => {
	const ext = getFileExtension(filePath);
	if (ext === "") {
		return Effect.fail(
			new StorageError({
				path: filePath,
				operation,
				message: `Cannot determine tape format: no extension in '${filePath}'`,
			}),
		);
	}
	return Effect.succeed(ext);
};

// ============================================================================
// loadTape / saveTape
// ============================================================================

/**
 * Read a tape file and decode it with the format registered for its extension.
 */
export const loadTape = (
	filePath: string,
): Effect.Effect<
	ReadonlyArray<TapeRecord>,
	StorageError | UnsupportedFormatError | FormatError,
	StorageAdapter | TapeFormatRegistry
> =>
	Effect.gen(function* () {
		const storage = yield* StorageAdapter;
		const formats = yield* TapeFormatRegistry;
		const ext = yield* resolveExtension(filePath, "read");
		const bytes = yield* storage.read(filePath);
		return yield* formats.decode(bytes, ext);
	});

/**
 * Encode records with the format registered for the path's extension and
 * write them. Nothing is written if encoding fails.
 */
export const saveTape = (
	filePath: string,
	records: ReadonlyArray<TapeRecord>,
): Effect.Effect<
	number,
	StorageError | UnsupportedFormatError | FormatError,
	StorageAdapter | TapeFormatRegistry
> =>
	Effect.gen(function* () {
		const storage = yield* StorageAdapter;
		const formats = yield* TapeFormatRegistry;
		const ext = yield* resolveExtension(filePath, "write");
		const bytes = yield* formats.encode(records, ext);
		yield* storage.write(filePath, bytes);
		return bytes.length;
	});

/**
 * Read a file and decode it as TAP, regardless of its extension.
 */
export const readTap = (
	filePath: string,
): Effect.Effect<
	ReadonlyArray<TapeRecord>,
	StorageError | TapDecodeError,
	StorageAdapter
> =>
	Effect.gen(function* () {
		const storage = yield* StorageAdapter;
		const bytes = yield* storage.read(filePath);
		return yield* decodeTap(bytes);
	});

// ============================================================================
// convertFile
// ============================================================================

export interface ConvertFileOptions extends TzxEncodeOptions {
	/** Replace an existing output file. The input itself is never replaced. */
	readonly overwrite?: boolean;
}

export interface ConvertFileResult {
	readonly inputPath: string;
	readonly outputPath: string;
	readonly blockCount: number;
	readonly bytesWritten: number;
}

/**
 * Convert a TAP file into a TZX file. Both paths are taken as given; only
 * their contents decide whether the conversion succeeds.
 *
 * Fails with OverwriteRefusedError when the output resolves to the input
 * file, or when it already exists and `overwrite` is not set.
 */
export const convertFile = (
	inputPath: string,
	outputPath: string,
	options: ConvertFileOptions = {},
): Effect.Effect<
	ConvertFileResult,
	StorageError | OverwriteRefusedError | FormatError,
	StorageAdapter
> =>
	Effect.gen(function* () {
		const storage = yield* StorageAdapter;

		if (yield* storage.exists(outputPath)) {
			const canonicalInput = yield* storage.canonicalPath(inputPath);
			const canonicalOutput = yield* storage.canonicalPath(outputPath);
			if (canonicalInput === canonicalOutput) {
				return yield* Effect.fail(
					new OverwriteRefusedError({
						path: outputPath,
						reason: "same-file",
						message: `Not overwriting input file '${inputPath}'`,
					}),
				);
			}
			if (!options.overwrite) {
				return yield* Effect.fail(
					new OverwriteRefusedError({
						path: outputPath,
						reason: "exists",
						message: `Output file '${outputPath}' already exists (use --force to replace it)`,
					}),
				);
			}
			yield* Effect.logDebug(`Replacing existing file '${outputPath}'`);
		}

		const input = yield* storage.read(inputPath);
		const { bytes, blockCount } = yield* convertTape(input, {
			pauseMs: options.pauseMs,
		});

		yield* storage.write(outputPath, bytes);
		yield* Effect.logInfo(`Wrote ${bytes.length} bytes to '${outputPath}'`).pipe(
			Effect.annotateLogs({ blocks: blockCount }),
		);

		return {
			inputPath,
			outputPath,
			blockCount,
			bytesWritten: bytes.length,
		};
	});
