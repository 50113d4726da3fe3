import { Effect, type Either, Layer } from "effect";
import { UnsupportedFormatError } from "../errors/storage-errors.js";
import type { FormatError } from "../errors/tape-errors.js";
import type { TapeRecord, TzxEncodeOptions } from "../types/tape-types.js";
import { decodeTap } from "./tap.js";
import {
	TapeFormatRegistry,
	type TapeFormatRegistryShape,
} from "./tape-format-service.js";
import { encodeTzx } from "./tzx.js";

// ============================================================================
// TapeFormat — Plugin point for tape container formats
// ============================================================================

/**
 * A TapeFormat describes one tape container:
 * - A human-readable name (e.g., "tap", "tzx")
 * - Supported file extensions without dots
 * - Optional synchronous decode/encode returning Either
 *
 * A format may support only one direction; asking the registry for the
 * missing one fails with UnsupportedFormatError.
 */
export interface TapeFormat {
	readonly name: string;
	readonly extensions: ReadonlyArray<string>;
	readonly decode?: (
		bytes: Uint8Array,
	) => Either.Either<ReadonlyArray<TapeRecord>, FormatError>;
	readonly encode?: (
		records: ReadonlyArray<TapeRecord>,
	) => Either.Either<Uint8Array, FormatError>;
}

/**
 * `.tap` reader. TAP images are only ever read.
 */
export const tapFormat = (): TapeFormat => ({
	name: "tap",
	extensions: ["tap"],
	decode: decodeTap,
});

/**
 * `.tzx` writer using standard data blocks.
 *
 * @example
 * ```typescript
 * const layer = makeTapeFormatLayer([tapFormat(), tzxFormat({ pauseMs: 500 })])
 * ```
 */
export const tzxFormat = (options?: TzxEncodeOptions): TapeFormat => ({
	name: "tzx",
	extensions: ["tzx"],
	encode: (records) => encodeTzx(records, options),
});

// ============================================================================
// makeTapeFormatLayer — Compositor for building TapeFormatRegistry
// ============================================================================

const normalizeExtension = (extension: string): string =>
	extension.replace(/^\./, "").toLowerCase();

/**
 * Creates a TapeFormatRegistry Layer from an array of TapeFormat instances.
 *
 * Extensions are matched case-insensitively. When two formats claim the
 * same extension the later one wins and a warning is logged.
 */
export const makeTapeFormatLayer = (
	formats: ReadonlyArray<TapeFormat>,
): Layer.Layer<TapeFormatRegistry> =>
	Layer.effect(
		TapeFormatRegistry,
		Effect.gen(function* () {
			const extensionMap = new Map<string, TapeFormat>();
			for (const format of formats) {
				for (const ext of format.extensions.map(normalizeExtension)) {
					const existing = extensionMap.get(ext);
					if (existing) {
						yield* Effect.logWarning(
							`Duplicate extension '.${ext}': '${existing.name}' overwritten by '${format.name}'`,
						);
					}
					extensionMap.set(ext, format);
				}
			}

			const extensions = Array.from(extensionMap.keys());

			const unsupported = (extension: string, direction: string) =>
				new UnsupportedFormatError({
					format: extension,
					message:
						extensions.length > 0
							? `Cannot ${direction} '.${extension}'. Available formats: ${extensions.map((ext) => `.${ext}`).join(", ")}`
							: `Cannot ${direction} '.${extension}'. No formats registered.`,
				});

			const registry: TapeFormatRegistryShape = {
				extensions,

				decode: (bytes, extension) => {
					const ext = normalizeExtension(extension);
					const decode = extensionMap.get(ext)?.decode;
					return decode
						? Effect.suspend(() => decode(bytes))
						: Effect.fail(unsupported(ext, "read"));
				},

				encode: (records, extension) => {
					const ext = normalizeExtension(extension);
					const encode = extensionMap.get(ext)?.encode;
					return encode
						? Effect.suspend(() => encode(records))
						: Effect.fail(unsupported(ext, "write"));
				},
			};

			return registry;
		}),
	);

/**
 * Registry with the built-in TAP reader and TZX writer.
 */
export const DefaultTapeFormatLayer: Layer.Layer<TapeFormatRegistry> =
	makeTapeFormatLayer([tapFormat(), tzxFormat()]);
