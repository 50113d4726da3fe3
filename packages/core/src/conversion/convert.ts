import { Effect, Either } from "effect";
import type { FormatError } from "../errors/tape-errors.js";
import { decodeTap } from "../formats/tap.js";
import { encodeTzx } from "../formats/tzx.js";
import type {
	ConversionResult,
	TzxEncodeOptions,
} from "../types/tape-types.js";

/**
 * Convert a `.tap` image to `.tzx` in one pure step.
 *
 * Fails with the first decode or encode error; no partial output is ever
 * returned.
 */
export const convertTapToTzx = (
	input: Uint8Array,
	options?: TzxEncodeOptions,
): Either.Either<ConversionResult, FormatError> =>
	Either.gen(function* () {
		const records = yield* decodeTap(input);
		const bytes = yield* encodeTzx(records, options);
		return { bytes, blockCount: records.length };
	});

/**
 * Effect variant of {@link convertTapToTzx} that reports each stage through
 * the Effect logger.
 */
export const convertTape = (
	input: Uint8Array,
	options?: TzxEncodeOptions,
): Effect.Effect<ConversionResult, FormatError> =>
	Effect.gen(function* () {
		yield* Effect.logDebug(`Decoding ${input.length} bytes of TAP data`);
		const records = yield* decodeTap(input);

		const bytes = yield* Effect.logDebug(`Encoding ${records.length} blocks as TZX`).pipe(
			Effect.zipRight(encodeTzx(records, options)),
			Effect.annotateLogs({ blocks: records.length }),
		);

		return { bytes, blockCount: records.length };
	}).pipe(
		Effect.tapError((error) => Effect.logDebug(`Conversion failed: ${error.message}`)),
		Effect.withLogSpan("convertTape"),
	);
