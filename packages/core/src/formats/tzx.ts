import { Either } from "effect";
import {
	InvalidPauseError,
	PayloadTooLargeError,
	type TzxEncodeError,
} from "../errors/tape-errors.js";
import type { TapeRecord, TzxEncodeOptions } from "../types/tape-types.js";

// ============================================================================
// TZX Constants
// ============================================================================

/** "ZXTape!" followed by the end-of-text marker */
export const TZX_SIGNATURE = new Uint8Array([
	0x5a, 0x58, 0x54, 0x61, 0x70, 0x65, 0x21, 0x1a,
]);
export const TZX_VERSION_MAJOR = 1;
export const TZX_VERSION_MINOR = 20;
export const TZX_HEADER_SIZE = TZX_SIGNATURE.length + 2;

/** Block ID 0x10: standard speed data block */
export const STANDARD_DATA_BLOCK_ID = 0x10;
// id(1) + pause(2) + length(2)
export const STANDARD_DATA_BLOCK_HEADER_SIZE = 5;

export const DEFAULT_PAUSE_MS = 1000;
export const MAX_PAYLOAD_LENGTH = 0xffff;

// ============================================================================
// Encoder
// ============================================================================

const validatePause = (
	pauseMs: number,
): Either.Either<number, InvalidPauseError> =>
	Number.isInteger(pauseMs) && pauseMs >= 0 && pauseMs <= 0xffff
		? Either.right(pauseMs)
		: Either.left(
				new InvalidPauseError({
					pauseMs,
					message: `Pause must be a whole number of milliseconds between 0 and 65535, got ${pauseMs}`,
				}),
			);

const checkPayloadSizes = (
	records: ReadonlyArray<TapeRecord>,
): Either.Either<number, PayloadTooLargeError> => {
	let total = 0;
	for (const [index, record] of records.entries()) {
		const length = record.payload.length;
		if (length > MAX_PAYLOAD_LENGTH) {
			return Either.left(
				new PayloadTooLargeError({
					index,
					length,
					max: MAX_PAYLOAD_LENGTH,
					message: `Block ${index} is ${length} bytes; a standard data block holds at most ${MAX_PAYLOAD_LENGTH}`,
				}),
			);
		}
		total += STANDARD_DATA_BLOCK_HEADER_SIZE + length;
	}
	return Either.right(total);
};

/**
 * Encode records as a `.tzx` image.
 *
 * Emits the fixed signature and version 1.20, then one standard data block
 * (ID 0x10) per record in order:
 *
 * ```
 * +----+-------+-------+---------+
 * | ID | pause | len   | payload |
 * | u8 | u16LE | u16LE | len     |
 * +----+-------+-------+---------+
 * ```
 *
 * Payloads are copied verbatim; checksums are not recomputed.
 */
export const encodeTzx = (
	records: ReadonlyArray<TapeRecord>,
	options: TzxEncodeOptions = {},
): Either.Either<Uint8Array, TzxEncodeError> =>
	Either.gen(function* () {
		const pauseMs = yield* validatePause(options.pauseMs ?? DEFAULT_PAUSE_MS);
		const blocksSize = yield* checkPayloadSizes(records);

		const out = new Uint8Array(TZX_HEADER_SIZE + blocksSize);
		const view = new DataView(out.buffer);

		out.set(TZX_SIGNATURE, 0);
		out[TZX_SIGNATURE.length] = TZX_VERSION_MAJOR;
		out[TZX_SIGNATURE.length + 1] = TZX_VERSION_MINOR;

		let offset = TZX_HEADER_SIZE;
		for (const record of records) {
			view.setUint8(offset, STANDARD_DATA_BLOCK_ID);
			view.setUint16(offset + 1, pauseMs, true);
			view.setUint16(offset + 3, record.payload.length, true);
			out.set(record.payload, offset + STANDARD_DATA_BLOCK_HEADER_SIZE);
			offset += STANDARD_DATA_BLOCK_HEADER_SIZE + record.payload.length;
		}

		return out;
	});
