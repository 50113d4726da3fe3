import { Either } from "effect";
import {
	type TapDecodeError,
	TruncatedBlockError,
	TruncatedLengthError,
} from "../errors/tape-errors.js";
import type { TapeRecord } from "../types/tape-types.js";

/** Size of the little-endian length prefix in front of every TAP block */
export const TAP_LENGTH_PREFIX_SIZE = 2;

/**
 * Decode a `.tap` image into its blocks.
 *
 * A TAP file is a bare sequence of `[length: u16 LE][payload]` pairs with
 * no header. Zero-length blocks are legal. The whole buffer must be
 * consumed: a dangling half prefix or a block cut short fails the decode
 * and no records are returned.
 *
 * @example
 * ```typescript
 * const result = decodeTap(new Uint8Array([0x03, 0x00, 0x41, 0x42, 0x43]))
 * // Either.right([{ payload: Uint8Array [0x41, 0x42, 0x43] }])
 * ```
 */
export const decodeTap = (
	input: Uint8Array,
): Either.Either<ReadonlyArray<TapeRecord>, TapDecodeError> => {
	const records: Array<TapeRecord> = [];
	let offset = 0;

	while (offset < input.length) {
		const remaining = input.length - offset;
		if (remaining < TAP_LENGTH_PREFIX_SIZE) {
			return Either.left(
				new TruncatedLengthError({
					offset,
					remaining,
					message: `Expected a 2-byte block length at offset ${offset} but only ${remaining} byte remains`,
				}),
			);
		}

		const declared = input[offset] | (input[offset + 1] << 8);
		const start = offset + TAP_LENGTH_PREFIX_SIZE;
		const available = input.length - start;
		if (declared > available) {
			return Either.left(
				new TruncatedBlockError({
					offset,
					declared,
					available,
					message: `Block at offset ${offset} declares ${declared} bytes but only ${available} remain`,
				}),
			);
		}

		records.push({ payload: input.slice(start, start + declared) });
		offset = start + declared;
	}

	return Either.right(records);
};
