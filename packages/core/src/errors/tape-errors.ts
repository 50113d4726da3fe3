import { Data } from "effect";

// ============================================================================
// Effect TaggedError Tape Format Error Types
// ============================================================================

/**
 * A length prefix was expected but fewer than two bytes were left.
 */
export class TruncatedLengthError extends Data.TaggedError(
	"TruncatedLengthError",
)<{
	/** Byte offset where the length prefix should have started */
	readonly offset: number;
	readonly remaining: number;
	readonly message: string;
}> {}

/**
 * A block declared more payload bytes than the input still holds.
 */
export class TruncatedBlockError extends Data.TaggedError(
	"TruncatedBlockError",
)<{
	/** Byte offset of the block's length prefix */
	readonly offset: number;
	readonly declared: number;
	readonly available: number;
	readonly message: string;
}> {}

/**
 * A record cannot fit the 16-bit length field of a standard data block.
 */
export class PayloadTooLargeError extends Data.TaggedError(
	"PayloadTooLargeError",
)<{
	/** Position of the offending record in the sequence */
	readonly index: number;
	readonly length: number;
	readonly max: number;
	readonly message: string;
}> {}

export class InvalidPauseError extends Data.TaggedError("InvalidPauseError")<{
	readonly pauseMs: number;
	readonly message: string;
}> {}

// ============================================================================
// Tape Error Unions
// ============================================================================

export type TapDecodeError = TruncatedLengthError | TruncatedBlockError;

export type TzxEncodeError = PayloadTooLargeError | InvalidPauseError;

export type FormatError = TapDecodeError | TzxEncodeError;
