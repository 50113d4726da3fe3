// ============================================================================
// Tape Record Types
// ============================================================================

/**
 * One logical block of a cassette image.
 *
 * The payload holds the block bytes exactly as they were stored, flag byte
 * and trailing checksum included. Nothing downstream reinterprets it.
 */
export interface TapeRecord {
	readonly payload: Uint8Array;
}

/**
 * Options accepted by the TZX encoder.
 */
export interface TzxEncodeOptions {
	/** Silence after every block, in milliseconds (0..65535). Defaults to 1000. */
	readonly pauseMs?: number;
}

/**
 * Output of a full TAP → TZX conversion.
 */
export interface ConversionResult {
	readonly bytes: Uint8Array;
	/** Every decoded block, empty ones included */
	readonly blockCount: number;
}

// ============================================================================
// Block Inspection Types
// ============================================================================

export type BlockKind = "header" | "data" | "empty";

export type HeaderType =
	| "Program"
	| "Number array"
	| "Character array"
	| "Bytes"
	| "Unknown";

/**
 * Read-only description of a decoded block.
 */
export interface BlockSummary {
	readonly index: number;
	/** Offset of the block's length prefix in the TAP input */
	readonly offset: number;
	readonly length: number;
	readonly flag: number | null;
	readonly kind: BlockKind;
	/** `null` when the payload is too short to carry a checksum */
	readonly checksumValid: boolean | null;
	readonly headerType: HeaderType | null;
	readonly name: string | null;
}
