// ============================================================================
// Tape Format Errors (re-exported from tape-errors.ts)
// ============================================================================

export type {
	FormatError,
	TapDecodeError,
	TzxEncodeError,
} from "./tape-errors.js";
export {
	InvalidPauseError,
	PayloadTooLargeError,
	TruncatedBlockError,
	TruncatedLengthError,
} from "./tape-errors.js";

// ============================================================================
// Storage Errors (re-exported from storage-errors.ts)
// ============================================================================

export type { PersistenceError } from "./storage-errors.js";
export {
	OverwriteRefusedError,
	StorageError,
	UnsupportedFormatError,
} from "./storage-errors.js";

// ============================================================================
// Union Types
// ============================================================================

import type { PersistenceError } from "./storage-errors.js";
import type { FormatError } from "./tape-errors.js";

export type ConversionError = FormatError | PersistenceError;
