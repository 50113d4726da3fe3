/**
 * Main entry point for the tapeconv core library.
 *
 * Pure TAP decoding and TZX encoding over byte buffers, plus the Effect
 * services (format registry, storage) that the Node adapter and CLI build on.
 */

// ============================================================================
// Error Types (Effect TaggedError)
// ============================================================================

export {
	InvalidPauseError,
	PayloadTooLargeError,
	TruncatedBlockError,
	TruncatedLengthError,
} from "./errors/tape-errors.js";

export type {
	FormatError,
	TapDecodeError,
	TzxEncodeError,
} from "./errors/tape-errors.js";

export {
	OverwriteRefusedError,
	StorageError,
	UnsupportedFormatError,
} from "./errors/storage-errors.js";

export type { PersistenceError } from "./errors/storage-errors.js";

export type { ConversionError } from "./errors/index.js";

// ============================================================================
// Tape Types
// ============================================================================

export type {
	BlockKind,
	BlockSummary,
	ConversionResult,
	HeaderType,
	TapeRecord,
	TzxEncodeOptions,
} from "./types/tape-types.js";

// ============================================================================
// Codecs
// ============================================================================

export { decodeTap, TAP_LENGTH_PREFIX_SIZE } from "./formats/tap.js";

export {
	DEFAULT_PAUSE_MS,
	encodeTzx,
	MAX_PAYLOAD_LENGTH,
	STANDARD_DATA_BLOCK_HEADER_SIZE,
	STANDARD_DATA_BLOCK_ID,
	TZX_HEADER_SIZE,
	TZX_SIGNATURE,
	TZX_VERSION_MAJOR,
	TZX_VERSION_MINOR,
} from "./formats/tzx.js";

// ============================================================================
// Conversion
// ============================================================================

export { convertTape, convertTapToTzx } from "./conversion/convert.js";

export {
	convertFile,
	loadTape,
	readTap,
	saveTape,
} from "./conversion/convert-file.js";

export type {
	ConvertFileOptions,
	ConvertFileResult,
} from "./conversion/convert-file.js";

export { inspectRecords } from "./inspection/inspect.js";

// ============================================================================
// Tape Format Registry
// ============================================================================

export {
	DefaultTapeFormatLayer,
	makeTapeFormatLayer,
	tapFormat,
	tzxFormat,
} from "./formats/tape-format.js";

export type { TapeFormat } from "./formats/tape-format.js";

export { TapeFormatRegistry } from "./formats/tape-format-service.js";

export type { TapeFormatRegistryShape } from "./formats/tape-format-service.js";

// ============================================================================
// Storage
// ============================================================================

export { StorageAdapter } from "./storage/storage-service.js";

export type { StorageAdapterShape } from "./storage/storage-service.js";

export {
	InMemoryStorageLayer,
	makeInMemoryStorageLayer,
} from "./storage/in-memory-adapter-layer.js";

// ============================================================================
// Utilities
// ============================================================================

export { getFileExtension, replaceExtension } from "./utils/path.js";
