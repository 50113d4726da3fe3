import { Data } from "effect"

// ============================================================================
// Effect TaggedError Storage Error Types
// ============================================================================

export class StorageError extends Data.TaggedError("StorageError")<{
	readonly path: string
	readonly operation: "read" | "write" | "resolve"
	readonly message: string
	readonly cause?: unknown
}> {}

export class UnsupportedFormatError extends Data.TaggedError("UnsupportedFormatError")<{
	readonly format: string
	readonly message: string
}> {}

export class OverwriteRefusedError extends Data.TaggedError("OverwriteRefusedError")<{
	readonly path: string
	readonly reason: "same-file" | "exists"
	readonly message: string
}> {}

// ============================================================================
// Storage Error Union
// ============================================================================

export type PersistenceError =
	| StorageError
	| UnsupportedFormatError
	| OverwriteRefusedError
