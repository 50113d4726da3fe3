import { Context, type Effect } from "effect"
import type { UnsupportedFormatError } from "../errors/storage-errors.js"
import type { FormatError } from "../errors/tape-errors.js"
import type { TapeRecord } from "../types/tape-types.js"

// ============================================================================
// TapeFormatRegistry Effect Service
// ============================================================================

export interface TapeFormatRegistryShape {
	readonly decode: (
		bytes: Uint8Array,
		extension: string,
	) => Effect.Effect<ReadonlyArray<TapeRecord>, FormatError | UnsupportedFormatError>
	readonly encode: (
		records: ReadonlyArray<TapeRecord>,
		extension: string,
	) => Effect.Effect<Uint8Array, FormatError | UnsupportedFormatError>
	/** Registered extensions, without dots */
	readonly extensions: ReadonlyArray<string>
}

export class TapeFormatRegistry extends Context.Tag("TapeFormatRegistry")<
	TapeFormatRegistry,
	TapeFormatRegistryShape
>() {}
