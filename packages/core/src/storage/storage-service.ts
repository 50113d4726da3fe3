import { Context, type Effect } from "effect";
import type { StorageError } from "../errors/storage-errors.js";

// ============================================================================
// StorageAdapter Effect Service
// ============================================================================

/**
 * Byte-level file access used around the conversion core.
 * The core itself never touches storage; the CLI composes the two.
 */
export interface StorageAdapterShape {
	readonly read: (path: string) => Effect.Effect<Uint8Array, StorageError>;
	readonly write: (
		path: string,
		data: Uint8Array,
	) => Effect.Effect<void, StorageError>;
	readonly exists: (path: string) => Effect.Effect<boolean, StorageError>;
	/** Absolute path with symlinks resolved; the file must exist */
	readonly canonicalPath: (
		path: string,
	) => Effect.Effect<string, StorageError>;
}

export class StorageAdapter extends Context.Tag("StorageAdapter")<
	StorageAdapter,
	StorageAdapterShape
>() {}
