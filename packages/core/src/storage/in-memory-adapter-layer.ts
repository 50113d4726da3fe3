/**
 * In-memory implementation of StorageAdapter as an Effect Layer.
 * Intended for testing — stores data in a Map<string, Uint8Array> instead of the filesystem.
 */

import { Effect, Layer } from "effect"
import { StorageAdapter, type StorageAdapterShape } from "./storage-service.js"
import { StorageError } from "../errors/storage-errors.js"

// ============================================================================
// In-memory storage adapter
// ============================================================================

const notFound = (path: string, operation: StorageError["operation"]) =>
	new StorageError({
		path,
		operation,
		message: `File not found: ${path}`,
	})

const makeInMemoryAdapter = (
	store: Map<string, Uint8Array> = new Map(),
): StorageAdapterShape => ({
	read: (path: string) =>
		Effect.suspend(() => {
			const content = store.get(path)
			if (content === undefined) {
				return Effect.fail(notFound(path, "read"))
			}
			return Effect.succeed(content.slice())
		}),

	write: (path: string, data: Uint8Array) =>
		Effect.sync(() => {
			store.set(path, data.slice())
		}),

	exists: (path: string) => Effect.sync(() => store.has(path)),

	// Keys are taken as already canonical
	canonicalPath: (path: string) =>
		Effect.suspend(() =>
			store.has(path)
				? Effect.succeed(path)
				: Effect.fail(notFound(path, "resolve")),
		),
})

// ============================================================================
// Layer construction
// ============================================================================

/**
 * Creates an InMemoryStorageLayer backed by the provided Map.
 * Pass your own Map to inspect stored data in tests.
 */
export const makeInMemoryStorageLayer = (
	store?: Map<string, Uint8Array>,
): Layer.Layer<StorageAdapter> =>
	Layer.succeed(StorageAdapter, makeInMemoryAdapter(store))

/**
 * Default InMemoryStorageLayer with a fresh empty Map.
 */
export const InMemoryStorageLayer: Layer.Layer<StorageAdapter> =
	makeInMemoryStorageLayer()
