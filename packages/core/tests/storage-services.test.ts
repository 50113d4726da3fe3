import { describe, it, expect } from "vitest"
import { Effect, Either, Layer } from "effect"
import { StorageAdapter } from "../src/storage/storage-service.js"
import { TapeFormatRegistry } from "../src/formats/tape-format-service.js"
import { DefaultTapeFormatLayer } from "../src/formats/tape-format.js"
import {
	makeInMemoryStorageLayer,
	InMemoryStorageLayer,
} from "../src/storage/in-memory-adapter-layer.js"
import { buildTap, DATA_BLOCK } from "./helpers/tape-fixtures.js"

// ============================================================================
// Helpers
// ============================================================================

/**
 * Reads a TAP image through StorageAdapter, decodes it and writes the TZX
 * encoding back. The same program runs against any storage layer.
 */
const readConvertWrite = (input: string, output: string) =>
	Effect.gen(function* () {
		const storage = yield* StorageAdapter
		const formats = yield* TapeFormatRegistry
		const records = yield* formats.decode(yield* storage.read(input), "tap")
		const bytes = yield* formats.encode(records, "tzx")
		yield* storage.write(output, bytes)
		return records.length
	})

// ============================================================================
// In-memory StorageAdapter
// ============================================================================

describe("InMemoryStorageLayer", () => {
	it("reads back what was written", async () => {
		const bytes = await Effect.runPromise(
			Effect.gen(function* () {
				const storage = yield* StorageAdapter
				yield* storage.write("/tapes/a.tap", new Uint8Array([1, 2, 3]))
				return yield* storage.read("/tapes/a.tap")
			}).pipe(Effect.provide(makeInMemoryStorageLayer())),
		)
		expect(Array.from(bytes)).toEqual([1, 2, 3])
	})

	it("stores a copy so later mutation of the buffer has no effect", async () => {
		const store = new Map<string, Uint8Array>()
		const data = new Uint8Array([7, 8])
		await Effect.runPromise(
			Effect.gen(function* () {
				const storage = yield* StorageAdapter
				yield* storage.write("/x.tap", data)
			}).pipe(Effect.provide(makeInMemoryStorageLayer(store))),
		)
		data[0] = 0
		expect(Array.from(store.get("/x.tap") ?? [])).toEqual([7, 8])
	})

	it("fails a read of a missing file with StorageError", async () => {
		const result = await Effect.runPromise(
			Effect.gen(function* () {
				const storage = yield* StorageAdapter
				return yield* storage.read("/missing.tap")
			}).pipe(Effect.either, Effect.provide(makeInMemoryStorageLayer())),
		)
		expect(Either.isLeft(result)).toBe(true)
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("StorageError")
			expect(result.left.operation).toBe("read")
			expect(result.left.message).toBe("File not found: /missing.tap")
		}
	})

	it("reports whether a file exists", async () => {
		const store = new Map<string, Uint8Array>([["/a.tap", new Uint8Array(0)]])
		const seen = await Effect.runPromise(
			Effect.gen(function* () {
				const storage = yield* StorageAdapter
				const present = yield* storage.exists("/a.tap")
				const absent = yield* storage.exists("/b.tap")
				return [present, absent]
			}).pipe(Effect.provide(makeInMemoryStorageLayer(store))),
		)
		expect(seen).toEqual([true, false])
	})

	it("fails to resolve a missing file", async () => {
		const error = await Effect.runPromise(
			Effect.flatMap(StorageAdapter, (s) => s.canonicalPath("/gone.tap")).pipe(
				Effect.flip,
				Effect.provide(makeInMemoryStorageLayer()),
			),
		)
		expect(error.operation).toBe("resolve")
	})

	it("returns existing keys unchanged as canonical paths", async () => {
		const store = new Map<string, Uint8Array>([["/a.tap", new Uint8Array(0)]])
		const canonical = await Effect.runPromise(
			Effect.flatMap(StorageAdapter, (s) => s.canonicalPath("/a.tap")).pipe(
				Effect.provide(makeInMemoryStorageLayer(store)),
			),
		)
		expect(canonical).toBe("/a.tap")
	})
})

// ============================================================================
// Storage + format registry
// ============================================================================

describe("Storage + TapeFormatRegistry", () => {
	it("converts a stored tape into a stored TZX image", async () => {
		const store = new Map<string, Uint8Array>([
			["/in.tap", buildTap([DATA_BLOCK, new Uint8Array(0)])],
		])
		const layer = Layer.merge(makeInMemoryStorageLayer(store), DefaultTapeFormatLayer)

		const count = await Effect.runPromise(
			readConvertWrite("/in.tap", "/out.tzx").pipe(Effect.provide(layer)),
		)

		expect(count).toBe(2)
		// 10-byte header, 5+7 for the data block, 5 for the empty block
		expect(store.get("/out.tzx")?.length).toBe(27)
	})

	it("fails when the input is absent from a fresh store", async () => {
		const layer = Layer.merge(InMemoryStorageLayer, DefaultTapeFormatLayer)
		const error = await Effect.runPromise(
			readConvertWrite("/nothing.tap", "/out.tzx").pipe(
				Effect.flip,
				Effect.provide(layer),
			),
		)
		expect(error._tag).toBe("StorageError")
	})
})
