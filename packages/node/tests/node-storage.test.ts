/**
 * Node adapter storage tests against a temporary directory.
 */

import { randomBytes } from "node:crypto";
import { promises as fs } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { StorageAdapter } from "@tapeconv/core";
import { Effect, Either } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { makeNodeStorageLayer } from "../src/node-adapter-layer.js";

// ============================================================================
// Helpers
// ============================================================================

const sampleBytes = new Uint8Array([0x00, 0x01, 0x7f, 0x80, 0xfe, 0xff]);

const run = <A, E>(effect: Effect.Effect<A, E, StorageAdapter>) =>
	Effect.runPromise(
		Effect.provide(effect, makeNodeStorageLayer({ baseDelay: 1 })),
	);

// ============================================================================
// Node Storage Adapter Tests
// ============================================================================

describe("NodeStorageLayer (filesystem)", () => {
	let tempDir: string;

	beforeEach(async () => {
		tempDir = join(tmpdir(), `tapeconv-test-${randomBytes(8).toString("hex")}`);
		await fs.mkdir(tempDir, { recursive: true });
	});

	afterEach(async () => {
		await fs.rm(tempDir, { recursive: true, force: true });
	});

	it("writes and reads back binary data unchanged", async () => {
		const filePath = join(tempDir, "tape.tzx");

		const result = await run(
			Effect.gen(function* () {
				const storage = yield* StorageAdapter;
				yield* storage.write(filePath, sampleBytes);
				return yield* storage.read(filePath);
			}),
		);

		expect(result).toEqual(sampleBytes);
		const onDisk = await fs.readFile(filePath);
		expect(Array.from(onDisk)).toEqual(Array.from(sampleBytes));
	});

	it("creates missing parent directories", async () => {
		const filePath = join(tempDir, "nested", "deeper", "tape.tzx");

		await run(
			Effect.flatMap(StorageAdapter, (storage) =>
				storage.write(filePath, sampleBytes),
			),
		);

		const stat = await fs.stat(filePath);
		expect(stat.size).toBe(sampleBytes.length);
	});

	it("leaves no temp files behind", async () => {
		const filePath = join(tempDir, "tape.tzx");

		await run(
			Effect.flatMap(StorageAdapter, (storage) =>
				storage.write(filePath, sampleBytes),
			),
		);

		expect(await fs.readdir(tempDir)).toEqual(["tape.tzx"]);
	});

	it("reports whether a file exists", async () => {
		const filePath = join(tempDir, "tape.tap");
		await fs.writeFile(filePath, sampleBytes);

		const [present, absent] = await run(
			Effect.gen(function* () {
				const storage = yield* StorageAdapter;
				const present = yield* storage.exists(filePath);
				const absent = yield* storage.exists(join(tempDir, "other.tap"));
				return [present, absent] as const;
			}),
		);

		expect(present).toBe(true);
		expect(absent).toBe(false);
	});

	it("fails reading a missing file with StorageError", async () => {
		const filePath = join(tempDir, "missing.tap");

		const result = await run(
			Effect.either(
				Effect.flatMap(StorageAdapter, (storage) => storage.read(filePath)),
			),
		);

		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("StorageError");
			expect(result.left.operation).toBe("read");
			expect(result.left.path).toBe(filePath);
		}
	});

	it("resolves symlinks to the same canonical path", async () => {
		const filePath = join(tempDir, "tape.tap");
		const linkPath = join(tempDir, "link.tap");
		await fs.writeFile(filePath, sampleBytes);
		await fs.symlink(filePath, linkPath);

		const [direct, linked] = await run(
			Effect.gen(function* () {
				const storage = yield* StorageAdapter;
				return [
					yield* storage.canonicalPath(filePath),
					yield* storage.canonicalPath(linkPath),
				] as const;
			}),
		);

		expect(linked).toBe(direct);
	});
});
