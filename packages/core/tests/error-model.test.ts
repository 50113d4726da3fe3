import { Effect } from "effect";
import { describe, expect, it } from "vitest";
import {
	type ConversionError,
	InvalidPauseError,
	OverwriteRefusedError,
	PayloadTooLargeError,
	StorageError,
	TruncatedBlockError,
	TruncatedLengthError,
	UnsupportedFormatError,
} from "../src/errors/index.js";

describe("Tape error creation and _tag discrimination", () => {
	it("TruncatedLengthError has correct _tag and fields", () => {
		const err = new TruncatedLengthError({
			offset: 12,
			remaining: 1,
			message: "truncated",
		});
		expect(err._tag).toBe("TruncatedLengthError");
		expect(err.offset).toBe(12);
		expect(err.remaining).toBe(1);
		expect(err.message).toBe("truncated");
	});

	it("TruncatedBlockError has correct _tag and fields", () => {
		const err = new TruncatedBlockError({
			offset: 0,
			declared: 5,
			available: 3,
			message: "short",
		});
		expect(err._tag).toBe("TruncatedBlockError");
		expect(err.declared).toBe(5);
		expect(err.available).toBe(3);
	});

	it("PayloadTooLargeError has correct _tag and fields", () => {
		const err = new PayloadTooLargeError({
			index: 2,
			length: 70000,
			max: 65535,
			message: "too large",
		});
		expect(err._tag).toBe("PayloadTooLargeError");
		expect(err.index).toBe(2);
		expect(err.max).toBe(65535);
	});

	it("InvalidPauseError is an Error instance", () => {
		const err = new InvalidPauseError({ pauseMs: -1, message: "bad pause" });
		expect(err).toBeInstanceOf(Error);
		expect(err.pauseMs).toBe(-1);
	});
});

describe("Storage error creation", () => {
	it("StorageError keeps its cause", () => {
		const cause = new Error("EACCES");
		const err = new StorageError({
			path: "/tapes/game.tap",
			operation: "read",
			message: "denied",
			cause,
		});
		expect(err._tag).toBe("StorageError");
		expect(err.operation).toBe("read");
		expect(err.cause).toBe(cause);
	});

	it("OverwriteRefusedError and UnsupportedFormatError carry their fields", () => {
		const refused = new OverwriteRefusedError({
			path: "/tapes/game.tap",
			reason: "same-file",
			message: "no",
		});
		const unsupported = new UnsupportedFormatError({
			format: "wav",
			message: "no",
		});
		expect(refused.reason).toBe("same-file");
		expect(unsupported.format).toBe("wav");
	});
});

describe("ConversionError union", () => {
	it("is exhaustively matchable with catchTags", async () => {
		const describeError = (error: ConversionError) =>
			Effect.fail(error).pipe(
				Effect.catchTags({
					TruncatedLengthError: () => Effect.succeed("length"),
					TruncatedBlockError: () => Effect.succeed("block"),
					PayloadTooLargeError: () => Effect.succeed("too-large"),
					InvalidPauseError: () => Effect.succeed("pause"),
					StorageError: () => Effect.succeed("storage"),
					UnsupportedFormatError: () => Effect.succeed("format"),
					OverwriteRefusedError: () => Effect.succeed("overwrite"),
				}),
			);

		const result = await Effect.runPromise(
			describeError(
				new TruncatedBlockError({
					offset: 0,
					declared: 2,
					available: 1,
					message: "short",
				}),
			),
		);

		expect(result).toBe("block");
	});
});
