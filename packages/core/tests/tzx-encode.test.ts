import { describe, expect, it } from "vitest";
import {
	DEFAULT_PAUSE_MS,
	encodeTzx,
	MAX_PAYLOAD_LENGTH,
	TZX_HEADER_SIZE,
} from "../src/formats/tzx.js";
import type { TapeRecord } from "../src/types/tape-types.js";
import {
	getLeft,
	getRight,
	patternPayload,
	TZX_HEADER_BYTES,
} from "./helpers/tape-fixtures.js";

const record = (bytes: ReadonlyArray<number> | Uint8Array): TapeRecord => ({
	payload: Uint8Array.from(bytes),
});

describe("encodeTzx", () => {
	describe("container header", () => {
		it("encodes no records as the bare signature and version", () => {
			const bytes = getRight(encodeTzx([]));

			expect(Array.from(bytes)).toEqual(TZX_HEADER_BYTES);
			expect(bytes.length).toBe(TZX_HEADER_SIZE);
		});
	});

	describe("standard data blocks", () => {
		it("emits tag, default pause, length and payload", () => {
			const bytes = getRight(encodeTzx([record([0x41, 0x42, 0x43])]));

			expect(Array.from(bytes)).toEqual([
				...TZX_HEADER_BYTES,
				0x10,
				0xe8,
				0x03,
				0x03,
				0x00,
				0x41,
				0x42,
				0x43,
			]);
		});

		it("uses 1000 ms as the default pause", () => {
			expect(DEFAULT_PAUSE_MS).toBe(1000);
		});

		it("emits a zero length for an empty record", () => {
			const bytes = getRight(encodeTzx([record([])]));

			expect(Array.from(bytes.subarray(TZX_HEADER_SIZE))).toEqual([
				0x10, 0xe8, 0x03, 0x00, 0x00,
			]);
		});

		it("keeps record order", () => {
			const bytes = getRight(encodeTzx([record([0x01]), record([0x02, 0x03])]));

			expect(Array.from(bytes.subarray(TZX_HEADER_SIZE))).toEqual([
				0x10, 0xe8, 0x03, 0x01, 0x00, 0x01, 0x10, 0xe8, 0x03, 0x02, 0x00,
				0x02, 0x03,
			]);
		});

		it("applies a pause override to every block", () => {
			const bytes = getRight(
				encodeTzx([record([0xaa]), record([0xbb])], { pauseMs: 0x0102 }),
			);

			expect(Array.from(bytes.subarray(TZX_HEADER_SIZE))).toEqual([
				0x10, 0x02, 0x01, 0x01, 0x00, 0xaa, 0x10, 0x02, 0x01, 0x01, 0x00,
				0xbb,
			]);
		});

		it("is deterministic", () => {
			const records = [record(patternPayload(40, 3)), record(patternPayload(9, 5))];

			expect(getRight(encodeTzx(records))).toEqual(getRight(encodeTzx(records)));
		});
	});

	describe("size ceiling", () => {
		it("accepts a 65535-byte payload and writes 0xFFFF as its length", () => {
			const bytes = getRight(encodeTzx([record(new Uint8Array(MAX_PAYLOAD_LENGTH))]));

			expect(bytes[TZX_HEADER_SIZE + 3]).toBe(0xff);
			expect(bytes[TZX_HEADER_SIZE + 4]).toBe(0xff);
			expect(bytes.length).toBe(TZX_HEADER_SIZE + 5 + 65535);
		});

		it("fails with PayloadTooLargeError for a 65536-byte payload", () => {
			const error = getLeft(
				encodeTzx([record([0x01]), record(new Uint8Array(65536))]),
			);

			expect(error._tag).toBe("PayloadTooLargeError");
			if (error._tag === "PayloadTooLargeError") {
				expect(error.index).toBe(1);
				expect(error.length).toBe(65536);
				expect(error.max).toBe(65535);
			}
		});
	});

	describe("pause validation", () => {
		it.each([-1, 65536, 1.5, Number.NaN])(
			"rejects a pause of %s",
			(pauseMs) => {
				const error = getLeft(encodeTzx([], { pauseMs }));

				expect(error._tag).toBe("InvalidPauseError");
			},
		);

		it("accepts the bounds 0 and 65535", () => {
			expect(getRight(encodeTzx([record([0x01])], { pauseMs: 0 }))[11]).toBe(0x00);
			expect(getRight(encodeTzx([record([0x01])], { pauseMs: 65535 }))[11]).toBe(0xff);
		});
	});
});
