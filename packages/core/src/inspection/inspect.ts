import { TAP_LENGTH_PREFIX_SIZE } from "../formats/tap.js";
import type {
	BlockSummary,
	HeaderType,
	TapeRecord,
} from "../types/tape-types.js";

// ============================================================================
// Spectrum Block Layout
// ============================================================================

const HEADER_FLAG = 0x00;
// flag(1) + type(1) + name(10) + lengths/params(6) + checksum(1)
const STANDARD_HEADER_LENGTH = 19;
const NAME_START = 2;
const NAME_END = 12;

const HEADER_TYPES: ReadonlyArray<HeaderType> = [
	"Program",
	"Number array",
	"Character array",
	"Bytes",
];

// ============================================================================
// Helpers
// ============================================================================

/**
 * The checksum byte is the XOR of every preceding byte, flag included,
 * so XOR-ing the whole payload yields zero for an intact block.
 */
const verifyChecksum = (payload: Uint8Array): boolean | null => {
	if (payload.length < 2) {
		return null;
	}
	let acc = 0;
	for (const byte of payload) {
		acc ^= byte;
	}
	return acc === 0;
};

const decodeName = (payload: Uint8Array): string =>
	String.fromCharCode(...payload.subarray(NAME_START, NAME_END)).replace(
		/ +$/,
		"",
	);

const summarize = (
	record: TapeRecord,
	index: number,
	offset: number,
): BlockSummary => {
	const { payload } = record;
	const flag = payload.length > 0 ? payload[0] : null;
	const isStandardHeader =
		flag === HEADER_FLAG && payload.length === STANDARD_HEADER_LENGTH;

	return {
		index,
		offset,
		length: payload.length,
		flag,
		kind: flag === null ? "empty" : flag === HEADER_FLAG ? "header" : "data",
		checksumValid: verifyChecksum(payload),
		headerType: isStandardHeader
			? (HEADER_TYPES[payload[1]] ?? "Unknown")
			: null,
		name: isStandardHeader ? decodeName(payload) : null,
	};
};

// ============================================================================
// Inspection
// ============================================================================

/**
 * Describe each record as a Spectrum tape block.
 *
 * Purely informational: the encoder never looks at flags or checksums.
 */
export const inspectRecords = (
	records: ReadonlyArray<TapeRecord>,
): ReadonlyArray<BlockSummary> => {
	const summaries: Array<BlockSummary> = [];
	let offset = 0;
	for (const [index, record] of records.entries()) {
		summaries.push(summarize(record, index, offset));
		offset += TAP_LENGTH_PREFIX_SIZE + record.payload.length;
	}
	return summaries;
};
