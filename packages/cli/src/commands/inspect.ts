/**
 * tapeconv CLI - Inspect Command
 *
 * Lists the blocks of a TAP image with their Spectrum flag, checksum
 * status and, for headers, the program type and name. The file is read
 * as TAP whatever its extension.
 */

import { Effect } from "effect"
import * as path from "node:path"
import {
	type BlockSummary,
	inspectRecords,
	makeNodeStorageLayer,
	readTap,
} from "@tapeconv/node"
import { format, type OutputFormat, type Row } from "../output/formatter.js"

/**
 * Options for the inspect command.
 */
export interface InspectOptions {
	readonly input: string
	readonly cwd?: string
}

/**
 * Result of the inspect command.
 */
export interface InspectResult {
	readonly success: boolean
	readonly message?: string
	readonly data?: ReadonlyArray<BlockSummary>
}

const hexByte = (value: number): string =>
	`0x${value.toString(16).padStart(2, "0").toUpperCase()}`

const checksumLabel = (valid: boolean | null): string | null =>
	valid === null ? null : valid ? "ok" : "BAD"

/**
 * Flatten a summary into table/CSV columns.
 */
export function toDisplayRow(summary: BlockSummary): Row {
	return {
		block: summary.index,
		offset: summary.offset,
		length: summary.length,
		flag: summary.flag === null ? null : hexByte(summary.flag),
		kind: summary.kind,
		checksum: checksumLabel(summary.checksumValid),
		type: summary.headerType,
		name: summary.name,
	}
}

/**
 * Render summaries: JSON and YAML keep every field as-is, table and CSV
 * use the display columns.
 */
export function renderInspection(
	summaries: ReadonlyArray<BlockSummary>,
	outputFormat: OutputFormat,
): string {
	if (outputFormat === "json" || outputFormat === "yaml") {
		return format(outputFormat, summaries.map((summary) => ({ ...summary })))
	}
	return format(outputFormat, summaries.map(toDisplayRow))
}

/**
 * Execute the inspect command.
 */
export function runInspect(
	options: InspectOptions,
): Effect.Effect<InspectResult, never> {
	const input = path.resolve(options.cwd ?? process.cwd(), options.input)

	return readTap(input).pipe(
		Effect.map((records) => ({
			success: true,
			data: inspectRecords(records),
		})),
		Effect.provide(makeNodeStorageLayer()),
		Effect.catchAll((error) =>
			Effect.succeed({
				success: false as const,
				message: error.message,
			}),
		),
	)
}
