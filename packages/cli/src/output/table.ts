/**
 * tapeconv CLI - Table Output Formatter
 *
 * Formats rows as an aligned plain-text table. Numeric columns are
 * right-aligned; long text is truncated with an ellipsis.
 */

import type { Row } from "./formatter.js"

const DEFAULT_MAX_COLUMN_WIDTH = 32

function cell(value: Row[string] | undefined): string {
	if (value === null || value === undefined) {
		return "-"
	}
	return String(value)
}

function truncate(str: string, maxLen: number): string {
	if (str.length <= maxLen) {
		return str
	}
	if (maxLen <= 3) {
		return str.slice(0, maxLen)
	}
	return `${str.slice(0, maxLen - 3)}...`
}

/**
 * Format rows as an aligned table: header, dashed separator, one line per row.
 *
 * @param options.maxColumnWidth - Maximum width for any column (default: 32)
 */
export function formatAsTable(
	rows: ReadonlyArray<Row>,
	options?: { readonly maxColumnWidth?: number },
): string {
	if (rows.length === 0) {
		return "(no blocks)"
	}

	const maxColumnWidth = options?.maxColumnWidth ?? DEFAULT_MAX_COLUMN_WIDTH
	const columns = Object.keys(rows[0]).map((name) => {
		const values = rows.map((row) => cell(row[name]))
		const width = Math.min(
			Math.max(name.length, ...values.map((value) => value.length)),
			maxColumnWidth,
		)
		const numeric = rows.every((row) => typeof row[name] === "number")
		return { name, width, numeric }
	})

	const renderLine = (values: ReadonlyArray<string>) =>
		columns
			.map(({ width, numeric }, i) => {
				const text = truncate(values[i], width)
				return numeric ? text.padStart(width) : text.padEnd(width)
			})
			.join("  ")
			.trimEnd()

	return [
		renderLine(columns.map((column) => column.name)),
		columns.map((column) => "-".repeat(column.width)).join("  "),
		...rows.map((row) => renderLine(columns.map((column) => cell(row[column.name])))),
	].join("\n")
}
