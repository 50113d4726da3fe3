/**
 * tapeconv CLI - CSV Output Formatter
 *
 * Header row taken from the first row's keys; values quoted only when needed.
 */

import type { Row } from "./formatter.js"

/**
 * Quote a value when it holds a comma, quote or line break.
 * Quotes within values are doubled; null becomes an empty cell.
 */
function escapeValue(value: Row[string]): string {
	if (value === null) {
		return ""
	}

	const str = String(value)
	if (/[",\r\n]/.test(str)) {
		return `"${str.replace(/"/g, '""')}"`
	}
	return str
}

/**
 * Format rows as CSV. Rows are expected to share the same columns.
 */
export function formatAsCsv(rows: ReadonlyArray<Row>): string {
	if (rows.length === 0) {
		return ""
	}

	const columns = Object.keys(rows[0])
	const lines = [columns.map(escapeValue).join(",")]
	for (const row of rows) {
		lines.push(columns.map((column) => escapeValue(row[column] ?? null)).join(","))
	}
	return lines.join("\n")
}
