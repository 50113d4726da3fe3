/**
 * tapeconv CLI - JSON Output Formatter
 */

import type { Row } from "./formatter.js"

/**
 * Format rows as pretty-printed JSON with 2-space indentation.
 */
export function formatAsJson(rows: ReadonlyArray<Row>): string {
	return JSON.stringify(rows, null, 2)
}
