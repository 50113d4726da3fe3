/**
 * tapeconv CLI - Output Formatter Dispatcher
 *
 * Accepts a format flag and row array, delegates to the appropriate formatter.
 */

import { formatAsCsv } from "./csv.js"
import { formatAsJson } from "./json.js"
import { formatAsTable } from "./table.js"
import { formatAsYaml } from "./yaml.js"

/**
 * Supported output formats.
 */
export type OutputFormat = "table" | "json" | "yaml" | "csv"

/**
 * A flat row of printable values.
 */
export type Row = Readonly<Record<string, string | number | boolean | null>>

/**
 * Format the given rows based on the specified format.
 */
export function format(format: OutputFormat, rows: ReadonlyArray<Row>): string {
	switch (format) {
		case "json":
			return formatAsJson(rows)
		case "yaml":
			return formatAsYaml(rows)
		case "csv":
			return formatAsCsv(rows)
		case "table":
			return formatAsTable(rows)
	}
}
