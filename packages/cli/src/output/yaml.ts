/**
 * tapeconv CLI - YAML Output Formatter
 */

import YAML from "yaml"
import type { Row } from "./formatter.js"

/**
 * Format rows as a YAML sequence with 2-space indentation.
 */
export function formatAsYaml(rows: ReadonlyArray<Row>): string {
	return YAML.stringify(rows, { indent: 2 })
}
