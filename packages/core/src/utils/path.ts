/**
 * Path utilities for tape files.
 */

/**
 * Index of the dot that starts the extension, or -1 when there is none.
 * A leading dot in the file name (".profile") does not start an extension.
 */
function extensionDotIndex(filePath: string): number {
	const lastDotIndex = filePath.lastIndexOf(".");
	const lastSlashIndex = Math.max(
		filePath.lastIndexOf("/"),
		filePath.lastIndexOf("\\"),
	);

	if (lastDotIndex <= lastSlashIndex + 1) {
		return -1;
	}
	return lastDotIndex;
}

/**
 * Extract the file extension from a file path without the leading dot.
 *
 * @example
 * getFileExtension('/games/manic.tap') // returns 'tap'
 * getFileExtension('/games/MANIC.TAP') // returns 'tap'
 * getFileExtension('/games/manic') // returns ''
 */
export function getFileExtension(filePath: string): string {
	const dot = extensionDotIndex(filePath);
	return dot === -1 ? "" : filePath.slice(dot + 1).toLowerCase();
}

/**
 * Swap the file extension, or append one when the path has none.
 *
 * @example
 * replaceExtension('/games/manic.tap', 'tzx') // returns '/games/manic.tzx'
 * replaceExtension('/games/manic', 'tzx') // returns '/games/manic.tzx'
 */
export function replaceExtension(filePath: string, extension: string): string {
	const dot = extensionDotIndex(filePath);
	const stem = dot === -1 ? filePath : filePath.slice(0, dot);
	return `${stem}.${extension}`;
}
