/**
 * @tapeconv/node - Node.js adapter for tapeconv
 *
 * Re-exports everything from @tapeconv/core plus Node.js filesystem storage.
 */

// Re-export everything from core
export * from "@tapeconv/core";
// Convenience wrappers (no manual layer wiring)
export type { NodeConversionOptions } from "./convenience.js";
export {
	convertTapeFile,
	makeNodeConversionLayer,
} from "./convenience.js";
export type { NodeAdapterConfig } from "./node-adapter-layer.js";
// Export Node.js storage adapter
export {
	makeNodeStorageLayer,
	NodeStorageLayer,
} from "./node-adapter-layer.js";
