/**
 * Convenience wrappers that eliminate manual layer wiring.
 *
 * These bundle the Node filesystem adapter with the built-in TAP reader and
 * TZX writer so callers can convert files without touching Layers.
 */

import {
	type ConvertFileOptions,
	type ConvertFileResult,
	type ConversionError,
	convertFile,
	makeTapeFormatLayer,
	type StorageAdapter,
	type TapeFormatRegistry,
	tapFormat,
	type TzxEncodeOptions,
	tzxFormat,
} from "@tapeconv/core";
import { Effect, Layer } from "effect";
import {
	makeNodeStorageLayer,
	type NodeAdapterConfig,
} from "./node-adapter-layer.js";

export interface NodeConversionOptions extends TzxEncodeOptions {
	readonly storage?: NodeAdapterConfig;
}

/**
 * Build a Layer providing StorageAdapter (filesystem) and TapeFormatRegistry.
 *
 * @param options - TZX encoder settings and filesystem adapter settings
 * @returns A Layer providing StorageAdapter + TapeFormatRegistry
 */
export const makeNodeConversionLayer = (
	options: NodeConversionOptions = {},
): Layer.Layer<StorageAdapter | TapeFormatRegistry> => {
	const { storage, ...encodeOptions } = options;
	return Layer.merge(
		makeNodeStorageLayer(storage),
		makeTapeFormatLayer([tapFormat(), tzxFormat(encodeOptions)]),
	);
};

/**
 * Convert a TAP file on disk to TZX.
 *
 * Returns an Effect with no requirements; failures stay typed.
 *
 * @example
 * ```typescript
 * const result = await Effect.runPromise(
 *   convertTapeFile("./manic.tap", "./manic.tzx"),
 * )
 * console.log(`${result.blockCount} blocks`)
 * ```
 */
export const convertTapeFile = (
	inputPath: string,
	outputPath: string,
	options: NodeConversionOptions & ConvertFileOptions = {},
): Effect.Effect<ConvertFileResult, ConversionError> => {
	const { storage, ...convertOptions } = options;
	return convertFile(inputPath, outputPath, convertOptions).pipe(
		Effect.provide(makeNodeStorageLayer(storage)),
	);
};
