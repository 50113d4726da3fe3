/**
 * Node.js filesystem implementation of StorageAdapter as an Effect Layer.
 * Provides atomic writes (temp file + rename) and retry with exponential backoff.
 */

import { randomBytes } from "node:crypto";
import { promises as fs } from "node:fs";
import { dirname } from "node:path";
import {
	StorageAdapter,
	type StorageAdapterShape,
	StorageError,
} from "@tapeconv/core";
import { Effect, Layer, Schedule } from "effect";

// ============================================================================
// Configuration
// ============================================================================

export interface NodeAdapterConfig {
	readonly maxRetries?: number;
	readonly baseDelay?: number; // milliseconds
	readonly createMissingDirectories?: boolean;
	readonly fileMode?: number;
	readonly dirMode?: number;
}

const defaultConfig: Required<NodeAdapterConfig> = {
	maxRetries: 3,
	baseDelay: 100,
	createMissingDirectories: true,
	fileMode: 0o644,
	dirMode: 0o755,
};

// ============================================================================
// Helpers
// ============================================================================

const toStorageError = (
	path: string,
	operation: StorageError["operation"],
	error: unknown,
): StorageError =>
	new StorageError({
		path,
		operation,
		message:
			error instanceof Error ? error.message : `Unknown ${operation} error`,
		cause: error,
	});

/** Errors that another attempt will not fix */
const PERMANENT_CODES = new Set(["ENOENT", "EISDIR", "ENOTDIR", "EACCES", "EPERM"]);

const isTransient = (error: StorageError): boolean => {
	const { cause } = error;
	if (typeof cause === "object" && cause !== null && "code" in cause) {
		return !PERMANENT_CODES.has(String(cause.code));
	}
	return true;
};

const retryPolicy = (config: Required<NodeAdapterConfig>) =>
	Schedule.intersect(
		Schedule.exponential(config.baseDelay),
		Schedule.recurs(config.maxRetries),
	).pipe(Schedule.whileInput(isTransient));

// ============================================================================
// Storage operations
// ============================================================================

const makeRead =
	(config: Required<NodeAdapterConfig>) =>
	(path: string): Effect.Effect<Uint8Array, StorageError> =>
		Effect.tryPromise({
			try: async () => new Uint8Array(await fs.readFile(path)),
			catch: (error) => toStorageError(path, "read", error),
		}).pipe(Effect.retry(retryPolicy(config)));

const makeWrite =
	(config: Required<NodeAdapterConfig>) =>
	(path: string, data: Uint8Array): Effect.Effect<void, StorageError> => {
		const tempPath = `${path}.tmp.${randomBytes(8).toString("hex")}`;

		const ensureParentDir = config.createMissingDirectories
			? Effect.tryPromise({
					try: () =>
						fs.mkdir(dirname(path), {
							recursive: true,
							mode: config.dirMode,
						}),
					catch: (error) => toStorageError(dirname(path), "write", error),
				}).pipe(Effect.asVoid)
			: Effect.void;

		const writeAndRename = Effect.tryPromise({
			try: () => fs.writeFile(tempPath, data, { mode: config.fileMode }),
			catch: (error) => toStorageError(path, "write", error),
		}).pipe(
			Effect.andThen(
				Effect.tryPromise({
					try: () => fs.rename(tempPath, path),
					catch: (error) => toStorageError(path, "write", error),
				}),
			),
			Effect.catchAll((error) =>
				Effect.tryPromise({
					try: () => fs.unlink(tempPath),
					catch: () => error,
				}).pipe(Effect.ignore, Effect.andThen(Effect.fail(error))),
			),
		);

		return ensureParentDir.pipe(
			Effect.andThen(writeAndRename),
			Effect.retry(retryPolicy(config)),
		);
	};

const makeExists =
	(_config: Required<NodeAdapterConfig>) =>
	(path: string): Effect.Effect<boolean, StorageError> =>
		Effect.promise(() =>
			fs.access(path).then(
				() => true,
				() => false,
			),
		);

const makeCanonicalPath =
	(_config: Required<NodeAdapterConfig>) =>
	(path: string): Effect.Effect<string, StorageError> =>
		Effect.tryPromise({
			try: () => fs.realpath(path),
			catch: (error) => toStorageError(path, "resolve", error),
		});

// ============================================================================
// Layer construction
// ============================================================================

const makeAdapter = (
	config: Required<NodeAdapterConfig>,
): StorageAdapterShape => ({
	read: makeRead(config),
	write: makeWrite(config),
	exists: makeExists(config),
	canonicalPath: makeCanonicalPath(config),
});

/**
 * Creates a NodeStorageLayer with custom configuration.
 */
export const makeNodeStorageLayer = (
	config: NodeAdapterConfig = {},
): Layer.Layer<StorageAdapter> => {
	const resolved = { ...defaultConfig, ...config };
	return Layer.succeed(StorageAdapter, makeAdapter(resolved));
};

/**
 * Default NodeStorageLayer with standard configuration.
 */
export const NodeStorageLayer: Layer.Layer<StorageAdapter> =
	makeNodeStorageLayer();
