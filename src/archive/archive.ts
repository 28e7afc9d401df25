import { SanitizedPath } from "../core/sanitize.js";
import type { SanitizeOptions } from "../core/types.js";

export type ArchiveErrorKind = "UnsupportedFormat" | "BadPassword" | "CorruptEntry" | "IoFailure";

export class ArchiveError extends Error {
	constructor(
		public readonly kind: ArchiveErrorKind,
		message: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "ArchiveError";
	}
}

/** Readable and seekable byte source an archive is opened from. */
export interface RandomAccessSource {
	readonly size: number;
	read(position: number, length: number): Promise<Uint8Array>;
}

export type ArchiveEntry = {
	/** Entry name as stored in the container. Untrusted. */
	path: string;
	type: "file" | "directory" | "symlink";
	size: number;
};

export type OpenOptions = {
	password?: string;
};

export interface Archive {
	entries(): AsyncIterable<ArchiveEntry>;
	extract(entry: ArchiveEntry, destination: SanitizedPath): Promise<void>;
}

/**
 * One implementation per container format (zip, tar, 7z, rar). Implementations must
 * pass every entry path through {@link resolveEntryDestination} before writing.
 */
export interface ArchiveFormat<A extends Archive = Archive> {
	readonly id: string;
	open(source: RandomAccessSource, options?: OpenOptions): Promise<A>;
}

export function resolveEntryDestination(
	entry: ArchiveEntry,
	targetDir: string,
	options: Omit<SanitizeOptions, "base"> = {},
): SanitizedPath {
	return SanitizedPath.sanitize(entry.path, { ...options, base: targetDir });
}

export async function extractAll(
	archive: Archive,
	targetDir: string,
	options: Omit<SanitizeOptions, "base"> = {},
): Promise<SanitizedPath[]> {
	const written: SanitizedPath[] = [];
	for await (const entry of archive.entries()) {
		const destination = resolveEntryDestination(entry, targetDir, options);
		await archive.extract(entry, destination);
		written.push(destination);
	}
	return written;
}
