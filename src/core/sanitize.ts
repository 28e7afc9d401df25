import path from "node:path";
import { fileURLToPath } from "node:url";
import { DRIVE_PREFIX, decompose, hostPlatform, separatorFor } from "./components.js";
import { InvalidInputError } from "./errors.js";
import type {
	NulBytePolicy,
	PathComponent,
	PathPlatform,
	SanitizeOptions,
	SanitizeReport,
} from "./types.js";

export type RawPath = string | Buffer | URL | SanitizedPath;

export type SanitizeResult =
	| { ok: true; path: SanitizedPath }
	| { ok: false; error: InvalidInputError };

type EmitResult = {
	emitted: PathComponent[];
	droppedParents: number;
	strippedAnchors: number;
};

/**
 * A path that cannot reach above its virtual root, optionally rooted at a base directory.
 *
 * Instances only come out of {@link SanitizedPath.sanitize} and friends, so every
 * instance holds the no-escape guarantee for its whole lifetime.
 */
export class SanitizedPath {
	readonly path: string;
	readonly depth: number;
	readonly modified: boolean;

	private constructor(
		readonly relative: string,
		readonly segments: readonly string[],
		readonly emitted: readonly PathComponent[],
		readonly report: Readonly<SanitizeReport>,
		readonly platform: PathPlatform,
		readonly base: string | undefined,
	) {
		this.path = base === undefined ? relative : joinBase(base, relative, platform);
		this.depth = segments.length;
		this.modified =
			report.droppedParents > 0 ||
			report.strippedAnchors > 0 ||
			report.strippedNulBytes > 0 ||
			emitted.some((component) => component.kind === "parent");
		Object.freeze(this.segments);
		Object.freeze(this.emitted);
		Object.freeze(this.report);
		Object.freeze(this);
	}

	/**
	 * Re-sanitizing a `SanitizedPath` keeps its platform and base unless the options
	 * name others.
	 */
	static sanitize(raw: RawPath, options: SanitizeOptions = {}): SanitizedPath {
		const inherited = raw instanceof SanitizedPath ? raw : undefined;
		const platform = options.platform ?? inherited?.platform ?? hostPlatform();
		const base = options.base ?? inherited?.base;
		const policy = resolveNulPolicy(options);
		const input = toPathString(raw);

		if (policy === "reject" && input.includes("\0")) {
			throw new InvalidInputError("Path contains a NUL byte", input);
		}

		const cleanedInput = policy === "strip" ? input.replaceAll("\0", "") : input;
		const strippedNulBytes = input.length - cleanedInput.length;
		const { emitted, droppedParents, strippedAnchors } = emitComponents(
			decompose(cleanedInput, platform),
		);
		const segments = resolveEmitted(emitted);
		const strippedDrives = platform === "win32" ? stripLeadingDrives(segments) : 0;

		return new SanitizedPath(
			segments.join(separatorFor(platform)),
			segments,
			emitted,
			{ droppedParents, strippedAnchors: strippedAnchors + strippedDrives, strippedNulBytes },
			platform,
			base,
		);
	}

	static from(raw: string): SanitizedPath {
		return SanitizedPath.sanitize(raw);
	}

	intoInner(): string {
		return this.path;
	}

	toString(): string {
		return this.path;
	}

	toJSON(): string {
		return this.path;
	}
}

export function sanitize(raw: RawPath, options: SanitizeOptions = {}): SanitizedPath {
	return SanitizedPath.sanitize(raw, options);
}

export function safeSanitize(raw: RawPath, options: SanitizeOptions = {}): SanitizeResult {
	try {
		return { ok: true, path: SanitizedPath.sanitize(raw, options) };
	} catch (error) {
		if (error instanceof InvalidInputError) {
			return { ok: false, error };
		}
		throw error;
	}
}

export function isSanitizedPath(value: unknown): value is SanitizedPath {
	return value instanceof SanitizedPath;
}

/**
 * Walks the components with a virtual depth counter. Root anchors, prefixes and "."
 * collapse to a "current" marker; a ".." at depth 0 is dropped.
 */
export function emitComponents(components: readonly PathComponent[]): EmitResult {
	const emitted: PathComponent[] = [];
	let depth = 0;
	let droppedParents = 0;
	let strippedAnchors = 0;

	for (const component of components) {
		switch (component.kind) {
			case "root":
			case "prefix":
				strippedAnchors += 1;
				emitted.push({ kind: "current" });
				break;
			case "current":
				emitted.push({ kind: "current" });
				break;
			case "parent":
				if (depth > 0) {
					depth -= 1;
					emitted.push({ kind: "parent" });
				} else {
					droppedParents += 1;
				}
				break;
			case "normal":
				depth += 1;
				emitted.push(component);
				break;
		}
	}

	return { emitted, droppedParents, strippedAnchors };
}

export function resolveEmitted(emitted: readonly PathComponent[]): string[] {
	const segments: string[] = [];
	for (const component of emitted) {
		if (component.kind === "normal") {
			segments.push(component.value);
		} else if (component.kind === "parent") {
			segments.pop();
		}
	}
	return segments;
}

// A resolved ".." can pull a segment such as "C:" to the front, where win32 would
// read it as a drive.
function stripLeadingDrives(segments: string[]): number {
	let stripped = 0;
	while (segments.length > 0 && DRIVE_PREFIX.test(segments[0])) {
		const rest = segments[0].replace(DRIVE_PREFIX, "");
		if (rest === "" || rest === "." || rest === "..") {
			segments.shift();
		} else {
			segments[0] = rest;
		}
		stripped += 1;
	}
	return stripped;
}

function resolveNulPolicy(options: SanitizeOptions): NulBytePolicy {
	if (options.rejectNulBytes) {
		return "reject";
	}
	return options.nulBytes ?? "strip";
}

function toPathString(raw: RawPath): string {
	if (raw instanceof SanitizedPath) {
		return raw.relative;
	}
	if (typeof raw === "string") {
		return raw;
	}
	if (raw instanceof URL) {
		if (raw.protocol !== "file:") {
			throw new InvalidInputError(`Unsupported URL scheme: ${raw.protocol}`, raw.href);
		}
		try {
			return fileURLToPath(raw);
		} catch (error) {
			const message = error instanceof Error ? error.message : "Invalid file URL";
			throw new InvalidInputError(message, raw.href);
		}
	}
	return raw.toString("utf-8");
}

function joinBase(base: string, relative: string, platform: PathPlatform): string {
	if (relative.length === 0) {
		return base;
	}
	return platform === "win32" ? path.win32.join(base, relative) : path.posix.join(base, relative);
}
