import { describe, expect, it } from "vitest";
import {
	type Archive,
	type ArchiveEntry,
	ArchiveError,
	type ArchiveFormat,
	type RandomAccessSource,
	extractAll,
	resolveEntryDestination,
} from "../src/archive/archive.js";
import type { SanitizedPath } from "../src/core/sanitize.js";

class MemoryArchive implements Archive {
	readonly written = new Map<string, string>();

	constructor(private readonly files: Record<string, string>) {}

	async *entries(): AsyncIterable<ArchiveEntry> {
		for (const [path, content] of Object.entries(this.files)) {
			yield { path, type: "file", size: content.length };
		}
	}

	async extract(entry: ArchiveEntry, destination: SanitizedPath): Promise<void> {
		this.written.set(destination.path, this.files[entry.path]);
	}
}

const MAGIC = [0x4d, 0x45, 0x4d];

const memoryFormat: ArchiveFormat<MemoryArchive> = {
	id: "memory",
	async open(source, options) {
		const header = await source.read(0, MAGIC.length);
		if (!MAGIC.every((byte, index) => header[index] === byte)) {
			throw new ArchiveError("UnsupportedFormat", "Not a memory archive");
		}
		if (options?.password !== undefined && options.password !== "test-secret") {
			throw new ArchiveError("BadPassword", "Wrong password");
		}
		return new MemoryArchive({
			"docs/readme.md": "hello",
			"../../etc/cron.d/job": "evil",
			"/abs/file": "x",
		});
	},
};

function bytesSource(bytes: number[]): RandomAccessSource {
	const data = Uint8Array.from(bytes);
	return {
		size: data.length,
		async read(position, length) {
			return data.subarray(position, position + length);
		},
	};
}

describe("archive contract", () => {
	it("confines every entry to the target directory", async () => {
		const archive = await memoryFormat.open(bytesSource([...MAGIC, 0]));
		const written = await extractAll(archive, "/tmp/out", { platform: "posix" });

		expect(written.map((destination) => destination.path)).toEqual([
			"/tmp/out/docs/readme.md",
			"/tmp/out/etc/cron.d/job",
			"/tmp/out/abs/file",
		]);
		expect(archive.written.get("/tmp/out/etc/cron.d/job")).toBe("evil");
	});

	it("surfaces format errors by kind", async () => {
		await expect(memoryFormat.open(bytesSource([0, 0, 0]))).rejects.toMatchObject({
			kind: "UnsupportedFormat",
			name: "ArchiveError",
		});
		await expect(
			memoryFormat.open(bytesSource(MAGIC), { password: "nope" }),
		).rejects.toMatchObject({ kind: "BadPassword" });
	});

	it("resolves a single entry destination", () => {
		const destination = resolveEntryDestination(
			{ path: "..\\..\\Windows\\win.ini", type: "file", size: 0 },
			"D:\\unpacked",
			{ platform: "win32" },
		);
		expect(destination.path).toBe("D:\\unpacked\\Windows\\win.ini");
	});

	it("keeps the cause on archive errors", () => {
		const cause = new Error("short read");
		const error = new ArchiveError("IoFailure", "Failed to read entry", { cause });
		expect(error.cause).toBe(cause);
		expect(error.kind).toBe("IoFailure");
	});
});
