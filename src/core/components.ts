import type { PathComponent, PathPlatform } from "./types.js";

export const DRIVE_PREFIX = /^[A-Za-z]:/;

const WIN32_PREFIXES: RegExp[] = [
	/^\\\\\?\\UNC\\[^\\]+(?:\\[^\\]*)?/i,
	/^\\\\\?\\[A-Za-z]:/,
	/^\\\\\?\\[^\\]+/,
	/^[\\/]{2}\.[\\/][^\\/]+/,
	/^[\\/]{2}[^\\/.?][^\\/]*(?:[\\/][^\\/]*)?/,
	DRIVE_PREFIX,
];

// Verbatim prefixes are dropped during sanitizing, so what follows them is split on
// both separators like any other win32 path.
const WIN32_SEPARATOR = /[\\/]/;

export function hostPlatform(): PathPlatform {
	return process.platform === "win32" ? "win32" : "posix";
}

export function separatorFor(platform: PathPlatform): string {
	return platform === "win32" ? "\\" : "/";
}

export function decompose(raw: string, platform: PathPlatform = hostPlatform()): PathComponent[] {
	return platform === "win32" ? decomposeWin32(raw) : decomposePosix(raw);
}

function decomposePosix(raw: string): PathComponent[] {
	const components: PathComponent[] = [];
	const hasRoot = raw.startsWith("/");
	if (hasRoot) {
		components.push({ kind: "root" });
	}
	pushSegments(components, raw.split("/"), !hasRoot);
	return components;
}

function decomposeWin32(raw: string): PathComponent[] {
	const components: PathComponent[] = [];
	let rest = raw;

	for (const pattern of WIN32_PREFIXES) {
		const match = pattern.exec(raw);
		if (match) {
			components.push({ kind: "prefix", value: match[0] });
			rest = raw.slice(match[0].length);
			break;
		}
	}

	const hasRoot = rest.length > 0 && WIN32_SEPARATOR.test(rest[0]);
	if (hasRoot) {
		components.push({ kind: "root" });
	}
	pushSegments(components, rest.split(WIN32_SEPARATOR), components.length === 0);
	return components;
}

// Only a leading "." survives as a component; interior ones are no-ops.
function pushSegments(components: PathComponent[], segments: string[], keepLeadingDot: boolean): void {
	segments.forEach((segment, index) => {
		if (segment === "") {
			return;
		}
		if (segment === ".") {
			if (index === 0 && keepLeadingDot) {
				components.push({ kind: "current" });
			}
			return;
		}
		if (segment === "..") {
			components.push({ kind: "parent" });
			return;
		}
		components.push({ kind: "normal", value: segment });
	});
}

export function formatComponents(components: readonly PathComponent[], platform: PathPlatform): string {
	return components
		.map((component) => {
			switch (component.kind) {
				case "prefix":
					return component.value;
				case "root":
					return "";
				case "current":
					return ".";
				case "parent":
					return "..";
				case "normal":
					return component.value;
			}
		})
		.join(separatorFor(platform));
}
