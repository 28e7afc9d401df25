export type PathPlatform = "posix" | "win32";

export type NulBytePolicy = "strip" | "reject" | "preserve";

export type PathComponent =
	| { kind: "prefix"; value: string }
	| { kind: "root" }
	| { kind: "current" }
	| { kind: "parent" }
	| { kind: "normal"; value: string };

export type SanitizeOptions = {
	base?: string;
	platform?: PathPlatform;
	nulBytes?: NulBytePolicy;
	/** Hardened mode. Same as `nulBytes: "reject"` and wins over it. */
	rejectNulBytes?: boolean;
};

export type SanitizeReport = {
	droppedParents: number;
	strippedAnchors: number;
	strippedNulBytes: number;
};
