import fs from "node:fs";
import type { NulBytePolicy, PathPlatform } from "../core/types.js";

export type CliCommand = "sanitize" | "check";

export type CliOptions = {
	command: CliCommand;
	paths: string[];
	base?: string;
	platform?: PathPlatform;
	nulBytes?: NulBytePolicy;
	stdin?: boolean;
	json?: boolean;
	help?: boolean;
	version?: boolean;
	unknown?: string[];
	errors?: string[];
};

export function parseArgs(argv: string[]): CliOptions {
	const options: CliOptions = { command: "sanitize", paths: [], unknown: [], errors: [] };
	const args = [...argv];
	const first = args[0];
	if (first === "sanitize" || first === "check") {
		options.command = first;
		args.shift();
	}

	while (args.length) {
		const arg = args.shift();
		switch (arg) {
			case "--help":
			case "-h":
				options.help = true;
				break;
			case "--version":
			case "-v":
				options.version = true;
				break;
			case "--base":
				options.base = takeValue("--base", args, options);
				break;
			case "--platform":
				{
					const value = takeValue("--platform", args, options);
					if (value) {
						const platform = toPlatform(value);
						if (platform) {
							options.platform = platform;
						} else {
							options.errors?.push(`Invalid value for --platform: ${value} (expected posix|win32)`);
						}
					}
				}
				break;
			case "--nul":
				{
					const value = takeValue("--nul", args, options);
					if (value) {
						const policy = toNulPolicy(value);
						if (policy) {
							options.nulBytes = policy;
						} else {
							options.errors?.push(
								`Invalid value for --nul: ${value} (expected strip|reject|preserve)`,
							);
						}
					}
				}
				break;
			case "--reject-nul":
				options.nulBytes = "reject";
				break;
			case "--stdin":
				options.stdin = true;
				break;
			case "--json":
				options.json = true;
				break;
			case "--":
				options.paths.push(...args.splice(0));
				break;
			default:
				if (arg === undefined) {
					break;
				}
				if (arg.startsWith("-") && arg !== "-") {
					options.unknown?.push(arg);
				} else {
					options.paths.push(arg);
				}
				break;
		}
	}

	return options;
}

export function printHelp(write: (chunk: string) => void): void {
	write(`slipguard [command] [options] <path...>\n\n`);
	write(`Commands:\n`);
	write(`  sanitize             Print the confined form of each path (default)\n`);
	write(`  check                Report paths that would be rewritten\n\n`);
	write(`Options:\n`);
	write(`  --base <dir>          Root the cleaned paths under <dir>\n`);
	write(`  --platform <p>        Path flavour: posix|win32\n`);
	write(`  --nul <policy>        NUL byte handling: strip|reject|preserve\n`);
	write(`  --reject-nul          Same as --nul reject\n`);
	write(`  --stdin               Read newline-separated paths from stdin\n`);
	write(`  --json                Print JSON output\n`);
	write(`  -h, --help            Show help\n`);
	write(`  -v, --version         Show version\n`);
}

export function readPackageVersion(): string {
	const pkgUrl = new URL("../../package.json", import.meta.url);
	const raw = fs.readFileSync(pkgUrl, "utf-8");
	const parsed = JSON.parse(raw) as { version?: string };
	return parsed.version ?? "0.0.0";
}

function takeValue(flag: string, args: string[], options: CliOptions): string | undefined {
	const value = args.shift();
	if (!value || value.startsWith("-")) {
		options.errors?.push(`Missing value for ${flag}`);
		if (value) {
			args.unshift(value);
		}
		return undefined;
	}
	return value;
}

function toPlatform(value: string): PathPlatform | undefined {
	if (value === "posix" || value === "win32") {
		return value;
	}
	return undefined;
}

function toNulPolicy(value: string): NulBytePolicy | undefined {
	if (value === "strip" || value === "reject" || value === "preserve") {
		return value;
	}
	return undefined;
}
