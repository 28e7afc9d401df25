import process from "node:process";
import { ZodError } from "zod";
import { type ConfigLoadResult, loadConfig } from "../config/load-config.js";
import { safeSanitize } from "../core/sanitize.js";
import type { SanitizeOptions } from "../core/types.js";
import type { CliOptions } from "./args.js";
import { parseArgs, printHelp, readPackageVersion } from "./args.js";
import type { PathOutcome } from "./output.js";
import { buildJsonSummary, formatCheckLines, formatSanitizeLines } from "./output.js";
import { promptForPath } from "./prompt.js";

export type CliIo = {
	stdout: (chunk: string) => void;
	stderr: (chunk: string) => void;
	readStdin: () => Promise<string>;
	promptPath: () => Promise<string | null>;
	isTty: boolean;
	cwd: string;
};

export async function runCli(
	argv: string[] = process.argv.slice(2),
	io: CliIo = createProcessIo(),
): Promise<number> {
	const args = parseArgs(argv);
	if (args.help) {
		printHelp(io.stdout);
		return 0;
	}
	if (args.version) {
		io.stdout(`slipguard ${readPackageVersion()}\n`);
		return 0;
	}
	if (args.unknown?.length) {
		io.stderr(`Unknown option(s): ${args.unknown.join(", ")}\n`);
		io.stderr("Run `slipguard --help` for usage.\n");
		return 2;
	}
	if (args.errors?.length) {
		for (const error of args.errors) {
			io.stderr(`${error}\n`);
		}
		return 2;
	}

	let loaded: ConfigLoadResult;
	try {
		loaded = loadConfig(io.cwd);
	} catch (error) {
		io.stderr(`Config error: ${describeError(error)}\n`);
		return 1;
	}

	const inputs = await collectInputs(args, io);
	if (inputs === null) {
		return 130;
	}
	if (inputs.length === 0) {
		io.stderr("No paths given. Pass paths as arguments or use --stdin.\n");
		return 2;
	}

	const options: SanitizeOptions = {
		base: args.base ?? loaded.config.base,
		platform: args.platform ?? loaded.config.platform,
		nulBytes: args.nulBytes ?? loaded.config.nulBytes,
	};
	const outcomes = inputs.map((input): PathOutcome => {
		const result = safeSanitize(input, options);
		return result.ok
			? { input, ok: true, path: result.path }
			: { input, ok: false, error: result.error };
	});

	if (args.json) {
		io.stdout(`${JSON.stringify(buildJsonSummary(args.command, outcomes))}\n`);
	} else if (args.command === "check") {
		io.stdout(formatCheckLines(outcomes));
	} else {
		io.stdout(formatSanitizeLines(outcomes));
		for (const outcome of outcomes) {
			if (!outcome.ok) {
				io.stderr(`Invalid input ${JSON.stringify(outcome.input)}: ${outcome.error.message}\n`);
			}
		}
	}

	const failed = outcomes.some((outcome) => !outcome.ok);
	const unsafe = args.command === "check" && outcomes.some((outcome) => outcome.ok && outcome.path.modified);
	return failed || unsafe ? 1 : 0;
}

async function collectInputs(args: CliOptions, io: CliIo): Promise<string[] | null> {
	const inputs = [...args.paths];
	if (args.stdin) {
		const raw = await io.readStdin();
		inputs.push(...raw.split(/\r?\n/).filter((line) => line.length > 0));
	}
	if (inputs.length === 0 && !args.stdin && io.isTty) {
		const prompted = await io.promptPath();
		if (prompted === null) {
			return null;
		}
		inputs.push(prompted);
	}
	return inputs;
}

function describeError(error: unknown): string {
	if (error instanceof ZodError) {
		return error.issues
			.map((issue) => `${issue.path.length ? issue.path.join(".") : "(root)"}: ${issue.message}`)
			.join("; ");
	}
	return error instanceof Error ? error.message : "Unknown error.";
}

export function createProcessIo(): CliIo {
	return {
		stdout: (chunk) => {
			process.stdout.write(chunk);
		},
		stderr: (chunk) => {
			process.stderr.write(chunk);
		},
		readStdin,
		promptPath: promptForPath,
		isTty: Boolean(process.stdin.isTTY && process.stdout.isTTY),
		cwd: process.cwd(),
	};
}

async function readStdin(): Promise<string> {
	const chunks: Buffer[] = [];
	for await (const chunk of process.stdin) {
		chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
	}
	return Buffer.concat(chunks).toString("utf-8");
}
