import { formatComponents } from "../core/components.js";
import type { InvalidInputError } from "../core/errors.js";
import type { SanitizedPath } from "../core/sanitize.js";
import type { CliCommand } from "./args.js";

export type PathOutcome =
	| { input: string; ok: true; path: SanitizedPath }
	| { input: string; ok: false; error: InvalidInputError };

export function formatSanitizeLines(outcomes: PathOutcome[]): string {
	return outcomes.flatMap((outcome) => (outcome.ok ? [`${outcome.path.path}\n`] : [])).join("");
}

export function formatCheckLines(outcomes: PathOutcome[]): string {
	return outcomes
		.map((outcome) => {
			if (!outcome.ok) {
				return `invalid ${JSON.stringify(outcome.input)}: ${outcome.error.message}\n`;
			}
			if (outcome.path.modified) {
				return `unsafe ${JSON.stringify(outcome.input)} -> ${JSON.stringify(outcome.path.relative)}\n`;
			}
			return `ok ${outcome.input}\n`;
		})
		.join("");
}

export function buildJsonSummary(command: CliCommand, outcomes: PathOutcome[]): Record<string, unknown> {
	return {
		command,
		results: outcomes.map((outcome) => {
			if (!outcome.ok) {
				return {
					input: outcome.input,
					error: { kind: outcome.error.kind, message: outcome.error.message },
				};
			}
			const { path } = outcome;
			return {
				input: outcome.input,
				path: path.path,
				relative: path.relative,
				base: path.base,
				depth: path.depth,
				modified: path.modified,
				emitted: formatComponents(path.emitted, path.platform),
				report: path.report,
			};
		}),
	};
}
