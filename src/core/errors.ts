export class InvalidInputError extends Error {
	readonly kind = "InvalidInput";

	constructor(
		message: string,
		public readonly input?: string,
	) {
		super(message);
		this.name = "InvalidInputError";
	}
}

export function isInvalidInputError(error: unknown): error is InvalidInputError {
	return error instanceof InvalidInputError;
}
