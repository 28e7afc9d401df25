import { describe, expect, it } from "vitest";
import { InvalidInputError, SanitizedPath, isInvalidInputError, safeSanitize, sanitize } from "../src/lib.js";

describe("library entry", () => {
	it("exposes the sanitizer", () => {
		expect(sanitize("../../a", { platform: "posix" }).relative).toBe("a");
		expect(SanitizedPath.from("b").path).toBe("b");
	});

	it("narrows invalid input errors", () => {
		const result = safeSanitize("a\0", { rejectNulBytes: true });
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(isInvalidInputError(result.error)).toBe(true);
			expect(result.error).toBeInstanceOf(InvalidInputError);
		}
		expect(isInvalidInputError(new Error("other"))).toBe(false);
	});
});
