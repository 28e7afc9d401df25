import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config/load-config.js";
import { ConfigSchema } from "../src/config/schema.js";

describe("config schema", () => {
	it("applies defaults", () => {
		expect(ConfigSchema.parse({})).toEqual({ nulBytes: "strip" });
	});

	it("rejects invalid values", () => {
		expect(() => ConfigSchema.parse({ platform: "darwin" })).toThrow();
		expect(() => ConfigSchema.parse({ base: "" })).toThrow();
	});
});

describe("load config", () => {
	it("returns defaults when .slipguard.yml does not exist", () => {
		const rootDir = fs.mkdtempSync(path.join(os.tmpdir(), "slipguard-config-empty-"));
		const loaded = loadConfig(rootDir);

		expect(loaded.path).toBeUndefined();
		expect(loaded.config.nulBytes).toBe("strip");
		expect(loaded.config.base).toBeUndefined();
	});

	it("loads and validates .slipguard.yml", () => {
		const rootDir = fs.mkdtempSync(path.join(os.tmpdir(), "slipguard-config-ok-"));
		const configPath = path.join(rootDir, ".slipguard.yml");
		fs.writeFileSync(configPath, ["platform: win32", "nulBytes: reject", "base: C:\\extract"].join("\n"));

		const loaded = loadConfig(rootDir);
		expect(loaded.path).toBe(configPath);
		expect(loaded.config).toEqual({ platform: "win32", nulBytes: "reject", base: "C:\\extract" });
	});

	it("treats an empty file as defaults", () => {
		const rootDir = fs.mkdtempSync(path.join(os.tmpdir(), "slipguard-config-blank-"));
		fs.writeFileSync(path.join(rootDir, ".slipguard.yml"), "");

		expect(loadConfig(rootDir).config).toEqual({ nulBytes: "strip" });
	});

	it("throws on invalid config shape", () => {
		const rootDir = fs.mkdtempSync(path.join(os.tmpdir(), "slipguard-config-invalid-"));
		fs.writeFileSync(path.join(rootDir, ".slipguard.yml"), "nulBytes: maybe\n");

		expect(() => loadConfig(rootDir)).toThrow();
	});
});
