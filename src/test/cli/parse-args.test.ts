import { describe, expect, it } from "vitest";
import { parseArgs } from "../../cli/parse-args";

const argv = (...args: string[]) => ["node", "refmirror", ...args];

describe("parseArgs", () => {
	it("reads the source and defaults every flag to off", () => {
		const parsed = parseArgs(argv("docs"));

		expect(parsed.source).toBe("docs");
		expect(parsed.help).toBe(false);
		expect(parsed.options).toEqual({
			config: undefined,
			path: undefined,
			fetch: false,
			update: false,
			force: false,
			list: false,
			getPath: false,
			json: false,
			silent: false,
			verbose: false,
			timeoutMs: undefined,
		});
	});

	it("reads intent flags", () => {
		const { options } = parseArgs(
			argv("wiki", "--fetch", "--update", "--force", "--list", "--get-path"),
		);

		expect(options).toMatchObject({
			fetch: true,
			update: true,
			force: true,
			list: true,
			getPath: true,
		});
	});

	it("accepts --clone as an alias of --fetch", () => {
		expect(parseArgs(argv("wiki", "--clone")).options.fetch).toBe(true);
	});

	it("reads value flags in both forms", () => {
		const { options } = parseArgs(
			argv("docs", "--path=./mirror/docs", "--config", "custom.json"),
		);

		expect(options.path).toBe("./mirror/docs");
		expect(options.config).toBe("custom.json");
	});

	it("reads the transfer timeout", () => {
		expect(parseArgs(argv("docs", "--timeout-ms", "3000")).options.timeoutMs).toBe(
			3000,
		);
	});

	it("rejects a non-positive timeout", () => {
		expect(() => parseArgs(argv("docs", "--timeout-ms", "0"))).toThrow(
			"--timeout-ms must be a positive number.",
		);
	});

	it("rejects unknown flags", () => {
		expect(() => parseArgs(argv("docs", "--bogus"))).toThrow(
			"Unknown option '--bogus'.",
		);
	});

	it("rejects more than one source", () => {
		expect(() => parseArgs(argv("docs", "wiki"))).toThrow(
			"Unexpected arguments: wiki",
		);
	});

	it("allows a missing source", () => {
		expect(parseArgs(argv("--list")).source).toBeNull();
	});

	it("detects help in both spellings", () => {
		expect(parseArgs(argv("--help")).help).toBe(true);
		expect(parseArgs(argv("-h")).help).toBe(true);
	});
});
