import { EventEmitter } from "node:events";
import { execa } from "execa";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { runTransferCommand } from "../../transfer/exec";

const state = vi.hoisted(() => {
	const value: { output: string[]; error: Error | null } = {
		output: [],
		error: null,
	};
	return value;
});

vi.mock("execa", async (importOriginal) => {
	const actual = await importOriginal<typeof import("execa")>();
	return {
		...actual,
		execa: vi.fn(() => {
			const stdout = new EventEmitter();
			const stderr = new EventEmitter();
			const done = new Promise((resolve, reject) => {
				setImmediate(() => {
					for (const chunk of state.output) {
						stderr.emit("data", Buffer.from(chunk));
					}
					if (state.error) {
						reject(state.error);
						return;
					}
					resolve({ exitCode: 0 });
				});
			});
			return Object.assign(done, { stdout, stderr });
		}),
	};
});

describe("runTransferCommand", () => {
	beforeEach(() => {
		vi.clearAllMocks();
		state.output = [];
		state.error = null;
	});

	it("resolves ok when the tool exits cleanly", async () => {
		const result = await runTransferCommand("git", ["clone", "a", "b"], {
			cwd: "/work",
			timeoutMs: 5000,
		});

		expect(result).toEqual({ ok: true });
		expect(vi.mocked(execa)).toHaveBeenCalledWith(
			"git",
			["clone", "a", "b"],
			expect.objectContaining({
				cwd: "/work",
				timeout: 5000,
				stdin: "ignore",
				stdout: "pipe",
				stderr: "pipe",
			}),
		);
	});

	it("forwards the command label and output lines to the logger", async () => {
		state.output = ["Cloning into 'b'...\r\n", "done.\n"];
		const logger = vi.fn();

		await runTransferCommand("git", ["clone", "a", "b"], {
			label: "git clone a b",
			logger,
		});

		expect(logger.mock.calls).toEqual([
			["git clone a b"],
			["git | Cloning into 'b'..."],
			["git | done."],
		]);
	});

	it("turns a failing tool into an error result", async () => {
		state.error = new Error("Command failed with exit code 128: git clone a b");

		const result = await runTransferCommand("git", ["clone", "a", "b"]);

		expect(result).toEqual({
			ok: false,
			error: "Command failed with exit code 128: git clone a b",
		});
	});
});
