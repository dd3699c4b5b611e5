import path from "node:path";
import pc from "picocolors";
import { toPosixPath } from "../paths";

export const symbols = {
	error: pc.red("✖"),
	success: pc.green("✔"),
	info: pc.blue("ℹ"),
	warn: pc.yellow("⚠"),
};

let _silentMode = false;

export const setSilentMode = (silent: boolean) => {
	_silentMode = silent;
};

export const ui = {
	// Shorter of the cwd-relative and absolute forms
	path: (value: string) => {
		const rel = path.relative(process.cwd(), value);
		const selected = rel.length > 0 && rel.length < value.length ? rel : value;
		return toPosixPath(selected);
	},

	line: (text = "") => {
		if (_silentMode) return;
		process.stdout.write(`${text}\n`);
	},

	error: (text: string) => {
		process.stderr.write(`${symbols.error} ${text}\n`);
	},
};
