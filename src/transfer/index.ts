import { gitClone, gitPull } from "./git";
import type { Transfer, TransferOptions } from "./types";
import { wgetMirror } from "./wget";

export type { Transfer, TransferOptions, TransferResult } from "./types";

export const createTransfer = (options: TransferOptions = {}): Transfer => ({
	fetch: (source, target) => {
		switch (source.mechanism) {
			case "bulk-http":
				return wgetMirror(source, target, options);
			case "vcs-clone":
				return gitClone(source, target, options);
		}
	},
	pull: (source, target) => gitPull(source, target, options),
});
