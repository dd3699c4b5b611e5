import type { MirrorSource, VcsCloneSource } from "../types/mirror";

export type TransferResult = { ok: true } | { ok: false; error: string };

export type TransferOptions = {
	timeoutMs?: number;
	logger?: (message: string) => void;
};

/**
 * Moves remote content onto the local filesystem. `fetch` populates a fresh
 * mirror at `target`; `pull` brings an existing clone up to date in place.
 */
export type Transfer = {
	fetch: (source: MirrorSource, target: string) => Promise<TransferResult>;
	pull: (source: VcsCloneSource, target: string) => Promise<TransferResult>;
};
