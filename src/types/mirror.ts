import type { SourceDefinition } from "../config/schema";

export type MirrorSource = SourceDefinition & {
	/** Absolute directory used when no `--path` override is given. */
	defaultPath: string;
};

export type BulkHttpSource = Extract<MirrorSource, { mechanism: "bulk-http" }>;
export type VcsCloneSource = Extract<MirrorSource, { mechanism: "vcs-clone" }>;
export type TransferMechanism = MirrorSource["mechanism"];

export type MirrorState = "missing" | "directory" | "not-directory";

export type MirrorListing =
	| { status: "missing" }
	| { status: "present"; files: string[] };

export type AcquisitionOutcome =
	| { status: "skipped-already-present" }
	| { status: "acquired" }
	| { status: "removed-and-reacquired" }
	| { status: "pulled" }
	| { status: "not-present" }
	| { status: "failed-removal"; error: string }
	| { status: "failed-transfer"; error: string };

export type AcquisitionStatus = AcquisitionOutcome["status"];

export type RefreshStrategy = "replace" | "pull";
