export {
	type AcquireDeps,
	type AcquireOptions,
	acquireMirror,
} from "./acquire";
export {
	type MirrorCommandOptions,
	type MirrorReport,
	type MirrorStep,
	runMirrorCommand,
} from "./commands/mirror";
export {
	BUILTIN_SOURCES,
	DEFAULT_CONFIG_FILENAME,
	loadConfig,
	type MirrorConfig,
	resolveConfig,
	validateConfig,
} from "./config";
export { defaultRootDir, resolveMirrorPath } from "./paths";
export { refreshMirror, refreshStrategyFor } from "./refresh";
export { inspectMirror, listMirrorFiles, mirrorExists } from "./store";
export {
	createTransfer,
	type Transfer,
	type TransferOptions,
	type TransferResult,
} from "./transfer";
export type {
	AcquisitionOutcome,
	AcquisitionStatus,
	BulkHttpSource,
	MirrorListing,
	MirrorSource,
	MirrorState,
	RefreshStrategy,
	TransferMechanism,
	VcsCloneSource,
} from "./types/mirror";
