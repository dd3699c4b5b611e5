import {
	acquireMirror,
	type AcquireDeps,
	inspectTarget,
	removeExisting,
} from "./acquire";
import type {
	AcquisitionOutcome,
	MirrorSource,
	MirrorState,
	RefreshStrategy,
	TransferMechanism,
	VcsCloneSource,
} from "./types/mirror";

export type RefreshOptions = {
	logger?: (message: string) => void;
};

const REFRESH_STRATEGIES: Record<TransferMechanism, RefreshStrategy> = {
	"bulk-http": "replace",
	"vcs-clone": "pull",
};

export const refreshStrategyFor = (source: MirrorSource): RefreshStrategy =>
	REFRESH_STRATEGIES[source.mechanism];

const replaceMirror = async (
	source: MirrorSource,
	target: string,
	options: RefreshOptions,
	deps: AcquireDeps,
): Promise<AcquisitionOutcome> => {
	options.logger?.(`Removing ${target} before re-fetching`);
	const failure = await removeExisting(target, deps);
	if (failure) {
		return failure;
	}
	const outcome = await acquireMirror(
		source,
		target,
		{ force: false, logger: options.logger },
		deps,
	);
	return outcome.status === "acquired"
		? { status: "removed-and-reacquired" }
		: outcome;
};

const pullMirror = async (
	source: VcsCloneSource,
	target: string,
	state: MirrorState,
	options: RefreshOptions,
	deps: AcquireDeps,
): Promise<AcquisitionOutcome> => {
	if (state !== "directory") {
		return {
			status: "failed-transfer",
			error: `${target} is not a directory; nothing to pull.`,
		};
	}
	options.logger?.(`Pulling ${source.branch} into ${target}`);
	const result = await deps.transfer.pull(source, target);
	return result.ok
		? { status: "pulled" }
		: { status: "failed-transfer", error: result.error };
};

/**
 * Bring an existing mirror up to date. A missing mirror is reported as
 * `not-present` and never fetched implicitly.
 *
 * Site mirrors are replaced wholesale; repository clones are pulled in place.
 */
export const refreshMirror = async (
	source: MirrorSource,
	target: string,
	options: RefreshOptions,
	deps: AcquireDeps,
): Promise<AcquisitionOutcome> => {
	const inspected = await inspectTarget(target);
	if ("failure" in inspected) {
		return inspected.failure;
	}
	const { state } = inspected;
	if (state === "missing") {
		return { status: "not-present" };
	}
	switch (source.mechanism) {
		case "bulk-http":
			return replaceMirror(source, target, options, deps);
		case "vcs-clone":
			return pullMirror(source, target, state, options, deps);
	}
};
