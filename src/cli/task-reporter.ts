import pc from "picocolors";
import { createLiveOutput, type LiveOutput } from "./live-output";
import { symbols } from "./ui";

export type TaskLevel = "success" | "info" | "warn" | "error";

type TaskState = "running" | TaskLevel;

const formatDuration = (ms: number) => {
	const seconds = Math.max(0, ms / 1000);
	if (seconds < 60) {
		return `${seconds.toFixed(1)}s`;
	}
	const minutes = Math.floor(seconds / 60);
	const remainder = seconds % 60;
	return `${minutes}m ${remainder.toFixed(1)}s`;
};

const LEVEL_SYMBOLS: Record<TaskLevel, string> = {
	success: symbols.success,
	info: symbols.info,
	warn: symbols.warn,
	error: symbols.error,
};

export type TaskReporterOptions = {
	maxLiveLines?: number;
	output?: LiveOutput;
};

/**
 * Live view of running transfers: a spinner-less "→ task" line per running
 * task, the last few lines of tool output, and an elapsed timer.
 */
export class TaskReporter {
	private readonly output: LiveOutput;
	private readonly maxLiveLines: number;
	private readonly startTime = Date.now();
	private readonly tasks = new Map<string, TaskState>();
	private readonly results: string[] = [];
	private readonly liveLines: string[] = [];
	private timer: NodeJS.Timeout | null = null;
	private warnings = 0;
	private errors = 0;

	constructor(options: TaskReporterOptions = {}) {
		this.output = options.output ?? createLiveOutput();
		this.maxLiveLines = options.maxLiveLines ?? 4;
		this.timer = setInterval(() => {
			if (this.hasRunningTasks()) {
				this.render();
			}
		}, 250);
		this.timer.unref?.();
	}

	start(task: string) {
		this.tasks.set(task, "running");
		this.render();
	}

	complete(task: string, level: TaskLevel, label: string, details?: string) {
		this.tasks.set(task, level);
		if (level === "warn") this.warnings += 1;
		if (level === "error") this.errors += 1;
		const partDetails = details ? pc.gray(details) : "";
		this.results.push(
			`  ${LEVEL_SYMBOLS[level]} ${pc.bold(label)} ${partDetails}`.trimEnd(),
		);
		this.liveLines.length = 0;
		this.render();
	}

	debug(text: string) {
		this.liveLines.push(pc.dim(text));
		if (this.liveLines.length > this.maxLiveLines) {
			this.liveLines.splice(0, this.liveLines.length - this.maxLiveLines);
		}
		this.render();
	}

	finish() {
		this.liveLines.length = 0;
		const parts = [
			`Completed in ${formatDuration(Date.now() - this.startTime)}`,
			this.warnings
				? `${this.warnings} warning${this.warnings === 1 ? "" : "s"}`
				: null,
			this.errors
				? `${this.errors} error${this.errors === 1 ? "" : "s"}`
				: null,
		].filter((part): part is string => part !== null);
		this.output.persist(this.composeView([pc.dim(parts.join(" · "))]));
		this.stopTimer();
	}

	stop() {
		this.output.stop();
		this.stopTimer();
	}

	private render() {
		this.output.render(this.composeView());
	}

	private stopTimer() {
		if (!this.timer) return;
		clearInterval(this.timer);
		this.timer = null;
	}

	private composeView(extraFooter: string[] = []) {
		const running = Array.from(this.tasks.entries())
			.filter(([, state]) => state === "running")
			.map(([task]) => `  ${pc.cyan("→")} ${task}`);
		const elapsed = this.hasRunningTasks()
			? pc.dim(`time: ${formatDuration(Date.now() - this.startTime)}`)
			: "";
		const lines = [
			...this.results,
			...running,
			...this.liveLines,
			elapsed,
			...extraFooter,
		].filter((line) => line.length > 0);
		return lines.length > 0 ? lines : [" "];
	}

	private hasRunningTasks() {
		for (const state of this.tasks.values()) {
			if (state === "running") return true;
		}
		return false;
	}
}
