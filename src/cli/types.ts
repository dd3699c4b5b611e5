export type CliOptions = {
	config?: string;
	path?: string;
	fetch: boolean;
	update: boolean;
	force: boolean;
	list: boolean;
	getPath: boolean;
	json: boolean;
	silent: boolean;
	verbose: boolean;
	timeoutMs?: number;
};
