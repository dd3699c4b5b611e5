export type ErrnoException = NodeJS.ErrnoException;

export const isErrnoException = (error: unknown): error is ErrnoException =>
	error instanceof Error && "code" in error;

export const getErrnoCode = (error: unknown): string | undefined =>
	isErrnoException(error) && typeof error.code === "string"
		? error.code
		: undefined;

export const toErrorMessage = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);
