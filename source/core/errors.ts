export class ReelpollError extends Error {
	readonly exitCode: 1 | 2 | 3;
	readonly httpStatus: number;

	constructor(message: string, exitCode: 1 | 2 | 3, httpStatus: number) {
		super(message);
		this.name = this.constructor.name;
		this.exitCode = exitCode;
		this.httpStatus = httpStatus;
	}
}

export class InvalidInputError extends ReelpollError {
	constructor(message: string) {
		super(message, 2, 400);
	}
}

export class DependencyError extends ReelpollError {
	constructor(message: string) {
		super(message, 3, 500);
	}
}

/** Raised before a job is accepted: bad URL, unreachable target, no items. */
export class MetadataError extends ReelpollError {
	constructor(message: string) {
		super(message, 1, 400);
	}
}

export class TransferError extends ReelpollError {
	readonly stderrSnippet?: string;

	constructor(message: string, stderrSnippet?: string) {
		super(message, 1, 502);
		this.stderrSnippet = stderrSnippet;
	}
}

export class JobBusyError extends ReelpollError {
	constructor(activeJobId: string) {
		super(`Job ${activeJobId} is still running`, 1, 409);
	}
}

export function toExitCode(error: unknown): 1 | 2 | 3 {
	if (error instanceof ReelpollError) {
		return error.exitCode;
	}

	return 1;
}

export function toHttpStatus(error: unknown): number {
	if (error instanceof ReelpollError) {
		return error.httpStatus;
	}

	return 500;
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
