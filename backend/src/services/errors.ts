export type BotHostErrorCode =
    | "NOT_FOUND"
    | "ALREADY_RUNNING"
    | "NOT_RUNNING"
    | "QUOTA_EXCEEDED"
    | "INVALID_FILE_TYPE"
    | "UNSUPPORTED_FILE_TYPE"
    | "SPAWN_FAILURE"
    | "INVALID_UPLOAD"
    | "SHUTTING_DOWN";

export class BotHostError extends Error {
    constructor(
        readonly code: BotHostErrorCode,
        readonly status: number,
        message: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = "BotHostError";
    }
}

export class BotNotFoundError extends BotHostError {
    constructor(readonly botId: string) {
        super("NOT_FOUND", 404, "Bot not found");
        this.name = "BotNotFoundError";
    }
}

export class AlreadyRunningError extends BotHostError {
    constructor(readonly botId: string) {
        super("ALREADY_RUNNING", 400, "Bot already running");
        this.name = "AlreadyRunningError";
    }
}

export class NotRunningError extends BotHostError {
    constructor(readonly botId: string) {
        super("NOT_RUNNING", 400, "Bot is not running");
        this.name = "NotRunningError";
    }
}

export class QuotaExceededError extends BotHostError {
    constructor(readonly owner: string, readonly limit: number) {
        super("QUOTA_EXCEEDED", 403, `Bot limit reached: ${limit} bots per user`);
        this.name = "QuotaExceededError";
    }
}

export class InvalidFileTypeError extends BotHostError {
    constructor(readonly fileName: string) {
        super("INVALID_FILE_TYPE", 400, "Invalid file type");
        this.name = "InvalidFileTypeError";
    }
}

export class UnsupportedFileTypeError extends BotHostError {
    constructor(readonly fileType: string) {
        super("UNSUPPORTED_FILE_TYPE", 400, "Unsupported file type");
        this.name = "UnsupportedFileTypeError";
    }
}

export class SpawnFailureError extends BotHostError {
    constructor(readonly botId: string, cause: unknown) {
        super("SPAWN_FAILURE", 500, `Failed to start bot: ${describeError(cause)}`, { cause });
        this.name = "SpawnFailureError";
    }
}

export class InvalidUploadError extends BotHostError {
    constructor(message: string) {
        super("INVALID_UPLOAD", 400, message);
        this.name = "InvalidUploadError";
    }
}

export class ShuttingDownError extends BotHostError {
    constructor() {
        super("SHUTTING_DOWN", 503, "Server is shutting down");
        this.name = "ShuttingDownError";
    }
}

export interface Failure {
    status: number;
    body: { success: false; message: string };
}

/** Maps anything thrown below the routes onto the JSON failure envelope. */
export function toFailure(error: unknown): Failure {
    if (error instanceof BotHostError) {
        return { status: error.status, body: { success: false, message: error.message } };
    }
    return { status: 500, body: { success: false, message: describeError(error) } };
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
