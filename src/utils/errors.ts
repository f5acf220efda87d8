// src/utils/errors.ts

/** Base error carrying the HTTP status the error handler answers with. */
export class AppError extends Error {
    constructor(
        message: string,
        public readonly status = 500,
        public readonly code = "INTERNAL"
    ) {
        super(message);
        this.name = new.target.name;
    }
}

export class ConfigError extends AppError {
    constructor(message: string) {
        super(message, 500, "CONFIG");
    }
}

/** Upstream HTTP failure; `upstreamStatus` is null for connection errors. */
export class UpstreamHttpError extends AppError {
    constructor(
        message: string,
        public readonly upstreamStatus: number | null,
        public readonly bodySnippet: string
    ) {
        super(message, 502, "UPSTREAM");
    }
}

export class ValidationError extends AppError {
    constructor(message: string) {
        super(message, 400, "VALIDATION");
    }
}

export class NotFoundError extends AppError {
    constructor(message: string) {
        super(message, 404, "NOT_FOUND");
    }
}

export class ConflictError extends AppError {
    constructor(message: string) {
        super(message, 409, "CONFLICT");
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/** MySQL unique or primary key violation (mysql2 sets `code`). */
export function isDuplicateKeyError(err: unknown): boolean {
    return typeof err === "object" && err !== null && "code" in err && err.code === "ER_DUP_ENTRY";
}
