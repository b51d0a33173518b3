import type { ZodIssue } from 'zod';

function describeCause(cause: unknown): string {
    return cause instanceof Error ? cause.message : String(cause);
}

export class TransportOpenError extends Error {
    readonly path: string;
    readonly reason: string;

    constructor(path: string, cause: unknown) {
        const reason = describeCause(cause);
        super(`Failed to open serial device ${path}: ${reason}`, { cause });
        this.name = 'TransportOpenError';
        this.path = path;
        this.reason = reason;
    }
}

export class TransportReadError extends Error {
    constructor(cause: unknown) {
        super(`Serial read failed: ${describeCause(cause)}`, { cause });
        this.name = 'TransportReadError';
    }
}

export class ConfigError extends Error {
    readonly issues: ZodIssue[];

    constructor(message: string, issues: ZodIssue[] = []) {
        super(message);
        this.name = 'ConfigError';
        this.issues = issues;
    }
}
