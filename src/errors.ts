export class ParseError extends Error {
    readonly path: string;
    readonly offset: number;
    readonly line: number;
    readonly column: number;

    constructor(path: string, message: string, offset: number, line: number, column: number) {
        super(`${path}: ${message} (line ${line}, column ${column}, byte ${offset})`);
        this.name = 'ParseError';
        this.path = path;
        this.offset = offset;
        this.line = line;
        this.column = column;
    }
}

export class UnresolvedConflictError extends Error {
    readonly unresolved: Record<string, string[]>;

    constructor(unresolved: Record<string, string[]>) {
        const count = Object.values(unresolved).reduce((sum, keys) => sum + keys.length, 0);
        const files = Object.keys(unresolved).join(', ');
        super(`${count} unresolved conflict(s) in ${files}; resolve them or enable forced mode`);
        this.name = 'UnresolvedConflictError';
        this.unresolved = unresolved;
    }
}

export class ResolutionError extends Error {
    readonly coarseKey: string;

    constructor(coarseKey: string, message: string) {
        super(`${coarseKey}: ${message}`);
        this.name = 'ResolutionError';
        this.coarseKey = coarseKey;
    }
}

export class PreviewConsumedError extends Error {
    constructor() {
        super('This merge preview has already been executed; generate a new preview');
        this.name = 'PreviewConsumedError';
    }
}

export class OverwriteNotConfirmedError extends Error {
    readonly files: string[];

    constructor(files: string[]) {
        super(`Existing mission files would be overwritten: ${files.join(', ')}; confirm to continue`);
        this.name = 'OverwriteNotConfirmedError';
        this.files = files;
    }
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
