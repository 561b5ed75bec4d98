/**
 * Failure surfaced by a use case for one request kind.
 */
export class UseCaseError extends Error {
    constructor(
        readonly requestKind: string,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = "UseCaseError";
    }
}

/**
 * Normalizes a thrown value. Errors pass through; anything else becomes a `UseCaseError`
 * for the request kind, keeping the original value as `cause`.
 */
export function toError(value: unknown, requestKind: string): Error {
    if (value instanceof Error) return value;
    return new UseCaseError(requestKind, String(value), { cause: value });
}
