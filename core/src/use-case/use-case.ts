/**
 * Single-purpose business operation.
 *
 * Results are delivered through `onOutput` rather than returned, so an implementation can
 * finish later (e.g. after a network call). Failures are either thrown synchronously or
 * reported through `onError`.
 */
export interface UseCase<Input, Output> {
    transform(input: Input, onOutput: (output: Output) => void, onError?: (error: Error) => void): void;
}
