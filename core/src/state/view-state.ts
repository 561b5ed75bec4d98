/**
 * Lifecycle of one asynchronous value.
 *
 * `none` before any request, `loading` while in flight, then either `finished` with the value
 * or `error` with the failure. Only `finished` carries a value and only `error` carries an error.
 */
export type ViewState<T, E = Error> =
    | { kind: "none" }
    | { kind: "loading" }
    | { kind: "finished"; value: T }
    | { kind: "error"; error: E };

const NONE = { kind: "none" } as const;
const LOADING = { kind: "loading" } as const;

export const ViewState = {
    none<T, E = Error>(): ViewState<T, E> {
        return NONE;
    },
    loading<T, E = Error>(): ViewState<T, E> {
        return LOADING;
    },
    finished<T, E = Error>(value: T): ViewState<T, E> {
        return { kind: "finished", value };
    },
    error<T, E = Error>(error: E): ViewState<T, E> {
        return { kind: "error", error };
    },
};

export type ViewStateHandlers<T, E, R> = {
    none: () => R;
    loading: () => R;
    finished: (value: T) => R;
    error: (error: E) => R;
};

/**
 * Exhaustive dispatch over the four cases.
 */
export function matchViewState<T, E, R>(state: ViewState<T, E>, handlers: ViewStateHandlers<T, E, R>): R {
    switch (state.kind) {
        case "none":
            return handlers.none();
        case "loading":
            return handlers.loading();
        case "finished":
            return handlers.finished(state.value);
        case "error":
            return handlers.error(state.error);
    }
}

export function isLoading<T, E>(state: ViewState<T, E>): state is { kind: "loading" } {
    return state.kind === "loading";
}

export function isFinished<T, E>(state: ViewState<T, E>): state is { kind: "finished"; value: T } {
    return state.kind === "finished";
}

export function isError<T, E>(state: ViewState<T, E>): state is { kind: "error"; error: E } {
    return state.kind === "error";
}

/**
 * One-line label for logs, e.g. `finished(Get Post Response)`.
 */
export function describeViewState<T, E>(state: ViewState<T, E>): string {
    return matchViewState(state, {
        none: () => "none",
        loading: () => "loading",
        finished: value => `finished(${String(value)})`,
        error: error => `error(${error instanceof Error ? error.message : String(error)})`,
    });
}
