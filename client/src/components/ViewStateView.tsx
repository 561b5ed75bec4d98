import React from "react";
import { matchViewState } from "@clean-posts/core";
import type { ViewState } from "@clean-posts/core";
import type { PostsDesign, PostsStrings } from "../posts-view";

type ViewStateViewProps<T> = {
    state: ViewState<T>;
    strings: Pick<PostsStrings, "loading" | "errorPrefix">;
    design: PostsDesign;
    formatValue?: (value: T) => string;
};

export function ViewStateView<T>({ state, strings, design, formatValue = String }: ViewStateViewProps<T>) {
    return matchViewState<T, Error, React.ReactElement | null>(state, {
        none: () => null,
        loading: () => (
            <div role="status" aria-busy="true" style={{ color: design.muted, fontSize: 13 }}>
                {strings.loading}
            </div>
        ),
        finished: value => (
            <div style={{ color: design.text, fontSize: 15 }}>{formatValue(value)}</div>
        ),
        error: error => (
            <div role="alert" style={{ color: design.error, fontSize: 13 }}>
                {strings.errorPrefix}
                {error.message}
            </div>
        ),
    });
}
