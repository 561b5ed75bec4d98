import { PostsUseCase, PostsViewModel } from "@clean-posts/core";
import type { PostsUseCaseContract } from "@clean-posts/core";

export type PostsRouter = {
    dismiss: () => void;
};

export type PostsStrings = {
    title: string;
    getPostTitle: string;
    sendPostTitle: string;
    reload: string;
    send: string;
    sendPlaceholder: string;
    sendResultPrefix: string;
    loading: string;
    errorPrefix: string;
    close: string;
};

export type PostsDesign = {
    background: string;
    panel: string;
    border: string;
    text: string;
    muted: string;
    accent: string;
    error: string;
    gap: number;
};

export type PostsViewConfiguration = {
    postUseCase: PostsUseCaseContract;
    router: PostsRouter;
    strings: PostsStrings;
    design: PostsDesign;
};

export const DEFAULT_POSTS_STRINGS: PostsStrings = {
    title: "Posts",
    getPostTitle: "Latest Post",
    sendPostTitle: "Send Post",
    reload: "Reload",
    send: "Send",
    sendPlaceholder: "Write a post",
    sendResultPrefix: "Result: ",
    loading: "Loading...",
    errorPrefix: "Error: ",
    close: "Close",
};

export const DEFAULT_POSTS_DESIGN: PostsDesign = {
    background: "var(--color-bg-deep, #111)",
    panel: "var(--color-bg-panel, #1a1b1e)",
    border: "var(--color-border, #374151)",
    text: "var(--color-text-main, #d1d5db)",
    muted: "var(--color-text-muted, #9ca3af)",
    accent: "var(--color-highlight, #eab308)",
    error: "#f87171",
    gap: 16,
};

export type PostsView = {
    viewModel: PostsViewModel<PostsUseCaseContract>;
    configuration: PostsViewConfiguration;
};

/**
 * Wires the posts screen: use case -> view model, plus the router, strings and design the
 * screen renders with. Every field falls back to a default.
 */
export function buildPostsView(overrides: Partial<PostsViewConfiguration> = {}): PostsView {
    const configuration: PostsViewConfiguration = {
        postUseCase: overrides.postUseCase ?? new PostsUseCase(),
        router: overrides.router ?? { dismiss: () => {} },
        strings: overrides.strings ?? DEFAULT_POSTS_STRINGS,
        design: overrides.design ?? DEFAULT_POSTS_DESIGN,
    };
    const viewModel = new PostsViewModel({ postUseCase: configuration.postUseCase });
    return { viewModel, configuration };
}
