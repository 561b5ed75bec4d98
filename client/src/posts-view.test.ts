import { describe, expect, it, vi } from "vitest";
import { PostsUseCase } from "@clean-posts/core";
import type { PostsUseCaseContract } from "@clean-posts/core";
import { DEFAULT_POSTS_DESIGN, DEFAULT_POSTS_STRINGS, buildPostsView } from "./posts-view";

describe("buildPostsView", () => {
    it("falls back to the mock use case and default presentation", () => {
        const { viewModel, configuration } = buildPostsView();

        expect(configuration.postUseCase).toBeInstanceOf(PostsUseCase);
        expect(viewModel.configuration.postUseCase).toBe(configuration.postUseCase);
        expect(configuration.strings).toBe(DEFAULT_POSTS_STRINGS);
        expect(configuration.design).toBe(DEFAULT_POSTS_DESIGN);
        expect(() => configuration.router.dismiss()).not.toThrow();
    });

    it("injects the given use case into the view model", () => {
        const transform = vi.fn<PostsUseCaseContract["transform"]>();
        const postUseCase: PostsUseCaseContract = { transform };
        const { viewModel } = buildPostsView({ postUseCase });

        viewModel.request({ kind: "getPost" });

        expect(transform).toHaveBeenCalledTimes(1);
        expect(transform.mock.calls[0]?.[0]).toEqual({ kind: "getPost" });
    });
});
