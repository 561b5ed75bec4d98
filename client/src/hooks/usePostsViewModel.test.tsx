import { act, renderHook } from "@testing-library/react";
import { afterEach, describe, expect, it, vi } from "vitest";
import { PostsUseCase, PostsViewModel, setDebugLogging } from "@clean-posts/core";
import type { PostResponse, PostsUseCaseContract } from "@clean-posts/core";
import { usePostsViewModel } from "./usePostsViewModel";

function deferredUseCase() {
    const pending: { answer?: (response: PostResponse) => void } = {};
    const postUseCase: PostsUseCaseContract = {
        transform: (_input, onOutput) => {
            pending.answer = onOutput;
        },
    };
    return { pending, postUseCase };
}

describe("usePostsViewModel", () => {
    afterEach(() => {
        setDebugLogging(false);
        vi.restoreAllMocks();
    });

    it("subscribes to both channels and requests the post on mount", () => {
        const viewModel = new PostsViewModel({ postUseCase: new PostsUseCase() });

        const { result } = renderHook(() => usePostsViewModel(viewModel));

        expect(result.current.getPostState).toEqual({ kind: "finished", value: "Get Post Response" });
        expect(result.current.sendPostState).toEqual({ kind: "none" });
        expect(viewModel.output.getPostResponseState.subscriberCount).toBe(1);
        expect(viewModel.output.sendPostResponseState.subscriberCount).toBe(1);
    });

    it("reports loading until the use case answers", () => {
        const { pending, postUseCase } = deferredUseCase();
        const viewModel = new PostsViewModel({ postUseCase });

        const { result } = renderHook(() => usePostsViewModel(viewModel));
        expect(result.current.getPostState).toEqual({ kind: "loading" });

        act(() => {
            pending.answer?.({ kind: "getPostResponse", text: "arrived" });
        });

        expect(result.current.getPostState).toEqual({ kind: "finished", value: "arrived" });
    });

    it("sends posts through the send channel only", () => {
        const viewModel = new PostsViewModel({ postUseCase: new PostsUseCase() });
        const { result } = renderHook(() => usePostsViewModel(viewModel));

        act(() => {
            result.current.sendPost("hello");
        });

        expect(result.current.sendPostState).toEqual({ kind: "finished", value: 10 });
        expect(result.current.getPostState).toEqual({ kind: "finished", value: "Get Post Response" });
    });

    it("releases every subscription on unmount", () => {
        const viewModel = new PostsViewModel({ postUseCase: new PostsUseCase() });
        const { unmount } = renderHook(() => usePostsViewModel(viewModel));

        unmount();

        expect(viewModel.output.getPostResponseState.subscriberCount).toBe(0);
        expect(viewModel.output.sendPostResponseState.subscriberCount).toBe(0);
    });

    it("ignores answers that arrive after unmount", () => {
        const { pending, postUseCase } = deferredUseCase();
        const viewModel = new PostsViewModel({ postUseCase });
        const { result, unmount } = renderHook(() => usePostsViewModel(viewModel));

        unmount();
        act(() => {
            pending.answer?.({ kind: "getPostResponse", text: "too late" });
        });

        expect(result.current.getPostState).toEqual({ kind: "loading" });
    });

    it("logs each state the view receives", () => {
        setDebugLogging(true);
        const log = vi.spyOn(console, "log").mockImplementation(() => {});
        const viewModel = new PostsViewModel({ postUseCase: new PostsUseCase() });

        renderHook(() => usePostsViewModel(viewModel));

        expect(log).toHaveBeenCalledWith("Loading");
        expect(log).toHaveBeenCalledWith("Finished response: Get Post Response");
    });
});
