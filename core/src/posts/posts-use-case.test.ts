import { describe, it, expect, vi } from "vitest";
import { GET_POST_RESPONSE_TEXT, PostRequest, PostsUseCase } from "./posts-use-case";

describe("PostsUseCase", () => {
    const useCase = new PostsUseCase();

    it("answers getPost with the canned response", () => {
        const onOutput = vi.fn();
        useCase.transform(PostRequest.getPost(), onOutput);

        expect(onOutput).toHaveBeenCalledTimes(1);
        expect(onOutput).toHaveBeenCalledWith({ kind: "getPostResponse", text: GET_POST_RESPONSE_TEXT });
        expect(GET_POST_RESPONSE_TEXT).toBe("Get Post Response");
    });

    it("echoes the sendPost text verbatim", () => {
        const onOutput = vi.fn();
        useCase.transform(PostRequest.sendPost("  hello, world  "), onOutput);

        expect(onOutput).toHaveBeenCalledTimes(1);
        expect(onOutput).toHaveBeenCalledWith({ kind: "sendPostResponse", text: "  hello, world  " });
    });

    it("answers before transform returns", () => {
        let answered = false;
        useCase.transform(PostRequest.getPost(), () => {
            answered = true;
        });

        expect(answered).toBe(true);
    });
});
