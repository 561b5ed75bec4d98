import type { UseCase } from "../use-case/use-case";

export type PostRequest =
    | { kind: "getPost" }
    | { kind: "sendPost"; text: string };

export type PostResponse =
    | { kind: "getPostResponse"; text: string }
    | { kind: "sendPostResponse"; text: string };

export const PostRequest = {
    getPost(): PostRequest {
        return { kind: "getPost" };
    },
    sendPost(text: string): PostRequest {
        return { kind: "sendPost", text };
    },
};

export const GET_POST_RESPONSE_TEXT = "Get Post Response";

/**
 * Mock posts use case. Answers synchronously and never fails.
 */
export class PostsUseCase implements UseCase<PostRequest, PostResponse> {
    transform(input: PostRequest, onOutput: (output: PostResponse) => void): void {
        switch (input.kind) {
            case "getPost":
                onOutput({ kind: "getPostResponse", text: GET_POST_RESPONSE_TEXT });
                break;
            case "sendPost":
                onOutput({ kind: "sendPostResponse", text: input.text });
                break;
        }
    }
}
