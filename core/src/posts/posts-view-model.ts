import { toError } from "../errors/use-case-error";
import { debugLog, debugWarn } from "../logging/debug-logging";
import { OutputChannel } from "../state/output-channel";
import { ViewState, describeViewState } from "../state/view-state";
import type { UseCase } from "../use-case/use-case";
import type { PostRequest, PostResponse } from "./posts-use-case";

// The send channel reports this constant rather than the echoed text.
export const SEND_POST_RESULT = 10;

export type PostsUseCaseContract = UseCase<PostRequest, PostResponse>;

export type PostsViewModelConfiguration<U extends PostsUseCaseContract> = {
    postUseCase: U;
};

export type PostsViewModelOutput = {
    getPostResponseState: OutputChannel<ViewState<string>>;
    sendPostResponseState: OutputChannel<ViewState<number>>;
};

/**
 * Runs post requests through the configured use case and republishes each request's
 * lifecycle on the output channel for its kind.
 */
export class PostsViewModel<U extends PostsUseCaseContract> {
    readonly output: PostsViewModelOutput = {
        getPostResponseState: new OutputChannel<ViewState<string>>("getPostResponseState"),
        sendPostResponseState: new OutputChannel<ViewState<number>>("sendPostResponseState"),
    };

    constructor(readonly configuration: PostsViewModelConfiguration<U>) {}

    request(input: PostRequest): void {
        debugLog(`[PostsViewModel] request ${input.kind}`);
        switch (input.kind) {
            case "getPost":
                this.handleRequest(input, this.output.getPostResponseState);
                break;
            case "sendPost":
                this.handleRequest(input, this.output.sendPostResponseState);
                break;
        }
    }

    private handleRequest<T>(input: PostRequest, channel: OutputChannel<ViewState<T>>): void {
        this.emit(channel, ViewState.loading());

        let settled = false;
        // Set when a subscriber threw while a settled state was being published.
        const dispatch: { failed: boolean; error?: unknown } = { failed: false };
        const publishSettled = (publish: () => void) => {
            try {
                publish();
            } catch (e: unknown) {
                dispatch.failed = true;
                dispatch.error = e;
                throw e;
            }
        };
        const fail = (error: Error) => {
            if (settled) {
                debugWarn(`[PostsViewModel] ${input.kind} failed after it settled:`, error);
                return;
            }
            settled = true;
            publishSettled(() => this.emit(channel, ViewState.error(error)));
        };

        try {
            this.configuration.postUseCase.transform(
                input,
                response => {
                    if (settled) {
                        debugWarn(`[PostsViewModel] ignoring extra ${response.kind} for ${input.kind}`);
                        return;
                    }
                    settled = true;
                    publishSettled(() => this.handleResponse(response));
                },
                fail
            );
        } catch (e: unknown) {
            if (dispatch.failed && dispatch.error === e) throw e;
            fail(toError(e, input.kind));
        }
    }

    private handleResponse(response: PostResponse): void {
        switch (response.kind) {
            case "getPostResponse":
                this.emit(this.output.getPostResponseState, ViewState.finished(response.text));
                break;
            case "sendPostResponse":
                this.emit(this.output.sendPostResponseState, ViewState.finished(SEND_POST_RESULT));
                break;
        }
    }

    private emit<T>(channel: OutputChannel<ViewState<T>>, state: ViewState<T>): void {
        debugLog(`[PostsViewModel] ${channel.name} -> ${describeViewState(state)}`);
        channel.publish(state);
    }
}
