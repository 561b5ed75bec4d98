import { useCallback, useEffect, useState } from "react";
import {
    DisposeBag,
    PostRequest,
    ViewState,
    bindToOwner,
    debugLog,
    matchViewState,
} from "@clean-posts/core";
import type { PostsUseCaseContract, PostsViewModel } from "@clean-posts/core";

type UsePostsViewModelResult = {
    getPostState: ViewState<string>;
    sendPostState: ViewState<number>;
    getPost: () => void;
    sendPost: (text: string) => void;
};

type ViewOwner = {
    tornDown: boolean;
    renderGetPost: (state: ViewState<string>) => void;
    renderSendPost: (state: ViewState<number>) => void;
};

function logViewState<T>(state: ViewState<T>): void {
    matchViewState(state, {
        none: () => {},
        loading: () => debugLog("Loading"),
        finished: value => debugLog(`Finished response: ${String(value)}`),
        error: error => debugLog(`Error: ${error.message}`),
    });
}

/**
 * Binds a posts view model to component state. Subscribes to every output channel on mount,
 * issues the initial getPost, and releases all subscriptions on unmount.
 */
export function usePostsViewModel<U extends PostsUseCaseContract>(viewModel: PostsViewModel<U>): UsePostsViewModelResult {
    const [getPostState, setGetPostState] = useState<ViewState<string>>(ViewState.none());
    const [sendPostState, setSendPostState] = useState<ViewState<number>>(ViewState.none());

    useEffect(() => {
        const owner: ViewOwner = {
            tornDown: false,
            renderGetPost: setGetPostState,
            renderSendPost: setSendPostState,
        };
        const isTornDown = (o: ViewOwner) => o.tornDown;
        const bag = new DisposeBag();

        bag.add(viewModel.output.sendPostResponseState.subscribe(
            bindToOwner(owner, (view, state: ViewState<number>) => {
                logViewState(state);
                view.renderSendPost(state);
            }, isTornDown)
        ));
        bag.add(viewModel.output.getPostResponseState.subscribe(
            bindToOwner(owner, (view, state: ViewState<string>) => {
                logViewState(state);
                view.renderGetPost(state);
            }, isTornDown)
        ));

        viewModel.request(PostRequest.getPost());

        return () => {
            owner.tornDown = true;
            bag.dispose();
        };
    }, [viewModel]);

    const getPost = useCallback(() => {
        viewModel.request(PostRequest.getPost());
    }, [viewModel]);

    const sendPost = useCallback((text: string) => {
        viewModel.request(PostRequest.sendPost(text));
    }, [viewModel]);

    return { getPostState, sendPostState, getPost, sendPost };
}
