import React, { useCallback, useMemo, useState } from "react";
import { Modal } from "./components/Modal";
import { PostsScreen } from "./components/PostsScreen";
import { DEFAULT_POSTS_DESIGN, buildPostsView } from "./posts-view";
import type { PostsViewConfiguration } from "./posts-view";

type AppProps = {
    // Forwarded to every posts screen this app presents.
    postsConfiguration?: Omit<Partial<PostsViewConfiguration>, "router">;
};

function App({ postsConfiguration }: AppProps) {
    const [showPosts, setShowPosts] = useState(false);

    const presentPosts = useCallback(() => setShowPosts(true), []);
    const dismissPosts = useCallback(() => setShowPosts(false), []);

    const postUseCase = postsConfiguration?.postUseCase;
    const strings = postsConfiguration?.strings;
    const postsDesign = postsConfiguration?.design;

    // A fresh view model for each presentation, kept while the fields it was built from hold.
    const posts = useMemo(
        () => (showPosts ? buildPostsView({ postUseCase, strings, design: postsDesign, router: { dismiss: dismissPosts } }) : null),
        [showPosts, postUseCase, strings, postsDesign, dismissPosts]
    );
    const design = posts?.configuration.design ?? postsDesign ?? DEFAULT_POSTS_DESIGN;

    return (
        <main
            style={{
                minHeight: "100vh",
                display: "flex",
                alignItems: "center",
                justifyContent: "center",
                background: design.background,
            }}
        >
            <button
                onClick={presentPosts}
                style={{
                    padding: "10px 20px",
                    background: "transparent",
                    border: `1px solid ${design.accent}`,
                    borderRadius: 8,
                    color: design.accent,
                    fontSize: 15,
                    cursor: "pointer",
                }}
            >
                Show Posts
            </button>

            <Modal
                isOpen={showPosts}
                onClose={dismissPosts}
                design={design}
                title={posts?.configuration.strings.title}
            >
                {posts && <PostsScreen viewModel={posts.viewModel} configuration={posts.configuration} />}
            </Modal>
        </main>
    );
}

export default App;
