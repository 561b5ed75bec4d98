import React, { useState } from "react";
import { usePostsViewModel } from "../hooks/usePostsViewModel";
import type { PostsView } from "../posts-view";
import { ViewStateView } from "./ViewStateView";

type PostsScreenProps = PostsView;

export const PostsScreen: React.FC<PostsScreenProps> = ({ viewModel, configuration }) => {
    const { strings, design, router } = configuration;
    const { getPostState, sendPostState, getPost, sendPost } = usePostsViewModel(viewModel);
    const [draft, setDraft] = useState("");

    const sectionStyle: React.CSSProperties = {
        display: "flex",
        flexDirection: "column",
        gap: 8,
        padding: 16,
        background: design.background,
        border: `1px solid ${design.border}`,
        borderRadius: 8,
    };
    const buttonStyle: React.CSSProperties = {
        alignSelf: "flex-start",
        padding: "6px 14px",
        background: "transparent",
        border: `1px solid ${design.accent}`,
        borderRadius: 6,
        color: design.accent,
        cursor: "pointer",
    };

    return (
        <div style={{ display: "flex", flexDirection: "column", gap: design.gap }}>
            <section style={sectionStyle}>
                <span style={{ fontSize: 15, fontWeight: 600, color: design.accent }}>{strings.getPostTitle}</span>
                <ViewStateView state={getPostState} strings={strings} design={design} />
                <button style={buttonStyle} onClick={getPost}>
                    {strings.reload}
                </button>
            </section>

            <section style={sectionStyle}>
                <span style={{ fontSize: 15, fontWeight: 600, color: design.accent }}>{strings.sendPostTitle}</span>
                <form
                    style={{ display: "flex", gap: 8 }}
                    onSubmit={(e) => {
                        e.preventDefault();
                        sendPost(draft);
                    }}
                >
                    <input
                        aria-label={strings.sendPlaceholder}
                        placeholder={strings.sendPlaceholder}
                        value={draft}
                        onChange={(e) => setDraft(e.target.value)}
                        style={{
                            flex: 1,
                            padding: "6px 10px",
                            background: design.panel,
                            border: `1px solid ${design.border}`,
                            borderRadius: 6,
                            color: design.text,
                        }}
                    />
                    <button type="submit" style={buttonStyle}>
                        {strings.send}
                    </button>
                </form>
                <ViewStateView
                    state={sendPostState}
                    strings={strings}
                    design={design}
                    formatValue={value => `${strings.sendResultPrefix}${value}`}
                />
            </section>

            <button style={{ ...buttonStyle, alignSelf: "flex-end", color: design.muted, borderColor: design.border }} onClick={router.dismiss}>
                {strings.close}
            </button>
        </div>
    );
};
