import React, { useEffect, useState } from "react";
import type { PostsDesign } from "../posts-view";

interface ModalProps {
    isOpen: boolean;
    onClose: () => void;
    children: React.ReactNode;
    design: PostsDesign;
    title?: string;
}

/**
 * Presents its children over the current screen. Stays mounted briefly after closing so the
 * fade-out can play.
 */
export const Modal: React.FC<ModalProps> = ({ isOpen, onClose, children, design, title }) => {
    const [visible, setVisible] = useState(false);

    useEffect(() => {
        if (isOpen) {
            setVisible(true);
        } else {
            const timer = setTimeout(() => setVisible(false), 300);
            return () => clearTimeout(timer);
        }
    }, [isOpen]);

    if (!visible && !isOpen) return null;

    return (
        <div
            data-testid="modal-backdrop"
            style={{
                position: "fixed",
                inset: 0,
                zIndex: 2000,
                display: "flex",
                alignItems: "center",
                justifyContent: "center",
                background: "rgba(0, 0, 0, 0.7)",
                opacity: isOpen ? 1 : 0,
                transition: "opacity 0.2s ease-in-out",
            }}
            onClick={onClose}
        >
            <div
                role="dialog"
                aria-modal="true"
                aria-label={title}
                style={{
                    width: "min(500px, 90vw)",
                    maxHeight: "80vh",
                    background: design.panel,
                    borderRadius: 16,
                    border: `1px solid ${design.border}`,
                    display: "flex",
                    flexDirection: "column",
                    overflow: "hidden",
                }}
                onClick={(e) => e.stopPropagation()}
            >
                <div style={{
                    padding: "16px 24px",
                    borderBottom: `1px solid ${design.border}`,
                    display: "flex",
                    alignItems: "center",
                    justifyContent: "space-between",
                }}>
                    {title && (
                        <h2 style={{ margin: 0, fontSize: 18, fontWeight: 600, color: design.text }}>
                            {title}
                        </h2>
                    )}
                    <button
                        aria-label="Dismiss"
                        onClick={onClose}
                        style={{
                            background: "transparent",
                            border: "none",
                            color: design.muted,
                            cursor: "pointer",
                            fontSize: 20,
                            lineHeight: 1,
                        }}
                    >
                        ×
                    </button>
                </div>

                <div style={{ padding: 24, overflowY: "auto" }}>
                    {children}
                </div>
            </div>
        </div>
    );
};
