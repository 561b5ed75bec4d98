export * from "./state/view-state";
export * from "./state/output-channel";
export * from "./state/dispose-bag";
export * from "./use-case/use-case";
export * from "./posts/posts-use-case";
export * from "./posts/posts-view-model";
export * from "./errors/use-case-error";
export * from "./logging/debug-logging";
