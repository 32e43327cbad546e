export * from "./avl-tree";
export * from "./nodes";
export * from "./errors";
