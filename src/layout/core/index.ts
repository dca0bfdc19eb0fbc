// src/layout/core/index.ts
export { Forest, type ForestColumns } from "./forest.js";
export { NodeData } from "./nodeData.js";
export { DirtyWorkspace } from "./dirtyWorkspace.js";
export { checkForest, assertForest } from "./invariants.js";
