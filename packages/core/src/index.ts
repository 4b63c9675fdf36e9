export { fingerprint } from "./fingerprint.js";

export { PassageStore } from "./passage-store.js";
export type { PassageStoreDependencies } from "./passage-store.js";

export { retrieve } from "./retrieval-pipeline.js";
export type { RetrievalDependencies } from "./retrieval-pipeline.js";

export { buildContext, CONTEXT_DELIMITER } from "./context-assembler.js";

export { RetrievalEngine } from "./retrieval-engine.js";
export type {
  RetrievalEngineDependencies,
  RetrievalEngineOptions,
  RetrievalEngineContract,
} from "./retrieval-engine.js";

export { createRetrievalEngine } from "./factory.js";
