export type { IReranker } from "./reranker.interface.js";
export { rankByScore, collectScores } from "./ranking.js";
export type { IndexedScore } from "./ranking.js";
export { CohereReranker } from "./cohere-reranker.js";
export type { CohereRerankerConfig } from "./cohere-reranker.js";
export { BgeReranker } from "./bge-reranker.js";
export type { BgeRerankerConfig } from "./bge-reranker.js";
export { createReranker } from "./factory.js";
export type { RerankerFactoryConfig } from "./factory.js";
