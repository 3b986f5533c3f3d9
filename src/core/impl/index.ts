export * from "./simpleTokenizer.js";
export * from "./tfidfVectorizer.js";
export * from "./cosineSimilarity.js";
export * from "./normal.js";
export * from "./betaEstimator.js";
export * from "./decay.js";
export * from "./mannKendall.js";
export * from "./minHeapTopK.js";
export * from "./relevanceIndex.js";
export * from "./compactor.js";
export * from "./compositeRisk.js";
