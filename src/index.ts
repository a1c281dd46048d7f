import { loadMatchingConfig } from "./config";
import type { MatcherSettings } from "./config";
import { EmbeddingModelManager } from "./services/embeddingModelManager";
import type { EmbeddingModelLoader } from "./services/embeddingModelManager";
import { MatchClassifier } from "./services/matchClassifier";
import { SimilarityScorer } from "./services/similarityScorer";
import { TitleMatchingEngine } from "./services/titleMatchingEngine";
import { transformersEmbeddingLoader } from "./services/transformersEmbeddingLoader";
import type { FieldQueryFormatter } from "./utils/searchQueries";

export * from "./types";
export {
    loadMatchingConfig,
    parseMatchingConfig,
    matchingConfigSchema,
    DEFAULT_MATCHING_THRESHOLD,
} from "./config";
export type { MatcherSettings } from "./config";
export {
    LEXICAL_ONLY_MODEL,
    DEFAULT_EMBEDDING_MODEL,
    MODEL_CATALOG,
    describeModel,
    resolveModelRepoId,
} from "./config/embeddingModels";
export type { EmbeddingModelInfo } from "./config/embeddingModels";
export { normalizeTitle } from "./utils/titleNormalization";
export { parseArtistTitle } from "./utils/titleParser";
export { buildSearchQueries, spotifyFieldQuery } from "./utils/searchQueries";
export type { FieldQueryFormatter } from "./utils/searchQueries";
export { formatCandidate, formatCandidateLabel } from "./utils/candidates";
export { lexicalSimilarity, cosineSimilarity } from "./utils/similarity";
export { AppError, ErrorCategory, ErrorCode, describeError, isRecoverable, isTransient } from "./utils/errors";
export { createLogger, setLogLevel } from "./utils/logger";
export { collectCandidates } from "./services/candidateCollector";
export type { CollectOptions, CollectionResult } from "./services/candidateCollector";
export { SimilarityScorer } from "./services/similarityScorer";
export type { ScoringStrategy } from "./services/similarityScorer";
export { EmbeddingModelManager } from "./services/embeddingModelManager";
export type {
    EmbeddingModel,
    EmbeddingModelLoader,
    EmbeddingVector,
    ModelState,
    TextEmbedder,
} from "./services/embeddingModelManager";
export { MatchClassifier } from "./services/matchClassifier";
export {
    TitleMatchingEngine,
    summarizeResults,
    progressLabel,
} from "./services/titleMatchingEngine";
export type { MatchAllOptions } from "./services/titleMatchingEngine";
export { createSpotifySearchProvider } from "./services/spotifySearchProvider";
export type { SpotifySearchProviderOptions } from "./services/spotifySearchProvider";
export { transformersEmbeddingLoader } from "./services/transformersEmbeddingLoader";

export interface TitleMatcher {
    settings: MatcherSettings;
    models: EmbeddingModelManager;
    scorer: SimilarityScorer;
    classifier: MatchClassifier;
    engine: TitleMatchingEngine;
}

export interface CreateTitleMatcherOptions {
    /** Defaults to settings read from the environment. */
    settings?: MatcherSettings;
    /** Defaults to transformers.js. */
    loader?: EmbeddingModelLoader;
    formatFieldQuery?: FieldQueryFormatter;
}

/** Wires the matcher's object graph. Nothing is loaded or fetched yet. */
export function createTitleMatcher(options: CreateTitleMatcherOptions = {}): TitleMatcher {
    const settings = options.settings ?? loadMatchingConfig();
    const models = new EmbeddingModelManager({
        cacheDir: settings.modelCacheDir,
        loader: options.loader ?? transformersEmbeddingLoader,
        modelName: settings.matching.embeddingModelName,
    });
    const scorer = new SimilarityScorer(models);
    const classifier = new MatchClassifier(scorer);
    const engine = new TitleMatchingEngine(classifier, models, {
        perQueryLimit: settings.perQueryLimit,
        totalCap: settings.totalCap,
        formatFieldQuery: options.formatFieldQuery,
    });

    return { settings, models, scorer, classifier, engine };
}
