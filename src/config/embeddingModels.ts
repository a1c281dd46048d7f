/** Model name that disables semantic scoring entirely. */
export const LEXICAL_ONLY_MODEL = "string_only";

export const DEFAULT_EMBEDDING_MODEL = "all-mpnet-base-v2";

/** Hub organisation that publishes ONNX exports of sentence-transformers models. */
const ONNX_MODEL_ORG = "Xenova";

export interface EmbeddingModelInfo {
    name: string;
    displayName: string;
    approximateSize: string;
    description: string;
}

export const MODEL_CATALOG: readonly EmbeddingModelInfo[] = [
    {
        name: LEXICAL_ONLY_MODEL,
        displayName: "String matching only",
        approximateSize: "0 MB",
        description: "No model download; titles are compared character by character",
    },
    {
        name: "paraphrase-MiniLM-L3-v2",
        displayName: "MiniLM L3 (paraphrase)",
        approximateSize: "~60 MB",
        description: "Smallest and fastest, lowest accuracy",
    },
    {
        name: "all-MiniLM-L6-v2",
        displayName: "MiniLM L6",
        approximateSize: "~80 MB",
        description: "Good balance of speed and accuracy",
    },
    {
        name: "all-MiniLM-L12-v2",
        displayName: "MiniLM L12",
        approximateSize: "~120 MB",
        description: "Better accuracy, slightly slower",
    },
    {
        name: DEFAULT_EMBEDDING_MODEL,
        displayName: "MPNet base",
        approximateSize: "~420 MB",
        description: "Best accuracy, slowest to load",
    },
];

export function isLexicalOnly(modelName: string): boolean {
    return modelName.trim() === "" || modelName === LEXICAL_ONLY_MODEL;
}

/**
 * Maps a bare sentence-transformers name to the repository id the loader
 * downloads. Names that already carry an organisation are used verbatim.
 */
export function resolveModelRepoId(modelName: string): string {
    return modelName.includes("/") ? modelName : `${ONNX_MODEL_ORG}/${modelName}`;
}

/** Catalog entry for a model; names outside the catalog get an unknown size. */
export function describeModel(modelName: string): EmbeddingModelInfo {
    const known = MODEL_CATALOG.find((model) => model.name === modelName);
    if (known) return known;

    return {
        name: modelName,
        displayName: modelName,
        approximateSize: "Unknown",
        description: "Custom model",
    };
}
