import type { EmbeddingModel, EmbeddingModelLoader } from "./embeddingModelManager";

/**
 * Loads sentence-transformers ONNX exports with transformers.js.
 * Files are downloaded into `cacheDir` on first use and read from there
 * afterwards. Output vectors are mean-pooled and L2-normalized.
 */
export const transformersEmbeddingLoader: EmbeddingModelLoader = {
    async load(repoId: string, cacheDir: string): Promise<EmbeddingModel> {
        // Dynamic import keeps the ONNX runtime out of lexical-only runs
        const { pipeline } = await import("@huggingface/transformers");
        const extractor = await pipeline("feature-extraction", repoId, {
            cache_dir: cacheDir,
        });

        return {
            async encode(text: string) {
                const output = await extractor(text, {
                    pooling: "mean",
                    normalize: true,
                });
                const vector: number[] = [];
                for (const value of output.data) {
                    vector.push(Number(value));
                }
                return vector;
            },
            async dispose() {
                await extractor.dispose();
            },
        };
    },
};
