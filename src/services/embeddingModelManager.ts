import fs from "fs/promises";
import path from "path";
import { createLogger, withLogTiming } from "../utils/logger";
import { AppError, ErrorCategory, ErrorCode, wrapNodeError } from "../utils/errors";
import {
    describeModel,
    isLexicalOnly,
    resolveModelRepoId,
} from "../config/embeddingModels";

const log = createLogger("Matching.Model");

// ── Types ──────────────────────────────────────────────────────────

export type EmbeddingVector = readonly number[];

/** A loaded model: text in, unit-normalized vector out. */
export interface EmbeddingModel {
    encode(text: string): Promise<EmbeddingVector>;
    dispose?(): Promise<void>;
}

/** Downloads (if needed) and loads a model into memory. */
export interface EmbeddingModelLoader {
    load(repoId: string, cacheDir: string): Promise<EmbeddingModel>;
}

/** Anything that can turn text into a vector, or report it cannot right now. */
export interface TextEmbedder {
    encode(text: string): Promise<EmbeddingVector | null>;
}

export type ModelState =
    | "unconfigured"
    | "lexical_only"
    | "configured"
    | "loading"
    | "loaded"
    | "load_failed";

export interface EmbeddingModelManagerOptions {
    cacheDir: string;
    loader: EmbeddingModelLoader;
    modelName?: string;
}

export interface DeleteModelResult {
    success: boolean;
    message: string;
}

// ── Manager ────────────────────────────────────────────────────────

/**
 * Owns the embedding model lifecycle: configure, lazy load, encode, delete.
 *
 * A model is loaded at most once per name. Concurrent first callers share
 * one in-flight load; once loaded, encode calls go straight to the model.
 * A failed load latches the configured name into lexical fallback until a
 * different model is configured.
 */
export class EmbeddingModelManager implements TextEmbedder {
    private readonly cacheDir: string;
    private readonly loader: EmbeddingModelLoader;

    private configuredName: string | null = null;
    private loaded: { name: string; model: EmbeddingModel } | null = null;
    private loadPromise: Promise<EmbeddingModel | null> | null = null;
    private failedName: string | null = null;
    // Bumped by delete/reset so a load that finishes afterwards is discarded
    private generation = 0;

    constructor(options: EmbeddingModelManagerOptions) {
        this.cacheDir = options.cacheDir;
        this.loader = options.loader;
        if (options.modelName !== undefined) {
            this.configure(options.modelName);
        }
    }

    /**
     * Select the model for future lazy loads. Does not load anything and does
     * not replace a model that is already in memory.
     */
    configure(modelName: string): void {
        const name = modelName.trim();
        if (name === this.configuredName) return;

        log.debug(`Configured embedding model: ${name || "(none)"}`);
        this.configuredName = name;
        this.failedName = null;
    }

    getConfiguredModel(): string | null {
        return this.configuredName;
    }

    getState(): ModelState {
        const name = this.configuredName;
        if (name === null) return "unconfigured";
        if (isLexicalOnly(name)) return "lexical_only";
        if (this.loaded) return "loaded";
        if (this.loadPromise) return "loading";
        if (this.failedName === name) return "load_failed";
        return "configured";
    }

    /**
     * Vector for `text`, or null when semantic scoring is unavailable
     * (lexical-only model, failed load, or a failing model call).
     */
    async encode(text: string): Promise<EmbeddingVector | null> {
        const model = await this.getModel();
        if (!model) return null;

        try {
            return await model.encode(text);
        } catch (error) {
            log.warn("Embedding failed, using lexical scoring for this comparison", {
                error,
            });
            return null;
        }
    }

    /** Load the configured model now instead of on first encode. */
    async preload(): Promise<boolean> {
        return (await this.getModel()) !== null;
    }

    /**
     * Fetch a model into the on-disk cache without making it the active
     * model. The loaded instance is released straight away.
     */
    async download(modelName: string): Promise<boolean> {
        if (isLexicalOnly(modelName)) return true;

        try {
            const model = await withLogTiming(
                log,
                "Embedding model download",
                () => this.loader.load(resolveModelRepoId(modelName), this.cacheDir),
                { model: modelName }
            );
            await model.dispose?.();
            return true;
        } catch (error) {
            log.warn(`Could not download embedding model "${modelName}"`, { error });
            return false;
        }
    }

    /** Checks the cache directory for the model's files without loading it. */
    async isDownloaded(modelName: string): Promise<boolean> {
        if (isLexicalOnly(modelName)) return true;

        const modelDir = this.modelCacheDir(modelName);
        try {
            await fs.access(path.join(modelDir, "config.json"));
            const weights = await fs.readdir(path.join(modelDir, "onnx"));
            return weights.some((file) => file.endsWith(".onnx"));
        } catch {
            return false;
        }
    }

    async status(): Promise<string> {
        const name = this.configuredName;
        if (name === null) return "Not configured";
        if (isLexicalOnly(name)) return "String matching only (no model needed)";

        const info = describeModel(name);
        if (this.loaded?.name === name) return `Loaded: ${info.displayName}`;
        if (this.loaded) {
            return `Loaded: ${describeModel(this.loaded.name).displayName} (${info.displayName} takes effect after reset)`;
        }
        if (this.loadPromise) return `Loading: ${info.displayName}`;
        if (this.failedName === name) {
            return `Failed to load: ${info.displayName} (using string matching)`;
        }
        if (await this.isDownloaded(name)) {
            return `Downloaded, not loaded: ${info.displayName}`;
        }
        return `Not downloaded: ${info.displayName} (${info.approximateSize})`;
    }

    /**
     * Drop the in-memory model so the next encode loads the configured one.
     * Cached files stay on disk.
     */
    async reset(): Promise<void> {
        this.abandonLoad();

        const current = this.loaded;
        this.loaded = null;
        if (current) await this.disposeQuietly(current.model);
    }

    /** Remove a model's cached files, unloading it first if it is in memory. */
    async delete(modelName: string): Promise<DeleteModelResult> {
        if (isLexicalOnly(modelName)) {
            return { success: false, message: "String matching has no model files to delete" };
        }

        if (this.loaded?.name === modelName) {
            await this.reset();
        } else if (this.configuredName === modelName) {
            this.abandonLoad();
        }

        const modelDir = this.modelCacheDir(modelName);
        if (!(await this.isDownloaded(modelName))) {
            return { success: false, message: `Model "${modelName}" is not downloaded` };
        }

        try {
            await fs.rm(modelDir, { recursive: true, force: true });
        } catch (error) {
            const wrapped = wrapNodeError(error, `deleting ${modelDir}`);
            const cacheError = new AppError(
                ErrorCode.MODEL_CACHE_ERROR,
                wrapped.category,
                `Failed to delete model "${modelName}": ${wrapped.message}`,
                { modelDir, cause: wrapped.code }
            );
            log.error(cacheError.message, cacheError.toJSON());
            return { success: false, message: cacheError.message };
        }

        log.info(`Deleted embedding model "${modelName}"`, { modelDir });
        return { success: true, message: `Deleted model "${modelName}"` };
    }

    // ── Internals ──────────────────────────────────────────────────

    private modelCacheDir(modelName: string): string {
        return path.join(this.cacheDir, ...resolveModelRepoId(modelName).split("/"));
    }

    /** Forget any in-flight load and the failure latch; a loaded model stays. */
    private abandonLoad(): void {
        this.generation++;
        this.loadPromise = null;
        this.failedName = null;
    }

    private async getModel(): Promise<EmbeddingModel | null> {
        const name = this.configuredName;
        if (name === null || isLexicalOnly(name)) return null;
        if (this.loaded) return this.loaded.model;
        if (this.failedName === name) return null;

        // Share the in-flight load with every concurrent caller
        if (this.loadPromise) return this.loadPromise;

        const pending = this.performLoad(name, this.generation);
        this.loadPromise = pending;
        try {
            return await pending;
        } finally {
            if (this.loadPromise === pending) this.loadPromise = null;
        }
    }

    private async performLoad(
        name: string,
        generation: number
    ): Promise<EmbeddingModel | null> {
        let model: EmbeddingModel;
        try {
            model = await withLogTiming(
                log,
                "Embedding model load",
                () => this.loader.load(resolveModelRepoId(name), this.cacheDir),
                { model: name }
            );
        } catch (error) {
            const loadError = new AppError(
                ErrorCode.MODEL_LOAD_FAILED,
                ErrorCategory.RECOVERABLE,
                `Embedding model "${name}" could not be loaded`,
                { model: name, error }
            );
            if (generation === this.generation) this.failedName = name;
            log.warn(`${loadError.message}, falling back to string matching`, loadError.toJSON());
            return null;
        }

        if (generation !== this.generation) {
            log.debug(`Discarding embedding model "${name}" loaded after reset`);
            await this.disposeQuietly(model);
            return null;
        }

        this.loaded = { name, model };
        log.info(`Embedding model ready: ${name}`);
        return model;
    }

    private async disposeQuietly(model: EmbeddingModel): Promise<void> {
        try {
            await model.dispose?.();
        } catch (error) {
            log.debug("Embedding model dispose failed", { error });
        }
    }
}
