import dotenv from "dotenv";
import path from "path";
import { z } from "zod";
import type { MatchingConfig } from "./types";
import { AppError, ErrorCategory, ErrorCode } from "./utils/errors";
import { DEFAULT_EMBEDDING_MODEL } from "./config/embeddingModels";
import { DEFAULT_PER_QUERY_LIMIT, DEFAULT_TOTAL_CAP } from "./services/candidateCollector";

dotenv.config();

export const DEFAULT_MATCHING_THRESHOLD = 0.6;

/** The matching settings a caller hands to the engine. */
export const matchingConfigSchema = z.object({
    matchingMode: z.enum(["lexical", "semantic"]),
    embeddingModelName: z.string(),
    matchingThreshold: z
        .number()
        .min(0, "matchingThreshold must be between 0 and 1")
        .max(1, "matchingThreshold must be between 0 and 1"),
});

const envSchema = z.object({
    MATCHING_MODE: z.enum(["lexical", "semantic"]).default("semantic"),
    EMBEDDING_MODEL: z.string().trim().min(1).default(DEFAULT_EMBEDDING_MODEL),
    MATCHING_THRESHOLD: z.coerce
        .number()
        .min(0, "MATCHING_THRESHOLD must be between 0 and 1")
        .max(1, "MATCHING_THRESHOLD must be between 0 and 1")
        .default(DEFAULT_MATCHING_THRESHOLD),
    SEARCH_PER_QUERY_LIMIT: z.coerce.number().int().min(1).default(DEFAULT_PER_QUERY_LIMIT),
    SEARCH_TOTAL_CAP: z.coerce.number().int().min(1).default(DEFAULT_TOTAL_CAP),
    MODEL_CACHE_DIR: z.string().trim().min(1).optional(),
});

export interface MatcherSettings {
    matching: MatchingConfig;
    perQueryLimit: number;
    totalCap: number;
    modelCacheDir: string;
}

function toConfigError(source: string, error: z.ZodError): AppError {
    const issues = error.errors.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    return new AppError(
        ErrorCode.INVALID_CONFIG,
        ErrorCategory.FATAL,
        `Invalid ${source}: ${issues.join("; ")}`,
        { issues }
    );
}

/** Validates a matching config held elsewhere (e.g. a settings file). */
export function parseMatchingConfig(value: unknown): MatchingConfig {
    const parsed = matchingConfigSchema.safeParse(value);
    if (!parsed.success) throw toConfigError("matching configuration", parsed.error);
    return parsed.data;
}

/**
 * Reads matcher settings from the environment. Empty variables count as
 * unset. Throws AppError(INVALID_CONFIG) listing every problem.
 */
export function loadMatchingConfig(
    env: NodeJS.ProcessEnv = process.env
): MatcherSettings {
    const present = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
    );
    const parsed = envSchema.safeParse(present);
    if (!parsed.success) throw toConfigError("environment", parsed.error);

    const vars = parsed.data;
    return {
        matching: {
            matchingMode: vars.MATCHING_MODE,
            embeddingModelName: vars.EMBEDDING_MODEL,
            matchingThreshold: vars.MATCHING_THRESHOLD,
        },
        perQueryLimit: vars.SEARCH_PER_QUERY_LIMIT,
        totalCap: vars.SEARCH_TOTAL_CAP,
        modelCacheDir: path.resolve(
            vars.MODEL_CACHE_DIR ?? path.join(process.cwd(), "cache", "models")
        ),
    };
}
