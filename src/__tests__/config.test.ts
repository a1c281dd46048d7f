import path from "path";
import { loadMatchingConfig, parseMatchingConfig } from "../config";
import { AppError, ErrorCategory, ErrorCode } from "../utils/errors";

describe("loadMatchingConfig", () => {
    it("applies defaults when nothing is set", () => {
        expect(loadMatchingConfig({})).toEqual({
            matching: {
                matchingMode: "semantic",
                embeddingModelName: "all-mpnet-base-v2",
                matchingThreshold: 0.6,
            },
            perQueryLimit: 10,
            totalCap: 40,
            modelCacheDir: path.resolve(process.cwd(), "cache", "models"),
        });
    });

    it("reads and coerces environment values", () => {
        expect(
            loadMatchingConfig({
                MATCHING_MODE: "lexical",
                EMBEDDING_MODEL: "string_only",
                MATCHING_THRESHOLD: "0.75",
                SEARCH_PER_QUERY_LIMIT: "5",
                SEARCH_TOTAL_CAP: "20",
                MODEL_CACHE_DIR: "/tmp/models",
            })
        ).toEqual({
            matching: {
                matchingMode: "lexical",
                embeddingModelName: "string_only",
                matchingThreshold: 0.75,
            },
            perQueryLimit: 5,
            totalCap: 20,
            modelCacheDir: path.resolve("/tmp/models"),
        });
    });

    it("treats empty variables as unset", () => {
        const settings = loadMatchingConfig({ MATCHING_THRESHOLD: "", EMBEDDING_MODEL: "" });

        expect(settings.matching.matchingThreshold).toBe(0.6);
        expect(settings.matching.embeddingModelName).toBe("all-mpnet-base-v2");
    });

    it("rejects a threshold outside [0, 1]", () => {
        expect(() => loadMatchingConfig({ MATCHING_THRESHOLD: "1.5" })).toThrow(
            "Invalid environment: MATCHING_THRESHOLD: MATCHING_THRESHOLD must be between 0 and 1"
        );
    });

    it("raises a fatal INVALID_CONFIG error listing every problem", () => {
        let caught: unknown;
        try {
            loadMatchingConfig({ MATCHING_MODE: "fuzzy", SEARCH_TOTAL_CAP: "0" });
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(AppError);
        if (!(caught instanceof AppError)) return;
        expect(caught.code).toBe(ErrorCode.INVALID_CONFIG);
        expect(caught.category).toBe(ErrorCategory.FATAL);
        expect(caught.details?.issues).toHaveLength(2);
    });
});

describe("parseMatchingConfig", () => {
    it("returns a valid configuration unchanged", () => {
        const config = {
            matchingMode: "lexical",
            embeddingModelName: "string_only",
            matchingThreshold: 0.6,
        };

        expect(parseMatchingConfig(config)).toEqual(config);
    });

    it("rejects an out-of-range threshold", () => {
        expect(() =>
            parseMatchingConfig({
                matchingMode: "semantic",
                embeddingModelName: "all-MiniLM-L6-v2",
                matchingThreshold: -0.1,
            })
        ).toThrow(
            "Invalid matching configuration: matchingThreshold: matchingThreshold must be between 0 and 1"
        );
    });
});
