import type { Candidate, MatchingConfig, MatchProgress, SearchProvider } from "../../types";
import { createLogger } from "../../utils/logger";
import { EmbeddingModelLoader, EmbeddingModelManager } from "../embeddingModelManager";
import { MatchClassifier } from "../matchClassifier";
import { SimilarityScorer } from "../similarityScorer";
import { TitleMatchingEngine, progressLabel, summarizeResults } from "../titleMatchingEngine";

jest.mock("../../utils/logger", () => {
    const log = {
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        child: jest.fn(),
    };
    return {
        logger: log,
        createLogger: () => log,
        withLogTiming: (_log: unknown, _operation: string, run: () => unknown) => run(),
    };
});

const mockLog = createLogger();
const mockLogInfo = mockLog.info as jest.Mock;
const mockLogWarn = mockLog.warn as jest.Mock;
const mockLogError = mockLog.error as jest.Mock;

const HEY_JUDE: Candidate = { id: "t1", name: "Hey Jude", contributors: ["The Beatles"] };
const UNRELATED: Candidate = {
    id: "t2",
    name: "Some Other Song",
    contributors: ["Unrelated Artist"],
};

const LEXICAL: MatchingConfig = {
    matchingMode: "lexical",
    embeddingModelName: "string_only",
    matchingThreshold: 0.6,
};

/** Returns every catalog entry whose name appears in the query. */
function catalogProvider(catalog: Candidate[]) {
    return jest.fn<ReturnType<SearchProvider>, Parameters<SearchProvider>>(async (query) =>
        catalog.filter((entry) => query.toLowerCase().includes(entry.name.toLowerCase()))
    );
}

function buildEngine(loader: EmbeddingModelLoader = { load: jest.fn() }) {
    const models = new EmbeddingModelManager({ cacheDir: "/tmp/unused-model-cache", loader });
    const classifier = new MatchClassifier(new SimilarityScorer(models));
    const engine = new TitleMatchingEngine(classifier, models);
    return { engine, models, classifier };
}

describe("TitleMatchingEngine.matchAll", () => {
    it("returns one classified result per title, in order", async () => {
        const { engine } = buildEngine();
        const search = catalogProvider([HEY_JUDE]);

        const batch = await engine.matchAll(
            ["The Beatles - Hey Jude (Official Video)", "Unknown Title", ""],
            search,
            LEXICAL
        );

        expect(batch.cancelled).toBe(false);
        expect(batch.results).toEqual([
            {
                sourceTitle: "The Beatles - Hey Jude (Official Video)",
                candidate: HEY_JUDE,
                tier: "matched",
                score: 1,
            },
            { sourceTitle: "Unknown Title", tier: "not_found" },
            { sourceTitle: "", tier: "not_found" },
        ]);
        expect(mockLogInfo).toHaveBeenCalledWith(
            "Matched 1, low confidence 0, not found 2 of 3 titles",
            { cancelled: false }
        );
    });

    it("never searches for an empty title", async () => {
        const { engine } = buildEngine();
        const search = catalogProvider([HEY_JUDE]);

        await engine.matchAll(["", "   "], search, LEXICAL);

        expect(search).not.toHaveBeenCalled();
    });

    it("runs every query for a title through the provider", async () => {
        const { engine } = buildEngine();
        const search = catalogProvider([HEY_JUDE]);

        await engine.matchAll(["The Beatles - Hey Jude"], search, LEXICAL);

        expect(search.mock.calls).toEqual([
            ["The Beatles Hey Jude", 10],
            ['artist:"The Beatles" track:"Hey Jude"', 10],
            ["The Beatles - Hey Jude", 10],
        ]);
    });

    it("flags an unrelated best candidate as low_confidence", async () => {
        const { engine } = buildEngine();
        const search = jest.fn<ReturnType<SearchProvider>, Parameters<SearchProvider>>(
            async () => [UNRELATED]
        );

        const { results } = await engine.matchAll(["The Beatles - Hey Jude"], search, LEXICAL);

        expect(results[0].tier).toBe("low_confidence");
        expect(results[0].candidate).toEqual(UNRELATED);
    });

    it("resolves to not_found when every query fails", async () => {
        const { engine } = buildEngine();
        const search = jest.fn<ReturnType<SearchProvider>, Parameters<SearchProvider>>(
            async () => {
                throw new Error("HTTP 503");
            }
        );

        const { results } = await engine.matchAll(["The Beatles - Hey Jude"], search, LEXICAL);

        expect(results).toEqual([{ sourceTitle: "The Beatles - Hey Jude", tier: "not_found" }]);
        expect(mockLogWarn).toHaveBeenCalledWith(
            'All 3 searches failed for "The Beatles - Hey Jude"'
        );
    });

    it("reports progress after each title with a truncated label", async () => {
        const { engine } = buildEngine();
        const longTitle = "x".repeat(60);
        const progress: MatchProgress[] = [];

        await engine.matchAll(["Hey Jude", longTitle], catalogProvider([HEY_JUDE]), LEXICAL, {
            onProgress: (update) => progress.push(update),
        });

        expect(progress).toEqual([
            { current: 1, total: 2, label: "Hey Jude" },
            { current: 2, total: 2, label: `${"x".repeat(50)}...` },
        ]);
    });

    it("ignores a progress callback that throws", async () => {
        const { engine } = buildEngine();

        const batch = await engine.matchAll(["Hey Jude", "Other"], catalogProvider([HEY_JUDE]), LEXICAL, {
            onProgress: () => {
                throw new Error("UI gone");
            },
        });

        expect(batch.results).toHaveLength(2);
        expect(mockLogWarn).toHaveBeenCalledWith("Progress callback threw, ignoring", {
            error: expect.any(Error),
        });
    });

    it("stops between titles when cancelled and keeps finished results", async () => {
        const { engine } = buildEngine();
        const search = catalogProvider([HEY_JUDE]);
        let finished = 0;

        const batch = await engine.matchAll(["Hey Jude", "Second", "Third"], search, LEXICAL, {
            onProgress: () => {
                finished++;
            },
            isCancelled: () => finished >= 1,
        });

        expect(batch.cancelled).toBe(true);
        expect(batch.results.map((result) => result.sourceTitle)).toEqual(["Hey Jude"]);
        expect(search).toHaveBeenCalledTimes(1);
    });

    it("drops the in-flight title when cancelled between its queries", async () => {
        const { engine } = buildEngine();
        const search = catalogProvider([HEY_JUDE]);
        const progress = jest.fn();

        const batch = await engine.matchAll(["The Beatles - Hey Jude"], search, LEXICAL, {
            onProgress: progress,
            isCancelled: () => search.mock.calls.length >= 1,
        });

        expect(batch).toEqual({ results: [], cancelled: true });
        expect(search).toHaveBeenCalledTimes(1);
        expect(progress).not.toHaveBeenCalled();
    });

    it("keeps going when the cancellation check throws", async () => {
        const { engine } = buildEngine();

        const batch = await engine.matchAll(["Hey Jude"], catalogProvider([HEY_JUDE]), LEXICAL, {
            isCancelled: () => {
                throw new Error("broken check");
            },
        });

        expect(batch.cancelled).toBe(false);
        expect(batch.results).toHaveLength(1);
    });

    it("turns an unexpected failure into not_found for that title only", async () => {
        const { engine, classifier } = buildEngine();
        jest.spyOn(classifier, "classify").mockRejectedValueOnce(new Error("boom"));

        const { results } = await engine.matchAll(
            ["Hey Jude", "Hey Jude"],
            catalogProvider([HEY_JUDE]),
            LEXICAL
        );

        expect(results.map((result) => result.tier)).toEqual(["not_found", "matched"]);
        expect(mockLogError).toHaveBeenCalledWith('Matching failed for "Hey Jude"', {
            error: expect.any(Error),
        });
    });

    describe("semantic mode", () => {
        const SEMANTIC: MatchingConfig = {
            matchingMode: "semantic",
            embeddingModelName: "all-MiniLM-L6-v2",
            matchingThreshold: 0.6,
        };

        it("falls back to lexical scoring for the whole batch when the model fails to load", async () => {
            const load = jest.fn().mockRejectedValue(new Error("onnx runtime crashed"));
            const { engine } = buildEngine({ load });

            const batch = await engine.matchAll(
                ["The Beatles - Hey Jude", "Unknown Title"],
                catalogProvider([HEY_JUDE]),
                SEMANTIC
            );

            expect(batch.results.map((result) => result.tier)).toEqual(["matched", "not_found"]);
            expect(batch.results[0].score).toBe(1);
            expect(load).toHaveBeenCalledTimes(1);
            expect(load).toHaveBeenCalledWith("Xenova/all-MiniLM-L6-v2", "/tmp/unused-model-cache");
        });

        it("scores with the configured model when it loads", async () => {
            const encode = jest.fn(async (_text: string) => [0.6, 0.8]);
            const { engine, models } = buildEngine({ load: jest.fn().mockResolvedValue({ encode }) });

            const { results } = await engine.matchAll(
                ["The Beatles - Hey Jude"],
                jest.fn<ReturnType<SearchProvider>, Parameters<SearchProvider>>(async () => [UNRELATED]),
                SEMANTIC
            );

            // Every text maps to the same vector, so cosine similarity is 1
            expect(results[0].tier).toBe("matched");
            expect(results[0].score).toBeCloseTo(1, 10);
            expect(models.getState()).toBe("loaded");
        });
    });
});

describe("summarizeResults", () => {
    it("counts results per tier", () => {
        expect(
            summarizeResults([
                { sourceTitle: "a", tier: "matched", candidate: HEY_JUDE, score: 1 },
                { sourceTitle: "b", tier: "low_confidence", candidate: UNRELATED, score: 0.2 },
                { sourceTitle: "c", tier: "not_found" },
                { sourceTitle: "d", tier: "not_found" },
            ])
        ).toEqual({ matched: 1, lowConfidence: 1, notFound: 2, total: 4 });
    });
});

describe("progressLabel", () => {
    it("keeps short titles and truncates long ones to 50 characters", () => {
        expect(progressLabel("Hey Jude")).toBe("Hey Jude");
        expect(progressLabel("y".repeat(50))).toBe("y".repeat(50));
        expect(progressLabel("y".repeat(51))).toBe(`${"y".repeat(50)}...`);
    });
});
