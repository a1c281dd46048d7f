import { createTitleMatcher } from "../index";
import type { MatcherSettings, SearchProvider } from "../index";

jest.mock("../utils/logger", () => {
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
        setLogLevel: jest.fn(),
        withLogTiming: (_log: unknown, _operation: string, run: () => unknown) => run(),
    };
});

const settings: MatcherSettings = {
    matching: {
        matchingMode: "semantic",
        embeddingModelName: "all-MiniLM-L6-v2",
        matchingThreshold: 0.6,
    },
    perQueryLimit: 3,
    totalCap: 5,
    modelCacheDir: "/tmp/unused-model-cache",
};

describe("createTitleMatcher", () => {
    it("wires the configured model and search limits into the engine", async () => {
        const load = jest.fn().mockRejectedValue(new Error("no network in tests"));
        const matcher = createTitleMatcher({ settings, loader: { load } });
        const search = jest.fn<ReturnType<SearchProvider>, Parameters<SearchProvider>>(
            async () => [{ id: "t1", name: "Song", contributors: ["Artist"] }]
        );

        expect(matcher.models.getConfiguredModel()).toBe("all-MiniLM-L6-v2");
        expect(load).not.toHaveBeenCalled();

        const batch = await matcher.engine.matchAll(["Artist - Song"], search, settings.matching);

        expect(search).toHaveBeenCalledWith("Artist Song", 3);
        expect(load).toHaveBeenCalledWith("Xenova/all-MiniLM-L6-v2", "/tmp/unused-model-cache");
        expect(batch.results[0]).toMatchObject({ tier: "matched", score: 1 });
    });

    it("uses a custom field query syntax", async () => {
        const matcher = createTitleMatcher({
            settings: { ...settings, matching: { ...settings.matching, matchingMode: "lexical" } },
            loader: { load: jest.fn() },
            formatFieldQuery: (contributor, work) => `${work} ${contributor}`,
        });
        const search = jest.fn<ReturnType<SearchProvider>, Parameters<SearchProvider>>(
            async () => []
        );

        await matcher.engine.matchAll(["Artist - Song"], search, matcher.settings.matching);

        expect(search.mock.calls.map(([query]) => query)).toEqual([
            "Artist Song",
            "Song Artist",
            "Artist - Song",
        ]);
    });
});
