import axios from "axios";
import PQueue from "p-queue";
import { z } from "zod";
import type { Candidate, SearchProvider } from "../types";
import { AppError, ErrorCategory, ErrorCode, describeError } from "../utils/errors";
import { createLogger } from "../utils/logger";

const log = createLogger("Matching.Spotify");

const SPOTIFY_SEARCH_URL = "https://api.spotify.com/v1/search";
const MAX_SEARCH_LIMIT = 50;

export interface SpotifySearchProviderOptions {
    /** Returns a bearer token; obtaining and refreshing it is the caller's job. */
    getAccessToken: () => string | Promise<string>;
    /** Minimum gap between the starts of consecutive requests, in ms. */
    pacingMs?: number;
    timeoutMs?: number;
    market?: string;
}

// Only the fields the matcher reads. Anything else in the payload is ignored.
const searchResponseSchema = z.object({
    tracks: z
        .object({
            items: z.array(z.unknown()).default([]),
        })
        .optional(),
});

const trackSchema = z.object({
    id: z.string().min(1),
    name: z.unknown(),
    artists: z.unknown(),
});

const artistSchema = z.object({ name: z.string() });

function toCandidate(item: unknown): Candidate | null {
    const parsed = trackSchema.safeParse(item);
    if (!parsed.success) return null;

    const { id, name, artists } = parsed.data;
    const contributors: string[] = [];
    if (Array.isArray(artists)) {
        for (const artist of artists) {
            const result = artistSchema.safeParse(artist);
            if (result.success) contributors.push(result.data.name);
        }
    }

    return {
        id,
        // A missing name stays empty so the scorer treats it as malformed
        name: typeof name === "string" ? name : "",
        contributors,
    };
}

function statusOf(error: unknown): number | undefined {
    return axios.isAxiosError(error) ? error.response?.status : undefined;
}

/**
 * Search provider backed by Spotify's track search.
 * Calls run one at a time through a queue that starts at most one request
 * per `pacingMs`; HTTP failures surface as AppError(SEARCH_PROVIDER_ERROR).
 */
export function createSpotifySearchProvider(
    options: SpotifySearchProviderOptions
): SearchProvider {
    const pacingMs = options.pacingMs ?? 100;
    const timeoutMs = options.timeoutMs ?? 10000;
    const queue = new PQueue({ concurrency: 1, interval: pacingMs, intervalCap: 1 });

    const searchTracks = async (query: string, limit: number): Promise<Candidate[]> => {
        const token = await options.getAccessToken();
        let data: unknown;
        try {
            const response = await axios.get(SPOTIFY_SEARCH_URL, {
                params: {
                    q: query,
                    type: "track",
                    limit: Math.min(MAX_SEARCH_LIMIT, Math.max(1, Math.floor(limit))),
                    ...(options.market ? { market: options.market } : {}),
                },
                headers: { Authorization: `Bearer ${token}` },
                timeout: timeoutMs,
            });
            data = response.data;
        } catch (error) {
            const status = statusOf(error);
            throw new AppError(
                ErrorCode.SEARCH_PROVIDER_ERROR,
                status === 429 || (status !== undefined && status >= 500)
                    ? ErrorCategory.TRANSIENT
                    : ErrorCategory.RECOVERABLE,
                `Spotify search failed: ${describeError(error)}`,
                { query, status }
            );
        }

        const parsed = searchResponseSchema.safeParse(data);
        if (!parsed.success) {
            throw new AppError(
                ErrorCode.SEARCH_PROVIDER_ERROR,
                ErrorCategory.RECOVERABLE,
                "Spotify search returned an unexpected payload",
                { query }
            );
        }

        const candidates: Candidate[] = [];
        for (const item of parsed.data.tracks?.items ?? []) {
            const candidate = toCandidate(item);
            if (candidate) candidates.push(candidate);
        }
        log.debug(`"${query}" -> ${candidates.length} tracks`);
        return candidates;
    };

    return (query: string, limit: number) => queue.add(() => searchTracks(query, limit));
}
