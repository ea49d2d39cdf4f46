/**
 * Tavily Search API Client
 * Backs the optional in-process `internet_search` tool
 */

import { z } from 'zod';
import { ApiKeyError, isAbortError, toError } from '../errors.js';
import { fetchWithRetry, parseErrorBody } from './http.js';

const TAVILY_API_BASE = 'https://api.tavily.com';
const DEFAULT_TIMEOUT_MS = 60_000;

export type TavilyTopic = 'general' | 'news' | 'finance';

export interface TavilySearchOptions {
    maxResults?: number;
    topic?: TavilyTopic;
    includeRawContent?: boolean;
    signal?: AbortSignal;
    timeoutMs?: number;
}

const TavilyResultSchema = z.object({
    title: z.string().default(''),
    url: z.string(),
    content: z.string().default(''),
    score: z.number().optional(),
    raw_content: z.string().nullish(),
    published_date: z.string().nullish(),
});

const TavilyResponseSchema = z.object({
    query: z.string().default(''),
    answer: z.string().nullish(),
    results: z.array(TavilyResultSchema).default([]),
    response_time: z.union([z.number(), z.string()]).optional(),
});

export type TavilySearchResult = z.infer<typeof TavilyResultSchema>;
export type TavilySearchResponse = z.infer<typeof TavilyResponseSchema>;

export interface TavilyClientOptions {
    retries?: number;
    retryDelayMs?: number;
}

export class TavilyClient {
    private apiKey: string;
    private retryOptions: TavilyClientOptions;

    constructor(apiKey: string, options: TavilyClientOptions = {}) {
        if (!apiKey || apiKey.trim() === '') {
            throw new ApiKeyError('TAVILY_API_KEY', undefined, 'https://tavily.com');
        }
        this.apiKey = apiKey.trim();
        this.retryOptions = options;
    }

    /**
     * Run a web search
     */
    async search(query: string, options: TavilySearchOptions = {}): Promise<TavilySearchResponse> {
        let response: Response;
        try {
            response = await fetchWithRetry(`${TAVILY_API_BASE}/search`, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    Authorization: `Bearer ${this.apiKey}`,
                },
                body: JSON.stringify({
                    query,
                    max_results: options.maxResults ?? 5,
                    topic: options.topic ?? 'general',
                    include_raw_content: options.includeRawContent ?? false,
                }),
                signal: options.signal,
            }, { ...this.retryOptions, timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS });
        } catch (error) {
            if (isAbortError(error)) throw error;
            throw new Error(`Tavily request failed: ${toError(error).message}`);
        }

        if (!response.ok) {
            const errorMessage = await parseErrorBody(response);

            if (response.status === 401) {
                throw new Error(
                    'Tavily API authentication failed.\n' +
                    'Please check your TAVILY_API_KEY is valid.\n' +
                    'Run: stageline init'
                );
            }

            if (response.status === 429) {
                throw new Error(
                    'Tavily API rate limit exceeded.\n' +
                    'Please wait a moment and try again.'
                );
            }

            throw new Error(`Tavily API error: ${response.status} - ${errorMessage}`);
        }

        const parsed = TavilyResponseSchema.safeParse(await response.json());
        if (!parsed.success) {
            throw new Error('Tavily API returned an unexpected response');
        }
        return parsed.data;
    }
}
