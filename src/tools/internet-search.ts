import { TavilyClient, type TavilyTopic } from '../clients/tavily.js';
import type { LocalTool } from './types.js';
import type { JsonObject } from '../pipeline/types.js';
import type { ToolArgs } from './arguments.js';

export const INTERNET_SEARCH_TOOL = 'internet_search';

const TOPICS: readonly TavilyTopic[] = ['general', 'news', 'finance'];

function isTopic(value: unknown): value is TavilyTopic {
    return typeof value === 'string' && TOPICS.some((t) => t === value);
}

/**
 * Web search through Tavily, offered alongside the MCP tools
 */
export function createInternetSearchTool(client: TavilyClient): LocalTool {
    return {
        definition: {
            name: INTERNET_SEARCH_TOOL,
            description: 'Run a web search and return result titles, URLs and snippets.',
            inputSchema: {
                type: 'object',
                properties: {
                    query: { type: 'string', description: 'Search query' },
                    max_results: { type: 'integer', minimum: 1, maximum: 20, default: 5 },
                    topic: { type: 'string', enum: [...TOPICS], default: 'general' },
                    include_raw_content: { type: 'boolean', default: false },
                },
                required: ['query'],
                additionalProperties: false,
            },
        },
        async run(args: ToolArgs, options) {
            const query = typeof args.query === 'string' ? args.query : '';
            const response = await client.search(query, {
                maxResults: typeof args.max_results === 'number' ? args.max_results : 5,
                topic: isTopic(args.topic) ? args.topic : 'general',
                includeRawContent: args.include_raw_content === true,
                signal: options.signal,
                timeoutMs: options.timeoutMs,
            });

            const output: JsonObject = {
                query: response.query || query,
                results: response.results.map((r) => {
                    const item: JsonObject = { title: r.title, url: r.url, content: r.content };
                    if (typeof r.score === 'number') item.score = r.score;
                    if (r.raw_content) item.raw_content = r.raw_content;
                    if (r.published_date) item.published_date = r.published_date;
                    return item;
                }),
            };
            if (response.answer) output.answer = response.answer;
            return output;
        },
    };
}
