/**
 * Configuration management for stageline
 */

import { readFile, writeFile } from 'fs/promises';
import path from 'path';
import { envBool, envOptionalNumber, envPositiveInt } from './utils/env.js';
import { buildStageConfigs } from './pipeline/prompts.js';
import type { StageConfigs } from './pipeline/types.js';

export type UiMode = 'minimal' | 'fancy' | 'plain';
export type ResearchPreference = 'firecrawl' | 'tavily';

/**
 * Centralized default values for the CLI configuration.
 * Use these instead of hardcoding defaults throughout the codebase.
 */
export const DEFAULTS = {
    llmBaseUrl: 'https://integrate.api.nvidia.com/v1',
    model: 'moonshotai/kimi-k2-instruct',
    topP: 0.9,
    thinking: true,
    researchPreference: 'firecrawl' as ResearchPreference,
    maxToolRounds: 4,
    modelRetries: 2,
    modelTimeoutMs: 120_000,
    toolTimeoutMs: 60_000,
    stageTimeoutMs: 600_000,
    toolConnectTimeoutMs: 25_000,
    contextTokenBudget: 24_000,
    uiMode: 'fancy' as UiMode,
    renderMarkdown: true,
    showReasoning: false,
    showToolCalls: true,
} as const;

export interface McpServerEntry {
    name: string;
    url: string;
}

export interface Config {
    llmApiKey: string;
    llmBaseUrl: string;
    defaultModel: string;
    modelTopP: number;
    modelThinking: boolean;
    firecrawlApiKey: string;
    mcpSseServers: McpServerEntry[];
    tavilyApiKey: string;
    enableTavily: boolean;
    researchPreference: ResearchPreference;
    maxToolRounds: number;
    modelRetries: number;
    modelTimeoutMs: number;
    toolTimeoutMs: number;
    stageTimeoutMs: number;
    toolConnectTimeoutMs: number;
    contextTokenBudget: number;
    uiMode: UiMode;
    renderMarkdown: boolean;
    showReasoning: boolean;
    showToolCalls: boolean;
}

function envUiMode(value: string | undefined): UiMode {
    const normalized = value?.trim().toLowerCase();
    if (normalized === 'fancy') return 'fancy';
    if (normalized === 'plain') return 'plain';
    if (normalized === 'minimal') return 'minimal';
    return DEFAULTS.uiMode;
}

function envResearchPreference(value: string | undefined): ResearchPreference {
    return value?.trim().toLowerCase().startsWith('tav') ? 'tavily' : DEFAULTS.researchPreference;
}

function envNonNegativeCount(value: string | undefined, defaultValue: number): number {
    const parsed = envOptionalNumber(value);
    if (parsed === undefined || !Number.isInteger(parsed) || parsed < 0) return defaultValue;
    return parsed;
}

/**
 * Parse `name=url,name=url`. A bare URL gets a generated name.
 */
export function parseServerList(value: string | undefined): McpServerEntry[] {
    if (!value) return [];
    return value
        .split(',')
        .map((part) => part.trim())
        .filter((part) => part.length > 0)
        .map((part, i) => {
            const eq = part.indexOf('=');
            if (eq > 0 && !part.slice(0, eq).includes('://')) {
                return { name: part.slice(0, eq).trim(), url: part.slice(eq + 1).trim() };
            }
            return { name: `server${i + 1}`, url: part };
        });
}

function isHttpUrl(value: string): boolean {
    try {
        const url = new URL(value);
        return url.protocol === 'http:' || url.protocol === 'https:';
    } catch {
        return false;
    }
}

export function loadConfig(): Config {
    const llmApiKey = process.env.LLM_API_KEY || process.env.NVIDIA_API_KEY || '';
    const llmBaseUrl = process.env.LLM_BASE_URL?.trim() || DEFAULTS.llmBaseUrl;
    const defaultModel = process.env.DEFAULT_MODEL?.trim() || DEFAULTS.model;
    const topP = envOptionalNumber(process.env.MODEL_TOP_P);
    const modelTopP = topP !== undefined && topP > 0 && topP <= 1 ? topP : DEFAULTS.topP;

    return {
        llmApiKey,
        llmBaseUrl,
        defaultModel,
        modelTopP,
        modelThinking: envBool(process.env.MODEL_THINKING, DEFAULTS.thinking),
        firecrawlApiKey: process.env.FIRECRAWL_API_KEY?.trim() || '',
        mcpSseServers: parseServerList(process.env.MCP_SSE_SERVERS),
        tavilyApiKey: process.env.TAVILY_API_KEY?.trim() || '',
        enableTavily: envBool(process.env.ENABLE_TAVILY_CLIENT, false),
        researchPreference: envResearchPreference(process.env.RESEARCH_PREFERENCE),
        maxToolRounds: envNonNegativeCount(process.env.MAX_TOOL_ROUNDS, DEFAULTS.maxToolRounds),
        modelRetries: envNonNegativeCount(process.env.MODEL_RETRIES, DEFAULTS.modelRetries),
        modelTimeoutMs: envPositiveInt(process.env.MODEL_TIMEOUT_MS, DEFAULTS.modelTimeoutMs),
        toolTimeoutMs: envPositiveInt(process.env.TOOL_TIMEOUT_MS, DEFAULTS.toolTimeoutMs),
        stageTimeoutMs: envPositiveInt(process.env.STAGE_TIMEOUT_MS, DEFAULTS.stageTimeoutMs),
        toolConnectTimeoutMs: envPositiveInt(process.env.TOOL_CONNECT_TIMEOUT_MS, DEFAULTS.toolConnectTimeoutMs),
        contextTokenBudget: envPositiveInt(process.env.CONTEXT_TOKEN_BUDGET, DEFAULTS.contextTokenBudget),
        uiMode: envUiMode(process.env.UI_MODE),
        renderMarkdown: envBool(process.env.RENDER_MARKDOWN, DEFAULTS.renderMarkdown),
        showReasoning: envBool(process.env.SHOW_REASONING, DEFAULTS.showReasoning),
        showToolCalls: envBool(process.env.SHOW_TOOL_CALLS, DEFAULTS.showToolCalls),
    };
}

/** True when at least one tool source is configured */
export function hasToolSources(config: Config): boolean {
    return Boolean(
        config.firecrawlApiKey ||
        config.mcpSseServers.length > 0 ||
        (config.enableTavily && config.tavilyApiKey)
    );
}

export function validateConfig(
    config: Config,
    required: { llm?: boolean; tools?: boolean } = { llm: true, tools: false }
): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    if (required.llm !== false && !config.llmApiKey) {
        errors.push('LLM_API_KEY is not set');
    }

    if (!isHttpUrl(config.llmBaseUrl)) {
        errors.push(`LLM_BASE_URL is not a valid URL: ${config.llmBaseUrl}`);
    }

    for (const server of config.mcpSseServers) {
        if (!isHttpUrl(server.url)) {
            errors.push(`MCP_SSE_SERVERS entry "${server.name}" is not a valid URL: ${server.url}`);
        }
    }

    if (config.enableTavily && !config.tavilyApiKey) {
        errors.push('ENABLE_TAVILY_CLIENT is set but TAVILY_API_KEY is not set');
    }

    if (required.tools && !hasToolSources(config)) {
        errors.push('No tool server configured (set FIRECRAWL_API_KEY, MCP_SSE_SERVERS or TAVILY_API_KEY with ENABLE_TAVILY_CLIENT)');
    }

    return {
        valid: errors.length === 0,
        errors,
    };
}

/**
 * The four stage configs for this configuration. `tools` overrides the
 * guess made from the configured sources.
 */
export function stageConfigsFrom(config: Config, options: { tools?: boolean } = {}): StageConfigs {
    const researchTools = options.tools ?? hasToolSources(config);
    return buildStageConfigs({ researchTools });
}

function escapeEnvValue(value: string): string {
    const trimmed = value.trim();
    if (trimmed === '') return '""';
    const needsQuotes = /[\s#"'\\]/.test(trimmed);
    if (!needsQuotes) return trimmed;
    const escaped = trimmed
        .replace(/\\/g, '\\\\')
        .replace(/\n/g, '\\n')
        .replace(/"/g, '\\"');
    return `"${escaped}"`;
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function updateEnvFile(envPath: string, updates: Record<string, string>): Promise<void> {
    let existing = '';
    try {
        existing = await readFile(envPath, 'utf8');
    } catch (error) {
        if (!isMissingFile(error)) throw error;
    }

    const lines = existing === '' ? [] : existing.split(/\r?\n/);
    const touched = new Set<string>();

    const nextLines = lines.map((line) => {
        if (line.trim().startsWith('#')) return line;
        const match = line.match(/^\s*([A-Z0-9_]+)\s*=\s*(.*)\s*$/);
        if (!match) return line;

        const key = match[1];
        const value = updates[key];
        if (value === undefined) return line;

        touched.add(key);
        return `${key}=${escapeEnvValue(value)}`;
    });

    if (nextLines.length > 0 && nextLines[nextLines.length - 1].trim() !== '') {
        nextLines.push('');
    }

    for (const [key, value] of Object.entries(updates)) {
        if (touched.has(key)) continue;
        nextLines.push(`${key}=${escapeEnvValue(value)}`);
    }

    const finalContents = nextLines.join('\n').replace(/\n*$/, '\n');
    const isNewFile = existing === '';
    const writeOptions: { encoding: BufferEncoding; mode?: number } = { encoding: 'utf8' };
    if (isNewFile) writeOptions.mode = 0o600;
    await writeFile(envPath, finalContents, writeOptions);
}

export function getDefaultEnvPath(): string {
    const explicit = process.env.STAGELINE_ENV_PATH?.trim();
    if (explicit) return path.isAbsolute(explicit) ? explicit : path.join(process.cwd(), explicit);
    return path.join(process.cwd(), '.env');
}

export async function writeEnvVars(
    updates: Record<string, string>,
    options: { envPath?: string } = {}
): Promise<void> {
    const envPath = options.envPath ?? getDefaultEnvPath();
    await updateEnvFile(envPath, updates);
    for (const [key, value] of Object.entries(updates)) {
        process.env[key] = value;
    }
}

export async function ensureConfig(
    required: { llm?: boolean; tools?: boolean } = { llm: true },
    options: { envPath?: string; promptPreferences?: boolean; force?: boolean } = {}
): Promise<Config> {
    const envPath = options.envPath ?? getDefaultEnvPath();
    const current = loadConfig();
    const validation = validateConfig(current, required);

    const canPrompt = Boolean(process.stdin.isTTY && process.stdout.isTTY);
    const missingRequired = validation.errors.length > 0;

    const shouldPrompt = Boolean(options.force || missingRequired || options.promptPreferences);
    if (!shouldPrompt) return current;

    if (!canPrompt && missingRequired) {
        throw new Error(`Missing configuration:\n${validation.errors.map(e => `  • ${e}`).join('\n')}`);
    }

    const inquirer = (await import('inquirer')).default;
    const updates: Record<string, string> = {};
    const next: Config = { ...current };

    if (options.force || (required.llm !== false && !current.llmApiKey)) {
        const { llmApiKey } = await inquirer.prompt<{ llmApiKey: string }>([
            {
                type: 'password',
                name: 'llmApiKey',
                message: 'Paste your model endpoint API key (NVIDIA or any OpenAI-compatible provider)',
                mask: '*',
                validate: (input: string) => input.trim().length > 0 || 'API key is required',
            },
        ]);
        next.llmApiKey = llmApiKey.trim();
        updates.LLM_API_KEY = next.llmApiKey;
    }

    if (options.force || (required.tools && !hasToolSources(current))) {
        const { firecrawlApiKey } = await inquirer.prompt<{ firecrawlApiKey: string }>([
            {
                type: 'password',
                name: 'firecrawlApiKey',
                message: 'Paste your Firecrawl API key (blank to skip)',
                mask: '*',
            },
        ]);
        if (firecrawlApiKey.trim()) {
            next.firecrawlApiKey = firecrawlApiKey.trim();
            updates.FIRECRAWL_API_KEY = next.firecrawlApiKey;
        }
    }

    const wantsPreferences = options.force || options.promptPreferences;
    if (wantsPreferences) {
        const answers = await inquirer.prompt<{
            defaultModel: string;
            researchPreference: ResearchPreference;
            uiMode: UiMode;
            renderMarkdown: boolean;
            showToolCalls: boolean;
        }>([
            {
                type: 'input',
                name: 'defaultModel',
                message: 'Default model id',
                default: current.defaultModel,
                validate: (input: string) => input.trim().length > 0 || 'Model id is required',
            },
            {
                type: 'list',
                name: 'researchPreference',
                message: 'Preferred research tool',
                default: current.researchPreference,
                choices: [
                    { name: 'Firecrawl (MCP)', value: 'firecrawl' },
                    { name: 'Tavily internet_search', value: 'tavily' },
                ],
            },
            {
                type: 'list',
                name: 'uiMode',
                message: 'UI style',
                default: current.uiMode,
                choices: [
                    { name: 'Minimal (clean)', value: 'minimal' },
                    { name: 'Fancy (boxed)', value: 'fancy' },
                    { name: 'Plain (no color)', value: 'plain' },
                ],
            },
            {
                type: 'confirm',
                name: 'renderMarkdown',
                message: 'Render markdown in terminal output?',
                default: current.renderMarkdown,
            },
            {
                type: 'confirm',
                name: 'showToolCalls',
                message: 'Show tool calls while researching?',
                default: current.showToolCalls,
            },
        ]);

        next.defaultModel = answers.defaultModel.trim();
        next.researchPreference = envResearchPreference(answers.researchPreference);
        next.uiMode = envUiMode(answers.uiMode);
        next.renderMarkdown = answers.renderMarkdown;
        next.showToolCalls = answers.showToolCalls;

        updates.DEFAULT_MODEL = next.defaultModel;
        updates.RESEARCH_PREFERENCE = next.researchPreference;
        updates.UI_MODE = next.uiMode;
        updates.RENDER_MARKDOWN = next.renderMarkdown ? '1' : '0';
        updates.SHOW_TOOL_CALLS = next.showToolCalls ? '1' : '0';
    }

    if (Object.keys(updates).length > 0) {
        await writeEnvVars(updates, { envPath });
    }

    return next;
}
