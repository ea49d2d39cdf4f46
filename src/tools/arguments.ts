/**
 * Tool arguments - typed values and schema validation
 */

import { z } from 'zod';
import { Ajv, type ValidateFunction } from 'ajv';
import { createModuleLogger } from '../logger.js';
import { describeError } from '../errors.js';

const log = createModuleLogger('tool-args');

export type ToolArgValue =
    | string
    | number
    | boolean
    | null
    | ToolArgValue[]
    | { [key: string]: ToolArgValue };

export type ToolArgs = { [key: string]: ToolArgValue };

export type ToolArgKind = 'string' | 'number' | 'boolean' | 'null' | 'sequence' | 'mapping';

export const ToolArgValueSchema: z.ZodType<ToolArgValue> = z.lazy(() =>
    z.union([
        z.string(),
        z.number(),
        z.boolean(),
        z.null(),
        z.array(ToolArgValueSchema),
        z.record(ToolArgValueSchema),
    ])
);

export const ToolArgsSchema = z.record(ToolArgValueSchema);

export function argKind(value: ToolArgValue): ToolArgKind {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'sequence';
    switch (typeof value) {
        case 'string': return 'string';
        case 'number': return 'number';
        case 'boolean': return 'boolean';
        default: return 'mapping';
    }
}

/**
 * Parse the argument text a model streamed for a tool call.
 * Empty text means "no arguments".
 */
export function parseToolArgs(raw: string): { args: ToolArgs; error?: string } {
    const trimmed = raw.trim();
    if (trimmed === '') return { args: {} };

    let parsed: unknown;
    try {
        parsed = JSON.parse(trimmed);
    } catch (error) {
        return { args: {}, error: `Arguments are not valid JSON: ${describeError(error)}` };
    }

    const result = ToolArgsSchema.safeParse(parsed);
    if (!result.success) {
        return { args: {}, error: 'Arguments must be a JSON object' };
    }
    return { args: result.data };
}

/**
 * Short one-line rendering for logs and the terminal, e.g. `query="paris" limit=3`
 */
export function describeArgs(args: ToolArgs, maxChars = 160): string {
    const parts = Object.entries(args).map(([key, value]) => {
        const kind = argKind(value);
        if (kind === 'sequence' || kind === 'mapping') return `${key}=${JSON.stringify(value)}`;
        return `${key}=${typeof value === 'string' ? JSON.stringify(value) : String(value)}`;
    });
    const line = parts.join(' ');
    return line.length <= maxChars ? line : `${line.slice(0, maxChars - 1)}…`;
}

/**
 * Validates arguments against each tool's declared JSON Schema.
 * Compiled validators are cached per schema object, so a tool whose
 * schema changes on a refresh is checked against the new one.
 */
export class ArgumentValidator {
    private ajv = new Ajv({ allErrors: true, strict: false });
    private compiled = new WeakMap<Record<string, unknown>, ValidateFunction | null>();

    validate(toolName: string, schema: Record<string, unknown> | undefined, args: ToolArgs): string[] {
        if (!schema) return [];
        const validate = this.compile(toolName, schema);
        if (!validate) return [];
        if (validate(args)) return [];

        return (validate.errors ?? []).map((e) => {
            const path = e.instancePath ? e.instancePath : '(root)';
            return `${path} ${e.message ?? 'is invalid'}`.trim();
        });
    }

    private compile(toolName: string, schema: Record<string, unknown>): ValidateFunction | null {
        if (this.compiled.has(schema)) return this.compiled.get(schema) ?? null;

        let validate: ValidateFunction | null = null;
        if (Object.keys(schema).length > 0) {
            try {
                // A refreshed schema may reuse the $id of the one it replaces
                if (typeof schema.$id === 'string') this.ajv.removeSchema(schema.$id);
                validate = this.ajv.compile(schema);
            } catch (error) {
                log.warn(`Skipping argument validation for ${toolName}: schema did not compile (${describeError(error)})`);
            }
        }
        this.compiled.set(schema, validate);
        return validate;
    }
}
