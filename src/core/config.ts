import { readFileSync, existsSync } from 'fs';
import path from 'path';
import { parse } from 'yaml';
import { z } from 'zod';
import type { RuleLevel } from '../types/diagnostic.js';
import { DEFAULT_INDENT } from './serializer.js';

export const CONFIG_FILE = '.varyaml.yml';

const RuleLevelSchema = z.enum(['error', 'warning', 'off']);

const GlobListSchema = z
    .union([z.string(), z.array(z.string())])
    .transform(v => (Array.isArray(v) ? v : [v]));

const RulesSchema = z
    .object({
        'malformed-line': RuleLevelSchema,
        'reserved-key': RuleLevelSchema,
        'duplicate-key': RuleLevelSchema,
    })
    .partial()
    .strict();

const SettingsSchema = z.object({
    include: GlobListSchema.optional(),
    ignore: GlobListSchema.optional(),
    indent: z.number().int().positive().optional(),
    rules: RulesSchema.optional(),
});

const ConfigFileSchema = SettingsSchema.extend({
    profiles: z.record(SettingsSchema).optional(),
});

export type RuleName = keyof z.infer<typeof RulesSchema>;
export type Rules = Record<RuleName, RuleLevel>;
export type Settings = z.infer<typeof SettingsSchema>;

export interface ResolvedConfig {
    include: string[];
    ignore: string[];
    indent: number;
    rules: Rules;
}

export const DEFAULT_RULES: Rules = {
    'malformed-line': 'warning',
    'reserved-key': 'error',
    'duplicate-key': 'off',
};

export function defaultConfig(): ResolvedConfig {
    return {
        include: ['**/*.vyaml'],
        ignore: [],
        indent: DEFAULT_INDENT,
        rules: { ...DEFAULT_RULES },
    };
}

export class ConfigError extends Error {
    constructor(message: string, public file: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

function applySettings(source: Settings | undefined, target: ResolvedConfig): void {
    if (!source) return;
    if (source.include) target.include = [...source.include];
    if (source.ignore) target.ignore.push(...source.ignore);
    if (source.indent !== undefined) target.indent = source.indent;
    if (source.rules) {
        target.rules = { ...target.rules, ...source.rules };
    }
}

/** Validates parsed configuration and layers the named profile over the top-level settings. */
export function resolveConfig(raw: unknown, file: string, profile?: string): ResolvedConfig {
    const parsed = ConfigFileSchema.safeParse(raw ?? {});
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue.path.length ? ` at "${issue.path.join('.')}"` : '';
        throw new ConfigError(`Invalid configuration${where}: ${issue.message}`, file);
    }

    const config = defaultConfig();
    applySettings(parsed.data, config);

    if (profile) {
        const selected = parsed.data.profiles?.[profile];
        if (!selected) {
            throw new ConfigError(`Profile "${profile}" is not defined`, file);
        }
        applySettings(selected, config);
    }
    return config;
}

/**
 * Reads `.varyaml.yml` (or an explicit file). A missing default file yields
 * the defaults; a missing explicit file is an error.
 */
export function loadConfig(root: string, options: { configPath?: string; profile?: string } = {}): ResolvedConfig {
    const file = options.configPath ?? path.join(root, CONFIG_FILE);
    if (!existsSync(file)) {
        if (options.configPath) {
            throw new ConfigError('Config file not found', file);
        }
        return resolveConfig({}, file, options.profile);
    }

    let raw: unknown;
    try {
        raw = parse(readFileSync(file, 'utf8'));
    } catch (e) {
        throw new ConfigError(`Failed to parse config file: ${e instanceof Error ? e.message : String(e)}`, file);
    }
    return resolveConfig(raw, file, options.profile);
}
