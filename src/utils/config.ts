import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type ExportConfig } from '../types/index.js';
import { getLogger } from './logger.js';
import type { UserConfig } from './user-config.js';

const sortSchema = z.enum(['year', 'year-desc', 'year-asc', 'citations', 'citations-desc', 'citations-asc']);

/**
 * Shape of alexport.config.json. Every key is optional; unknown keys are dropped.
 */
export const projectConfigSchema = z.object({
    search: z.string().optional(),
    authorIds: z.array(z.string()).optional(),
    institution: z.string().optional(),
    institutionOnly: z.boolean().optional(),
    yearFrom: z.number().int().optional(),
    yearTo: z.number().int().optional(),
    fields: z.array(z.string()).optional(),
    excludeFields: z.array(z.string()).optional(),
    sort: sortSchema.optional(),
    maxResults: z.number().int().min(0).optional(),
    perPage: z.number().int().min(1).optional(),
    out: z.string().optional(),
    email: z.string().optional(),
    logLevel: z.enum(['error', 'warn', 'info', 'debug', 'silent']).optional(),
    jsonLogs: z.boolean().optional(),
    affiliation: z.object({
        institution: z.string().optional(),
        maxAuthors: z.number().int().min(1).optional(),
    }).optional(),
    nameResolution: z.object({
        enabled: z.boolean().optional(),
        strict: z.boolean().optional(),
        institutionDomains: z.record(z.string()).optional(),
    }).optional(),
});

export type ProjectConfig = z.infer<typeof projectConfigSchema>;

/**
 * CLI flags as collected by the command parser. Nested sections may be partial.
 */
export type CliFlags = Partial<Omit<ExportConfig, 'affiliation' | 'nameResolution'>> & {
    affiliation?: Partial<ExportConfig['affiliation']>;
    nameResolution?: Partial<ExportConfig['nameResolution']>;
};

/**
 * Load configuration from alexport.config.json using cosmiconfig.
 * Returns null if no config file is found; defaults are used then.
 */
async function loadConfigFile(searchFrom?: string): Promise<ProjectConfig | null> {
    const explorer = cosmiconfig('alexport', {
        searchPlaces: ['alexport.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            const parsed = projectConfigSchema.safeParse(result.config);
            if (!parsed.success) {
                getLogger().warn({ path: result.filepath, issues: parsed.error.issues }, 'Invalid config file, using defaults');
                return null;
            }
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return parsed.data;
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(env: NodeJS.ProcessEnv): CliFlags {
    const config: CliFlags = {};

    if (env['OPENALEX_EMAIL']) config.email = env['OPENALEX_EMAIL'];
    if (env['OPENALEX_API_KEY']) config.apiKey = env['OPENALEX_API_KEY'];
    if (env['TAVILY_API_KEY']) config.searchApiKey = env['TAVILY_API_KEY'];

    return config;
}

/**
 * Drop keys whose value is undefined so they don't shadow lower-precedence sources.
 */
function defined<T extends object>(value: T | null | undefined): Partial<T> {
    const result: Partial<T> = { ...value };
    for (const key in result) {
        if (result[key] === undefined) delete result[key];
    }
    return result;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > user config > defaults
 */
export async function resolveConfig(
    cliFlags: CliFlags,
    options: { userConfig?: UserConfig; env?: NodeJS.ProcessEnv; searchFrom?: string } = {}
): Promise<ExportConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env ?? process.env);
    const userConfig: CliFlags = {
        email: options.userConfig?.email,
        searchApiKey: options.userConfig?.searchApiKey,
    };

    // Deep merge with precedence
    const merged: ExportConfig = {
        ...DEFAULT_CONFIG,
        ...defined(userConfig),
        ...defined(fileConfig),
        ...defined(envConfig),
        ...defined(cliFlags),
        // Deep merge nested objects
        affiliation: {
            ...DEFAULT_CONFIG.affiliation,
            ...defined(fileConfig?.affiliation),
            ...defined(cliFlags.affiliation),
        },
        nameResolution: {
            ...DEFAULT_CONFIG.nameResolution,
            ...defined(fileConfig?.nameResolution),
            ...defined(cliFlags.nameResolution),
        },
    };

    return merged;
}
