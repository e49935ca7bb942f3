import { existsSync, mkdirSync, renameSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { getLogger } from './logger.js';

/**
 * Persisted per-user settings.
 */
export const userConfigSchema = z.object({
    email: z.string().email().optional(),
    searchApiKey: z.string().min(1).optional(),
});

export type UserConfig = z.infer<typeof userConfigSchema>;

/**
 * Default directory for the user config file: $ALEXPORT_CONFIG_DIR or ~/.alexport
 */
export function defaultConfigDir(): string {
    return process.env['ALEXPORT_CONFIG_DIR'] ?? join(homedir(), '.alexport');
}

/**
 * Read/write access to the user config file. Reads once per `load()`;
 * `set()` does a read-modify-write and replaces the file atomically.
 */
export class UserConfigStore {
    readonly path: string;
    private readonly dir: string;

    constructor(dir: string = defaultConfigDir()) {
        this.dir = dir;
        this.path = join(dir, 'config.json');
    }

    /**
     * Load the config. A missing file is empty; an invalid one is logged and treated as empty.
     */
    async load(): Promise<UserConfig> {
        if (!existsSync(this.path)) return {};

        const explorer = cosmiconfig('alexport');
        try {
            const result = await explorer.load(this.path);
            if (!result || result.isEmpty) return {};

            const parsed = userConfigSchema.safeParse(result.config);
            if (!parsed.success) {
                getLogger().warn({ path: this.path, issues: parsed.error.issues }, 'Invalid user config, ignoring');
                return {};
            }
            return parsed.data;
        } catch (error) {
            getLogger().warn({ path: this.path, error }, 'Failed to read user config, ignoring');
            return {};
        }
    }

    /**
     * Merge `patch` into the stored config and persist it.
     */
    async set(patch: UserConfig): Promise<UserConfig> {
        const next = userConfigSchema.parse({ ...(await this.load()), ...patch });

        mkdirSync(this.dir, { recursive: true });
        const tmpPath = `${this.path}.${process.pid}.tmp`;
        writeFileSync(tmpPath, `${JSON.stringify(next, null, 2)}\n`, { encoding: 'utf-8', mode: 0o600 });
        renameSync(tmpPath, this.path);

        getLogger().debug({ path: this.path }, 'User config saved');
        return next;
    }
}
