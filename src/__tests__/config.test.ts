import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { resolveConfig } from '../utils/config.js';
import { toCliFlags } from '../cli/options.js';
import { UserConfigStore, defaultConfigDir } from '../utils/user-config.js';
import { DEFAULT_CONFIG } from '../types/index.js';

describe('resolveConfig', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'alexport-config-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    const writeProjectConfig = (config: unknown) =>
        writeFileSync(join(dir, 'alexport.config.json'), JSON.stringify(config));

    it('should fall back to defaults', async () => {
        await expect(resolveConfig({}, { env: {}, searchFrom: dir })).resolves.toEqual(DEFAULT_CONFIG);
    });

    it('should apply CLI > env > file > user precedence', async () => {
        writeProjectConfig({
            maxResults: 50,
            email: 'file@example.com',
            out: 'file.json',
            affiliation: { maxAuthors: 200 },
            nameResolution: { strict: true },
        });

        const config = await resolveConfig(
            { maxResults: 10, out: undefined, nameResolution: { enabled: false } },
            {
                userConfig: { email: 'user@example.com', searchApiKey: 'user-key' },
                env: { OPENALEX_EMAIL: 'env@example.com' },
                searchFrom: dir,
            }
        );

        expect(config.maxResults).toBe(10);
        expect(config.email).toBe('env@example.com');
        expect(config.out).toBe('file.json');
        expect(config.searchApiKey).toBe('user-key');
        expect(config.affiliation).toEqual({ institution: 'Colorado State University', maxAuthors: 200 });
        expect(config.nameResolution).toEqual({
            enabled: false,
            strict: true,
            institutionDomains: { 'Colorado State University': 'colostate.edu' },
        });
    });

    it('should keep file values for flags the command line leaves unset', async () => {
        writeProjectConfig({ authorIds: ['A1'], maxResults: 50, nameResolution: { enabled: true, strict: true } });

        const config = await resolveConfig(toCliFlags({ nameResolution: true }), { env: {}, searchFrom: dir });

        expect(config.authorIds).toEqual(['A1']);
        expect(config.maxResults).toBe(50);
        expect(config.nameResolution.strict).toBe(true);
    });

    it('should let command-line authors and --no-name-resolution win over the file', async () => {
        writeProjectConfig({ authorIds: ['A1'], nameResolution: { enabled: true } });

        const config = await resolveConfig(
            toCliFlags({ authorId: ['A2'], nameResolution: false, fields: 'title, doi' }),
            { env: {}, searchFrom: dir }
        );

        expect(config.authorIds).toEqual(['A2']);
        expect(config.nameResolution.enabled).toBe(false);
        expect(config.fields).toEqual(['title', 'doi']);
    });

    it('should read API keys from the environment', async () => {
        const config = await resolveConfig({}, {
            env: { OPENALEX_API_KEY: 'test-secret', TAVILY_API_KEY: 'test-search-key' },
            searchFrom: dir,
        });

        expect(config.apiKey).toBe('test-secret');
        expect(config.searchApiKey).toBe('test-search-key');
    });

    it('should ignore an invalid config file', async () => {
        writeProjectConfig({ maxResults: 'lots' });

        const config = await resolveConfig({}, { env: {}, searchFrom: dir });
        expect(config.maxResults).toBe(DEFAULT_CONFIG.maxResults);
    });
});

describe('UserConfigStore', () => {
    let dir: string;
    let store: UserConfigStore;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'alexport-user-'));
        store = new UserConfigStore(join(dir, 'nested'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
        vi.unstubAllEnvs();
    });

    it('should treat a missing file as empty', async () => {
        await expect(store.load()).resolves.toEqual({});
    });

    it('should persist and merge settings', async () => {
        await expect(store.set({ email: 'test@example.com' })).resolves.toEqual({ email: 'test@example.com' });
        expect(readFileSync(store.path, 'utf-8')).toBe('{\n  "email": "test@example.com"\n}\n');

        await store.set({ searchApiKey: 'test-secret' });

        await expect(store.load()).resolves.toEqual({ email: 'test@example.com', searchApiKey: 'test-secret' });
    });

    it('should reject an invalid email', async () => {
        await expect(store.set({ email: 'not-an-email' })).rejects.toThrow();
    });

    it('should ignore invalid or unreadable files', async () => {
        await store.set({ email: 'test@example.com' });

        writeFileSync(store.path, JSON.stringify({ email: 'not-an-email' }));
        await expect(store.load()).resolves.toEqual({});

        writeFileSync(store.path, '{');
        await expect(store.load()).resolves.toEqual({});
    });

    it('should honor ALEXPORT_CONFIG_DIR', () => {
        vi.stubEnv('ALEXPORT_CONFIG_DIR', dir);

        expect(defaultConfigDir()).toBe(dir);
        expect(new UserConfigStore().path).toBe(join(dir, 'config.json'));
    });
});
