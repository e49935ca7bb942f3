import { describe, it, expect, afterEach, vi } from 'vitest';
import { TavilySearchBackend } from '../sources/tavily.js';
import { stubFetch, testHttpClient } from './helpers.js';

describe('TavilySearchBackend', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('should post the query with bearer auth and map the response', async () => {
        const fetchMock = stubFetch(() => ({
            answer: 'Emily Kelly is a professor of chemistry.',
            results: [{ title: 'Emily Kelly', url: 'https://example.edu/kelly', content: 'Profile', score: 0.9 }, {}],
        }));
        const backend = new TavilySearchBackend({ apiKey: 'test-secret', httpClient: testHttpClient() });

        const response = await backend.search('E. Kelly professor', { includeDomains: ['example.edu'] });

        expect(response).toEqual({
            answer: 'Emily Kelly is a professor of chemistry.',
            results: [
                { title: 'Emily Kelly', url: 'https://example.edu/kelly', content: 'Profile' },
                { title: '', url: '', content: '' },
            ],
        });

        const [url, init] = fetchMock.mock.calls[0] ?? [];
        expect(url).toBe('https://api.tavily.com/search');
        expect(init?.method).toBe('POST');
        expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
        expect(JSON.parse(String(init?.body))).toEqual({
            query: 'E. Kelly professor',
            include_answer: 'advanced',
            max_results: 5,
            include_domains: ['example.edu'],
        });
    });

    it('should omit domains when none are given and default a missing answer to null', async () => {
        const fetchMock = stubFetch(() => ({ results: [] }));
        const backend = new TavilySearchBackend({ apiKey: 'test-secret', httpClient: testHttpClient() });

        await expect(backend.search('query', { maxResults: 3 })).resolves.toEqual({ answer: null, results: [] });

        const init = fetchMock.mock.calls[0]?.[1];
        expect(JSON.parse(String(init?.body))).toEqual({ query: 'query', include_answer: 'advanced', max_results: 3 });
    });
});
