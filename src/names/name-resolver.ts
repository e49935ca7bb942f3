import type { AuthorQuery, NameResolution, NameResolutionConfig, SearchBackend, SearchResponse } from '../types/index.js';
import { ConfigurationError, isAbortError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Whether every token but the last is a single-letter initial ("E. Kelly", "E Kelly", "J. R. Smith").
 */
export function isAbbreviatedName(name: string): boolean {
    const parts = name.trim().split(/\s+/).filter(Boolean);
    if (parts.length < 2) return false;

    return parts.slice(0, -1).every((part) => /^\p{L}\.?$/u.test(part));
}

/**
 * Search query for an abbreviated name: the name, then any institutional context, then "professor".
 */
export function buildSearchQuery(name: string, context: { college?: string; department?: string; institution?: string }): string {
    return [name, context.college, context.department, context.institution, 'professor']
        .filter((part): part is string => !!part && part.trim().length > 0)
        .join(' ');
}

const TITLE_WORDS = new Set(['Professor', 'Prof', 'Dr', 'Doctor', 'Dean', 'Chair', 'Lecturer', 'Associate', 'Assistant', 'Emeritus', 'Mr', 'Mrs', 'Ms']);

/**
 * Pull "First [M.] Surname" out of a search response.
 * The synthesized answer is consulted first, then the top result's title and content.
 * Title words are never taken as a first name, and a given `firstInitial` must match.
 */
export function extractFullName(response: SearchResponse, lastName: string, firstInitial?: string): string | null {
    const pattern = new RegExp(`\\b([A-Z][a-z]+(?:\\s+[A-Z]\\.?\\s*)?)\\s+${escapeRegExp(lastName)}\\b`, 'g');
    const initial = firstInitial?.trim().charAt(0).toUpperCase();
    const top = response.results[0];
    const texts = [response.answer, top?.title, top?.content];

    for (const text of texts) {
        if (!text) continue;
        for (const match of text.matchAll(pattern)) {
            const candidate = match[1]?.trim();
            if (!candidate) continue;

            const firstName = candidate.split(/\s+/)[0] ?? candidate;
            if (TITLE_WORDS.has(firstName)) continue;
            if (initial && firstName.charAt(0) !== initial) continue;

            return `${candidate} ${lastName}`;
        }
    }

    return null;
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export interface NameResolverOptions {
    /** Null when no backend or key is configured */
    backend: SearchBackend | null;
    /** Raise ConfigurationError instead of degrading when `backend` is missing */
    strict?: boolean;
    /** Institution display name → web domain for the first, narrowed search */
    institutionDomains?: Record<string, string>;
}

/**
 * Best-effort expansion of abbreviated author names via contextual web search.
 * Failures degrade to the original name; only user aborts and strict-mode misconfiguration raise.
 */
export class NameResolver {
    private readonly backend: SearchBackend | null;
    private readonly strict: boolean;
    private readonly institutionDomains: Record<string, string>;
    private readonly logger = getLogger();

    constructor(options: NameResolverOptions) {
        this.backend = options.backend;
        this.strict = options.strict ?? false;
        this.institutionDomains = options.institutionDomains ?? {};
    }

    async resolve(query: AuthorQuery, institution?: string): Promise<NameResolution> {
        const name = query.name.trim();

        if (!isAbbreviatedName(name)) {
            return { resolved: false, value: query.name, reason: 'not-abbreviated' };
        }

        if (!this.backend) {
            if (this.strict) {
                throw new ConfigurationError(
                    'Name resolution requires a search API key. Set one with `alexport config set-search-key` or TAVILY_API_KEY.'
                );
            }
            this.logger.debug({ name }, 'No search backend configured, keeping abbreviated name');
            return { resolved: false, value: query.name, reason: 'backend-unavailable' };
        }

        const lastName = query.lastName ?? name.split(/\s+/).pop() ?? name;
        const firstInitial = query.firstInitial ?? name.charAt(0);
        const searchQuery = buildSearchQuery(name, {
            college: query.college,
            department: query.department,
            institution,
        });
        const domain = institution ? this.domainFor(institution) : undefined;

        try {
            let fullName: string | null = null;

            if (domain) {
                const narrowed = await this.backend.search(searchQuery, { includeDomains: [domain] });
                fullName = extractFullName(narrowed, lastName, firstInitial);
            }
            if (!fullName) {
                const broad = await this.backend.search(searchQuery);
                fullName = extractFullName(broad, lastName, firstInitial);
            }

            if (fullName) {
                this.logger.info({ name, resolved: fullName }, 'Resolved abbreviated name');
                return { resolved: true, value: fullName, reason: 'search-match' };
            }
            return { resolved: false, value: query.name, reason: 'no-candidate' };
        } catch (error) {
            if (isAbortError(error)) throw error;
            this.logger.warn({ name, error }, 'Name search failed, keeping abbreviated name');
            return { resolved: false, value: query.name, reason: 'search-failed' };
        }
    }

    private domainFor(institution: string): string | undefined {
        const needle = institution.trim().toLowerCase();
        for (const [name, domain] of Object.entries(this.institutionDomains)) {
            if (name.toLowerCase() === needle) return domain;
        }
        return undefined;
    }
}

/**
 * Name resolver for a run. A disabled config never searches and never raises.
 */
export function createNameResolver(
    config: NameResolutionConfig,
    backend: SearchBackend | null
): NameResolver {
    return new NameResolver({
        backend: config.enabled ? backend : null,
        strict: config.enabled && config.strict,
        institutionDomains: config.institutionDomains,
    });
}
