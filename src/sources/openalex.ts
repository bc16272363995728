import { z } from 'zod';
import type {
    AuthorProfile,
    Location,
    MetadataSource,
    MetadataSourceOptions,
    OaStatus,
    Subject,
    WorkRecord,
} from '../types/index.js';
import type { ResponseCache } from '../cache/response-cache.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { cleanOpenAlexId, cleanOrcid, organizationKind, stripDoiPrefix } from './utils.js';

const OPENALEX_BASE = 'https://api.openalex.org';

/**
 * OpenAlex payload schemas (subset of relevant fields).
 * Everything the analysis does not strictly need is optional.
 */
const OpenAlexSourceSchema = z.object({
    display_name: z.string().nullish(),
    host_organization: z.string().nullish(),
    host_organization_name: z.string().nullish(),
    host_organization_lineage_names: z.union([z.string(), z.array(z.string().nullable())]).nullish(),
});

const OpenAlexWorkSchema = z.object({
    id: z.string(),
    doi: z.string().nullish(),
    title: z.string().nullish(),
    display_name: z.string().nullish(),
    publication_date: z.string().nullish(),
    open_access: z
        .object({
            is_oa: z.boolean().nullish(),
            oa_status: z.string().nullish(),
        })
        .nullish(),
    apc_paid: z
        .object({
            value: z.number().nonnegative().nullish(),
            currency: z.string().nullish(),
        })
        .nullish(),
    locations: z
        .array(z.object({ source: OpenAlexSourceSchema.nullish() }).nullable())
        .nullish(),
});

type OpenAlexWork = z.infer<typeof OpenAlexWorkSchema>;
type OpenAlexSourceRecord = z.infer<typeof OpenAlexSourceSchema>;

const OpenAlexAuthorSchema = z.object({
    id: z.string(),
    display_name: z.string().nullish(),
    orcid: z.string().nullish(),
    works_count: z.number().nullish(),
    last_known_institutions: z.array(z.object({ display_name: z.string().nullish() })).nullish(),
});

type OpenAlexAuthor = z.infer<typeof OpenAlexAuthorSchema>;

interface OpenAlexListResponse {
    meta?: { count?: number; next_cursor?: string | null };
    results?: unknown[];
}

/**
 * OpenAlex filter expression selecting the works of a subject.
 */
export function subjectFilter(subject: Subject): string {
    switch (subject.kind) {
        case 'author':
            return `author.id:${cleanOpenAlexId(subject.id, 'A')}`;
        case 'institution':
            return `authorships.institutions.lineage:${cleanOpenAlexId(subject.id, 'I')}`;
        case 'funder':
            return `grants.funder:${cleanOpenAlexId(subject.id, 'F')}`;
    }
}

/**
 * OpenAlex metadata source.
 * Pages through /works with a cursor and validates every record into a WorkRecord.
 *
 * @see https://docs.openalex.org/
 */
export class OpenAlexSource implements MetadataSource {
    readonly name = 'OpenAlex';
    private httpClient: HttpClient;
    private readonly apiKey?: string;
    private readonly email?: string;
    private readonly articlesOnly: boolean;
    private readonly perPage: number;
    private readonly cache: ResponseCache | null;

    constructor(options?: MetadataSourceOptions & { cache?: ResponseCache | null }) {
        this.apiKey = options?.apiKey ?? process.env['OPENALEX_API_KEY'];
        this.email = options?.email;
        this.articlesOnly = options?.articlesOnly ?? true;
        this.perPage = Math.min(options?.perPage ?? 200, 200);
        this.cache = options?.cache ?? null;
        this.httpClient = getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    async fetchWorks(subject: Subject, limit?: number): Promise<WorkRecord[]> {
        const filters = [subjectFilter(subject)];
        if (this.articlesOnly) filters.push('type:article');

        const works: WorkRecord[] = [];
        let cursor: string | null = '*';
        let skipped = 0;

        while (cursor && (limit === undefined || works.length < limit)) {
            const params = new URLSearchParams({
                filter: filters.join(','),
                sort: 'publication_date:desc',
                'per-page': String(this.perPage),
                cursor,
            });
            this.addAuthParams(params);

            const url = `${OPENALEX_BASE}/works?${params.toString()}`;
            getLogger().debug({ url, fetched: works.length }, 'OpenAlex works page');

            const page: OpenAlexListResponse = await this.getJson<OpenAlexListResponse>(url);
            const results = page.results ?? [];

            for (const raw of results) {
                const work = this.parseWork(raw);
                if (work) {
                    works.push(work);
                } else {
                    skipped++;
                }
            }

            cursor = results.length > 0 ? page.meta?.next_cursor ?? null : null;
        }

        if (skipped > 0) {
            getLogger().warn({ skipped }, 'Skipped malformed OpenAlex work records');
        }

        const fetched = limit === undefined ? works : works.slice(0, limit);
        getLogger().info({ subject: subject.id, kind: subject.kind, works: fetched.length }, 'Fetched works from OpenAlex');
        return fetched;
    }

    async searchAuthors(query: string, limit = 10): Promise<AuthorProfile[]> {
        const params = new URLSearchParams({
            search: query,
            'per-page': String(Math.min(limit, 200)),
        });
        this.addAuthParams(params);

        const url = `${OPENALEX_BASE}/authors?${params.toString()}`;
        getLogger().debug({ url }, 'OpenAlex author search');

        const response = await this.getJson<OpenAlexListResponse>(url);
        return (response.results ?? [])
            .map((raw) => this.parseAuthor(raw))
            .filter((author): author is AuthorProfile => author !== null);
    }

    async findAuthorByOrcid(orcid: string): Promise<AuthorProfile | null> {
        const cleaned = cleanOrcid(orcid);
        if (!cleaned) return null;

        const params = new URLSearchParams({ filter: `orcid:${cleaned}` });
        this.addAuthParams(params);

        const url = `${OPENALEX_BASE}/authors?${params.toString()}`;
        getLogger().debug({ url }, 'OpenAlex ORCID lookup');

        const response = await this.getJson<OpenAlexListResponse>(url);
        const [first] = response.results ?? [];
        return first === undefined ? null : this.parseAuthor(first);
    }

    async fetchAuthor(id: string): Promise<AuthorProfile | null> {
        const params = new URLSearchParams();
        this.addAuthParams(params);

        const url = `${OPENALEX_BASE}/authors/${cleanOpenAlexId(id, 'A')}?${params.toString()}`;
        getLogger().debug({ url }, 'OpenAlex fetch author');

        try {
            return this.parseAuthor(await this.getJson<unknown>(url));
        } catch (error) {
            getLogger().warn({ id, error }, 'Failed to fetch author from OpenAlex');
            return null;
        }
    }

    /**
     * Validate a raw work; null (logged) when it does not have the expected shape.
     */
    parseWork(raw: unknown): WorkRecord | null {
        const parsed = OpenAlexWorkSchema.safeParse(raw);
        if (!parsed.success) {
            getLogger().debug({ issues: parsed.error.issues.slice(0, 3) }, 'Invalid OpenAlex work');
            return null;
        }
        return this.normalizeWork(parsed.data);
    }

    // ─── Private helpers ──────────────────────────────────────

    private normalizeWork(work: OpenAlexWork): WorkRecord {
        const oaStatus = work.open_access?.oa_status?.toLowerCase();
        const apcValue = work.apc_paid?.value;

        const locations: Location[] = (work.locations ?? [])
            .filter((location) => location !== null)
            .map((location) => ({ source: location?.source ? this.normalizeSource(location.source) : null }));

        return {
            id: work.id.replace('https://openalex.org/', ''),
            title: work.display_name ?? work.title ?? 'Untitled',
            publicationDate: work.publication_date || null,
            doi: stripDoiPrefix(work.doi),
            openAccess: {
                isOa: work.open_access?.is_oa ?? false,
                // No open_access block at all means the work is treated as closed
                oaStatus: work.open_access ? toOaStatus(oaStatus) : 'closed',
            },
            ...(apcValue != null
                ? { apcPaid: { value: apcValue, currency: work.apc_paid?.currency ?? null } }
                : {}),
            locations,
        };
    }

    private normalizeSource(source: OpenAlexSourceRecord): Location['source'] {
        const lineage = source.host_organization_lineage_names;
        return {
            displayName: source.display_name ?? null,
            hostOrganization: source.host_organization
                ? { id: source.host_organization, kind: organizationKind(source.host_organization) }
                : null,
            hostOrganizationName: source.host_organization_name ?? null,
            lineage: typeof lineage === 'string'
                ? lineage
                : (lineage ?? []).filter((name): name is string => !!name),
        };
    }

    private parseAuthor(raw: unknown): AuthorProfile | null {
        const parsed = OpenAlexAuthorSchema.safeParse(raw);
        if (!parsed.success) return null;
        return this.normalizeAuthor(parsed.data);
    }

    private normalizeAuthor(author: OpenAlexAuthor): AuthorProfile {
        const affiliation = author.last_known_institutions?.[0]?.display_name;
        return {
            id: cleanOpenAlexId(author.id, 'A'),
            name: author.display_name ?? 'Unknown',
            affiliation: affiliation ?? 'Unknown affiliation',
            worksCount: author.works_count ?? 0,
            orcid: cleanOrcid(author.orcid),
        };
    }

    private async getJson<T>(url: string): Promise<T> {
        const cached = this.cache?.get<T>(url);
        if (cached != null) return cached;

        const response = await this.httpClient.get<T>(url, { source: 'openalex' });
        this.cache?.set(url, response.data);
        return response.data;
    }

    private addAuthParams(params: URLSearchParams): void {
        if (this.apiKey) {
            params.set('api_key', this.apiKey);
        }
        if (this.email) {
            params.set('mailto', this.email);
        }
    }
}

function toOaStatus(status: string | undefined): OaStatus {
    switch (status) {
        case 'gold':
        case 'hybrid':
        case 'bronze':
        case 'diamond':
        case 'green':
        case 'closed':
            return status;
        default:
            return 'other';
    }
}
