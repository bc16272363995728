import type { AggregateSummary, ResolvedWork, WorkRecord } from './work.js';

export type SubjectKind = 'author' | 'institution' | 'funder';

/**
 * Whose works are being analysed.
 */
export interface Subject {
    kind: SubjectKind;
    id: string;
}

export interface AuthorProfile {
    id: string;
    name: string;
    affiliation: string;
    worksCount: number;
    orcid: string | null;
}

/**
 * Interface for metadata sources.
 * Each source validates its raw payloads and hands back fully materialized WorkRecords.
 */
export interface MetadataSource {
    /** Human-readable source name */
    readonly name: string;

    /**
     * Fetch every work of the subject, newest first, up to `limit` records.
     */
    fetchWorks(subject: Subject, limit?: number): Promise<WorkRecord[]>;

    searchAuthors(query: string, limit?: number): Promise<AuthorProfile[]>;

    findAuthorByOrcid(orcid: string): Promise<AuthorProfile | null>;

    fetchAuthor(id: string): Promise<AuthorProfile | null>;
}

/**
 * Options for source initialization.
 */
export interface MetadataSourceOptions {
    /** API key (from environment variable) */
    apiKey?: string;

    /** Contact email for polite pool (OpenAlex) */
    email?: string;

    /** Restrict works to type:article */
    articlesOnly?: boolean;

    /** Page size for cursor pagination (max 200) */
    perPage?: number;
}

/**
 * Context shown alongside the analysis (who was analysed).
 */
export interface PresentationContext {
    subject: Subject;
    author?: AuthorProfile | null;
}

/**
 * Output channel for an analysis. Must reflect rows and summary verbatim.
 */
export interface Presenter {
    render(rows: readonly ResolvedWork[], summary: AggregateSummary, context: PresentationContext): void;
}
