/**
 * Work records: the normalized shape every MetadataSource hands to the analysis core.
 * Raw API payloads are validated and defaulted before they become a WorkRecord.
 */

/**
 * Open-access classification as reported by the metadata source.
 * Anything the source reports outside this list is mapped to 'other'.
 */
export type OaStatus = 'gold' | 'hybrid' | 'bronze' | 'diamond' | 'green' | 'closed' | 'other';

export interface OpenAccess {
    isOa: boolean;
    oaStatus: OaStatus;
}

/**
 * APC reported by the source. `value` is in `currency`.
 */
export interface ApcPaid {
    value: number;
    currency: string | null;
}

export type OrganizationKind = 'publisher' | 'institution' | 'other';

export interface OrganizationRef {
    id: string;
    kind: OrganizationKind;
}

/**
 * Hosting venue of a location (journal, repository, conference, ...).
 */
export interface Source {
    /** Venue name, e.g. "Nature Communications" or "bioRxiv" */
    displayName: string | null;

    /** Direct host organization; may be an institution rather than a publisher */
    hostOrganization: OrganizationRef | null;

    hostOrganizationName: string | null;

    /**
     * Organization names of the host lineage, in source order.
     * Some payloads carry a bare string instead of a list.
     */
    lineage: string | readonly string[];
}

export interface Location {
    source: Source | null;
}

export interface WorkRecord {
    id: string;
    title: string;

    /** ISO date (YYYY-MM-DD); null sorts as the earliest possible date */
    publicationDate: string | null;

    /** DOI without the https://doi.org/ prefix */
    doi: string | null;

    openAccess: OpenAccess;
    apcPaid?: ApcPaid;
    locations: readonly Location[];
}

/**
 * Lowercase taxonomy key, or the 'unknown' sentinel.
 */
export type CanonicalPublisher = string;

export const UNKNOWN_PUBLISHER: CanonicalPublisher = 'unknown';

/**
 * One analysed work, as emitted to presenters.
 */
export interface ResolvedWork {
    id: string;
    title: string;
    doi: string | null;
    publicationDate: string | null;
    publisher: CanonicalPublisher;

    /** Attributed cost; 0 means no APC recorded or plausible */
    cost: number;

    isOpenAccess: boolean;
    isForProfit: boolean;
    oaStatus: OaStatus;
}

export interface AggregateSummary {
    /** Works considered after capping, before unknown/preprint filtering */
    inputCount: number;
    totalCount: number;
    forProfitCount: number;
    totalCost: number;
    costByPublisher: Map<CanonicalPublisher, number>;
    countByPublisher: Map<CanonicalPublisher, number>;
}

export interface AggregateResult {
    rows: ResolvedWork[];
    summary: AggregateSummary;
}
