import type { Location, OaStatus, Source, WorkRecord } from '../types/index.js';

/**
 * Source naming a publisher through its host lineage.
 */
export function publisherSource(...lineage: string[]): Source {
    return {
        displayName: null,
        hostOrganization: { id: 'https://openalex.org/P4310320990', kind: 'publisher' },
        hostOrganizationName: null,
        lineage,
    };
}

export function at(source: Source | null): Location {
    return { source };
}

export function makeWork(overrides: Partial<WorkRecord> & { oa?: [boolean, OaStatus] } = {}): WorkRecord {
    const { oa = [true, 'gold'], ...rest } = overrides;
    return {
        id: 'W1',
        title: 'A test work',
        publicationDate: '2024-01-01',
        doi: null,
        openAccess: { isOa: oa[0], oaStatus: oa[1] },
        locations: [],
        ...rest,
    };
}
