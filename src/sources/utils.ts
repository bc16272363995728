/**
 * Shared utilities for metadata sources.
 */
import type { OrganizationKind } from '../types/index.js';

const OPENALEX_PREFIX = 'https://openalex.org/';

/**
 * Strip DOI prefix URLs to get just the DOI identifier.
 * "https://doi.org/10.1234/test" → "10.1234/test"
 */
export function stripDoiPrefix(doi: string | null | undefined): string | null {
    if (!doi) return null;
    return doi
        .replace('https://doi.org/', '')
        .replace('http://doi.org/', '')
        .trim() || null;
}

/**
 * Canonical short form of an OpenAlex entity ID.
 * "https://openalex.org/A5008020290" → "A5008020290", "a5008020290" → "A5008020290",
 * "5008020290" → "A5008020290" (with prefix 'A').
 *
 * @param prefix - Entity letter: A (author), I (institution), F (funder), P (publisher)
 */
export function cleanOpenAlexId(input: string, prefix: string): string {
    let id = input.trim();
    if (id.includes('openalex.org')) {
        id = id.split('/').pop() ?? id;
    }
    const letters = new RegExp(`^[${prefix.toUpperCase()}${prefix.toLowerCase()}]+`);
    return `${prefix.toUpperCase()}${id.replace(letters, '')}`;
}

export function cleanAuthorId(input: string): string {
    return cleanOpenAlexId(input, 'A');
}

/**
 * Strip the resolver URL from an ORCID.
 * "https://orcid.org/0000-0002-1825-0097" → "0000-0002-1825-0097"
 */
export function cleanOrcid(orcid: string | null | undefined): string | null {
    if (!orcid) return null;
    return orcid.replace(/^https?:\/\/orcid\.org\//, '').trim() || null;
}

/**
 * Classify an OpenAlex organization ID by its entity letter:
 * P = publisher, I = institution.
 */
export function organizationKind(id: string): OrganizationKind {
    const shortId = id.startsWith(OPENALEX_PREFIX) ? id.slice(OPENALEX_PREFIX.length) : id;
    switch (shortId.charAt(0).toUpperCase()) {
        case 'P':
            return 'publisher';
        case 'I':
            return 'institution';
        default:
            return 'other';
    }
}
