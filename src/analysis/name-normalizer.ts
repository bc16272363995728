import { UNKNOWN_PUBLISHER, type CanonicalPublisher, type Taxonomy } from '../types/index.js';

/**
 * Lowercase, turn punctuation used in company forms ("B.V.", "Co.,") into
 * spaces, collapse whitespace and pad with one space on each side so suffix
 * tokens also match at the start and end of the name.
 */
function cleanName(name: string): string {
    const collapsed = name.toLowerCase().replace(/[.,]/g, ' ').replace(/\s+/g, ' ').trim();
    return ` ${collapsed} `;
}

/**
 * Remove every known company-suffix token. One pass over the suffix list,
 * each token tried once.
 */
export function stripCompanySuffixes(name: string, suffixes: readonly string[]): string {
    let cleaned = cleanName(name);
    for (const suffix of suffixes) {
        if (cleaned.includes(suffix)) {
            cleaned = cleanName(cleaned.split(suffix).join(' '));
        }
    }
    return cleaned.trim();
}

/**
 * Map a raw organization name to its canonical publisher key.
 *
 * The alias table is scanned in declaration order and the first pattern found
 * in the cleaned name wins. Names matching no alias are 'unknown': an
 * unrecognized publisher is treated the same as missing publisher data.
 *
 * @example
 * normalizePublisherName('Elsevier B.V.', taxonomy) // 'elsevier'
 */
export function normalizePublisherName(
    rawName: string | null | undefined,
    taxonomy: Taxonomy
): CanonicalPublisher {
    if (!rawName || !rawName.trim()) return UNKNOWN_PUBLISHER;

    const cleaned = stripCompanySuffixes(rawName, taxonomy.companySuffixes);
    if (!cleaned) return UNKNOWN_PUBLISHER;

    for (const [pattern, canonical] of taxonomy.aliases) {
        if (cleaned.includes(pattern)) return canonical;
    }

    return UNKNOWN_PUBLISHER;
}
