import type { CanonicalPublisher, OaStatus, Taxonomy, WorkRecord } from '../types/index.js';
import { estimatedApcFor } from '../taxonomy/taxonomy.js';

/**
 * OA statuses under which an author may have paid an APC.
 */
export const APC_BEARING_STATUSES: ReadonlySet<OaStatus> = new Set<OaStatus>(['gold', 'hybrid', 'bronze', 'diamond']);

export interface CostEstimate {
    /** Attributed APC; 0 when none is recorded or plausible */
    cost: number;
    isOpenAccess: boolean;
}

/**
 * Closed works, and statuses outside APC_BEARING_STATUSES, never carry an APC.
 */
export function isApcImplausible(work: WorkRecord): boolean {
    return !work.openAccess.isOa || !APC_BEARING_STATUSES.has(work.openAccess.oaStatus);
}

/**
 * Attribute an APC to a work:
 * 1. a reported non-zero APC is used as is, whatever the OA status;
 * 2. otherwise a plausibly APC-bearing work gets the publisher's estimate (or the default);
 * 3. otherwise 0.
 */
export function estimateCost(
    work: WorkRecord,
    publisher: CanonicalPublisher,
    taxonomy: Taxonomy
): CostEstimate {
    const noApcPlausible = isApcImplausible(work);
    const reported = work.apcPaid?.value;

    let cost: number;
    if (reported !== undefined && reported > 0) {
        cost = reported;
    } else if (!noApcPlausible) {
        cost = estimatedApcFor(taxonomy, publisher);
    } else {
        cost = 0;
    }

    return { cost, isOpenAccess: cost > 0 || !noApcPlausible };
}
