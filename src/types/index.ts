/**
 * Barrel export for all shared types.
 */
export { UNKNOWN_PUBLISHER } from './work.js';
export type {
    OaStatus,
    OpenAccess,
    ApcPaid,
    OrganizationKind,
    OrganizationRef,
    Source,
    Location,
    WorkRecord,
    CanonicalPublisher,
    ResolvedWork,
    AggregateSummary,
    AggregateResult,
} from './work.js';
export type { Taxonomy, PublisherAlias } from './taxonomy.js';
export { DEFAULT_CONFIG } from './config.js';
export type { PubCostConfig, LogLevel, RetryConfig } from './config.js';
export type {
    Subject,
    SubjectKind,
    AuthorProfile,
    MetadataSource,
    MetadataSourceOptions,
    PresentationContext,
    Presenter,
} from './source-adapter.js';
