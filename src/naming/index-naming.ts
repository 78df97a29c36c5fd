/**
 * Index naming
 *
 * Indices rotate monthly: `{env}-{service}-{entity}-{yyyy-MM}`.
 * Readers go through the alias `{env}-{service}-{entity}`, which always
 * points at the active month.
 */

export interface IndexNaming {
  /** Deployment environment label (prod, stg, dev) */
  environment: string;
  /** Owning service (digital-discovery) */
  service: string;
  /** Entity type (categories) */
  entity: string;
  /** Instant whose UTC month selects the time bucket */
  date: Date;
}

/**
 * Format the UTC month of `date` as yyyy-MM
 */
export function formatTimeBucket(date: Date): string {
  const year = date.getUTCFullYear();
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  return `${year}-${month}`;
}

export function getAliasName(naming: Omit<IndexNaming, 'date'>): string {
  return `${naming.environment}-${naming.service}-${naming.entity}`;
}

export function getIndexName(naming: IndexNaming): string {
  return `${getAliasName(naming)}-${formatTimeBucket(naming.date)}`;
}

/**
 * Index pattern covering every monthly index of an entity, any environment
 */
export function getIndexPattern(service: string, entity: string): string {
  return `*-${service}-${entity}-*`;
}
