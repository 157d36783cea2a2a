/**
 * Shared shapes for linked services and datasets.
 */

/** One record. Column names map to backend values. */
export type Row = Record<string, unknown>;

/**
 * Opaque incremental position. The orchestrator persists it; the provider interprets it.
 * An empty checkpoint means "full load".
 */
export type Checkpoint = Record<string, unknown>;

export function isEmptyCheckpoint(checkpoint: Checkpoint | null | undefined): boolean {
  return !checkpoint || Object.keys(checkpoint).length === 0;
}

/** Settings common to all linked services. Providers extend this. */
export type LinkedServiceSettings = Record<string, unknown>;

/**
 * Settings common to all datasets. Providers extend this.
 * Row matching for update/upsert/delete is configured here, never in code.
 */
export interface DatasetSettings {
  readonly identityColumns?: readonly string[];
}

/**
 * Identity and configuration of a resource, passed to constructors.
 */
export interface ResourceOptions<TSettings> {
  /** Unique id (generated when omitted) */
  readonly id?: string;
  readonly name?: string;
  readonly description?: string;
  /** Defaults to "1.0.0" */
  readonly version?: string;
  readonly settings: TSettings;
}

/**
 * Catalog entry describing a resource implementation.
 */
export interface ResourceInfo {
  /** e.g. "DS.RESOURCE.DATASET.MEMORY" */
  readonly kind: string;
  readonly name: string;
  readonly version: string;
  readonly description?: string;
}

/** Human-readable "<kind>:v<version>". */
export function formatResourceInfo(info: Pick<ResourceInfo, 'kind' | 'version'>): string {
  return `${info.kind}:v${info.version}`;
}

/** Composite registry key for a kind/version pair. */
export function resourceKey(kind: string, version: string): string {
  return formatResourceInfo({ kind, version });
}
