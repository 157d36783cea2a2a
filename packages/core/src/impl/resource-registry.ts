/**
 * ResourceRegistry: builds linked services and datasets from configuration.
 *
 * Providers register a manifest of descriptors, each keyed by `(kind, version)`.
 * A configuration envelope names the kind (and optionally the version); the
 * registry validates it, validates `settings` against the descriptor's JSON
 * schema, and hands typed settings to the descriptor's factory.
 *
 * ```typescript
 * const registry = new ResourceRegistry();
 * registry.register(memoryProvider(backend));
 *
 * const service = registry.linkedService({ kind: 'DS.RESOURCE.LINKED_SERVICE.MEMORY', settings: {} });
 * const dataset = registry.dataset({ kind: 'DS.RESOURCE.DATASET.MEMORY', settings: { table: 'orders' } }, service);
 * ```
 */

import Ajv, { type ErrorObject, type SchemaObject } from 'ajv';
import addFormats from 'ajv-formats';
import type { LinkedService } from '../interfaces/linked-service';
import type { Dataset } from '../interfaces/dataset';
import type { ResourceEventBus } from '../interfaces/event-bus';
import type { DatasetSettings, LinkedServiceSettings, ResourceInfo, ResourceOptions } from '../types/resource';
import { resourceKey } from '../types/resource';
import { DeserializationError, MismatchedLinkedServiceError } from '../types/errors';
import { getLogger, type Logger } from '../utils/logger';

// ── Configuration envelope ──────────────────────────────────────

export interface ResourceConfig {
  kind: string;
  version?: string;
  id?: string;
  name?: string;
  description?: string;
  settings: Record<string, unknown>;
}

const RESOURCE_CONFIG_SCHEMA: SchemaObject = {
  type: 'object',
  required: ['kind', 'settings'],
  properties: {
    kind: { type: 'string', minLength: 1 },
    version: { type: 'string', pattern: '^\\d+(\\.\\d+)*$' },
    id: { type: 'string', format: 'uuid' },
    name: { type: 'string', minLength: 1 },
    description: { type: 'string' },
    settings: { type: 'object' },
  },
  additionalProperties: false,
};

let ajvInstance: Ajv | null = null;

function getAjv(): Ajv {
  if (!ajvInstance) {
    ajvInstance = new Ajv({ allErrors: true });
    addFormats(ajvInstance);
  }
  return ajvInstance;
}

const validateConfig = getAjv().compile<ResourceConfig>(RESOURCE_CONFIG_SCHEMA);

function describeErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map(e => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`.trim());
}

// ── Descriptors ─────────────────────────────────────────────────

/** What a factory receives: validated settings plus the registry's event bus and logger. */
export interface RegistryResourceOptions<TSettings> extends ResourceOptions<TSettings> {
  readonly events?: ResourceEventBus;
  readonly logger?: Logger;
}

export interface LinkedServiceDescriptor<TSettings extends LinkedServiceSettings> {
  readonly info: ResourceInfo;
  /** JSON schema `settings` must satisfy */
  readonly settingsSchema: SchemaObject;
  create(options: RegistryResourceOptions<TSettings>): LinkedService;
}

export interface DatasetDescriptor<TSettings extends DatasetSettings> {
  readonly info: ResourceInfo;
  readonly settingsSchema: SchemaObject;
  /** Kind of linked service the dataset runs on. Others are rejected. */
  readonly linkedServiceKind?: string;
  create(options: RegistryResourceOptions<TSettings>, linkedService: LinkedService): Dataset;
}

/** A descriptor with its settings type erased behind a validating builder. */
export interface LinkedServiceEntry {
  readonly info: ResourceInfo;
  build(config: ResourceConfig, context: BuildContext): LinkedService;
}

export interface DatasetEntry {
  readonly info: ResourceInfo;
  readonly linkedServiceKind?: string;
  build(config: ResourceConfig, linkedService: LinkedService, context: BuildContext): Dataset;
}

export interface BuildContext {
  readonly events?: ResourceEventBus;
  readonly logger?: Logger;
}

function settingsValidator<T>(info: ResourceInfo, schema: SchemaObject): (settings: Record<string, unknown>) => T {
  const validate = getAjv().compile<T>(schema);
  return settings => {
    if (!validate(settings)) {
      throw new DeserializationError({
        message: `Invalid settings for ${info.kind}:v${info.version}`,
        details: { kind: info.kind, version: info.version, errors: describeErrors(validate.errors) },
      });
    }
    return settings;
  };
}

export function defineLinkedService<TSettings extends LinkedServiceSettings>(
  descriptor: LinkedServiceDescriptor<TSettings>,
): LinkedServiceEntry {
  const check = settingsValidator<TSettings>(descriptor.info, descriptor.settingsSchema);
  return {
    info: descriptor.info,
    build: (config, context) =>
      descriptor.create({
        id: config.id,
        name: config.name,
        description: config.description,
        version: descriptor.info.version,
        settings: check(config.settings),
        events: context.events,
        logger: context.logger,
      }),
  };
}

export function defineDataset<TSettings extends DatasetSettings>(descriptor: DatasetDescriptor<TSettings>): DatasetEntry {
  const check = settingsValidator<TSettings>(descriptor.info, descriptor.settingsSchema);
  return {
    info: descriptor.info,
    linkedServiceKind: descriptor.linkedServiceKind,
    build: (config, linkedService, context) =>
      descriptor.create(
        {
          id: config.id,
          name: config.name,
          description: config.description,
          version: descriptor.info.version,
          settings: check(config.settings),
          events: context.events,
          logger: context.logger,
        },
        linkedService,
      ),
  };
}

export interface ProviderManifest {
  readonly name: string;
  readonly description?: string;
  readonly linkedServices?: readonly LinkedServiceEntry[];
  readonly datasets?: readonly DatasetEntry[];
}

export interface ProviderSummary {
  readonly name: string;
  readonly description?: string;
  readonly linkedServices: readonly ResourceInfo[];
  readonly datasets: readonly ResourceInfo[];
}

/** Numeric dotted-version comparison: "1.10.0" > "1.9.3". */
export function compareVersions(a: string, b: string): number {
  const left = a.split('.').map(Number);
  const right = b.split('.').map(Number);
  for (let i = 0; i < Math.max(left.length, right.length); i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

// ── Registry ────────────────────────────────────────────────────

export interface ResourceRegistryOptions {
  /** Passed to every built resource, and told about registrations */
  events?: ResourceEventBus;
  logger?: Logger;
}

export class ResourceRegistry {
  private readonly _providers = new Map<string, ProviderSummary>();
  private readonly _linkedServices = new Map<string, LinkedServiceEntry>();
  private readonly _datasets = new Map<string, DatasetEntry>();
  private readonly events?: ResourceEventBus;
  private readonly logger?: Logger;

  constructor(options: ResourceRegistryOptions = {}) {
    this.events = options.events;
    this.logger = options.logger;
  }

  /**
   * Register a provider. Either every descriptor is registered or none is.
   * @throws Error on a duplicate provider name or `(kind, version)` pair
   */
  register(manifest: ProviderManifest): void {
    if (this._providers.has(manifest.name)) {
      throw new Error(`Provider "${manifest.name}" already registered`);
    }
    const linkedServices = manifest.linkedServices ?? [];
    const datasets = manifest.datasets ?? [];
    this.assertUnique(linkedServices, this._linkedServices);
    this.assertUnique(datasets, this._datasets);

    for (const entry of linkedServices) {
      this._linkedServices.set(resourceKey(entry.info.kind, entry.info.version), entry);
    }
    for (const entry of datasets) {
      this._datasets.set(resourceKey(entry.info.kind, entry.info.version), entry);
    }
    this._providers.set(manifest.name, {
      name: manifest.name,
      description: manifest.description,
      linkedServices: linkedServices.map(e => e.info),
      datasets: datasets.map(e => e.info),
    });

    this.log.debug(
      { provider: manifest.name, linkedServices: linkedServices.length, datasets: datasets.length },
      'provider registered',
    );
    for (const entry of linkedServices) {
      this.events?.onResourceRegistered?.({
        provider: manifest.name,
        kind: entry.info.kind,
        version: entry.info.version,
        resource: 'linked_service',
      });
    }
    for (const entry of datasets) {
      this.events?.onResourceRegistered?.({
        provider: manifest.name,
        kind: entry.info.kind,
        version: entry.info.version,
        resource: 'dataset',
      });
    }
  }

  /**
   * Build a linked service from a configuration object.
   * @throws DeserializationError on an invalid envelope, unknown kind/version or invalid settings
   */
  linkedService(config: unknown): LinkedService {
    const envelope = this.parse(config);
    const entry = this.resolve(this._linkedServices, envelope, 'linked service');
    return entry.build(envelope, this.context);
  }

  /**
   * Build a dataset bound to `linkedService` from a configuration object.
   * @throws DeserializationError as for linkedService()
   * @throws MismatchedLinkedServiceError when the linked service is of the wrong kind
   */
  dataset(config: unknown, linkedService: LinkedService): Dataset {
    const envelope = this.parse(config);
    const entry = this.resolve(this._datasets, envelope, 'dataset');
    if (entry.linkedServiceKind !== undefined && entry.linkedServiceKind !== linkedService.kind) {
      throw new MismatchedLinkedServiceError({
        message: `${entry.info.kind} requires a ${entry.linkedServiceKind} linked service, got ${linkedService.kind}`,
        details: { expected: entry.linkedServiceKind, actual: linkedService.kind },
      });
    }
    return entry.build(envelope, linkedService, this.context);
  }

  get providers(): readonly ProviderSummary[] {
    return [...this._providers.values()];
  }

  get linkedServices(): readonly ResourceInfo[] {
    return [...this._linkedServices.values()].map(e => e.info);
  }

  get datasets(): readonly ResourceInfo[] {
    return [...this._datasets.values()].map(e => e.info);
  }

  // ── Internal ────────────────────────────────────────────────────

  private get context(): BuildContext {
    return { events: this.events, logger: this.logger };
  }

  private get log(): Logger {
    return (this.logger ?? getLogger()).child({ component: 'registry' });
  }

  private parse(config: unknown): ResourceConfig {
    if (!validateConfig(config)) {
      throw new DeserializationError({
        message: 'Invalid resource configuration',
        details: { errors: describeErrors(validateConfig.errors) },
      });
    }
    return config;
  }

  private resolve<E extends { readonly info: ResourceInfo }>(entries: Map<string, E>, config: ResourceConfig, label: string): E {
    if (config.version !== undefined) {
      const entry = entries.get(resourceKey(config.kind, config.version));
      if (!entry) {
        throw new DeserializationError({
          message: `Unknown ${label} ${config.kind}:v${config.version}`,
          details: { error: 'unknown_version', kind: config.kind, version: config.version },
        });
      }
      return entry;
    }

    let latest: E | undefined;
    for (const entry of entries.values()) {
      if (entry.info.kind !== config.kind) continue;
      if (!latest || compareVersions(entry.info.version, latest.info.version) > 0) {
        latest = entry;
      }
    }
    if (!latest) {
      throw new DeserializationError({
        message: `Unknown ${label} kind ${config.kind}`,
        details: { error: 'unknown_kind', kind: config.kind },
      });
    }
    return latest;
  }

  private assertUnique(entries: readonly { readonly info: ResourceInfo }[], registered: Map<string, unknown>): void {
    const seen = new Set<string>();
    for (const { info } of entries) {
      const key = resourceKey(info.kind, info.version);
      if (registered.has(key) || seen.has(key)) {
        throw new Error(`${key} already registered`);
      }
      seen.add(key);
    }
  }
}
