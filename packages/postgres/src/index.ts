// Pool
export {
  adaptPool,
  createPool,
  quoteIdent,
  qualifiedName,
  schemaFromFields,
  sqlState,
  type PgPool,
  type PgClient,
  type PgField,
  type PgQueryResult,
  type PgConnectionSettings,
} from './pool';

// Resources
export {
  PgLinkedService,
  PG_LINKED_SERVICE_KIND,
  type PgLinkedServiceSettings,
  type PgLinkedServiceOptions,
} from './pg-linked-service';
export {
  PgTableDataset,
  PG_TABLE_DATASET_KIND,
  isPgCheckpoint,
  type PgTableDatasetSettings,
  type PgTableDatasetOptions,
  type PgCheckpoint,
} from './pg-table-dataset';

// Registry
export { pgProvider, type PgProviderOptions } from './pg-provider';
