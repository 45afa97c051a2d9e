/**
 * colfetch
 *
 * Schema-driven export of webservice resource listings to Arrow IPC streams
 * and Parquet files. The column layout of every resource type is derived at
 * run time from the service's own schema synopsis.
 *
 * @example
 * ```typescript
 * import { HttpTransport, FileSystemStorage, readParquet, run } from 'colfetch'
 *
 * const transport = new HttpTransport({ baseUrl: 'https://shop.example/api', key: process.env.SHOP_KEY ?? '' })
 *
 * // Products with their category ids exploded into rows
 * const summary = await run(
 *   'products',
 *   {
 *     fields: ['reference', 'price', 'categories'],
 *     filters: [{ type: 'dateRange', field: 'date_upd', low: '2024-01-01', high: '2024-02-01' }],
 *   },
 *   { sink: new FileSystemStorage({ path: './out' }), path: 'products.parquet' },
 *   { transport, format: 'parquet', flatten: true }
 * )
 *
 * // Read it back without the schema
 * const { layout, rows } = await readParquet(await new FileSystemStorage({ path: './out' }).read('products.parquet'))
 * ```
 */

// Error hierarchy (central error module)
export {
  // Base error
  ColfetchError,
  // Input errors
  SchemaError,
  QueryError,
  // Page processing errors
  ParseError,
  CoercionError,
  BuilderStateError,
  // Output errors
  WriteError,
  type WriteErrorCode,
  StorageError,
  FileNotFoundError,
  // Remote errors
  TransportError,
  type TransportErrorOptions,
  // Run control
  RunCancelledError,
  ConfigError,
  ValidationError,
  // Type guards
  isColfetchError,
  isSchemaError,
  isQueryError,
  isParseError,
  isCoercionError,
  isWriteError,
  isTransportError,
  isStorageError,
  isFileNotFoundError,
  isValidationError,
  isRetryableError,
} from './errors.js'

// Schema resolution
export {
  type ScalarKind,
  type FieldKind,
  type ScalarFieldKind,
  type AssociationFieldKind,
  type TranslatedFieldKind,
  type FieldSpec,
  type Schema,
  type ResolveSchemaOptions,
  type UnknownHintPolicy,
  type HintMapping,
  SCALAR_KINDS,
  ID_FIELD,
  resolveSchema,
  createHintTable,
  getHintTable,
  findField,
  describeKind,
  formatSchema,
} from './schema/index.js'

// Query building
export {
  type QueryDescriptor,
  type QueryConstraints,
  type FilterConstraint,
  type FieldFilter,
  type DateRangeFilter,
  type MembershipFilter,
  type QueryLimit,
  type QuerySort,
  type SortDirection,
  type DateRange,
  type RecordFilter,
  buildQuery,
  projectSchema,
  toQueryParams,
  createRecordFilter,
  matchesFilters,
  parseMembershipLiterals,
  parseMembershipArgument,
  parseLimit,
  parseDateRange,
} from './query/index.js'

// Record parsing
export {
  type RecordTree,
  type RecordValue,
  type PageEncoding,
  parsePage,
  decodeUtf8,
  recordTree,
} from './record/index.js'

// Columnar batches and backends
export {
  type BackendName,
  type ColumnarBackend,
  type ColumnarBatch,
  type ColumnVector,
  type BatchBuilder,
  type BatchBuilderOptions,
  type CellRow,
  type CellValue,
  type ScalarValue,
  type ColumnLayout,
  type ColumnSpec,
  type ColumnType,
  BACKEND_NAMES,
  DEFAULT_BACKEND,
  arrowBackend,
  nativeBackend,
  getBackend,
  isBackendName,
  deriveLayout,
  coerceScalar,
  materializeRows,
} from './columnar/index.js'

// Batch writers
export {
  type BatchWriter,
  type WriteSummary,
  type OutputFormat,
  type CompressionCodec,
  type CreateBatchWriterOptions,
  type DecodedOutput,
  OUTPUT_FORMATS,
  createBatchWriter,
  readArrowStream,
  readParquet,
} from './writer/index.js'

// Output sinks
export {
  type OutputSink,
  type StorageBackend,
  MemoryStorage,
  FileSystemStorage,
  StreamSink,
} from './storage/index.js'

// Transport
export {
  type Transport,
  type PageToken,
  type FetchedPage,
  type RequestOptions,
  type HttpTransportOptions,
  type AuthorizationMode,
  type RetryConfig,
  HttpTransport,
  withRetry,
} from './transport/index.js'

// Engine
export {
  type RunOptions,
  type RunTarget,
  type RunSummary,
  run,
} from './engine/index.js'

// Configuration
export {
  type ColfetchConfig,
  loadConfig,
  parseConfig,
  transportOptions,
} from './config/index.js'

// Logging abstraction and utilities
export {
  type Logger,
  defaultLogger,
  setLogger,
  getLogger,
  assertNever,
} from './utils/index.js'
