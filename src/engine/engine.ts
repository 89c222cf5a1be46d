/**
 * Engine
 *
 * Binds model classes to tables and persists their objects. Provides the main
 * entry point of the library: save, delete, load, query, scan and stream.
 */

import type {
  DeleteItemCommandInput,
  KeysAndAttributes,
  TableDescription,
  UpdateItemCommandInput,
} from '@aws-sdk/client-dynamodb';

import type { EngineConfig } from '../config/config.js';
import { type ResolvedEngineConfig, resolveConfig } from '../config/defaults.js';
import { validateConfig } from '../config/validation.js';
import type { Session } from '../session/session.js';
import { AwsSession } from '../session/aws.js';
import type { AttributeMap } from '../typedefs/wire.js';
import { TypeEngine } from '../typedefs/engine.js';
import type { Condition } from '../conditions/condition.js';
import type { AnyColumn } from '../models/column.js';
import { Index } from '../models/indexes.js';
import type { ModelMeta } from '../models/meta.js';
import {
  BaseModel,
  type ModelClass,
  assignAttribute,
  clearActions,
  getAttribute,
  isModelClass,
  metaOf,
  pendingAction,
} from '../models/model.js';
import { ChangeTracker } from '../tracking/tracker.js';
import { ExpressionRenderer } from '../expressions/renderer.js';
import { Coordinator, type StreamPosition } from '../stream/coordinator.js';
import { Stream } from '../stream/stream.js';
import { BATCH_GET_ITEM_CHUNK_SIZE, chunk } from '../batch/index.js';
import { type EngineEvents, Hooks } from './hooks.js';
import { createTableRequest, isTableActive, validateTable } from './tables.js';
import {
  type QueryOptions,
  type ScanOptions,
  SearchIterator,
  prepareQuery,
  prepareScan,
  queryPages,
  scanPages,
} from './search.js';
import {
  InvalidModelError,
  InvalidStreamError,
  MissingObjectsError,
  UnboundModelError,
} from '../error/categories.js';
import { type Logger, ConsoleLogger } from '../observability/logging.js';
import { type MetricsCollector, InMemoryMetricsCollector } from '../observability/metrics.js';

/**
 * Milliseconds between table status checks while a table is being created
 */
const DEFAULT_POLL_INTERVAL_MS = 1000;

export interface EngineOptions {
  config?: EngineConfig;
  /** Session to use instead of an {@link AwsSession} built from the config */
  session?: Session;
  logger?: Logger;
  metrics?: MetricsCollector;
  typeEngine?: TypeEngine;
  /** Wait used while polling a table that is still being created */
  sleep?: (ms: number) => Promise<void>;
  pollIntervalMs?: number;
}

export interface WriteOptions {
  /** Precondition the stored item must meet */
  condition?: Condition;
  /** Also require the stored item to match the last loaded or saved state */
  atomic?: boolean;
}

export interface LoadOptions {
  consistent?: boolean;
}

interface Binding {
  readonly model: ModelClass;
  readonly tableName: string;
  readonly streamArn: string | undefined;
  readonly unsubscribe: () => void;
}

interface PendingTable {
  readonly meta: ModelMeta;
  readonly byKey: Map<string, BaseModel[]>;
}

/**
 * Maps model objects to tables.
 *
 * @example
 * ```typescript
 * const engine = new Engine({ config: { region: 'eu-west-1', tablePrefix: 'dev-' } });
 * await engine.bind(User);
 *
 * const user = new User({ id: 'u1', email: 'user@example.com' });
 * await engine.save(user, { condition: User.meta.columns.id.notExists() });
 *
 * user.email = 'new@example.com';
 * await engine.save(user, { atomic: true });
 * ```
 */
export class Engine {
  readonly config: ResolvedEngineConfig;
  readonly session: Session;
  readonly typeEngine: TypeEngine;
  readonly changes: ChangeTracker;
  private readonly renderer: ExpressionRenderer;
  private readonly hooks = new Hooks<EngineEvents>();
  private readonly bindings = new Map<ModelMeta, Binding>();
  private readonly indexModels = new Map<Index, ModelClass>();
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly pollIntervalMs: number;

  /**
   * @throws {ConfigurationError} for an invalid config
   */
  constructor(options: EngineOptions = {}) {
    if (options.config !== undefined) {
      validateConfig(options.config);
    }
    this.config = resolveConfig(options.config);
    this.logger = options.logger ?? new ConsoleLogger(this.config.logLevel);
    this.metrics = options.metrics ?? new InMemoryMetricsCollector();
    this.session =
      options.session ?? new AwsSession(options.config, { logger: this.logger, metrics: this.metrics });
    this.typeEngine = options.typeEngine ?? new TypeEngine();
    this.changes = new ChangeTracker(this.typeEngine);
    this.renderer = new ExpressionRenderer(this.changes, this.typeEngine);
    this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;

    // Tracking listeners run before any user listener.
    this.hooks.on('objectModified', (obj, column) => this.changes.mark(obj, column));
    this.hooks.on('objectLoaded', obj => this.changes.sync(obj));
    this.hooks.on('objectSaved', obj => {
      this.changes.sync(obj);
      for (const column of metaOf(obj).columnList) {
        if (pendingAction(obj, column) !== undefined) {
          this.changes.unmark(obj, column);
        }
      }
      clearActions(obj);
    });
    this.hooks.on('objectDeleted', obj => this.changes.clear(obj));
  }

  on<K extends keyof EngineEvents>(event: K, listener: (...args: EngineEvents[K]) => void): void {
    this.hooks.on(event, listener);
  }

  off<K extends keyof EngineEvents>(event: K, listener: (...args: EngineEvents[K]) => void): void {
    this.hooks.off(event, listener);
  }

  /**
   * Creates each model's table if it's missing, waits for it to be active and
   * checks that it fits the model. Binding a model twice is a no-op.
   *
   * @throws {InvalidModelError} for a class that isn't a model
   * @throws {TableMismatchError} when an existing table doesn't fit the model
   */
  async bind(...models: ModelClass[]): Promise<void> {
    for (const model of models) {
      if (!isModelClass(model)) {
        throw new InvalidModelError(`${String(model)} is not a model class`);
      }
      const meta = model.meta;
      if (this.bindings.has(meta)) {
        continue;
      }
      const tableName = this.config.tablePrefix + meta.tableName;
      this.logger.info('Binding model', { model: model.name, tableName });

      const expected = createTableRequest(meta, tableName);
      await this.session.createTable(expected);
      const table = await this.waitForTable(tableName);
      const streamArn = validateTable(expected, table);
      this.hooks.emit('tableValidated', model, table);

      const unsubscribe = meta.observe((obj, column, value) => this.hooks.emit('objectModified', obj, column, value));
      this.bindings.set(meta, { model, tableName, streamArn, unsubscribe });
      for (const index of Object.values(meta.indexes)) {
        this.indexModels.set(index, model);
      }
      this.hooks.emit('modelBound', model);
    }
  }

  /**
   * Stops tracking changes to objects of every bound model.
   */
  close(): void {
    for (const binding of this.bindings.values()) {
      binding.unsubscribe();
    }
    this.bindings.clear();
    this.indexModels.clear();
  }

  /**
   * Writes each object's changed fields with UpdateItem.
   *
   * @throws {ConstraintViolationError} when a condition fails; objects
   * before the failing one are already saved
   */
  async save(objs: BaseModel | readonly BaseModel[], options: WriteOptions = {}): Promise<void> {
    for (const obj of toList(objs)) {
      const meta = metaOf(obj);
      const binding = this.bindingOf(meta);
      const request: UpdateItemCommandInput = {
        TableName: binding.tableName,
        Key: this.dumpKey(obj, meta),
        ...this.renderer.render(obj, {
          condition: options.condition,
          atomic: options.atomic ?? this.config.atomic,
          update: true,
        }),
      };
      await this.session.saveItem(request);
      this.logger.debug('Saved object', { model: binding.model.name, tableName: binding.tableName });
      this.hooks.emit('objectSaved', obj);
    }
  }

  /**
   * @throws {ConstraintViolationError} when a condition fails; objects
   * before the failing one are already deleted
   */
  async delete(objs: BaseModel | readonly BaseModel[], options: WriteOptions = {}): Promise<void> {
    for (const obj of toList(objs)) {
      const meta = metaOf(obj);
      const binding = this.bindingOf(meta);
      const request: DeleteItemCommandInput = {
        TableName: binding.tableName,
        Key: this.dumpKey(obj, meta),
        ...this.renderer.render(obj, {
          condition: options.condition,
          atomic: options.atomic ?? this.config.atomic,
        }),
      };
      await this.session.deleteItem(request);
      this.logger.debug('Deleted object', { model: binding.model.name, tableName: binding.tableName });
      this.hooks.emit('objectDeleted', obj);
    }
  }

  /**
   * Populates objects from their stored items, by key. Objects sharing a key
   * are all populated from the same item.
   *
   * @throws {MissingObjectsError} listing the objects that weren't found;
   * every other object is loaded
   */
  async load(objs: BaseModel | readonly BaseModel[], options: LoadOptions = {}): Promise<void> {
    const consistent = options.consistent ?? this.config.consistent;
    const pending = new Map<string, PendingTable>();
    const keys: { tableName: string; key: AttributeMap }[] = [];

    for (const obj of toList(objs)) {
      const meta = metaOf(obj);
      const { tableName } = this.bindingOf(meta);
      const key = this.dumpKey(obj, meta);
      let table = pending.get(tableName);
      if (table === undefined) {
        table = { meta, byKey: new Map() };
        pending.set(tableName, table);
      }
      const id = keyId(key);
      const waiting = table.byKey.get(id);
      if (waiting === undefined) {
        table.byKey.set(id, [obj]);
        keys.push({ tableName, key });
      } else {
        waiting.push(obj);
      }
    }

    for (const batch of chunk(keys, BATCH_GET_ITEM_CHUNK_SIZE)) {
      const byTable = new Map<string, AttributeMap[]>();
      for (const { tableName, key } of batch) {
        const tableKeys = byTable.get(tableName) ?? [];
        tableKeys.push(key);
        byTable.set(tableName, tableKeys);
      }
      const request: Record<string, KeysAndAttributes> = {};
      for (const [tableName, tableKeys] of byTable) {
        request[tableName] = { Keys: tableKeys, ConsistentRead: consistent };
      }

      const found = await this.session.loadItems(request);
      for (const [tableName, items] of Object.entries(found)) {
        const table = pending.get(tableName);
        if (table === undefined) {
          continue;
        }
        for (const item of items) {
          const id = keyId(pickKey(item, table.meta.keys));
          const waiting = table.byKey.get(id);
          if (waiting === undefined) {
            continue;
          }
          table.byKey.delete(id);
          for (const obj of waiting) {
            this.unpack(obj, item, table.meta.columnList);
            this.hooks.emit('objectLoaded', obj);
          }
        }
      }
    }

    const missing = [...pending.values()].flatMap(table => [...table.byKey.values()].flat());
    if (missing.length > 0) {
      this.logger.debug('Objects not found', { count: missing.length });
      throw new MissingObjectsError(missing);
    }
  }

  /**
   * Queries a model's table, or one of its indexes.
   *
   * @example
   * ```typescript
   * const { account, createdAt } = Tweet.meta.columns;
   * const recent = await engine
   *   .query(Tweet.meta.indexes.byCreation, {
   *     key: account.eq('a1').and(createdAt.ge(new Date('2024-01-01T00:00:00Z'))),
   *     forward: false,
   *   })
   *   .all();
   * ```
   * @throws {InvalidSearchError} for a bad key condition or projection
   */
  query<M extends BaseModel>(model: ModelClass<M>, options: QueryOptions): SearchIterator<M>;
  query(index: Index, options: QueryOptions): SearchIterator<BaseModel>;
  query(target: ModelClass | Index, options: QueryOptions): SearchIterator<BaseModel> {
    const model = target instanceof Index ? this.modelOfIndex(target) : target;
    const index = target instanceof Index ? target : options.index;
    const binding = this.bindingOf(model.meta);
    const prepared = prepareQuery(
      { meta: model.meta, index, tableName: binding.tableName },
      { ...options, consistent: this.defaultConsistent(options.consistent, index) },
      this.renderer
    );
    return new SearchIterator(
      queryPages(this.session, prepared.request),
      prepared.request,
      attrs => this.loadObject(model, attrs, prepared.expected),
      options.limit
    );
  }

  /**
   * Scans a model's table, or one of its indexes.
   *
   * @throws {InvalidSearchError} for a bad projection or parallel segment
   */
  scan<M extends BaseModel>(model: ModelClass<M>, options?: ScanOptions): SearchIterator<M>;
  scan(index: Index, options?: ScanOptions): SearchIterator<BaseModel>;
  scan(target: ModelClass | Index, options: ScanOptions = {}): SearchIterator<BaseModel> {
    const model = target instanceof Index ? this.modelOfIndex(target) : target;
    const index = target instanceof Index ? target : options.index;
    const binding = this.bindingOf(model.meta);
    const prepared = prepareScan(
      { meta: model.meta, index, tableName: binding.tableName },
      { ...options, consistent: this.defaultConsistent(options.consistent, index) },
      this.renderer
    );
    return new SearchIterator(
      scanPages(this.session, prepared.request),
      prepared.request,
      attrs => this.loadObject(model, attrs, prepared.expected),
      options.limit
    );
  }

  /**
   * Opens the change stream of a bound model's table at `position`.
   *
   * @throws {InvalidStreamError} when the model declares no stream
   */
  async stream<M extends BaseModel>(model: ModelClass<M>, position: StreamPosition): Promise<Stream<M>> {
    const binding = this.bindingOf(model.meta);
    if (binding.streamArn === undefined) {
      throw new InvalidStreamError(`${model.name} does not declare a stream`);
    }
    const coordinator = new Coordinator({
      session: this.session,
      streamArn: binding.streamArn,
      logger: this.logger,
      metrics: this.metrics,
    });
    const stream = new Stream(model, coordinator, (attrs, expected) => this.loadObject(model, attrs, expected));
    await stream.moveTo(position);
    return stream;
  }

  private async waitForTable(tableName: string): Promise<TableDescription> {
    for (;;) {
      const table = await this.session.describeTable(tableName);
      if (isTableActive(table)) {
        return table;
      }
      this.logger.debug('Waiting for table', { tableName, status: table.TableStatus });
      await this.sleep(this.pollIntervalMs);
    }
  }

  private bindingOf(meta: ModelMeta): Binding {
    const binding = this.bindings.get(meta);
    if (binding === undefined) {
      throw new UnboundModelError(meta.tableName);
    }
    return binding;
  }

  private modelOfIndex(index: Index): ModelClass {
    const model = this.indexModels.get(index);
    if (model === undefined) {
      throw new UnboundModelError(index.modelTableName);
    }
    return model;
  }

  private defaultConsistent(consistent: boolean | undefined, index: Index | undefined): boolean | undefined {
    if (consistent !== undefined) {
      return consistent;
    }
    return index?.kind === 'gsi' ? undefined : this.config.consistent;
  }

  private dumpKey(obj: BaseModel, meta: ModelMeta): AttributeMap {
    const key: AttributeMap = {};
    for (const column of meta.keys) {
      const wire = this.typeEngine.dump(column.typedef, getAttribute(obj, column));
      if (wire === undefined) {
        throw new InvalidModelError(`${obj.constructor.name} is missing its key ${column.name}`);
      }
      key[column.dynamoName] = wire;
    }
    return key;
  }

  private loadObject<M extends BaseModel>(model: ModelClass<M>, attrs: AttributeMap, expected: readonly AnyColumn[]): M {
    const obj = new model();
    this.unpack(obj, attrs, expected);
    this.hooks.emit('objectLoaded', obj);
    return obj;
  }

  /**
   * Sets every expected column from `attrs`; columns missing from the item
   * are deleted from the object.
   */
  private unpack(obj: BaseModel, attrs: AttributeMap, expected: readonly AnyColumn[]): void {
    for (const column of expected) {
      assignAttribute(obj, column, this.typeEngine.load(column.typedef, attrs[column.dynamoName]));
    }
  }
}

function toList(objs: BaseModel | readonly BaseModel[]): readonly BaseModel[] {
  return objs instanceof BaseModel ? [objs] : objs;
}

function pickKey(item: AttributeMap, keys: readonly AnyColumn[]): AttributeMap {
  const key: AttributeMap = {};
  for (const column of keys) {
    const wire = item[column.dynamoName];
    if (wire !== undefined) {
      key[column.dynamoName] = wire;
    }
  }
  return key;
}

/**
 * Stable identity of a dumped key
 */
function keyId(key: AttributeMap): string {
  return JSON.stringify(
    Object.keys(key)
      .sort()
      .map(name => [name, key[name]])
  );
}
