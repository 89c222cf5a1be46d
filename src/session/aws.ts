/**
 * Session backed by the AWS SDK.
 * @module session/aws
 */

import {
  BatchGetItemCommand,
  CreateTableCommand,
  DeleteItemCommand,
  DescribeTableCommand,
  DynamoDBClient,
  QueryCommand,
  ScanCommand,
  UpdateItemCommand,
  type AttributeValue,
  type DynamoDBClientConfig,
} from '@aws-sdk/client-dynamodb';
import {
  DescribeStreamCommand,
  DynamoDBStreamsClient,
  GetRecordsCommand,
  GetShardIteratorCommand,
  type AttributeValue as StreamAttributeValue,
  type ShardIteratorType as SdkShardIteratorType,
  type _Record as SdkStreamRecord,
} from '@aws-sdk/client-dynamodb-streams';
import { fromIni } from '@aws-sdk/credential-providers';

import type { Session } from './session.js';
import type {
  CreateTableCommandInput,
  DeleteItemCommandInput,
  GetShardIteratorRequest,
  KeysAndAttributes,
  QueryCommandInput,
  RawStreamRecord,
  RecordsResponse,
  ScanCommandInput,
  SearchResponse,
  ShardDescription,
  ShardIteratorType,
  StreamDescription,
  TableDescription,
  UpdateItemCommandInput,
} from './types.js';
import type { AttributeMap } from '../typedefs/wire.js';
import type { EngineConfig } from '../config/config.js';
import { resolveConfig } from '../config/defaults.js';
import { MapperError } from '../error/error.js';
import { ConstraintViolationError, ServiceError } from '../error/categories.js';
import { mapAwsError } from '../error/mapper.js';
import { type Logger, ConsoleLogger, logError, logOperation } from '../observability/logging.js';
import { type MetricsCollector, InMemoryMetricsCollector, MapperMetricNames } from '../observability/metrics.js';
import { CircuitBreaker } from '../resilience/circuit-breaker.js';
import { RetryExecutor } from '../resilience/retry.js';

const SDK_ITERATOR_TYPES: Record<ShardIteratorType, SdkShardIteratorType> = {
  trim_horizon: 'TRIM_HORIZON',
  latest: 'LATEST',
  at_sequence: 'AT_SEQUENCE_NUMBER',
  after_sequence: 'AFTER_SEQUENCE_NUMBER',
};

export interface AwsSessionOptions {
  logger?: Logger;
  metrics?: MetricsCollector;
  /** Client to use instead of one built from the config */
  dynamoClient?: DynamoDBClient;
  /** Client to use instead of one built from the config */
  streamsClient?: DynamoDBStreamsClient;
  /** Sleep between retries */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * {@link Session} over DynamoDB and DynamoDB Streams.
 *
 * Every call runs through a circuit breaker and a retry executor; SDK errors
 * are mapped with {@link mapAwsError} before the retry decision.
 *
 * @example
 * ```typescript
 * const session = new AwsSession({
 *   region: 'eu-west-1',
 *   credentials: { type: 'profile', profileName: 'dev' },
 * });
 * ```
 */
export class AwsSession implements Session {
  private readonly dynamo: DynamoDBClient;
  private readonly streams: DynamoDBStreamsClient;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly circuitBreaker: CircuitBreaker;
  private readonly retryExecutor: RetryExecutor;

  constructor(config: EngineConfig = {}, options: AwsSessionOptions = {}) {
    const resolved = resolveConfig(config);
    this.logger = options.logger ?? new ConsoleLogger(resolved.logLevel);
    this.metrics = options.metrics ?? new InMemoryMetricsCollector();
    this.circuitBreaker = new CircuitBreaker(resolved.circuitBreakerConfig);
    this.retryExecutor = new RetryExecutor(resolved.retryConfig, options.sleep);

    const clientConfig = buildClientConfig(config);
    this.dynamo = options.dynamoClient ?? new DynamoDBClient(clientConfig);
    this.streams = options.streamsClient ?? new DynamoDBStreamsClient(clientConfig);
  }

  async saveItem(request: UpdateItemCommandInput): Promise<void> {
    await this.call('UpdateItem', request.TableName, request, () => this.dynamo.send(new UpdateItemCommand(request)));
  }

  async deleteItem(request: DeleteItemCommandInput): Promise<void> {
    await this.call('DeleteItem', request.TableName, request, () => this.dynamo.send(new DeleteItemCommand(request)));
  }

  async loadItems(request: Record<string, KeysAndAttributes>): Promise<Record<string, AttributeMap[]>> {
    const found: Record<string, AttributeMap[]> = {};
    let pending: Record<string, KeysAndAttributes> = request;

    while (Object.keys(pending).length > 0) {
      const RequestItems = pending;
      const response = await this.call('BatchGetItem', undefined, { RequestItems }, () =>
        this.dynamo.send(new BatchGetItemCommand({ RequestItems }))
      );
      for (const [table, items] of Object.entries(response.Responses ?? {})) {
        (found[table] ??= []).push(...items);
      }
      pending = response.UnprocessedKeys ?? {};
      const unprocessed = Object.values(pending).reduce((sum, keys) => sum + (keys.Keys?.length ?? 0), 0);
      if (unprocessed > 0) {
        this.metrics.incrementCounter(MapperMetricNames.BATCH_UNPROCESSED, unprocessed);
        this.logger.debug('Retrying unprocessed keys', { unprocessed });
      }
    }
    return found;
  }

  async queryItems(request: QueryCommandInput): Promise<SearchResponse> {
    const response = await this.call('Query', request.TableName, request, () =>
      this.dynamo.send(new QueryCommand(request))
    );
    return searchResponse(response);
  }

  async scanItems(request: ScanCommandInput): Promise<SearchResponse> {
    const response = await this.call('Scan', request.TableName, request, () =>
      this.dynamo.send(new ScanCommand(request))
    );
    return searchResponse(response);
  }

  async createTable(request: CreateTableCommandInput): Promise<void> {
    try {
      await this.call('CreateTable', request.TableName, request, () =>
        this.dynamo.send(new CreateTableCommand(request))
      );
    } catch (error) {
      if (error instanceof MapperError && error.code === 'ResourceInUseException') {
        this.logger.debug('Table already exists', { tableName: request.TableName });
        return;
      }
      throw error;
    }
  }

  async describeTable(tableName: string): Promise<TableDescription> {
    const response = await this.call('DescribeTable', tableName, { TableName: tableName }, () =>
      this.dynamo.send(new DescribeTableCommand({ TableName: tableName }))
    );
    if (response.Table === undefined) {
      throw new ServiceError(`DescribeTable returned no table for ${tableName}`, 'MalformedResponse');
    }
    return response.Table;
  }

  async describeStream(streamArn: string, firstShard?: string): Promise<StreamDescription> {
    const shards: ShardDescription[] = [];
    let exclusiveStart = firstShard;
    do {
      const request = { StreamArn: streamArn, ExclusiveStartShardId: exclusiveStart };
      const response = await this.call('DescribeStream', undefined, request, () =>
        this.streams.send(new DescribeStreamCommand(request))
      );
      for (const shard of response.StreamDescription?.Shards ?? []) {
        if (shard.ShardId !== undefined) {
          shards.push(
            shard.ParentShardId === undefined
              ? { ShardId: shard.ShardId }
              : { ShardId: shard.ShardId, ParentShardId: shard.ParentShardId }
          );
        }
      }
      exclusiveStart = response.StreamDescription?.LastEvaluatedShardId;
    } while (exclusiveStart !== undefined);
    return { StreamArn: streamArn, Shards: shards };
  }

  async getShardIterator(request: GetShardIteratorRequest): Promise<string> {
    const input = {
      StreamArn: request.streamArn,
      ShardId: request.shardId,
      ShardIteratorType: SDK_ITERATOR_TYPES[request.iteratorType],
      SequenceNumber: request.sequenceNumber,
    };
    const response = await this.call('GetShardIterator', undefined, input, () =>
      this.streams.send(new GetShardIteratorCommand(input))
    );
    if (response.ShardIterator === undefined) {
      throw new ServiceError(`No iterator returned for shard ${request.shardId}`, 'MalformedResponse');
    }
    return response.ShardIterator;
  }

  async getStreamRecords(iteratorId: string): Promise<RecordsResponse> {
    const input = { ShardIterator: iteratorId };
    const response = await this.call('GetRecords', undefined, input, () =>
      this.streams.send(new GetRecordsCommand(input))
    );
    const records = (response.Records ?? []).map(toRawRecord);
    return response.NextShardIterator === undefined
      ? { Records: records }
      : { Records: records, NextShardIterator: response.NextShardIterator };
  }

  private async call<R>(
    operation: string,
    tableName: string | undefined,
    request: object,
    send: () => Promise<R>
  ): Promise<R> {
    const startTime = Date.now();
    const labels: Record<string, string> = tableName === undefined ? { operation } : { operation, table: tableName };

    try {
      const result = await this.executeWithResilience(async () => {
        try {
          return await send();
        } catch (error) {
          throw mapAwsError(error, operation, request);
        }
      });

      const duration = Date.now() - startTime;
      this.metrics.incrementCounter(MapperMetricNames.OPERATIONS_TOTAL, 1, { ...labels, status: 'success' });
      this.metrics.recordHistogram(MapperMetricNames.OPERATION_DURATION, duration / 1000, labels);
      logOperation(this.logger, operation, tableName ?? '', duration);
      return result;
    } catch (error) {
      const mapped = mapAwsError(error, operation, request);
      if (mapped instanceof ConstraintViolationError) {
        this.metrics.incrementCounter(MapperMetricNames.CONSTRAINT_VIOLATIONS, 1, labels);
        this.logger.debug('Condition not met', { operation, tableName });
      } else {
        this.metrics.incrementCounter(MapperMetricNames.ERRORS, 1, { ...labels, code: mapped.code });
        logError(this.logger, operation, mapped);
      }
      throw mapped;
    }
  }

  private async executeWithResilience<R>(operation: () => Promise<R>): Promise<R> {
    return await this.circuitBreaker.execute(async () => {
      return await this.retryExecutor.execute(operation);
    });
  }
}

function buildClientConfig(config: EngineConfig): DynamoDBClientConfig {
  const resolved = resolveConfig(config);
  const clientConfig: DynamoDBClientConfig = {
    region: resolved.region,
    endpoint: resolved.endpoint,
    // Retries happen in the session's own executor
    maxAttempts: 1,
  };

  if (config.credentials) {
    switch (config.credentials.type) {
      case 'static':
        clientConfig.credentials = {
          accessKeyId: config.credentials.accessKeyId,
          secretAccessKey: config.credentials.secretAccessKey,
          sessionToken: config.credentials.sessionToken,
        };
        break;
      case 'profile':
        clientConfig.credentials = fromIni({ profile: config.credentials.profileName });
        break;
      case 'environment':
        // The SDK's default chain reads the environment
        break;
    }
  }
  return clientConfig;
}

function searchResponse(response: {
  Count?: number;
  ScannedCount?: number;
  Items?: AttributeMap[];
  LastEvaluatedKey?: AttributeMap;
}): SearchResponse {
  const items = response.Items ?? [];
  const page: SearchResponse = {
    Count: response.Count ?? items.length,
    ScannedCount: response.ScannedCount ?? items.length,
    Items: items,
  };
  if (response.LastEvaluatedKey !== undefined) {
    page.LastEvaluatedKey = response.LastEvaluatedKey;
  }
  return page;
}

function toRawRecord(record: SdkStreamRecord): RawStreamRecord {
  const data = record.dynamodb;
  if (
    record.eventID === undefined ||
    record.eventName === undefined ||
    record.eventVersion === undefined ||
    data?.ApproximateCreationDateTime === undefined ||
    data.SequenceNumber === undefined
  ) {
    throw new ServiceError('GetRecords returned an incomplete record', 'MalformedResponse');
  }
  const raw: RawStreamRecord = {
    eventID: record.eventID,
    eventName: record.eventName,
    eventVersion: record.eventVersion,
    dynamodb: {
      ApproximateCreationDateTime: data.ApproximateCreationDateTime,
      SequenceNumber: data.SequenceNumber,
    },
  };
  if (data.Keys !== undefined) {
    raw.dynamodb.Keys = toAttributeMap(data.Keys);
  }
  if (data.NewImage !== undefined) {
    raw.dynamodb.NewImage = toAttributeMap(data.NewImage);
  }
  if (data.OldImage !== undefined) {
    raw.dynamodb.OldImage = toAttributeMap(data.OldImage);
  }
  return raw;
}

function toAttributeMap(attrs: Record<string, StreamAttributeValue>): AttributeMap {
  const result: AttributeMap = {};
  for (const [name, value] of Object.entries(attrs)) {
    result[name] = toAttributeValue(value);
  }
  return result;
}

/**
 * Streams and tables ship separate (identical) attribute value unions.
 */
export function toAttributeValue(value: StreamAttributeValue): AttributeValue {
  if (value.S !== undefined) return { S: value.S };
  if (value.N !== undefined) return { N: value.N };
  if (value.B !== undefined) return { B: value.B };
  if (value.BOOL !== undefined) return { BOOL: value.BOOL };
  if (value.NULL !== undefined) return { NULL: value.NULL };
  if (value.SS !== undefined) return { SS: value.SS };
  if (value.NS !== undefined) return { NS: value.NS };
  if (value.BS !== undefined) return { BS: value.BS };
  if (value.L !== undefined) return { L: value.L.map(toAttributeValue) };
  if (value.M !== undefined) return { M: toAttributeMap(value.M) };
  throw new ServiceError('Stream record holds an unknown attribute type', 'MalformedResponse');
}
