/** Identifier of a shard (partition) within the source stream. */
export type ShardId = string;

/**
 * A record as handed over by the coordinator.
 *
 * Returned to callers unmodified; this layer only reads the ordering fields.
 */
export type KinesisClientRecord = {
  sequenceNumber: string;
  subSequenceNumber: number;
  partitionKey: string;
  data: Uint8Array;
  approximateArrivalTimestamp?: Date;
  explicitHashKey?: string;
  /** True when the record was unpacked from an aggregated (KPL) record. */
  aggregated?: boolean;
};

/**
 * A shard position.
 *
 * `sequenceNumber` may also be a sentinel such as `TRIM_HORIZON` or `LATEST`.
 */
export type ExtendedSequenceNumber = {
  sequenceNumber: string;
  subSequenceNumber?: number;
};

/** Where a brand-new lease starts reading when no checkpoint exists yet. */
export type InitialPosition =
  | { type: "trim_horizon" }
  | { type: "latest" }
  | { type: "at_timestamp"; timestamp: Date };

/** `polling`: GetRecords loop. `fanout`: enhanced fan-out push (SubscribeToShard). */
export type RetrievalMode = "polling" | "fanout";

/** A non-empty run of records from a single processor callback. */
export type Chunk<T> = readonly T[];

/** `(source) => output` stream transformer. */
export type Pipe<TIn, TOut> = (source: AsyncIterable<TIn>) => AsyncIterable<TOut>;

/** Checkpoint handle passed to processors by the coordinator. */
export interface RecordProcessorCheckpointer {
  /**
   * Durably record progress on the shard.
   *
   * With a position, everything up to and including it is committed.
   * Without one, the coordinator commits the latest delivered position
   * (or SHARD_END when called from `shardEnded`).
   */
  checkpoint(position?: ExtendedSequenceNumber): Promise<void>;
}

export type InitializationInput = {
  shardId: ShardId;
  /** Position the lease resumes from. */
  extendedSequenceNumber: ExtendedSequenceNumber;
};

export type ProcessRecordsInput = {
  records: readonly KinesisClientRecord[];
  checkpointer: RecordProcessorCheckpointer;
  millisBehindLatest?: number;
};

export type LeaseLostInput = Record<string, never>;

export type ShardEndedInput = {
  checkpointer: RecordProcessorCheckpointer;
};

export type ShutdownRequestedInput = {
  checkpointer: RecordProcessorCheckpointer;
};

/**
 * Per-shard callback target.
 *
 * The coordinator creates one per lease and awaits each callback before
 * delivering the next batch for that shard.
 */
export interface ShardRecordProcessor {
  initialize(input: InitializationInput): Promise<void>;
  processRecords(input: ProcessRecordsInput): Promise<void>;
  leaseLost(input: LeaseLostInput): Promise<void>;
  shardEnded(input: ShardEndedInput): Promise<void>;
  shutdownRequested(input: ShutdownRequestedInput): Promise<void>;
}

export type ShardRecordProcessorFactory = () => ShardRecordProcessor;

/** The external coordinator (lease management, retrieval, checkpoint storage). */
export interface Scheduler {
  /** Runs until shut down or failed. */
  run(): Promise<void>;
  /** Idempotent; safe to call before, during or after `run()`. */
  shutdown(): Promise<void>;
}

/** Everything needed to build a scheduler for one stream run. */
export type SchedulerConfig = {
  streamName: string;
  appName: string;
  /** Unique per `readChunkedFromKinesisStream` iteration. */
  workerIdentifier: string;
  retrievalMode: RetrievalMode;
  initialPosition: InitialPosition;
  processorFactory: ShardRecordProcessorFactory;
};

export type SchedulerFactory = (config: SchedulerConfig) => Scheduler;
