import { randomUUID } from "node:crypto";

import { createLogger, type Logger } from "@shardpipe/utils";

import { BoundedQueue } from "./bounded-queue";
import {
  bypassCheckpoint,
  checkpointRecords,
  type CheckpointRecordsOptions,
} from "./checkpoint-pipe";
import { ChunkedRecordProcessor } from "./chunked-record-processor";
import type { CommittableRecord } from "./committable-record";
import { CoordinatorExitedError, CoordinatorFailedError } from "./errors";
import {
  kinesisConsumerSettings,
  type KinesisCheckpointSettings,
  type KinesisCheckpointSettingsInput,
  type KinesisConsumerSettings,
  type KinesisConsumerSettingsInput,
} from "./settings";
import type { Chunk, KinesisClientRecord, Pipe, Scheduler, SchedulerFactory } from "./types";

export type StreamState = "created" | "running" | "stopping" | "stopped";

export type ReadOptions = {
  /** Aborting ends the sequence (without an error) and shuts the scheduler down. */
  signal?: AbortSignal;
};

/** Options for `createKinesis`. */
export type KinesisOptions = {
  /** Builds the coordinator for each stream run. */
  schedulerFactory: SchedulerFactory;
  logger?: Logger;
  /** Worker identity per run. Defaults to a random UUID. */
  workerIdGenerator?: () => string;
};

type ChunkStreamInit = {
  settings: KinesisConsumerSettings;
  schedulerFactory: SchedulerFactory;
  workerIdentifier: string;
  logger: Logger;
  signal?: AbortSignal;
};

/**
 * One scheduler run exposed as an async iterator of chunks.
 *
 * Not an async generator: `return()` must be able to cut through a
 * `next()` that is parked on an empty buffer, and a generator would queue it
 * behind that `next()` instead.
 */
class ChunkStream implements AsyncIterableIterator<Chunk<CommittableRecord>> {
  private readonly init: ChunkStreamInit;
  private readonly logger: Logger;
  private readonly buffer: BoundedQueue<Chunk<CommittableRecord>>;

  private state: StreamState = "created";
  private scheduler: Scheduler | null = null;
  private running: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  private readonly onAbort = () => {
    void this.stop();
  };

  constructor(init: ChunkStreamInit) {
    this.init = init;
    this.logger = init.logger.child({ workerId: init.workerIdentifier });
    this.buffer = new BoundedQueue(init.settings.bufferSize);
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  async next(): Promise<IteratorResult<Chunk<CommittableRecord>, undefined>> {
    if (this.state === "created") this.start();
    if (this.stopping) {
      await this.stopping;
      return { done: true, value: undefined };
    }

    let result: IteratorResult<Chunk<CommittableRecord>, undefined>;
    try {
      result = await this.buffer.next();
    } catch (e) {
      await this.stop();
      throw e;
    }

    if (result.done) {
      await this.stop();
    }
    return result;
  }

  async return(): Promise<IteratorResult<Chunk<CommittableRecord>, undefined>> {
    await this.stop();
    return { done: true, value: undefined };
  }

  private start(): void {
    const { settings, workerIdentifier, signal } = this.init;

    if (signal?.aborted) {
      this.buffer.close();
      this.stopping = Promise.resolve();
      this.transition("stopped");
      return;
    }

    const scheduler = this.init.schedulerFactory({
      streamName: settings.streamName,
      appName: settings.appName,
      workerIdentifier,
      retrievalMode: settings.retrievalMode,
      initialPosition: settings.initialPosition,
      processorFactory: () =>
        new ChunkedRecordProcessor((chunk) => this.buffer.offer(chunk), {
          logger: this.logger,
        }),
    });
    this.scheduler = scheduler;

    signal?.addEventListener("abort", this.onAbort, { once: true });
    this.transition("running");

    // Deferred so a synchronous throw from run() lands in the same path as a rejection.
    this.running = Promise.resolve()
      .then(() => scheduler.run())
      .then(
        () => {
          if (this.stopping) return;
          this.logger.error({}, "kinesis.scheduler_exited");
          this.buffer.fail(new CoordinatorExitedError(workerIdentifier));
        },
        (e: unknown) => {
          if (this.stopping) {
            this.logger.warn({ err: e }, "kinesis.scheduler_failed_during_shutdown");
            return;
          }
          this.logger.error({ err: e }, "kinesis.scheduler_failed");
          this.buffer.fail(new CoordinatorFailedError(workerIdentifier, e));
        },
      );
  }

  /** Idempotent; every exit path funnels through here. */
  private stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    this.init.signal?.removeEventListener("abort", this.onAbort);
    this.buffer.close();

    const scheduler = this.scheduler;
    if (!scheduler) {
      this.transition("stopped");
      return;
    }

    this.transition("stopping");
    const startedAt = Date.now();
    try {
      await scheduler.shutdown();
    } catch (e) {
      this.logger.error({ err: e }, "kinesis.scheduler_shutdown_failed");
    }
    await this.running;
    this.transition("stopped", { durationMs: Date.now() - startedAt });
  }

  private transition(to: StreamState, fields: Record<string, unknown> = {}): void {
    const from = this.state;
    this.state = to;
    this.logger.info(
      {
        from,
        to,
        streamName: this.init.settings.streamName,
        appName: this.init.settings.appName,
        ...fields,
      },
      "kinesis.stream_state",
    );
  }
}

/** Flattens chunks, forwarding `return()` straight to the chunk iterator. */
class FlattenedStream<T> implements AsyncIterableIterator<T> {
  private readonly source: AsyncIterator<Chunk<T>, unknown>;
  private items: Iterator<T> = [][Symbol.iterator]();

  constructor(source: AsyncIterable<Chunk<T>>) {
    this.source = source[Symbol.asyncIterator]();
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  async next(): Promise<IteratorResult<T, undefined>> {
    while (true) {
      const item = this.items.next();
      if (!item.done) return { done: false, value: item.value };

      const result = await this.source.next();
      if (result.done) return { done: true, value: undefined };
      this.items = result.value[Symbol.iterator]();
    }
  }

  async return(): Promise<IteratorResult<T, undefined>> {
    this.items = [][Symbol.iterator]();
    await this.source.return?.();
    return { done: true, value: undefined };
  }
}

/** Flatten a chunked sequence into single items. */
export function flattenChunks<T>(chunks: AsyncIterable<Chunk<T>>): AsyncIterable<T> {
  return {
    [Symbol.asyncIterator]: () => new FlattenedStream(chunks),
  };
}

/** Consumer-facing API over a scheduler. */
export interface Kinesis {
  /**
   * Start a worker and stream records from a Kinesis stream.
   *
   * The scheduler is shut down whenever the sequence ends (error, `break`,
   * or abort).
   */
  readFromKinesisStream(
    appName: string,
    streamName: string,
    options?: ReadOptions,
  ): AsyncIterable<CommittableRecord>;
  readFromKinesisStream(
    settings: KinesisConsumerSettingsInput,
    options?: ReadOptions,
  ): AsyncIterable<CommittableRecord>;

  /** Same as `readFromKinesisStream`, one chunk per processor callback. */
  readChunkedFromKinesisStream(
    settings: KinesisConsumerSettingsInput,
    options?: ReadOptions,
  ): AsyncIterable<Chunk<CommittableRecord>>;

  /** See `checkpointRecords`. */
  checkpointRecords(
    settings?: KinesisCheckpointSettingsInput | KinesisCheckpointSettings,
    options?: CheckpointRecordsOptions,
  ): Pipe<CommittableRecord, KinesisClientRecord>;

  /** See `bypassCheckpoint`. */
  bypassCheckpoint(): Pipe<CommittableRecord, KinesisClientRecord>;
}

class KinesisStream implements Kinesis {
  private readonly schedulerFactory: SchedulerFactory;
  private readonly logger: Logger;
  private readonly workerIdGenerator: () => string;

  constructor(options: KinesisOptions) {
    this.schedulerFactory = options.schedulerFactory;
    this.logger = options.logger ?? createLogger({ module: "kinesis:stream" });
    this.workerIdGenerator = options.workerIdGenerator ?? randomUUID;
  }

  readFromKinesisStream(
    appName: string,
    streamName: string,
    options?: ReadOptions,
  ): AsyncIterable<CommittableRecord>;
  readFromKinesisStream(
    settings: KinesisConsumerSettingsInput,
    options?: ReadOptions,
  ): AsyncIterable<CommittableRecord>;
  readFromKinesisStream(
    first: string | KinesisConsumerSettingsInput,
    second?: string | ReadOptions,
    third?: ReadOptions,
  ): AsyncIterable<CommittableRecord> {
    if (typeof first === "string") {
      const streamName = typeof second === "string" ? second : "";
      return flattenChunks(
        this.readChunkedFromKinesisStream({ appName: first, streamName }, third),
      );
    }
    const options = typeof second === "string" ? third : second;
    return flattenChunks(this.readChunkedFromKinesisStream(first, options));
  }

  readChunkedFromKinesisStream(
    settings: KinesisConsumerSettingsInput,
    options: ReadOptions = {},
  ): AsyncIterable<Chunk<CommittableRecord>> {
    const resolved = kinesisConsumerSettings(settings);
    return {
      [Symbol.asyncIterator]: () =>
        new ChunkStream({
          settings: resolved,
          schedulerFactory: this.schedulerFactory,
          workerIdentifier: this.workerIdGenerator(),
          logger: this.logger,
          signal: options.signal,
        }),
    };
  }

  checkpointRecords(
    settings?: KinesisCheckpointSettingsInput | KinesisCheckpointSettings,
    options: CheckpointRecordsOptions = {},
  ): Pipe<CommittableRecord, KinesisClientRecord> {
    return checkpointRecords(settings, { ...options, logger: options.logger ?? this.logger });
  }

  bypassCheckpoint(): Pipe<CommittableRecord, KinesisClientRecord> {
    return bypassCheckpoint();
  }
}

/** Create a `Kinesis` consumer bound to a scheduler factory. */
export function createKinesis(options: KinesisOptions): Kinesis {
  return new KinesisStream(options);
}
