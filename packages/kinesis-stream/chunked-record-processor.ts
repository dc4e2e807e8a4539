import { createLogger, type Logger } from "@shardpipe/utils";

import { CommittableRecord, type ProcessorLifecycle } from "./committable-record";
import { BufferClosedError } from "./errors";
import type {
  Chunk,
  ExtendedSequenceNumber,
  InitializationInput,
  LeaseLostInput,
  ProcessRecordsInput,
  ShardEndedInput,
  ShardId,
  ShardRecordProcessor,
  ShutdownRequestedInput,
} from "./types";

/** Receives each delivered batch; resolving late is how backpressure reaches the coordinator. */
export type ChunkSink = (chunk: Chunk<CommittableRecord>) => Promise<void>;

export type ChunkedRecordProcessorOptions = {
  logger?: Logger;
};

/**
 * Shard processor that forwards every delivered batch to a sink as one chunk.
 *
 * One instance per lease. Errors from the sink are logged and swallowed so
 * they never unwind into the coordinator's own delivery loop.
 */
export class ChunkedRecordProcessor implements ShardRecordProcessor, ProcessorLifecycle {
  private readonly sink: ChunkSink;
  private readonly logger: Logger;

  private shardId: ShardId | null = null;
  private startingSequenceNumber: ExtendedSequenceNumber | null = null;
  private shutdown = false;

  constructor(sink: ChunkSink, options: ChunkedRecordProcessorOptions = {}) {
    this.sink = sink;
    this.logger = options.logger ?? createLogger({ module: "kinesis:processor" });
  }

  get isShutdown(): boolean {
    return this.shutdown;
  }

  async initialize(input: InitializationInput): Promise<void> {
    this.shardId = input.shardId;
    this.startingSequenceNumber = input.extendedSequenceNumber;

    this.logger.debug(
      {
        shardId: input.shardId,
        sequenceNumber: input.extendedSequenceNumber.sequenceNumber,
        subSequenceNumber: input.extendedSequenceNumber.subSequenceNumber,
      },
      "kinesis.processor_initialized",
    );
  }

  async processRecords(input: ProcessRecordsInput): Promise<void> {
    const shardId = this.shardId;
    const startingSequenceNumber = this.startingSequenceNumber;
    if (shardId === null || startingSequenceNumber === null) {
      throw new Error("processRecords called before initialize");
    }
    if (input.records.length === 0) return;

    const chunk = input.records.map(
      (record) =>
        new CommittableRecord({
          shardId,
          record,
          checkpointer: input.checkpointer,
          recordProcessorStartingSequenceNumber: startingSequenceNumber,
          millisBehindLatest: input.millisBehindLatest,
          processor: this,
        }),
    );

    const startedAt = Date.now();
    try {
      await this.sink(chunk);
    } catch (e) {
      if (e instanceof BufferClosedError) {
        // Consumer is gone; the coordinator re-delivers from the last checkpoint.
        this.logger.warn({ shardId, records: chunk.length }, "kinesis.enqueue_dropped");
        return;
      }
      this.logger.error({ shardId, records: chunk.length, err: e }, "kinesis.enqueue_failed");
      return;
    }

    this.logger.debug(
      {
        shardId,
        records: chunk.length,
        millisBehindLatest: input.millisBehindLatest,
        waitedMs: Date.now() - startedAt,
      },
      "kinesis.chunk_enqueued",
    );
  }

  async leaseLost(_input: LeaseLostInput): Promise<void> {
    this.shutdown = true;
    this.logger.info({ shardId: this.shardId }, "kinesis.lease_lost");
  }

  /** A finished shard must be checkpointed at SHARD_END before its children are leased. */
  async shardEnded(input: ShardEndedInput): Promise<void> {
    try {
      await input.checkpointer.checkpoint();
      this.logger.info({ shardId: this.shardId }, "kinesis.shard_ended");
    } catch (e) {
      this.logger.error({ shardId: this.shardId, err: e }, "kinesis.shard_end_checkpoint_failed");
    } finally {
      this.shutdown = true;
    }
  }

  async shutdownRequested(_input: ShutdownRequestedInput): Promise<void> {
    this.shutdown = true;
    this.logger.info({ shardId: this.shardId }, "kinesis.shutdown_requested");
  }
}
