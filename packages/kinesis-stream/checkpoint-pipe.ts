import { createLogger, type Logger } from "@shardpipe/utils";

import { BoundedQueue } from "./bounded-queue";
import { maxCommittableRecord, type CommittableRecord } from "./committable-record";
import { BufferClosedError, CheckpointFailedError } from "./errors";
import {
  defaultCheckpointSettings,
  kinesisCheckpointSettings,
  type KinesisCheckpointSettings,
  type KinesisCheckpointSettingsInput,
} from "./settings";
import type { KinesisClientRecord, Pipe, ShardId } from "./types";

const OUTPUT_CAPACITY = 64;

export type CheckpointRecordsOptions = {
  /**
   * Also emit every input record as soon as it arrives, not just the
   * checkpointed maximum of each window.
   */
  passThrough?: boolean;
  /**
   * Cancellation of the upstream read. Once it fires, open windows are
   * dropped instead of drained and no further checkpoint starts.
   */
  signal?: AbortSignal;
  logger?: Logger;
};

type WindowCloseReason = "size" | "time" | "drain";

type CommitWindow = (
  shardId: ShardId,
  window: CommittableRecord[],
  reason: WindowCloseReason,
) => Promise<void>;

/**
 * Count-or-time window for one shard.
 *
 * Closed windows are committed one after another on `tail`, so checkpoints
 * for a shard never overtake each other.
 */
class ShardWindow {
  private records: CommittableRecord[] = [];
  private timer: ReturnType<typeof setTimeout> | null = null;
  private tail: Promise<void> = Promise.resolve();
  private closedPending = 0;

  constructor(
    readonly shardId: ShardId,
    private readonly settings: KinesisCheckpointSettings,
    private readonly commit: CommitWindow,
  ) {}

  push(record: CommittableRecord): void {
    this.records.push(record);

    if (this.records.length >= this.settings.maxBatchSize) {
      this.close("size");
      return;
    }

    if (this.records.length === 1) {
      this.timer = setTimeout(() => this.close("time"), this.settings.maxBatchWaitMs);
    }
  }

  close(reason: WindowCloseReason): void {
    this.clearTimer();
    if (this.records.length === 0) return;

    const window = this.records;
    this.records = [];
    this.closedPending += 1;
    this.tail = this.tail
      .then(() => this.commit(this.shardId, window, reason))
      .finally(() => {
        this.closedPending -= 1;
      });
  }

  /** Closed windows not yet committed, the running one included. */
  get pendingCommits(): number {
    return this.closedPending;
  }

  /** Drop the open window without committing it. */
  discard(): void {
    this.clearTimer();
    this.records = [];
  }

  /** Resolves once every closed window has been committed (or skipped). */
  settled(): Promise<void> {
    return this.tail;
  }

  private clearTimer(): void {
    if (this.timer === null) return;
    clearTimeout(this.timer);
    this.timer = null;
  }
}

/**
 * Pipe that checkpoints records per shard in batches.
 *
 * Records are grouped by shard; each shard closes a window after
 * `maxBatchSize` records or `maxBatchWaitMs` after the window's first record,
 * whichever comes first. Only the highest-ordered record of a window is
 * checkpointed (committing everything before it on that shard) and emitted.
 * Shards are checkpointed independently; output is in completion order.
 * Reading from the source pauses while a shard has a checkpoint running and
 * another window already closed behind it.
 *
 * A failed checkpoint ends the output with a `CheckpointFailedError`. There
 * are no retries here.
 */
export function checkpointRecords(
  settings: KinesisCheckpointSettingsInput | KinesisCheckpointSettings = defaultCheckpointSettings,
  options: CheckpointRecordsOptions = {},
): Pipe<CommittableRecord, KinesisClientRecord> {
  const resolved = kinesisCheckpointSettings(settings);
  const logger = options.logger ?? createLogger({ module: "kinesis:checkpoint" });
  const passThrough = options.passThrough ?? false;

  return (source) =>
    runCheckpointPipe(source, resolved, { passThrough, signal: options.signal, logger });
}

/** One-to-one passthrough without checkpointing. */
export function bypassCheckpoint(): Pipe<CommittableRecord, KinesisClientRecord> {
  return async function* (source) {
    for await (const record of source) {
      yield record.record;
    }
  };
}

type PipeRuntime = {
  passThrough: boolean;
  signal: AbortSignal | undefined;
  logger: Logger;
};

async function* runCheckpointPipe(
  source: AsyncIterable<CommittableRecord>,
  settings: KinesisCheckpointSettings,
  runtime: PipeRuntime,
): AsyncGenerator<KinesisClientRecord, void, undefined> {
  const { passThrough, signal, logger } = runtime;
  const output = new BoundedQueue<KinesisClientRecord>(OUTPUT_CAPACITY);
  const windows = new Map<ShardId, ShardWindow>();
  const iterator = source[Symbol.asyncIterator]();
  let stopped = false;

  let wake = () => {};
  const stopRequested = new Promise<void>((resolve) => {
    wake = () => resolve();
  });
  const cancelled = () => stopped || signal?.aborted === true;

  const onAbort = () => {
    for (const window of windows.values()) window.discard();
    logger.debug({ shards: windows.size }, "kinesis.checkpoint_cancelled");
    output.close();
    wake();
  };
  signal?.addEventListener("abort", onAbort, { once: true });

  const commit: CommitWindow = async (shardId, window, reason) => {
    // Windows queued behind a running checkpoint are dropped once cancelled.
    if (cancelled() || output.closed) return;

    const max = maxCommittableRecord(window);
    if (!max) return;

    const startedAt = Date.now();
    try {
      await max.checkpoint();
    } catch (e) {
      logger.error(
        {
          shardId,
          sequenceNumber: max.sequenceNumber,
          subSequenceNumber: max.subSequenceNumber,
          err: e,
        },
        "kinesis.checkpoint_failed",
      );
      output.fail(
        new CheckpointFailedError(shardId, max.sequenceNumber, max.subSequenceNumber, e),
      );
      return;
    }

    logger.debug(
      {
        shardId,
        sequenceNumber: max.sequenceNumber,
        subSequenceNumber: max.subSequenceNumber,
        records: window.length,
        reason,
        durationMs: Date.now() - startedAt,
      },
      "kinesis.checkpoint",
    );

    if (passThrough) return;
    try {
      await output.offer(max.record);
    } catch (e) {
      if (e instanceof BufferClosedError) return;
      output.fail(e);
    }
  };

  const settleAll = () => Promise.all([...windows.values()].map((w) => w.settled()));

  const pump = (async () => {
    try {
      while (!cancelled()) {
        const result = await iterator.next();
        if (result.done || cancelled()) break;

        const record = result.value;
        let window = windows.get(record.shardId);
        if (!window) {
          window = new ShardWindow(record.shardId, settings, commit);
          windows.set(record.shardId, window);
          logger.debug({ shardId: record.shardId }, "kinesis.shard_partition_created");
        }
        window.push(record);

        if (passThrough) await output.offer(record.record);

        // At most one closed window waits behind the running checkpoint of a shard.
        if (window.pendingCommits > 1) {
          await Promise.race([window.settled(), stopRequested]);
        }
      }

      for (const window of windows.values()) {
        if (cancelled()) window.discard();
        else window.close("drain");
      }
      await settleAll();
      output.close();
    } catch (e) {
      for (const window of windows.values()) window.discard();
      await settleAll();
      if (e instanceof BufferClosedError && stopped) return;
      output.fail(e);
    }
  })();

  try {
    for await (const record of output) {
      yield record;
    }
  } finally {
    stopped = true;
    wake();
    signal?.removeEventListener("abort", onAbort);
    output.close();
    for (const window of windows.values()) window.discard();

    try {
      await iterator.return?.();
    } catch (e) {
      logger.warn({ err: e }, "kinesis.source_close_failed");
    }
    await pump;
    await settleAll();
  }
}
