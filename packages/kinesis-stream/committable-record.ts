import {
  compareSequencePositions,
  maxBy,
  type Comparator,
} from "./sequence-number";
import type {
  ExtendedSequenceNumber,
  KinesisClientRecord,
  RecordProcessorCheckpointer,
  ShardId,
} from "./types";

/** Liveness of the processor that delivered a record. */
export interface ProcessorLifecycle {
  /** True once the lease was lost or shutdown was requested. */
  readonly isShutdown: boolean;
}

export type CommittableRecordInit = {
  shardId: ShardId;
  record: KinesisClientRecord;
  checkpointer: RecordProcessorCheckpointer;
  recordProcessorStartingSequenceNumber: ExtendedSequenceNumber;
  millisBehindLatest?: number;
  processor: ProcessorLifecycle;
};

/**
 * A delivered record plus the capability to checkpoint up to it.
 *
 * Checkpointing a record commits every earlier record on the same shard.
 */
export class CommittableRecord {
  readonly shardId: ShardId;
  readonly record: KinesisClientRecord;
  /** Position the delivering lease resumed from. */
  readonly recordProcessorStartingSequenceNumber: ExtendedSequenceNumber;
  readonly millisBehindLatest: number | undefined;

  private readonly checkpointer: RecordProcessorCheckpointer;
  private readonly processor: ProcessorLifecycle;

  constructor(init: CommittableRecordInit) {
    this.shardId = init.shardId;
    this.record = init.record;
    this.recordProcessorStartingSequenceNumber = init.recordProcessorStartingSequenceNumber;
    this.millisBehindLatest = init.millisBehindLatest;
    this.checkpointer = init.checkpointer;
    this.processor = init.processor;
  }

  get sequenceNumber(): string {
    return this.record.sequenceNumber;
  }

  get subSequenceNumber(): number {
    return this.record.subSequenceNumber;
  }

  /**
   * Commit progress up to and including this record.
   *
   * No-op once the delivering processor has been shut down: the lease now
   * belongs to someone else and the coordinator would reject the write.
   */
  async checkpoint(): Promise<void> {
    if (this.processor.isShutdown) return;
    await this.checkpointer.checkpoint({
      sequenceNumber: this.sequenceNumber,
      subSequenceNumber: this.subSequenceNumber,
    });
  }
}

export const compareCommittableRecords: Comparator<CommittableRecord> = compareSequencePositions;

export function maxCommittableRecord(
  records: readonly CommittableRecord[],
): CommittableRecord | undefined {
  return maxBy(records, compareCommittableRecords);
}
