import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  BoundedQueue,
  CheckpointFailedError,
  CommittableRecord,
  InvalidSettingsError,
  bypassCheckpoint,
  checkpointRecords,
  type ExtendedSequenceNumber,
  type KinesisClientRecord,
  type ProcessorLifecycle,
  type RecordProcessorCheckpointer,
} from "../index";
import { RecordingCheckpointer, kinesisRecord, nextTicks } from "./fake-scheduler";

function committable(
  checkpointer: RecordingCheckpointer,
  sequenceNumber: string,
  subSequenceNumber = 0,
  processor: ProcessorLifecycle = { isShutdown: false },
): CommittableRecord {
  return new CommittableRecord({
    shardId: checkpointer.shardId,
    record: kinesisRecord(sequenceNumber, subSequenceNumber),
    checkpointer,
    recordProcessorStartingSequenceNumber: { sequenceNumber: "TRIM_HORIZON" },
    processor,
  });
}

async function sourceOf(
  records: CommittableRecord[],
  options: { close?: boolean } = {},
): Promise<BoundedQueue<CommittableRecord>> {
  const queue = new BoundedQueue<CommittableRecord>(Math.max(records.length, 1));
  for (const record of records) await queue.offer(record);
  if (options.close ?? true) queue.close();
  return queue;
}

async function collect(records: AsyncIterable<KinesisClientRecord>): Promise<string[]> {
  const seen: string[] = [];
  for await (const record of records) seen.push(record.sequenceNumber);
  return seen;
}

function positions(checkpointer: RecordingCheckpointer): string[] {
  return checkpointer.calls.map((c) =>
    c.position ? `${c.position.sequenceNumber}/${c.position.subSequenceNumber ?? 0}` : "SHARD_END",
  );
}

/** Holds every checkpoint until `release()`. */
class GatedCheckpointer implements RecordProcessorCheckpointer {
  readonly calls: string[] = [];
  private released = false;
  private readonly waiting: Array<() => void> = [];

  async checkpoint(position?: ExtendedSequenceNumber): Promise<void> {
    this.calls.push(position?.sequenceNumber ?? "SHARD_END");
    if (this.released) return;
    await new Promise<void>((resolve) => {
      this.waiting.push(resolve);
    });
  }

  release(): void {
    this.released = true;
    for (const resolve of this.waiting.splice(0)) resolve();
  }
}

describe("checkpointRecords", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("checkpoints the max of a full batch, then the rest once the wait expires", async () => {
    const shard = new RecordingCheckpointer("shard-0");
    const source = await sourceOf(
      ["100", "101", "102", "103", "104"].map((seq) => committable(shard, seq)),
      { close: false },
    );

    const out = checkpointRecords({ maxBatchSize: 3, maxBatchWaitMs: 10_000 })(source)[
      Symbol.asyncIterator
    ]();

    const first = await out.next();
    expect(first.done ? null : first.value.sequenceNumber).toBe("102");
    expect(positions(shard)).toEqual(["102/0"]);

    const second = out.next();
    await vi.advanceTimersByTimeAsync(10_000);
    const r2 = await second;
    expect(r2.done ? null : r2.value.sequenceNumber).toBe("104");
    expect(positions(shard)).toEqual(["102/0", "104/0"]);

    source.close();
    expect(await out.next()).toEqual({ done: true, value: undefined });
  });

  it("closes windows on count and drains the partial window when the source ends", async () => {
    const shard = new RecordingCheckpointer("shard-0");
    const source = await sourceOf(["1", "2", "3", "4", "5"].map((seq) => committable(shard, seq)));

    const emitted = await collect(
      checkpointRecords({ maxBatchSize: 2, maxBatchWaitMs: 60_000 })(source),
    );

    expect(emitted).toEqual(["2", "4", "5"]);
    expect(positions(shard)).toEqual(["2/0", "4/0", "5/0"]);
  });

  it("closes a window on time only after the full wait", async () => {
    const shard = new RecordingCheckpointer("shard-0");
    const source = await sourceOf([committable(shard, "7")], { close: false });

    const out = checkpointRecords({ maxBatchSize: 100, maxBatchWaitMs: 1000 })(source)[
      Symbol.asyncIterator
    ]();
    const pending = out.next();
    await nextTicks(20);

    await vi.advanceTimersByTimeAsync(999);
    expect(shard.calls).toEqual([]);

    await vi.advanceTimersByTimeAsync(1);
    const result = await pending;
    expect(result.done ? null : result.value.sequenceNumber).toBe("7");
    expect(shard.calls).toEqual([
      { shardId: "shard-0", position: { sequenceNumber: "7", subSequenceNumber: 0 } },
    ]);

    // Nothing new arrived, so no further checkpoint.
    await vi.advanceTimersByTimeAsync(5000);
    expect(shard.calls).toHaveLength(1);

    source.close();
    expect(await out.next()).toEqual({ done: true, value: undefined });
  });

  it("orders sequence numbers numerically, then by sub-sequence", async () => {
    const shard = new RecordingCheckpointer("shard-0");
    const source = await sourceOf([
      committable(shard, "100"),
      committable(shard, "99"),
      committable(shard, "500", 2),
      committable(shard, "500", 1),
    ]);

    const emitted = await collect(
      checkpointRecords({ maxBatchSize: 2, maxBatchWaitMs: 60_000 })(source),
    );

    expect(emitted).toEqual(["100", "500"]);
    expect(positions(shard)).toEqual(["100/0", "500/2"]);
  });

  it("keeps shards in separate windows", async () => {
    const a = new RecordingCheckpointer("shard-a");
    const b = new RecordingCheckpointer("shard-b");
    const source = await sourceOf([
      committable(a, "1"),
      committable(b, "2"),
      committable(a, "3"),
      committable(b, "4"),
    ]);

    const emitted = await collect(
      checkpointRecords({ maxBatchSize: 2, maxBatchWaitMs: 60_000 })(source),
    );

    expect([...emitted].sort()).toEqual(["3", "4"]);
    expect(positions(a)).toEqual(["3/0"]);
    expect(positions(b)).toEqual(["4/0"]);
  });

  it("emits every record with passThrough while still checkpointing per window", async () => {
    const shard = new RecordingCheckpointer("shard-0");
    const source = await sourceOf(["1", "2", "3"].map((seq) => committable(shard, seq)));

    const emitted = await collect(
      checkpointRecords({ maxBatchSize: 2, maxBatchWaitMs: 60_000 }, { passThrough: true })(source),
    );

    expect(emitted).toEqual(["1", "2", "3"]);
    expect(positions(shard)).toEqual(["2/0", "3/0"]);
  });

  it("skips the checkpoint call for records whose processor has shut down", async () => {
    const shard = new RecordingCheckpointer("shard-0");
    const gone: ProcessorLifecycle = { isShutdown: true };
    const source = await sourceOf([committable(shard, "1", 0, gone), committable(shard, "2", 0, gone)]);

    const emitted = await collect(
      checkpointRecords({ maxBatchSize: 2, maxBatchWaitMs: 60_000 })(source),
    );

    expect(emitted).toEqual(["2"]);
    expect(shard.calls).toEqual([]);
  });

  it("fails the output with CheckpointFailedError and closes the source", async () => {
    const shard = new RecordingCheckpointer("shard-0");
    shard.failWith = new Error("lease expired");
    const source = await sourceOf([committable(shard, "1"), committable(shard, "2")], {
      close: false,
    });

    const out = checkpointRecords({ maxBatchSize: 2, maxBatchWaitMs: 60_000 })(source)[
      Symbol.asyncIterator
    ]();

    const error = await out.next().then(
      () => null,
      (e: unknown) => e,
    );
    expect(error).toBeInstanceOf(CheckpointFailedError);
    expect(error instanceof Error ? error.message : "").toBe(
      "checkpoint failed for shard shard-0 at 2/0: lease expired",
    );
    expect(source.closed).toBe(true);
  });

  it("passes source errors through", async () => {
    const shard = new RecordingCheckpointer("shard-0");
    async function* failing(): AsyncGenerator<CommittableRecord> {
      yield committable(shard, "1");
      throw new Error("source broke");
    }

    await expect(
      collect(checkpointRecords({ maxBatchSize: 10, maxBatchWaitMs: 60_000 })(failing())),
    ).rejects.toThrow("source broke");
    expect(shard.calls).toEqual([]);
  });

  it("stops checkpointing once the consumer returns", async () => {
    const shard = new RecordingCheckpointer("shard-0");
    const source = await sourceOf(["1", "2", "3"].map((seq) => committable(shard, seq)), {
      close: false,
    });

    const out = checkpointRecords({ maxBatchSize: 2, maxBatchWaitMs: 1000 })(source)[
      Symbol.asyncIterator
    ]();

    const first = await out.next();
    expect(first.done ? null : first.value.sequenceNumber).toBe("2");

    await out.return?.();
    expect(source.closed).toBe(true);

    await vi.advanceTimersByTimeAsync(5000);
    expect(positions(shard)).toEqual(["2/0"]);
  });

  it("stops pulling from the source while a shard's checkpoints lag", async () => {
    const gate = new GatedCheckpointer();
    let pulled = 0;
    async function* source(): AsyncGenerator<CommittableRecord> {
      for (let i = 1; i <= 50; i++) {
        pulled = i;
        yield new CommittableRecord({
          shardId: "shard-0",
          record: kinesisRecord(String(i)),
          checkpointer: gate,
          recordProcessorStartingSequenceNumber: { sequenceNumber: "TRIM_HORIZON" },
          processor: { isShutdown: false },
        });
      }
    }

    const out = checkpointRecords({ maxBatchSize: 1, maxBatchWaitMs: 60_000 })(source())[
      Symbol.asyncIterator
    ]();
    const first = out.next();
    await nextTicks(50);

    // One checkpoint running, one closed window queued behind it.
    expect(pulled).toBe(2);
    expect(gate.calls).toEqual(["1"]);

    gate.release();
    const seen: string[] = [];
    const r1 = await first;
    if (!r1.done) seen.push(r1.value.sequenceNumber);
    for (;;) {
      const r = await out.next();
      if (r.done) break;
      seen.push(r.value.sequenceNumber);
    }

    expect(seen).toHaveLength(50);
    expect(seen.slice(0, 3)).toEqual(["1", "2", "3"]);
    expect(seen[49]).toBe("50");
    expect(pulled).toBe(50);
  });

  it("drops open windows instead of draining them once the signal fires", async () => {
    const shard = new RecordingCheckpointer("shard-0");
    const controller = new AbortController();
    const source = await sourceOf([committable(shard, "1"), committable(shard, "2")], {
      close: false,
    });

    const out = checkpointRecords(
      { maxBatchSize: 100, maxBatchWaitMs: 1000 },
      { signal: controller.signal },
    )(source)[Symbol.asyncIterator]();
    const pending = out.next();
    await nextTicks(20);

    controller.abort();

    expect(await pending).toEqual({ done: true, value: undefined });
    expect(source.closed).toBe(true);
    await vi.advanceTimersByTimeAsync(5000);
    expect(shard.calls).toEqual([]);
  });

  it("checkpoints nothing when the signal is already aborted", async () => {
    const shard = new RecordingCheckpointer("shard-0");
    const controller = new AbortController();
    controller.abort();
    const source = await sourceOf([committable(shard, "1"), committable(shard, "2")]);

    const emitted = await collect(
      checkpointRecords({ maxBatchSize: 1, maxBatchWaitMs: 1000 }, { signal: controller.signal })(
        source,
      ),
    );

    expect(emitted).toEqual([]);
    expect(shard.calls).toEqual([]);
  });

  it("rejects invalid settings when the pipe is built", () => {
    expect(() => checkpointRecords({ maxBatchSize: 0 })).toThrow(InvalidSettingsError);
    expect(() => checkpointRecords({ maxBatchWaitMs: -1 })).toThrow(InvalidSettingsError);
    expect(() => checkpointRecords({ maxBatchWaitMs: 3_000_000_000 })).toThrow(InvalidSettingsError);
  });
});

describe("bypassCheckpoint", () => {
  it("unwraps every record and never checkpoints", async () => {
    const shard = new RecordingCheckpointer("shard-0");
    const source = await sourceOf(["1", "2", "3"].map((seq) => committable(shard, seq)));

    expect(await collect(bypassCheckpoint()(source))).toEqual(["1", "2", "3"]);
    expect(shard.calls).toEqual([]);
  });
});
