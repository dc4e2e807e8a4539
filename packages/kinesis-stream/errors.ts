export class BufferClosedError extends Error {
  override readonly name = "BufferClosedError";

  constructor(message = "buffer is closed") {
    super(message);
  }
}

/** The scheduler's run loop resolved without anyone asking it to stop. */
export class CoordinatorExitedError extends Error {
  override readonly name = "CoordinatorExitedError";

  constructor(readonly workerIdentifier: string) {
    super(`scheduler ${workerIdentifier} exited unexpectedly`);
  }
}

export class CoordinatorFailedError extends Error {
  override readonly name = "CoordinatorFailedError";

  constructor(
    readonly workerIdentifier: string,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`scheduler ${workerIdentifier} failed: ${detail}`, { cause });
  }
}

export class CheckpointFailedError extends Error {
  override readonly name = "CheckpointFailedError";

  constructor(
    readonly shardId: string,
    readonly sequenceNumber: string,
    readonly subSequenceNumber: number,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(
      `checkpoint failed for shard ${shardId} at ${sequenceNumber}/${subSequenceNumber}: ${detail}`,
      { cause },
    );
  }
}

export class InvalidSettingsError extends Error {
  override readonly name = "InvalidSettingsError";

  constructor(
    label: string,
    readonly issues: readonly string[],
  ) {
    super(`invalid ${label}: ${issues.join("; ")}`);
  }
}
