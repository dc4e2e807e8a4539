export type Env = ReturnType<typeof parseEnv>;

export type RetrievalModeInput = "polling" | "fanout";

export type InitialPositionInput =
  | { type: "trim_horizon" }
  | { type: "latest" }
  | { type: "at_timestamp"; timestamp: Date };

function parseOptionalString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parsePositiveInt(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const n = Math.floor(Number(value));
  if (!Number.isFinite(n) || n <= 0) return undefined;
  return n;
}

function parseRetrievalMode(value: string | undefined): RetrievalModeInput | undefined {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "polling" || normalized === "fanout") return normalized;
  return undefined;
}

/** `trim_horizon`, `latest`, or anything `Date` can parse (an ISO timestamp). */
function parseInitialPosition(value: string | undefined): InitialPositionInput | undefined {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) return undefined;
  if (normalized === "trim_horizon") return { type: "trim_horizon" };
  if (normalized === "latest") return { type: "latest" };

  const ms = Date.parse(value ?? "");
  if (Number.isNaN(ms)) return undefined;
  return { type: "at_timestamp", timestamp: new Date(ms) };
}

export function parseEnv(source: NodeJS.ProcessEnv = process.env) {
  return {
    kinesis: {
      streamName: parseOptionalString(source.KINESIS_STREAM_NAME),
      appName: parseOptionalString(source.KINESIS_APP_NAME),
      bufferSize: parsePositiveInt(source.KINESIS_BUFFER_SIZE),
      retrievalMode: parseRetrievalMode(source.KINESIS_RETRIEVAL_MODE),
      initialPosition: parseInitialPosition(source.KINESIS_INITIAL_POSITION),
      checkpoint: {
        maxBatchSize: parsePositiveInt(source.KINESIS_CHECKPOINT_MAX_BATCH_SIZE),
        maxBatchWaitMs: parsePositiveInt(source.KINESIS_CHECKPOINT_MAX_BATCH_WAIT_MS),
      },
    },
  } as const;
}
