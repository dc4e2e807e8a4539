import { z } from "zod";
import { parseEnv } from "@shardpipe/utils";

import { InvalidSettingsError } from "./errors";
import type { InitialPosition, RetrievalMode } from "./types";

export const DEFAULT_BUFFER_SIZE = 10;
export const DEFAULT_MAX_BATCH_SIZE = 1000;
export const DEFAULT_MAX_BATCH_WAIT_MS = 10_000;
/** Largest delay `setTimeout` honours; longer ones fire after 1 ms. */
export const MAX_BATCH_WAIT_MS = 2_147_483_647;

const initialPositionSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("trim_horizon") }),
  z.object({ type: z.literal("latest") }),
  z.object({ type: z.literal("at_timestamp"), timestamp: z.date() }),
]);

export const kinesisConsumerSettingsSchema = z.object({
  streamName: z.string().trim().min(1),
  appName: z.string().trim().min(1),
  /** Max chunks held between processor callbacks and the consumer. */
  bufferSize: z.number().int().positive().default(DEFAULT_BUFFER_SIZE),
  retrievalMode: z.enum(["polling", "fanout"]).default("fanout"),
  initialPosition: initialPositionSchema.default({ type: "latest" }),
});

export const kinesisCheckpointSettingsSchema = z.object({
  /** Records per shard before a checkpoint is forced. */
  maxBatchSize: z.number().int().positive().default(DEFAULT_MAX_BATCH_SIZE),
  /** Time after a window's first record before a checkpoint is forced. */
  maxBatchWaitMs: z.number().positive().max(MAX_BATCH_WAIT_MS).default(DEFAULT_MAX_BATCH_WAIT_MS),
});

export type KinesisConsumerSettings = {
  readonly streamName: string;
  readonly appName: string;
  readonly bufferSize: number;
  readonly retrievalMode: RetrievalMode;
  readonly initialPosition: InitialPosition;
};

export type KinesisConsumerSettingsInput = z.input<typeof kinesisConsumerSettingsSchema>;

export type KinesisCheckpointSettings = {
  readonly maxBatchSize: number;
  readonly maxBatchWaitMs: number;
};

export type KinesisCheckpointSettingsInput = z.input<typeof kinesisCheckpointSettingsSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const at = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${at}: ${issue.message}`;
  });
}

/** Validate and freeze consumer settings. */
export function kinesisConsumerSettings(
  input: KinesisConsumerSettingsInput,
): KinesisConsumerSettings {
  const parsed = kinesisConsumerSettingsSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidSettingsError("kinesis consumer settings", formatIssues(parsed.error));
  }
  return Object.freeze(parsed.data);
}

/** Validate and freeze checkpoint settings. */
export function kinesisCheckpointSettings(
  input: KinesisCheckpointSettingsInput = {},
): KinesisCheckpointSettings {
  const parsed = kinesisCheckpointSettingsSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidSettingsError("kinesis checkpoint settings", formatIssues(parsed.error));
  }
  return Object.freeze(parsed.data);
}

export const defaultCheckpointSettings: KinesisCheckpointSettings = kinesisCheckpointSettings();

export function consumerSettingsFromEnv(
  source: NodeJS.ProcessEnv = process.env,
  overrides: Partial<KinesisConsumerSettingsInput> = {},
): KinesisConsumerSettings {
  const { kinesis } = parseEnv(source);
  return kinesisConsumerSettings({
    streamName: kinesis.streamName ?? "",
    appName: kinesis.appName ?? "",
    bufferSize: kinesis.bufferSize,
    retrievalMode: kinesis.retrievalMode,
    initialPosition: kinesis.initialPosition,
    ...overrides,
  });
}

export function checkpointSettingsFromEnv(
  source: NodeJS.ProcessEnv = process.env,
  overrides: Partial<KinesisCheckpointSettingsInput> = {},
): KinesisCheckpointSettings {
  const { kinesis } = parseEnv(source);
  return kinesisCheckpointSettings({
    maxBatchSize: kinesis.checkpoint.maxBatchSize,
    maxBatchWaitMs: kinesis.checkpoint.maxBatchWaitMs,
    ...overrides,
  });
}
