export * from "./types";
export * from "./errors";
export * from "./settings";
export * from "./sequence-number";
export * from "./committable-record";
export * from "./bounded-queue";
export * from "./chunked-record-processor";
export * from "./checkpoint-pipe";
export * from "./kinesis";
