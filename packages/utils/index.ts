export * from "./logging";
export * from "./env";
