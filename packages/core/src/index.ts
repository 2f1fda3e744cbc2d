export * from "./constants";
export * from "./errors";
export * from "./wait-policy";
export * from "./gateway-spec";
export * from "./metadata";
export * from "./server-create-config";

export const HOIST_VERSION = "0.1.0";
