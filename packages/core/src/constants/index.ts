/**
 * Constants module for @hoist/core.
 */

export * from "./defaults";
export * from "./timeouts";
