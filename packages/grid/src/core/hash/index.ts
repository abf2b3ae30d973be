/**
 * Hash utilities module
 */

export * from "./fnv64";
export * from "./grid-hash";
