export * from "./random/seeded-random";
export * from "./schemas/grid-options";
export * from "./types/error";
export * from "./types/grid";
export * from "./types/result";
export * from "./utils/builder";
