export * from "./bounds";
export { createDenseGrid, denseCopyOf, denseGridOf } from "./dense";
export {
  gridsEqual,
  isEqualValue,
  isEquatable,
  isReadonlyGrid,
} from "./equality";
export { formatRows } from "./format";
export { Grid } from "./grid";
export {
  type CriticalSection,
  type Equatable,
  type GridEntry,
  type MutableGrid,
  type ReadonlyGrid,
  UNGUARDED,
} from "./types";
