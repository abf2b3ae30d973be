export type { AtomicCellStorage, GridStorage } from "./types";
export { DenseStorage } from "./dense-storage";
export { type OccupiedBounds, SparseStorage } from "./sparse-storage";
export { TypedArrayStorage } from "./typed-storage";
export {
  AtomicReference,
  INT32_BYTES,
  ReferenceCellStorage,
  SharedInt32CellStorage,
} from "./atomic-storage";
