export {
  type ElementType,
  type ElementTypeName,
  Float32Element,
  Float64Element,
  Int32Element,
  Int64Element,
  type NumericArray,
  type NumericElement,
} from "./element-types";
export { DoubleGrid, FloatGrid, IntGrid, LongGrid } from "./families";
export {
  NumericGrid,
  type NumericOperand,
  typedStorage,
  typedStorageFrom,
  typedStorageOf,
} from "./numeric-grid";
