export { Slice, sizeOf } from "./slice.js";
export type {
  CapacityOptions,
  FromOptions,
  Ownership,
  SizedIterable,
  SlotRef,
  StorageOptions,
} from "./slice.js";

export {
  StorageManager,
  defaultStorageManager,
  isSlotCount,
} from "./storage.js";
export type {
  StorageAddress,
  StorageBlock,
  StorageManagerOptions,
  StorageOrigin,
  StorageStats,
} from "./storage.js";

export { constructElements, destroyPrefix, placeAt } from "./lifecycle.js";

export {
  copyTraits,
  isTriviallyDestructible,
  selectStrategy,
  transferTraits,
} from "./traits.js";
export type {
  ConstructionKind,
  ConstructionStrategy,
  CopyTraits,
  Destroy,
  ElementTraits,
  IsTriviallyDestructible,
  MoveTraits,
} from "./traits.js";

export {
  constructErr,
  constructOk,
  isSliceErr,
  isSliceOk,
  sliceBuildErrorToCode,
  sliceBuildErrorToMessage,
  sliceErr,
  sliceOk,
} from "./result.js";
export type {
  ConstructFailure,
  ConstructOutcome,
  SliceBuildError,
  SliceResult,
} from "./result.js";

export * from "./errors.js";
