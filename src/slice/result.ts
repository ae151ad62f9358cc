import type { AllocationError } from "./errors.js";
import type { Slice } from "./slice.js";

/**
 * Why a source-driven element build stopped. Produced by
 * `constructElements`; the caller is responsible for rollback.
 */
export type ConstructFailure =
  | { type: "element_failed"; index: number; cause: unknown }
  | { type: "source_failed"; index: number; cause: unknown }
  | { type: "source_exhausted"; expected: number; actual: number }
  | { type: "source_overflow"; expected: number };

export type ConstructOutcome =
  | { ok: true; constructed: number }
  | { ok: false; constructed: number; failure: ConstructFailure };

export function constructOk(constructed: number): ConstructOutcome {
  return { ok: true, constructed };
}

export function constructErr(
  constructed: number,
  failure: ConstructFailure,
): ConstructOutcome {
  return { ok: false, constructed, failure };
}

export type SliceBuildError =
  | { type: "allocation_failed"; error: AllocationError }
  | { type: "source_invalid"; declared: number }
  | ConstructFailure;

export type SliceResult<T> =
  | { ok: true; slice: Slice<T> }
  | { ok: false; error: SliceBuildError };

export function sliceOk<T>(slice: Slice<T>): SliceResult<T> {
  return { ok: true, slice };
}

export function sliceErr<T>(error: SliceBuildError): SliceResult<T> {
  return { ok: false, error };
}

export function isSliceOk<T>(
  result: SliceResult<T>,
): result is { ok: true; slice: Slice<T> } {
  return result.ok === true;
}

export function isSliceErr<T>(
  result: SliceResult<T>,
): result is { ok: false; error: SliceBuildError } {
  return result.ok === false;
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export function sliceBuildErrorToMessage(error: SliceBuildError): string {
  switch (error.type) {
    case "allocation_failed":
      return `Allocation failed: ${error.error.message}`;
    case "source_invalid":
      return `Source declares an invalid element count: ${error.declared}`;
    case "element_failed":
      return `Construction of element ${error.index} failed: ${describeCause(error.cause)}`;
    case "source_failed":
      return `Source failed after ${error.index} elements: ${describeCause(error.cause)}`;
    case "source_exhausted":
      return `Source yielded ${error.actual} of ${error.expected} declared elements`;
    case "source_overflow":
      return `Source yielded more than its ${error.expected} declared elements`;
  }
}

export function sliceBuildErrorToCode(error: SliceBuildError): string {
  switch (error.type) {
    case "allocation_failed":
      return "ALLOCATION_FAILED";
    case "source_invalid":
      return "SOURCE_INVALID";
    case "element_failed":
      return "ELEMENT_FAILED";
    case "source_failed":
      return "SOURCE_FAILED";
    case "source_exhausted":
      return "SOURCE_EXHAUSTED";
    case "source_overflow":
      return "SOURCE_OVERFLOW";
  }
}
