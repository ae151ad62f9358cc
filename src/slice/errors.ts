export enum SliceErrorCode {
  ALLOCATION_FAILED = "ALLOCATION_FAILED",
  INVALID_ARGUMENT = "INVALID_ARGUMENT",
  OUT_OF_BOUNDS = "OUT_OF_BOUNDS",
  INVALID_RANGE = "INVALID_RANGE",
  CAPACITY_EXCEEDED = "CAPACITY_EXCEEDED",
  RELEASE_VIOLATION = "RELEASE_VIOLATION",
  USE_AFTER_DESTROY = "USE_AFTER_DESTROY",
  STALE_VIEW = "STALE_VIEW",
  ELEMENT_DESTROY_FAILED = "ELEMENT_DESTROY_FAILED",
  CONFIG_ERROR = "CONFIG_ERROR",
}

export class SliceError extends Error {
  readonly code: SliceErrorCode;
  constructor(code: SliceErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SliceError";
    this.code = code;
  }
}

export class AllocationError extends SliceError {
  readonly requested: number;
  constructor(requested: number, message: string, options?: ErrorOptions) {
    super(SliceErrorCode.ALLOCATION_FAILED, message, options);
    this.name = "AllocationError";
    this.requested = requested;
  }
}

export class InvalidArgumentError extends SliceError {
  constructor(message: string) {
    super(SliceErrorCode.INVALID_ARGUMENT, message);
    this.name = "InvalidArgumentError";
  }
}

export class OutOfBoundsError extends SliceError {
  readonly index: number;
  readonly length: number;
  constructor(index: number, length: number) {
    super(
      SliceErrorCode.OUT_OF_BOUNDS,
      `Index ${index} is out of bounds for length ${length}`,
    );
    this.name = "OutOfBoundsError";
    this.index = index;
    this.length = length;
  }
}

export class InvalidRangeError extends SliceError {
  readonly start: number;
  readonly end: number;
  readonly length: number;
  constructor(start: number, end: number, length: number) {
    super(
      SliceErrorCode.INVALID_RANGE,
      `Invalid range [${start}, ${end}) for length ${length}`,
    );
    this.name = "InvalidRangeError";
    this.start = start;
    this.end = end;
    this.length = length;
  }
}

export class CapacityExceededError extends SliceError {
  readonly capacity: number;
  constructor(capacity: number) {
    super(
      SliceErrorCode.CAPACITY_EXCEEDED,
      `All ${capacity} reserved slots are already initialized`,
    );
    this.name = "CapacityExceededError";
    this.capacity = capacity;
  }
}

export class ReleaseViolationError extends SliceError {
  readonly blockId: number;
  constructor(blockId: number, message: string) {
    super(SliceErrorCode.RELEASE_VIOLATION, message);
    this.name = "ReleaseViolationError";
    this.blockId = blockId;
  }
}

export class UseAfterDestroyError extends SliceError {
  constructor(operation: string) {
    super(
      SliceErrorCode.USE_AFTER_DESTROY,
      `Cannot ${operation}: slice has been destroyed`,
    );
    this.name = "UseAfterDestroyError";
  }
}

export class StaleViewError extends SliceError {
  readonly blockId: number;
  constructor(blockId: number, operation: string) {
    super(
      SliceErrorCode.STALE_VIEW,
      `Cannot ${operation}: storage block ${blockId} has been released`,
    );
    this.name = "StaleViewError";
    this.blockId = blockId;
  }
}

/**
 * Raised after a prefix teardown visited every slot but one or more
 * destroy hooks threw. `failures` pairs each slot index with its error.
 */
export class ElementDestroyError extends SliceError {
  readonly failures: ReadonlyArray<{ index: number; error: unknown }>;
  constructor(failures: ReadonlyArray<{ index: number; error: unknown }>) {
    super(
      SliceErrorCode.ELEMENT_DESTROY_FAILED,
      `Failed to destroy ${failures.length} element(s) at slot(s) ${failures
        .map((f) => f.index)
        .join(", ")}`,
    );
    this.name = "ElementDestroyError";
    this.failures = failures;
  }
}

export class ConfigError extends SliceError {
  constructor(message: string, options?: ErrorOptions) {
    super(SliceErrorCode.CONFIG_ERROR, message, options);
    this.name = "ConfigError";
  }
}

export interface ErrorDetail {
  message: string;
  code?: string;
}

export function errorToResponse(error: unknown): { error: ErrorDetail } {
  if (error instanceof Error) {
    const detail: ErrorDetail = {
      message: error.message,
    };
    if (error instanceof SliceError) {
      detail.code = error.code;
    }
    return { error: detail };
  }
  return {
    error: {
      message: String(error),
    },
  };
}
