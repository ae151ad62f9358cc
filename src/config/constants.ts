/**
 * Constants for fixed-slice
 *
 * Named limits and defaults shared by the storage manager and the
 * configuration schema.
 */

// ============================================================================
// Storage Constants
// ============================================================================

/**
 * Largest block a single allocation may reserve, in slots.
 * Requests above this fail with an AllocationError.
 */
export const DEFAULT_MAX_SLOTS_PER_BLOCK = 16_777_216;

/**
 * Upper bound on slots held by unreleased blocks across one storage manager.
 */
export const DEFAULT_MAX_LIVE_SLOTS = Number.MAX_SAFE_INTEGER;

/**
 * Hard ceiling imposed by the runtime on array length.
 */
export const MAX_ARRAY_LENGTH = 4_294_967_295;

// ============================================================================
// Configuration Constants
// ============================================================================

export const CONFIG_FILE_NAME = "fixed-slice.config.json";

/**
 * Environment variable naming an explicit config file path.
 */
export const CONFIG_PATH_ENV = "SLICE_CONFIG";
