import { z } from "zod";
import { LOG_LEVELS } from "../util/logger.js";
import {
  DEFAULT_MAX_LIVE_SLOTS,
  DEFAULT_MAX_SLOTS_PER_BLOCK,
  MAX_ARRAY_LENGTH,
} from "./constants.js";

export const LogLevelSchema = z.enum(LOG_LEVELS);

/**
 * When only `maxLiveSlots` is given, the block limit is clamped to it so a
 * single-field budget still validates.
 */
export const StorageConfigSchema = z
  .object({
    maxSlotsPerBlock: z.number().int().min(0).max(MAX_ARRAY_LENGTH).optional(),
    maxLiveSlots: z
      .number()
      .int()
      .min(0)
      .max(Number.MAX_SAFE_INTEGER)
      .optional(),
  })
  .refine(
    (storage) =>
      storage.maxSlotsPerBlock === undefined ||
      storage.maxLiveSlots === undefined ||
      storage.maxSlotsPerBlock <= storage.maxLiveSlots,
    {
      message: "maxSlotsPerBlock must not exceed maxLiveSlots",
      path: ["maxSlotsPerBlock"],
    },
  )
  .transform((storage) => {
    const maxLiveSlots = storage.maxLiveSlots ?? DEFAULT_MAX_LIVE_SLOTS;
    return {
      maxSlotsPerBlock:
        storage.maxSlotsPerBlock ??
        Math.min(DEFAULT_MAX_SLOTS_PER_BLOCK, maxLiveSlots),
      maxLiveSlots,
    };
  });

export type StorageConfig = z.infer<typeof StorageConfigSchema>;

export const AppConfigSchema = z.object({
  logLevel: LogLevelSchema.default("info"),
  storage: StorageConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
