import { z } from "zod";
import { ALPHABET_NAMES } from "@numdrill/types";

export const MAX_WINDOW_RADIUS = 10;

export const EngineConfigSchema = z.object({
  windowRadius: z.number().int().min(0).max(MAX_WINDOW_RADIUS),
  alphabet: z.enum(ALPHABET_NAMES),
});

// Anything left out of the settings file falls back to the defaults
export const StoredConfigSchema = EngineConfigSchema.partial();

export type StoredConfig = z.infer<typeof StoredConfigSchema>;
