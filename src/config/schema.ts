import { z } from "zod";
import { RISK_LEVELS } from "../types/risk.js";

/**
 * Configuration schema. Every key has a default, so a partial file (or none)
 * parses into a complete config.
 */
export const ConfigSchema = z.object({
  privilege: z.object({
    method: z.enum(["sudo", "doas"]).default("sudo"),
  }).default({}),
  storage: z.object({
    base_dir: z.string().min(1).default("."),
  }).default({}),
  execution: z.object({
    command_timeout_seconds: z.number().int().min(0).default(0),
  }).default({}),
  safety: z.object({
    confirmation_threshold: z.enum(RISK_LEVELS).default("moderate"),
    dry_run_bypass_confirmation: z.boolean().default(true),
  }).default({}),
});

export type SysbakConfig = z.infer<typeof ConfigSchema>;

/** Elevation wrapper used for privileged installs. */
export type ElevationMethod = SysbakConfig["privilege"]["method"];
