/**
 * Configuration schema definitions using Zod
 */

import { z } from 'zod';
import { PlatformMarkerSchema, PlatformSchema } from '../types/platform.js';

/**
 * Discovery settings schema
 */
export const DiscoverySettingsSchema = z.object({
  /** Ordered root directories, relative to the workspace root */
  roots: z.array(z.string().min(1)).min(1).default(['apps', 'packages', 'services']),
});

/**
 * Platform settings schema
 */
export const PlatformSettingsSchema = z.object({
  /** Evaluated top to bottom; first match wins */
  markers: z.array(PlatformMarkerSchema).min(1),
  /** Runner adapter per platform, relative to the workspace root */
  adapters: z.record(PlatformSchema, z.string().min(1)),
});

/**
 * Largest delay `setTimeout` honours; longer delays fire immediately
 */
export const MAX_TIMER_MS = 2_147_483_647;

/**
 * Execution settings schema
 */
export const ExecutionSettingsSchema = z.object({
  /** Global deadline measured from the first spawn */
  timeout_ms: z.number().int().positive().max(MAX_TIMER_MS).default(10 * 60 * 1000),
  /** How long to wait for terminated processes before SIGKILL */
  kill_grace_ms: z.number().int().min(0).max(MAX_TIMER_MS).default(2000),
});

/**
 * Output settings schema
 */
export const OutputSettingsSchema = z.object({
  verbose: z.boolean().default(false),
  progress: z.boolean().default(true),
});

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  discovery: DiscoverySettingsSchema,
  platforms: PlatformSettingsSchema,
  execution: ExecutionSettingsSchema,
  output: OutputSettingsSchema,
});

/**
 * Configuration type inferred from schema
 */
export type Config = z.infer<typeof ConfigSchema>;
export type DiscoverySettings = z.infer<typeof DiscoverySettingsSchema>;
export type PlatformSettings = z.infer<typeof PlatformSettingsSchema>;
export type ExecutionSettings = z.infer<typeof ExecutionSettingsSchema>;
export type OutputSettings = z.infer<typeof OutputSettingsSchema>;
