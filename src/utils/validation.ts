/**
 * Runtime Validation Schemas
 *
 * Zod schemas for validating configuration at runtime.
 * Provides type-safe validation with automatic TypeScript type inference.
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// Tracker Configuration
// =============================================================================

export const MetadataPolicySchema = z.enum(["always", "on-change"]);

/**
 * When provider metadata on an existing record is refreshed:
 * `always` on every observation, `on-change` only when the schema changed.
 */
export type MetadataPolicy = z.infer<typeof MetadataPolicySchema>;

export const HistoryBackendSchema = z.enum(["none", "file", "git"]);

export type HistoryBackend = z.infer<typeof HistoryBackendSchema>;

/**
 * Tracker configuration schema (`.schema-ledger/config.json`)
 */
export const TrackerConfigSchema = z.object({
  /** Directory holding ledger files, schemas and history (relative to the project root) */
  dataDir: z.string().min(1).default(".schema-ledger/data"),

  /** Sub-directory of dataDir with one canonical JSON file per resource type */
  schemasDir: z.string().min(1).default("schemas"),

  /** AWS region; the SDK default provider chain is used when absent */
  region: z.string().min(1).optional(),

  /** Only type names with this prefix are tracked */
  typePrefix: z.string().default("AWS::"),

  metadataPolicy: MetadataPolicySchema.default("always"),

  /** Parallel DescribeType calls per pass */
  concurrency: z.number().int().min(1).max(64).default(4),

  /** Upper bound for a single schema fetch */
  fetchTimeoutMs: z.number().int().positive().default(30_000),

  /** Log progress every N processed types */
  progressInterval: z.number().int().positive().default(100),

  historyBackend: HistoryBackendSchema.default("file"),
});

export type TrackerConfig = z.infer<typeof TrackerConfigSchema>;

/**
 * Input shape accepted before defaults are applied
 */
export type TrackerConfigInput = z.input<typeof TrackerConfigSchema>;

// =============================================================================
// Validation Utilities
// =============================================================================

/**
 * Validation result type
 */
export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: z.ZodError };

/**
 * Safely validate data against a schema (returns result object)
 */
export function safeValidate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
