import { z } from "zod";
import { ValidationError } from "./errors.js";

export const TaskNameSchema = z
  .string()
  .min(1, "task name must not be empty")
  .max(128, "task name must be at most 128 characters")
  .regex(/^[A-Za-z][A-Za-z0-9_.-]*$/, "task name must start with a letter and use only letters, digits, '_', '.' or '-'");

export const StorageFormatSchema = z.enum(["json", "v8"]);
export const MemoryPolicySchema = z.enum(["retain", "drop"]);
export const CueModeSchema = z.enum(["thorough", "always", "never"]);
export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const TaskOptionsSchema = z
  .object({
    format: StorageFormatSchema,
    memory: MemoryPolicySchema,
    deployment: z.string().min(1),
    retries: z.number().int().min(0),
    timeoutMs: z.number().int().min(0),
    cue: CueModeSchema,
    version: z.string().optional(),
    description: z.string().optional(),
  })
  .strict();

export const BranchPatternSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("none") }),
  z.object({ kind: z.literal("map"), refs: z.array(TaskNameSchema).min(1) }),
  z.object({ kind: z.literal("cross"), refs: z.array(TaskNameSchema).min(1) }),
]);

export const NodeKindSchema = z.enum(["static", "pattern", "branch"]);

/** A row of the metadata table after JSON columns have been decoded. */
export const FingerprintRecordSchema = z.object({
  nodeId: z.string(),
  taskName: z.string(),
  kind: NodeKindSchema,
  fingerprint: z.string(),
  codeHash: z.string(),
  inputHashes: z.record(z.string()),
  valueHash: z.string().nullable(),
  format: StorageFormatSchema,
  durationMs: z.number(),
  bytes: z.number().int(),
  warnings: z.array(z.string()),
  error: z.string().nullable(),
  invalidated: z.boolean(),
  builtAt: z.number(),
  branches: z.array(z.string()).nullable(),
});

/** Messages a worker thread posts back to its pool. */
export const ThreadMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("ready") }),
  z.object({ type: z.literal("setup-failed"), message: z.string() }),
  z.object({ type: z.literal("warning"), job: z.number(), message: z.string() }),
  z.object({ type: z.literal("done"), job: z.number(), value: z.unknown() }),
  z.object({ type: z.literal("failed"), job: z.number(), name: z.string(), message: z.string() }),
]);

export type ThreadMessage = z.infer<typeof ThreadMessageSchema>;

export const ConfigSchema = z
  .object({
    store: z
      .object({
        root: z.string().min(1),
        metadataFile: z.string().min(1),
        objectsDir: z.string().min(1),
      })
      .strict(),
    execution: z
      .object({
        maxConcurrency: z.number().int().min(1),
        defaultRetries: z.number().int().min(0),
        defaultTimeoutMs: z.number().int().min(0),
        defaultDeployment: z.string().min(1),
        defaultMemory: MemoryPolicySchema,
        defaultFormat: StorageFormatSchema,
        defaultCue: CueModeSchema,
      })
      .strict(),
    retry: z
      .object({
        baseDelayMs: z.number().int().min(0),
        maxDelayMs: z.number().int().min(0),
      })
      .strict(),
    cache: z.object({ maxEntries: z.number().int().min(0) }).strict(),
    hashing: z.object({ branchIdLength: z.number().int().min(8).max(64) }).strict(),
    logging: z.object({ level: LogLevelSchema }).strict(),
  })
  .strict();

/** Parse a value with a schema, converting zod issues into a ValidationError. */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown, label: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const msg = result.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new ValidationError("VALIDATION_FAILED", `${label}: ${msg}`);
  }
  return result.data;
}
