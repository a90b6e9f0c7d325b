import { z } from 'zod'

/**
 * Database names double as snapshot filenames and remote object names,
 * so they must be usable as a single path segment.
 */
export const databaseNameSchema = z
  .string()
  .min(1, 'Database name must not be empty')
  .max(128, 'Database name must be at most 128 characters')
  .refine((name) => !/[\\/\0]/.test(name), 'Database name must not contain path separators')
  .refine((name) => !name.startsWith('.'), 'Database name must not start with a dot')
  .refine((name) => name.trim() === name, 'Database name must not have surrounding whitespace')

const columnSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1),
})

const tableSchema = z.object({
  name: z.string().min(1),
  columns: z.array(columnSchema),
  rows: z.array(z.record(z.unknown())).default([]),
})

/**
 * Persisted representation of one database, as written to
 * `{snapshotDir}/{name}.json` and uploaded to the remote store.
 */
export const snapshotDocumentSchema = z.object({
  name: z.string(),
  tables: z.array(tableSchema).default([]),
})

export type SnapshotDocument = z.infer<typeof snapshotDocumentSchema>

/**
 * Validate a database name, returning the issue message on failure.
 */
export function validateDatabaseName(name: string): { ok: true } | { ok: false; message: string } {
  const result = databaseNameSchema.safeParse(name)
  if (result.success) {
    return { ok: true }
  }
  return { ok: false, message: result.error.issues[0]?.message ?? 'Invalid database name' }
}
