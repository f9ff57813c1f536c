import { z } from 'zod';

// ── Transform specs (zod) ──

export type AffixAction = 'add' | 'remove';
export type CaseStyle = 'upper' | 'lower' | 'title';
export type DatePosition = 'prefix' | 'suffix' | 'replace';
export type SortOrder = 'name' | 'modified' | 'size';

const AffixActionSchema = z.enum(['add', 'remove']);

export const TransformSpecSchema = z.discriminatedUnion('mode', [
  z.object({
    mode: z.literal('searchReplace'),
    search: z.string().min(1, 'search text must not be empty'),
    replace: z.string(),
  }),
  z.object({
    mode: z.literal('regex'),
    pattern: z.string().min(1, 'regex pattern must not be empty'),
    replacement: z.string(),
  }),
  z.object({
    mode: z.literal('numbering'),
    pattern: z.string().min(1, 'numbering pattern must not be empty'),
    start: z.number().int().nonnegative(),
    step: z.number().int().positive().optional(),
  }),
  z.object({
    mode: z.literal('prefix'),
    text: z.string().min(1, 'prefix must not be empty'),
    action: AffixActionSchema,
  }),
  z.object({
    mode: z.literal('suffix'),
    text: z.string().min(1, 'suffix must not be empty'),
    action: AffixActionSchema,
  }),
  z.object({
    mode: z.literal('case'),
    style: z.enum(['upper', 'lower', 'title']),
  }),
  z.object({
    mode: z.literal('date'),
    position: z.enum(['prefix', 'suffix', 'replace']),
  }),
]);

export type TransformSpec = z.infer<typeof TransformSpecSchema>;
export type TransformMode = TransformSpec['mode'];

/** Per-file facts a transform may read. Supplied by the planner. */
export interface TransformContext {
  modified?: Date;
}

// ── Config schemas (zod) ──

const SortOrderSchema = z.enum(['name', 'modified', 'size']);

export const PresetSchema = z.object({
  spec: TransformSpecSchema,
  sort: SortOrderSchema.optional(),
});

export type Preset = z.infer<typeof PresetSchema>;

export const ConfigSchema = z.object({
  version: z.literal(1),
  defaults: z
    .object({
      sort: SortOrderSchema.default('name'),
      includeHidden: z.boolean().default(false),
    })
    .default({}),
  presets: z.record(z.string(), PresetSchema).default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

// ── Plans ──

export type RenameStage = 'direct' | 'temporary' | 'final';

export interface RenameOp {
  source: string;
  target: string;
  stage: RenameStage;
}

export type Conflict =
  | { kind: 'duplicateTarget'; target: string; sources: string[] }
  | { kind: 'externalCollision'; source: string; target: string }
  | { kind: 'cycle'; paths: string[] }
  | { kind: 'invalidTarget'; source: string; target: string; reason: string };

export type ConflictKind = Conflict['kind'];

export interface Plan {
  ops: RenameOp[];
  conflicts: Conflict[];
}

// ── Execution ──

export type ExecutionErrorCode =
  | 'SOURCE_MISSING'
  | 'TARGET_EXISTS'
  | 'PERMISSION_DENIED'
  | 'CROSS_DEVICE'
  | 'IO_ERROR';

export interface OpFailure<E extends Error = Error> {
  op: RenameOp;
  cause: E;
}

export interface ExecutionResult {
  applied: RenameOp[];
  failed: OpFailure | null;
  rolledBack: RenameOp[];
  rollbackFailures: OpFailure[];
}

export interface ExecutionEvent {
  event: 'applied' | 'failed' | 'rolledBack' | 'rollbackFailed';
  op: RenameOp;
}
