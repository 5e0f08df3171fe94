import { z } from 'zod';

// =============================================================================
// Server Schema
// =============================================================================

export const ServerConfigSchema = z.object({
  host: z.string().default('0.0.0.0'),
  port: z.number().int().min(0).max(65535).default(9100),
  path: z.string().startsWith('/').default('/metrics'),
});

// =============================================================================
// Target Schemas
// =============================================================================

const isCompilableRegex = (source: string): boolean => {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
};

// The token is read from the first capture group
const hasCaptureGroup = (source: string): boolean => {
  try {
    return (new RegExp(`${source}|`).exec('')?.length ?? 1) > 1;
  } catch {
    return true;
  }
};

export const CollectorsConfigSchema = z.object({
  cpu: z.boolean().default(true),
  meminfo: z.boolean().default(true),
  loadavg: z.boolean().default(true),
  time: z.boolean().default(true),
  uname: z.boolean().default(true),
  netdev: z.boolean().default(true),
  filesystem: z.boolean().default(true),
  wireless: z.boolean().default(true),
  conntrack: z.boolean().default(true),
}).strict();

export const TimeoutsConfigSchema = z.object({
  authSeconds: z.number().positive().default(10),
  commandSeconds: z.number().positive().default(15),
});

export const OutputMarkersSchema = z.object({
  start: z.string().min(1),
  end: z.string().min(1),
});

export const TargetConfigSchema = z.object({
  name: z.string().min(1),
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535).optional(),
  scheme: z.enum(['http', 'https']).default('http'),
  verifySsl: z.boolean().default(false),
  username: z.string().default('root'),
  password: z.string(),
  httpId: z.string().min(1).optional(),
  tokenPattern: z
    .string()
    .refine(isCompilableRegex, { message: 'tokenPattern must be a valid regular expression' })
    .refine(hasCaptureGroup, { message: 'tokenPattern must capture the token in a group' })
    .optional(),
  outputMarkers: OutputMarkersSchema.optional(),
  timeouts: TimeoutsConfigSchema.default({}),
  collectors: CollectorsConfigSchema.default({}),
});

// =============================================================================
// Main Config Schema
// =============================================================================

export const ExporterConfigSchema = z.object({
  server: ServerConfigSchema.default({}),
  targets: z
    .array(TargetConfigSchema)
    .min(1, { message: 'At least one target must be configured' })
    .refine((targets) => new Set(targets.map((t) => t.name)).size === targets.length, {
      message: 'Target names must be unique',
    }),
});

// Type exports
export type ExporterConfig = z.infer<typeof ExporterConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type TargetConfig = Readonly<z.infer<typeof TargetConfigSchema>>;
export type CollectorsConfig = z.infer<typeof CollectorsConfigSchema>;
