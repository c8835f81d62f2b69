import { z } from 'zod';

export const SCHEMA_VERSION = 'v1';

export const ProjectConfigSchema = z
  .object({
    pipeline: z.object({ enabled: z.boolean().optional() }).optional(),
    scheduler: z
      .object({
        enabled: z.boolean().optional(),
        timezone: z.string().min(1).optional(),
        window_minutes: z.number().int().nonnegative().optional(),
        plan_path: z.string().min(1).optional(),
      })
      .optional(),
    worker: z.object({ enabled: z.boolean().optional() }).optional(),
    queue: z.object({ dir: z.string().min(1).optional() }).optional(),
    upload: z
      .object({
        enabled: z.boolean().optional(),
        max_retries: z.number().int().nonnegative().optional(),
        backoff_seconds: z.number().nonnegative().optional(),
        privacy_status: z.string().optional(),
        timeout_ms: z.number().int().positive().optional(),
      })
      .optional(),
    probe: z
      .object({
        bin: z.string().min(1).optional(),
        timeout_ms: z.number().int().positive().optional(),
      })
      .optional(),
    supervisor: z
      .object({
        commands_path: z.string().min(1).optional(),
        log_dir: z.string().min(1).optional(),
      })
      .optional(),
    api: z
      .object({
        host: z.string().min(1).optional(),
        port: z.number().int().positive().optional(),
      })
      .optional(),
  })
  .strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

// ---------------------------------------------------------------------------
// Step plan (pipeline runner input)
// ---------------------------------------------------------------------------

export const StepSpecSchema = z
  .object({
    id: z.string().min(1),
    handler_key: z.string().min(1).optional(),
    uses: z.string().min(1).optional(),
    input_from: z.union([z.string().min(1), z.record(z.string().min(1))]).optional(),
    output: z.string().min(1),
    config: z.record(z.unknown()).optional(),
  })
  .refine((step) => step.handler_key !== undefined || step.uses !== undefined, {
    message: 'handler_key is required',
    path: ['handler_key'],
  })
  .transform((step) => ({
    id: step.id,
    handler_key: step.handler_key ?? step.uses ?? '',
    input_from: step.input_from,
    output: step.output,
    config: step.config,
  }));

export const StepPlanSchema = z.object({
  pipeline: z.string().min(1).default('unknown'),
  steps: z.array(z.unknown()).default([]),
});

// ---------------------------------------------------------------------------
// Schedule plan (scheduler input)
// ---------------------------------------------------------------------------

export const RawSchedulePlanSchema = z.object({
  schema_version: z.literal(SCHEMA_VERSION),
  timezone: z.string().min(1).optional(),
  entries: z.array(z.unknown()).default([]),
});

export const ScheduleEntrySchema = z.object({
  publish_at: z.string().min(1),
  pipeline_path: z.string().min(1),
  run_id: z.string().min(1).optional(),
  run_id_prefix: z.string().min(1).optional(),
  params: z.record(z.unknown()).optional(),
});

export type ScheduleEntry = z.infer<typeof ScheduleEntrySchema>;

// ---------------------------------------------------------------------------
// Queue job payload
// ---------------------------------------------------------------------------

export const JobErrorSchema = z.object({
  code: z.string(),
  message: z.string(),
});

export type JobError = z.infer<typeof JobErrorSchema>;

export const QueueStateSchema = z.enum(['pending', 'running', 'done', 'failed']);

export type QueueState = z.infer<typeof QueueStateSchema>;

export const JobSpecSchema = z.object({
  schema_version: z.literal(SCHEMA_VERSION),
  job_id: z.string().min(1),
  created_at: z.string(),
  scheduled_for: z.string(),
  pipeline_path: z.string().min(1),
  run_id: z.string().min(1),
  params: z.record(z.unknown()).nullable().optional(),
  status: QueueStateSchema,
  attempts: z.number().int().nonnegative().default(0),
  last_error: JobErrorSchema.nullable().default(null),
});

export type JobSpec = z.infer<typeof JobSpecSchema>;

// ---------------------------------------------------------------------------
// Upstream artifacts read by the gates
// ---------------------------------------------------------------------------

export const RenderSummarySchema = z
  .object({
    schema_version: z.literal(SCHEMA_VERSION),
    run_id: z.string().optional(),
    output_mp4_path: z.string().trim().min(1),
  })
  .passthrough();

export const GateSummaryRefSchema = z
  .object({
    schema_version: z.literal(SCHEMA_VERSION),
    run_id: z.string().optional(),
    decision: z.enum(['pass', 'fail']),
    artifact_path: z.string().optional(),
  })
  .passthrough();

export const PublishMetadataSchema = z
  .object({
    title: z.string().optional(),
    description: z.string().optional(),
    tags: z.array(z.unknown()).optional(),
  })
  .passthrough();

// ---------------------------------------------------------------------------
// Supervisor command map
// ---------------------------------------------------------------------------

export const CommandMapSchema = z.record(
  z.object({
    cmd: z.array(z.string().min(1)).min(1),
  }),
);

export type CommandMap = z.infer<typeof CommandMapSchema>;
