import { z } from 'zod';
import { MAX_TIMER_DELAY_MS } from '../shared/Timers';

// ── Shared fields ─────────────────────────────────────────────

const selector = z.string().min(1);
const delay = z.number().int().max(MAX_TIMER_DELAY_MS);
const timeout = delay.positive().optional();

/** Failures of an optional step are skipped */
const optional = z.boolean().default(false);

/** Key under which an extraction is stored in the job result */
const as = z.string().min(1);

// ── Interaction steps ─────────────────────────────────────────

export const gotoStepSchema = z.object({
  type: z.literal('goto'),
  url: z.string().url(),
  waitUntil: z.enum(['load', 'domcontentloaded', 'networkidle']).optional(),
  timeout,
  /** Extra attempts after an error or a non-2xx response */
  retries: z.number().int().nonnegative().max(10).default(0),
  /** Backoff before the first retry; doubles on each further one */
  retryDelayMs: delay.positive().default(1000),
});

export const clickStepSchema = z.object({
  type: z.literal('click'),
  selector,
  timeout,
  optional,
});

export const fillStepSchema = z.object({
  type: z.literal('fill'),
  selector,
  value: z.string(),
  timeout,
});

export const selectStepSchema = z.object({
  type: z.literal('select'),
  selector,
  value: z.string(),
});

export const hoverStepSchema = z.object({
  type: z.literal('hover'),
  selector,
});

export const waitForStepSchema = z.object({
  type: z.literal('wait_for'),
  selector,
  state: z.enum(['visible', 'hidden', 'attached', 'detached']).optional(),
  timeout,
  optional,
});

export const waitStepSchema = z.object({
  type: z.literal('wait'),
  ms: delay.nonnegative(),
});

// ── Extraction steps ──────────────────────────────────────────

export const extractTextStepSchema = z.object({
  type: z.literal('extract_text'),
  selector,
  as,
  /** Collect every match instead of the first */
  all: z.boolean().default(false),
});

export const extractAttributeStepSchema = z.object({
  type: z.literal('extract_attribute'),
  selector,
  attribute: z.string().min(1),
  as,
  all: z.boolean().default(false),
});

export const extractLinksStepSchema = z.object({
  type: z.literal('extract_links'),
  selector: selector.default('a[href]'),
  as,
  /** Store this query parameter of each link instead of the absolute URL */
  queryParam: z.string().min(1).optional(),
});

const rowFieldSchema = z.union([
  selector,
  z.object({
    selector,
    /** Read this attribute instead of the text */
    attribute: z.string().min(1).optional(),
  }),
]);

/**
 * One record per row; fields are looked up inside each row, missing ones are null.
 */
export const extractRowsStepSchema = z.object({
  type: z.literal('extract_rows'),
  selector,
  fields: z
    .record(z.string().min(1), rowFieldSchema)
    .refine(fields => Object.keys(fields).length > 0, { message: 'At least one field is required' }),
  as,
});

export const evaluateStepSchema = z.object({
  type: z.literal('evaluate'),
  script: z.string().min(1),
  as: as.optional(),
});

// ── Union schema ──────────────────────────────────────────────

export const stepSchema = z.discriminatedUnion('type', [
  gotoStepSchema,
  clickStepSchema,
  fillStepSchema,
  selectStepSchema,
  hoverStepSchema,
  waitForStepSchema,
  waitStepSchema,
  extractTextStepSchema,
  extractAttributeStepSchema,
  extractLinksStepSchema,
  extractRowsStepSchema,
  evaluateStepSchema,
]);

export type Step = z.infer<typeof stepSchema>;
export type GotoStep = z.infer<typeof gotoStepSchema>;
export type RowField = z.infer<typeof rowFieldSchema>;

export const stepListSchema = z.array(stepSchema).min(1);

// ── Batch file ────────────────────────────────────────────────

export const batchJobSchema = z.object({
  id: z.string().min(1).optional(),
  label: z.string().optional(),
  timeoutMs: timeout,
  steps: stepListSchema,
});


export const batchFileSchema = z
  .object({
    defaults: z
      .object({
        timeoutMs: timeout,
        /** Pause between submitting one job and the next */
        delayMs: delay.nonnegative().optional(),
      })
      .optional(),
    jobs: z.array(batchJobSchema).min(1),
  })
  .superRefine((file, ctx) => {
    const seen = new Set<string>();
    file.jobs.forEach((job, index) => {
      if (job.id === undefined) {
        return;
      }
      if (seen.has(job.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['jobs', index, 'id'],
          message: `Duplicate job id '${job.id}'`,
        });
      }
      seen.add(job.id);
    });
  });

export type BatchFile = z.infer<typeof batchFileSchema>;
