import { z } from 'zod';

export const fineTuneEventSchema = z
  .object({
    object: z.string().optional(),
    created_at: z.number().optional(),
    level: z.string().optional(),
    message: z.string().optional(),
  })
  .passthrough();

export const fineTuneEventListSchema = z
  .object({
    object: z.string().optional(),
    data: z.array(fineTuneEventSchema),
  })
  .passthrough();

/**
 * A fine-tune job. Inside list responses nested objects such as
 * `hyperparams` arrive flattened (`hyperparams.n_epochs`).
 */
export const fineTuneSchema = z
  .object({
    id: z.string(),
    object: z.string().optional(),
    model: z.string().optional(),
    created_at: z.number().optional(),
    updated_at: z.number().optional(),
    fine_tuned_model: z.string().nullable().optional(),
    organization_id: z.string().optional(),
    status: z.string().optional(),
    events: z.array(fineTuneEventSchema).optional(),
  })
  .passthrough();

export const fineTuneListSchema = z
  .object({
    object: z.string().optional(),
    data: z.array(fineTuneSchema),
  })
  .passthrough();

export const modelDeleteResponseSchema = z
  .object({
    id: z.string(),
    object: z.string().optional(),
    deleted: z.boolean(),
  })
  .passthrough();

export const fineTuneCreateRequestSchema = z.object({
  training_file: z
    .string({ required_error: 'training_file is required', invalid_type_error: 'training_file must be a single string' })
    .min(1, 'training_file cannot be empty'),
  validation_file: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  n_epochs: z.number().int().positive().optional(),
  batch_size: z.number().int().positive().optional(),
  learning_rate_multiplier: z.number().positive().optional(),
  prompt_loss_weight: z.number().nonnegative().optional(),
  compute_classification_metrics: z.boolean().optional(),
  classification_n_classes: z.number().int().min(2).optional(),
  classification_positive_class: z.string().optional(),
  classification_betas: z.array(z.number()).optional(),
  suffix: z.string().min(1).max(40).optional(),
});

export type FineTuneEvent = z.infer<typeof fineTuneEventSchema>;
export type FineTuneEventList = z.infer<typeof fineTuneEventListSchema>;
export type FineTune = z.infer<typeof fineTuneSchema>;
export type FineTuneList = z.infer<typeof fineTuneListSchema>;
export type ModelDeleteResponse = z.infer<typeof modelDeleteResponseSchema>;
export type FineTuneCreateRequest = z.input<typeof fineTuneCreateRequestSchema>;

export interface FineTuneEventListParams {
  /** Streaming is not implemented; only `false` is accepted. */
  stream?: boolean;
}
