import type { JsonObject } from '../types/common.js';

export function createFineTuneEvent(overrides: JsonObject = {}): JsonObject {
  return {
    object: 'fine-tune-event',
    created_at: 1614807352,
    level: 'info',
    message: 'Job enqueued. Waiting for jobs ahead to complete. Queue number: 0.',
    ...overrides,
  };
}

export function createFineTuneEventList(events: JsonObject[] = [createFineTuneEvent()]): JsonObject {
  return {
    object: 'list',
    data: events,
  };
}

export function createFineTune(overrides: JsonObject = {}): JsonObject {
  return {
    id: 'ft-test123',
    object: 'fine-tune',
    model: 'curie',
    created_at: 1614807352,
    updated_at: 1614807865,
    fine_tuned_model: null,
    organization_id: 'org-test',
    status: 'pending',
    hyperparams: {
      batch_size: 4,
      learning_rate_multiplier: 0.1,
      n_epochs: 4,
      prompt_loss_weight: 0.1,
    },
    training_files: [
      {
        id: 'file-train',
        object: 'file',
        bytes: 1547276,
        filename: 'train.jsonl',
        purpose: 'fine-tune-train',
      },
    ],
    validation_files: [],
    result_files: [],
    events: [createFineTuneEvent({ message: 'Created fine-tune: ft-test123' })],
    ...overrides,
  };
}

export function createFineTuneList(fineTunes: JsonObject[] = [createFineTune()]): JsonObject {
  return {
    object: 'list',
    data: fineTunes,
  };
}

export function createModelDeleteResponse(model = 'curie:ft-test-2023-01-01'): JsonObject {
  return {
    id: model,
    object: 'model',
    deleted: true,
  };
}
