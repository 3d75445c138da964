import { Capability } from '../../types/common.js';
import { parseArgument, rejectUnsupported, requireString } from '../../validation/arguments.js';
import { fineTuneCreateRequestSchema, type FineTuneCreateRequest } from './types.js';

export class FineTunesValidator {
  static validateFineTuneId(fineTuneId: unknown): string {
    return requireString(fineTuneId, 'fineTuneId');
  }

  static validateModel(model: unknown): string {
    return requireString(model, 'model');
  }

  static validateStream(stream: unknown): false {
    return rejectUnsupported(Capability.Streaming, stream);
  }

  static validateCreate(request: unknown): FineTuneCreateRequest {
    return parseArgument(fineTuneCreateRequestSchema, request, 'request');
  }
}
