export type { RequestOrchestrator, ResponseSchema } from './orchestrator.js';
export { DefaultRequestOrchestrator, decodeResponse } from './orchestrator.js';
export type { RequestHook, ResponseHook, ErrorHook, PipelineHooks } from './hooks.js';
export { LoggingHooks } from './hooks.js';
