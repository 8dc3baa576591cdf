/**
 * Pipeline Orchestrator
 * Verification, gate and promotion for one pipeline run
 */

export { PipelineOrchestrator, DEFAULT_PIPELINE_ORCHESTRATOR_CONFIG } from './pipeline-orchestrator.js';
export type {
  PipelineOrchestratorConfig,
  PipelineOrchestratorDependencies,
  PipelineOrchestratorEvents,
  PipelineRunOptions,
} from './pipeline-orchestrator.js';

export { decideGate } from './gate.js';
export type { GateInput } from './gate.js';
