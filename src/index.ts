/**
 * Browser Session Orchestrator
 * Library entry point
 */

export { Orchestrator } from './application/services/Orchestrator';
export type {
  OrchestratorOptions,
  OrchestratorStatus,
  OrchestratorHealth,
} from './application/services/Orchestrator';
export { ContextPool, DEFAULT_POOL_CONFIG } from './application/services/pool/ContextPool';
export type {
  ContextPoolConfig,
  ContextLease,
  ContextProvider,
  PoolMaintenance,
  PoolStats,
} from './application/services/pool/ContextPool';
export { Scheduler, DEFAULT_SCHEDULER_CONFIG } from './application/services/scheduler/Scheduler';
export type { JobSpec, JobHandle, SchedulerConfig } from './application/services/scheduler/Scheduler';
export { JobQueue } from './application/services/scheduler/JobQueue';
export { ContextRunner } from './application/services/context/ContextRunner';
export type { RunOutcome } from './application/services/context/ContextRunner';
export { CapacityCircuitBreaker } from './application/services/health/CapacityCircuitBreaker';
export type {
  CircuitState,
  CircuitBreakerConfig,
  AdmissionPolicy,
} from './application/services/health/CapacityCircuitBreaker';
export { HealthMonitor } from './application/services/health/HealthMonitor';
export { StepScriptCompiler } from './application/services/automation/StepScriptCompiler';
export type { ExtractionResult } from './application/services/automation/StepScriptCompiler';
export { BatchRunner } from './application/services/batch/BatchRunner';
export type { BatchReport, BatchJobReport } from './application/services/batch/BatchRunner';

export { Job } from './domain/jobs/Job';
export type { JobState } from './domain/jobs/Job';
export { isSucceeded } from './domain/jobs/JobOutcome';
export type { JobOutcome, JobStatus } from './domain/jobs/JobOutcome';
export { ExecutionContext } from './domain/context/ExecutionContext';
export type { ContextState } from './domain/context/ExecutionContext';
export * from './domain/errors/OrchestratorErrors';
export * from './domain/events/OrchestratorEvents';
export { stepSchema, stepListSchema, batchFileSchema } from './domain/automation/StepScript';
export type { Step, BatchFile } from './domain/automation/StepScript';

export type {
  AutomationSession,
  AutomationSteps,
  BrowserEnginePort,
  EngineHandle,
  NavigateOptions,
  NavigationResult,
  RowFieldSelector,
  ScreenshotOptions,
  WaitForSelectorOptions,
} from './application/ports';
export type { BatchRepository } from './application/ports/BatchRepository';
export { PlaywrightEngineAdapter, PlaywrightSession } from './infrastructure/browser/PlaywrightEngineAdapter';
export { InMemoryEventBus } from './infrastructure/events/InMemoryEventBus';
export { ConfigFactory } from './infrastructure/config/ConfigFactory';
