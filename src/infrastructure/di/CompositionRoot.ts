import { BrowserEnginePort } from '../../application/ports/BrowserEnginePort';
import { BatchRepository } from '../../application/ports/BatchRepository';
import { Orchestrator } from '../../application/services/Orchestrator';
import { BatchRunner } from '../../application/services/batch/BatchRunner';
import { StepScriptCompiler } from '../../application/services/automation/StepScriptCompiler';
import { PlaywrightEngineAdapter } from '../browser/PlaywrightEngineAdapter';
import { FileBasedBatchRepository } from '../persistence/FileBasedBatchRepository';
import { InMemoryEventBus } from '../events/InMemoryEventBus';
import { OrchestratorEventHandlers } from '../events/OrchestratorEventHandlers';
import { ConfigFactory } from '../config/ConfigFactory';
import { setGlobalLoggerConfig } from '../logging';
import { AppConfig } from '../../domain/config/AppConfig';

export interface ApplicationContainer {
  config: AppConfig;
  eventBus: InMemoryEventBus;
  eventHandlers: OrchestratorEventHandlers;
  engine: BrowserEnginePort;
  orchestrator: Orchestrator;
  batchRunner: BatchRunner;
  batchRepository: BatchRepository;
}

export interface CompositionOptions {
  /** Environment to read configuration from (default: process.env) */
  env?: Record<string, string | undefined>;
  /** Replaces the Playwright engine */
  engine?: BrowserEnginePort;
  /** Base directory for batch files and reports */
  baseDir?: string;
}

export class CompositionRoot {
  static initialize(options: CompositionOptions = {}): ApplicationContainer {
    // 1. Load Configuration
    const config = ConfigFactory.load(options.env);
    setGlobalLoggerConfig({ minLevel: config.logging.level, jsonOutput: config.logging.json });

    // 2. Initialize Infrastructure Adapters
    const engine =
      options.engine ??
      new PlaywrightEngineAdapter({
        headless: config.browser.headless,
        viewportWidth: config.browser.width,
        viewportHeight: config.browser.height,
        executablePath: config.browser.executablePath,
        actionTimeoutMs: config.browser.actionTimeoutMs,
        launchArgs: config.browser.launchArgs,
      });
    const eventBus = new InMemoryEventBus();
    const batchRepository = new FileBasedBatchRepository(options.baseDir);

    // 3. Initialize Application Services
    const orchestrator = new Orchestrator(engine, eventBus, {
      pool: {
        capacity: config.pool.capacity,
        acquireTimeoutMs: config.pool.acquireTimeoutMs,
        creationRetries: config.pool.creationRetries,
        maxJobsPerContext: config.pool.maxJobsPerContext,
        terminateTimeoutMs: config.pool.terminateTimeoutMs,
      },
      scheduler: config.scheduler,
      circuitBreaker: {
        failureThreshold: config.health.failureThreshold,
        failureWindowMs: config.health.failureWindowMs,
        resetTimeoutMs: config.health.resetTimeoutMs,
        successThreshold: config.health.successThreshold,
        degradedCapacity: config.health.degradedCapacity,
      },
      healthMonitor: {
        checkIntervalMs: config.health.checkIntervalMs,
        idleTimeoutMs: config.pool.idleTimeoutMs,
      },
    });
    const batchRunner = new BatchRunner(orchestrator, new StepScriptCompiler());

    // 4. Setup Event Handling
    const eventHandlers = new OrchestratorEventHandlers(eventBus, config.logging.level === 'debug');
    eventHandlers.register();

    return {
      config,
      eventBus,
      eventHandlers,
      engine,
      orchestrator,
      batchRunner,
      batchRepository,
    };
  }
}
