/**
 * ESP Demo Application
 *
 * Bootstrap + lifecycle for one pipeline run.
 *
 * Lifecycle:
 * - Wire client, orchestrator, reporter and metrics from a frozen config
 * - Run the pipeline once
 * - Always close the client, whatever the run did
 */

import { EspApiClient } from './client/esp-client.js';
import { EspDemoConfig, missingCredentials } from './config.js';
import { ConsoleMetrics, NoOpMetrics, WorkflowMetrics } from './observability/metrics.js';
import { ConsoleReporter } from './reporting/console-reporter.js';
import { attachReporter, ResultReporter } from './reporting/types.js';
import { createLogger, Logger, LogSink } from './utils/logger.js';
import { WorkflowOrchestrator } from './workflows/engine.js';
import { createEspPipeline } from './workflows/esp-pipeline.js';
import type { RunSummary } from './workflows/types.js';

// =============================================================================
// DEPENDENCIES
// =============================================================================

export interface EspDemoDependencies {
  /** HTTP transport for the client; defaults to the global fetch */
  fetch?: typeof fetch;
  /** Receives the human-readable report, one line per call */
  write?: (line: string) => void;
  /** Receives JSON log and metrics lines; defaults to stderr */
  logSink?: LogSink;
  /** Extra reporters beside the console one */
  reporters?: ResultReporter[];
  now?: () => Date;
  createRunId?: () => string;
}

// =============================================================================
// APPLICATION
// =============================================================================

export class EspDemoApp {
  private config: Readonly<EspDemoConfig>;
  private deps: EspDemoDependencies;
  private logSink: LogSink;
  private logger: Logger;

  constructor(config: Readonly<EspDemoConfig>, deps: EspDemoDependencies = {}) {
    this.config = config;
    this.deps = deps;
    this.logSink = deps.logSink ?? ((line) => process.stderr.write(`${line}\n`));
    this.logger = createLogger({ level: config.logLevel, service: 'esp-orchestrator', sink: this.logSink });
  }

  /**
   * Run the pipeline once. Resolves with the summary even when every step
   * fails; rejects only on programming errors in the wiring.
   */
  async run(): Promise<RunSummary> {
    const { config, deps } = this;

    for (const scope of missingCredentials(config.credentials)) {
      this.logger.warn(
        { scope },
        scope === 'account'
          ? 'No account API key configured - account-scoped steps will fail'
          : 'No sub-account API key configured - sub-account-scoped steps will fail'
      );
    }

    const client = new EspApiClient({
      baseUrl: config.baseUrl,
      credentials: config.credentials,
      timeoutMs: config.requestTimeoutMs,
      fetch: deps.fetch,
    });

    const orchestrator = new WorkflowOrchestrator({
      logger: this.logger,
      metrics: this.createMetrics(),
      policyOverrides: config.dependencyPolicies,
      createRunId: deps.createRunId,
    });

    attachReporter(orchestrator, new ConsoleReporter(deps.write));
    for (const reporter of deps.reporters ?? []) {
      attachReporter(orchestrator, reporter);
    }

    const pipeline = createEspPipeline(client, config.pipeline, { now: deps.now });
    this.logger.info(
      { baseUrl: config.baseUrl, steps: pipeline.length, extended: config.pipeline.extended },
      'Starting ESP pipeline'
    );

    try {
      return await orchestrator.run(pipeline);
    } finally {
      client.close();
      this.logger.debug({}, 'ESP client closed');
    }
  }

  private createMetrics(): WorkflowMetrics {
    switch (this.config.metrics) {
      case 'console':
        return new ConsoleMetrics(this.logSink);
      case 'none':
        return new NoOpMetrics();
    }
  }
}
