import { buildJobFields } from "./job.js";
import type { BaseEnvironment, OrchestratorJob } from "./types.js";

export type OrchestratorJobOptions = {
  /** Scheduler endpoint the orchestrator submits further jobs to. */
  schedulerUri: string;
  brokerConfigPath: string;
  baseEnvironment?: BaseEnvironment;
};

/**
 * Coordination job that schedules the rest of the workflow. It has only been
 * exercised when the jobs it schedules live in its own allocation.
 */
export function createOrchestratorJob(options: OrchestratorJobOptions): OrchestratorJob {
  return {
    kind: "orchestrator",
    ...buildJobFields({
      name: "AMSOrchestrator",
      executable: "AMSOrchestrator",
      stdout: "AMSOrchestrator-log.out",
      stderr: "AMSOrchestrator-log.err",
      baseEnvironment: options.baseEnvironment,
      cliKwargs: {
        "--ml-uri": options.schedulerUri,
        "--ams-rmq-config": options.brokerConfigPath,
      },
      resources: { nodes: 1, tasksPerNode: 1, coresPerTask: 1, exclusive: false, gpusPerTask: 0 },
    }),
    schedulerUri: options.schedulerUri,
    brokerConfigPath: options.brokerConfigPath,
  };
}
