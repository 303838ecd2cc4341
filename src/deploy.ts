import type { BrokerConfig } from "./broker.js";
import { DEFAULT_CONFIG } from "./config.js";
import { deployDomainJob } from "./domain-job.js";
import { ResourceError } from "./errors.js";
import { generateCommand, toSubmissionSpec, type SubmissionOptions } from "./job.js";
import type { DataStore } from "./store.js";
import type { AmsJobsConfig, JobDescription, SubmissionSpec } from "./types.js";

/**
 * Called by the submission driver right before handing the job to the
 * scheduler. Only domain jobs change state here; the others receive
 * everything they need on the command line.
 *
 * Not idempotent: a domain job writes a new AMS objects file on every call.
 */
export async function precedeDeploy(
  job: JobDescription,
  store: DataStore,
  broker: BrokerConfig | null = null,
  config: AmsJobsConfig = DEFAULT_CONFIG,
): Promise<void> {
  switch (job.kind) {
    case "domain":
      await deployDomainJob(job, store, broker, config);
      return;
    case "job":
    case "train":
    case "sub-select":
    case "stage":
    case "orchestrator":
      return;
    default:
      job satisfies never;
  }
}

export interface JobCapabilities {
  readonly job: JobDescription;
  generateCommand(): string[];
  toSubmissionSpec(options?: SubmissionOptions): SubmissionSpec;
  precedeDeploy(store: DataStore, broker?: BrokerConfig | null): Promise<void>;
}

export function jobCapabilities(
  job: JobDescription,
  config: AmsJobsConfig = DEFAULT_CONFIG,
): JobCapabilities {
  return {
    job,
    generateCommand: () => generateCommand(job),
    toSubmissionSpec: (options = {}) =>
      toSubmissionSpec(job, { ...options, config: options.config ?? config }),
    precedeDeploy: async (store, broker = null) => await precedeDeploy(job, store, broker, config),
  };
}

/**
 * `precedeDeploy` followed by `toSubmissionSpec`. Resources are checked first
 * so a job that cannot be submitted leaves no artifact behind.
 */
export async function prepareSubmission(
  job: JobDescription,
  params: {
    store: DataStore;
    broker?: BrokerConfig | null;
    config?: AmsJobsConfig;
    cwd?: string;
  },
): Promise<SubmissionSpec> {
  if (!job.resources) {
    throw new ResourceError(`Job "${job.name}" has no resources and cannot be submitted`);
  }
  const config = params.config ?? DEFAULT_CONFIG;
  await precedeDeploy(job, params.store, params.broker ?? null, config);
  return toSubmissionSpec(job, { config, cwd: params.cwd });
}
