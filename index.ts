export { echoJobSpec, nestedInstanceSpec, type NestedInstanceOptions } from "./src/allocation.js";
export {
  RmqConfiguration,
  type BrokerConfig,
  type ConnectionDescriptor,
  type RmqConfig,
} from "./src/broker.js";
export { buildCliCommand, formatCommandLine, shellQuote } from "./src/command.js";
export { DEFAULT_CONFIG, parseAmsJobsConfig } from "./src/config.js";
export {
  jobCapabilities,
  precedeDeploy,
  prepareSubmission,
  type JobCapabilities,
} from "./src/deploy.js";
export {
  buildAmsObjects,
  createDomainJob,
  deployDomainJob,
  domainJobFromDescription,
  type DomainJobOptions,
} from "./src/domain-job.js";
export { AmsJobsError, ConfigurationError, ResourceError, StoreError } from "./src/errors.js";
export {
  createJob,
  describeJob,
  generateCommand,
  jobFromDict,
  jobToDict,
  toSubmissionSpec,
  validateEnvironment,
  type JobOptions,
  type SubmissionOptions,
} from "./src/job.js";
export { logger } from "./src/logger.js";
export {
  FORMATTING_KEYS,
  createSubSelectJob,
  createTrainingJob,
  formatTemplate,
  generateFormatting,
  mlJobFromDescription,
  type FormattingContext,
  type MlJobOptions,
} from "./src/ml-job.js";
export { createOrchestratorJob, type OrchestratorJobOptions } from "./src/orchestrator.js";
export {
  createResourceSpec,
  resourcesFromDict,
  resourcesToDict,
  stageResourcesFromDomainJob,
  totalTasks,
  type ResourceSpecInput,
} from "./src/resources.js";
export type { JobDict, ResourceDict } from "./src/schema.js";
export {
  createFsPersistentStageJob,
  createFsStageJob,
  createNetworkStageJob,
  networkStageJobFromDescription,
  type FsPersistentStageJobOptions,
  type FsStageJobOptions,
  type NetworkStageJobOptions,
} from "./src/stage-job.js";
export {
  LedgerDataStore,
  STORE_ENTRIES,
  type DataStore,
  type StoreEntry,
  type StoreRecord,
  type StoreVersion,
} from "./src/store.js";
export type * from "./src/types.js";
