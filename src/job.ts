import { buildCliCommand, formatCommandLine } from "./command.js";
import { DEFAULT_CONFIG } from "./config.js";
import { ConfigurationError, ResourceError } from "./errors.js";
import { logger } from "./logger.js";
import {
  createResourceSpec,
  resourcesFromDict,
  resourcesToDict,
  totalTasks,
  type ResourceSpecInput,
} from "./resources.js";
import { JobDictSchema, checkValue, type JobDict, type StageSourceDict } from "./schema.js";
import type {
  AmsJobsConfig,
  BaseEnvironment,
  CliKwargs,
  CliValue,
  GenericJob,
  JobDescription,
  JobEnvironment,
  JobFields,
  StageSource,
  SubmissionSpec,
} from "./types.js";

export type JobOptions = {
  name: string;
  executable: string;
  environment?: Readonly<JobEnvironment> | null;
  /** Merged under `environment`; pass `process.env` here to inherit the driver's environment. */
  baseEnvironment?: BaseEnvironment;
  resources?: ResourceSpecInput | null;
  stdout?: string | null;
  stderr?: string | null;
  cliArgs?: readonly CliValue[];
  cliKwargs?: Readonly<CliKwargs>;
  isMpi?: boolean;
  amsLog?: boolean;
};

export type SubmissionOptions = {
  config?: AmsJobsConfig;
  cwd?: string;
};

export function validateEnvironment(value: unknown, field = "environment"): JobEnvironment {
  if (value == null) {
    return {};
  }
  if (typeof value !== "object" || Array.isArray(value)) {
    const type = Array.isArray(value) ? "array" : typeof value;
    throw new ConfigurationError(`Unknown type ${type} for ${field}`);
  }
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto !== Object.prototype && proto !== null) {
    const tag = Object.prototype.toString.call(value).slice(8, -1);
    throw new ConfigurationError(`Unknown type ${tag} for ${field}`);
  }
  const env: JobEnvironment = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== "string") {
      throw new ConfigurationError(`${field}.${key} must be a string (got ${typeof entry})`);
    }
    env[key] = entry;
  }
  return env;
}

function mergeEnvironment(base: BaseEnvironment | undefined, env: JobEnvironment): JobEnvironment {
  if (!base) {
    return env;
  }
  const merged: JobEnvironment = {};
  for (const [key, value] of Object.entries(base)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return { ...merged, ...env };
}

export function buildJobFields(options: JobOptions): JobFields {
  const name = options.name.trim();
  const executable = options.executable.trim();
  if (!executable) {
    throw new ConfigurationError(`Job "${name}" requires an executable`);
  }
  return {
    name,
    executable,
    environment: mergeEnvironment(
      options.baseEnvironment,
      validateEnvironment(options.environment),
    ),
    resources: options.resources ? createResourceSpec(options.resources) : null,
    stdout: options.stdout ?? null,
    stderr: options.stderr ?? null,
    cliArgs: [...(options.cliArgs ?? [])],
    cliKwargs: { ...options.cliKwargs },
    isMpi: options.isMpi ?? false,
    amsLog: options.amsLog ?? false,
  };
}

export function createJob(options: JobOptions): GenericJob {
  return { kind: "job", ...buildJobFields(options) };
}

export function generateCommand(job: JobFields): string[] {
  return buildCliCommand(job.executable, job.cliArgs, job.cliKwargs);
}

export function toSubmissionSpec(job: JobFields, options: SubmissionOptions = {}): SubmissionSpec {
  const resources = job.resources;
  if (!resources) {
    throw new ResourceError(`Job "${job.name}" has no resources and cannot be submitted`);
  }
  const config = options.config ?? DEFAULT_CONFIG;

  const spec: SubmissionSpec = {
    command: generateCommand(job),
    totalTasks: totalTasks(resources),
    nodes: resources.nodes,
    coresPerTask: resources.coresPerTask,
    gpusPerTask: resources.gpusPerTask,
    exclusive: resources.exclusive,
    stdout: job.stdout ?? config.defaultStdout,
    stderr: job.stderr ?? config.defaultStderr,
    environment: { ...job.environment },
    cwd: options.cwd ?? process.cwd(),
  };

  if (job.isMpi) {
    logger.debug(`[ams-jobs] ${job.name}: mpi shell option ${config.mpiFlavor}`);
    spec.mpi = config.mpiFlavor;
  }
  spec.gpuAffinity = config.gpuAffinity;
  return spec;
}

function stageSourceToDict(source: StageSource): StageSourceDict {
  if (source.mechanism === "fs") {
    return { mechanism: "fs", src: source.src, src_type: source.srcType, pattern: source.pattern };
  }
  return { mechanism: "network", creds: source.creds, update_models: source.updateModels };
}

function stageSourceFromDict(source: StageSourceDict): StageSource {
  if (source.mechanism === "fs") {
    return { mechanism: "fs", src: source.src, srcType: source.src_type, pattern: source.pattern };
  }
  return { mechanism: "network", creds: source.creds, updateModels: source.update_models };
}

export function jobToDict(job: JobDescription): JobDict {
  const base = {
    name: job.name,
    executable: job.executable,
    environment: { ...job.environment },
    resources: job.resources ? resourcesToDict(job.resources) : null,
    stdout: job.stdout,
    stderr: job.stderr,
    cli_args: [...job.cliArgs],
    cli_kwargs: { ...job.cliKwargs },
    is_mpi: job.isMpi,
    ams_log: job.amsLog,
  };

  switch (job.kind) {
    case "job":
      return { ...base, kind: job.kind };
    case "domain":
      return {
        ...base,
        kind: job.kind,
        domain_names: [...job.domainNames],
        stage_dir: job.stageDir,
        ams_objects_path: job.amsObjectsPath,
      };
    case "train":
    case "sub-select":
      return { ...base, kind: job.kind, domain: job.domain };
    case "stage":
      return {
        ...base,
        kind: job.kind,
        variant: job.variant,
        destination_path: job.destinationPath,
        persistent_store_path: job.persistentStorePath,
        store: job.storeFlag,
        db_type: job.dbType,
        policy: job.policy,
        prune_module_path: job.pruneModulePath,
        prune_class: job.pruneClass,
        source: stageSourceToDict(job.source),
      };
    case "orchestrator":
      return {
        ...base,
        kind: job.kind,
        scheduler_uri: job.schedulerUri,
        broker_config_path: job.brokerConfigPath,
      };
    default:
      job satisfies never;
      throw new ConfigurationError(`Unsupported job kind: ${String(job)}`);
  }
}

/**
 * Restores a job from `jobToDict` output. Fields are taken as they were
 * serialized; construction-time flag assembly is not repeated.
 */
export function jobFromDict(value: unknown): JobDescription {
  const dict = checkValue(JobDictSchema, value, "job description");
  const fields: JobFields = {
    name: dict.name,
    executable: dict.executable,
    environment: { ...dict.environment },
    resources: dict.resources ? resourcesFromDict(dict.resources) : null,
    stdout: dict.stdout,
    stderr: dict.stderr,
    cliArgs: [...dict.cli_args],
    cliKwargs: { ...dict.cli_kwargs },
    isMpi: dict.is_mpi,
    amsLog: dict.ams_log,
  };

  switch (dict.kind) {
    case "job":
      return { ...fields, kind: dict.kind };
    case "domain":
      return {
        ...fields,
        kind: dict.kind,
        domainNames: [...dict.domain_names],
        stageDir: dict.stage_dir,
        amsObjectsPath: dict.ams_objects_path,
      };
    case "train":
    case "sub-select":
      return { ...fields, kind: dict.kind, domain: dict.domain };
    case "stage":
      return {
        ...fields,
        kind: dict.kind,
        variant: dict.variant,
        destinationPath: dict.destination_path,
        persistentStorePath: dict.persistent_store_path,
        storeFlag: dict.store,
        dbType: dict.db_type,
        policy: dict.policy,
        pruneModulePath: dict.prune_module_path,
        pruneClass: dict.prune_class,
        source: stageSourceFromDict(dict.source),
      };
    case "orchestrator":
      return {
        ...fields,
        kind: dict.kind,
        schedulerUri: dict.scheduler_uri,
        brokerConfigPath: dict.broker_config_path,
      };
    default:
      dict satisfies never;
      throw new ConfigurationError("Unsupported job kind");
  }
}

function jobLabel(job: JobDescription): string {
  return job.kind === "stage" ? `stage:${job.variant}` : job.kind;
}

export function describeJob(job: JobDescription): string {
  return [
    jobLabel(job),
    `CLI: ${formatCommandLine(generateCommand(job))}`,
    `Description: ${JSON.stringify(jobToDict(job))}`,
  ].join("\n");
}
