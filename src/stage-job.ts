import { existsSync } from "node:fs";
import { ConfigurationError } from "./errors.js";
import { buildJobFields, type JobOptions } from "./job.js";
import type { ResourceSpecInput } from "./resources.js";
import { NetworkStageDescriptionSchema, checkValue } from "./schema.js";
import type { CliKwargs, CliValue, StageJob, StageSource, StageVariant } from "./types.js";

export const STAGE_EXECUTABLE = "AMSDBStage";

const DEFAULT_DB_TYPE = "dhdf5";
const DEFAULT_POLICY = "process";
const DEFAULT_PATTERN = "*.h5";
const DEFAULT_SRC_TYPE = "shdf5";

export type StageJobOptions = Omit<JobOptions, "name" | "executable" | "resources" | "isMpi"> & {
  resources: ResourceSpecInput;
  destinationPath: string;
  persistentStorePath: string;
  storeFlag?: boolean;
  dbType?: string;
  policy?: string;
  pruneModulePath?: string | null;
  pruneClass?: string | null;
};

export type FsStageJobOptions = StageJobOptions & {
  src: string;
  srcType?: string;
  pattern?: string;
};

export type NetworkStageJobOptions = StageJobOptions & {
  creds: string;
  updateModels?: boolean;
};

export type FsPersistentStageJobOptions = Omit<
  StageJobOptions,
  "storeFlag" | "dbType" | "policy"
> & {
  src: string;
};

type Pruning = { modulePath: string; className: string } | null;

function validatePruning(
  modulePath: string | null | undefined,
  className: string | null | undefined,
): Pruning {
  if (modulePath == null) {
    return null;
  }
  if (!existsSync(modulePath)) {
    throw new ConfigurationError(`Pruning module ${modulePath} does not exist`);
  }
  if (!className?.trim()) {
    throw new ConfigurationError(`Pruning module ${modulePath} requires a pruning class`);
  }
  return { modulePath, className: className.trim() };
}

function sourceFlags(source: StageSource): { args: CliValue[]; kwargs: CliKwargs } {
  if (source.mechanism === "fs") {
    return {
      args: [],
      kwargs: {
        "--src": source.src,
        ...(source.srcType === null ? {} : { "--src-type": source.srcType }),
        "--pattern": source.pattern,
        "--mechanism": "fs",
      },
    };
  }
  return {
    args: source.updateModels ? ["--update-rmq-models"] : [],
    kwargs: {
      "--creds": source.creds,
      "--mechanism": "network",
    },
  };
}

function createStageJob(
  variant: StageVariant,
  name: string,
  source: StageSource,
  options: StageJobOptions,
): StageJob {
  const {
    destinationPath,
    persistentStorePath,
    storeFlag = true,
    dbType = DEFAULT_DB_TYPE,
    policy = DEFAULT_POLICY,
    pruneModulePath,
    pruneClass,
    cliArgs,
    cliKwargs,
    ...jobOptions
  } = options;

  // Checked before any flag is assembled.
  const pruning = validatePruning(pruneModulePath, pruneClass);

  const flags = sourceFlags(source);
  const kwargs: CliKwargs = {
    ...cliKwargs,
    ...flags.kwargs,
    "--dest": destinationPath,
    "--persistent-db-path": persistentStorePath,
    "--db-type": dbType,
    "--policy": policy,
  };
  if (pruning) {
    kwargs["--load"] = pruning.modulePath;
    kwargs["--class"] = pruning.className;
  }
  const args: CliValue[] = [
    ...(cliArgs ?? []),
    ...flags.args,
    storeFlag ? "--store" : "--no-store",
  ];

  return {
    kind: "stage",
    ...buildJobFields({
      ...jobOptions,
      name,
      executable: STAGE_EXECUTABLE,
      cliArgs: args,
      cliKwargs: kwargs,
    }),
    variant,
    destinationPath,
    persistentStorePath,
    storeFlag,
    dbType,
    policy,
    pruneModulePath: pruning?.modulePath ?? null,
    pruneClass: pruning?.className ?? null,
    source,
  };
}

/** Stages samples the application wrote to the filesystem. */
export function createFsStageJob(options: FsStageJobOptions): StageJob {
  const { src, srcType = DEFAULT_SRC_TYPE, pattern = DEFAULT_PATTERN, ...stageOptions } = options;
  return createStageJob(
    "fs",
    "AMSStageJob",
    { mechanism: "fs", src, srcType, pattern },
    stageOptions,
  );
}

/** Consumes samples the application publishes through the message broker. */
export function createNetworkStageJob(options: NetworkStageJobOptions): StageJob {
  const { creds, updateModels = false, ...stageOptions } = options;
  return createStageJob(
    "network",
    "AMSStageJob",
    { mechanism: "network", creds, updateModels },
    stageOptions,
  );
}

export function networkStageJobFromDescription(
  descr: unknown,
  params: {
    destinationPath: string;
    persistentStorePath: string;
    creds: string;
    resources: ResourceSpecInput;
  },
): StageJob {
  const parsed = checkValue(NetworkStageDescriptionSchema, descr, "stage job description");
  return createNetworkStageJob({
    ...params,
    storeFlag: parsed.store,
    dbType: parsed.db_type,
    updateModels: parsed.update_models,
    pruneModulePath: parsed.prune_module_path,
    pruneClass: parsed.prune_class,
    environment: parsed.environ,
    stdout: parsed.stdout,
    stderr: parsed.stderr,
    cliArgs: parsed.cli_args,
    cliKwargs: parsed.cli_kwargs,
  });
}

/**
 * Moves staged files from a temporary filesystem location into the
 * persistent store. Always stores, using the default pattern and policy,
 * and leaves the source type to the stager.
 */
export function createFsPersistentStageJob(options: FsPersistentStageJobOptions): StageJob {
  const { src, ...stageOptions } = options;
  return createStageJob(
    "fs-persistent",
    "AMSStage",
    { mechanism: "fs", src, srcType: null, pattern: DEFAULT_PATTERN },
    { ...stageOptions, storeFlag: true, dbType: DEFAULT_DB_TYPE, policy: DEFAULT_POLICY },
  );
}
