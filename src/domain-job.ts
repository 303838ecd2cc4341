import fs from "node:fs/promises";
import path from "node:path";
import type { BrokerConfig } from "./broker.js";
import { DEFAULT_CONFIG } from "./config.js";
import { StoreError } from "./errors.js";
import { buildJobFields, type JobOptions } from "./job.js";
import { logger } from "./logger.js";
import { resourceInputFromDict } from "./resources.js";
import { DomainJobDescriptionSchema, checkValue } from "./schema.js";
import type { DataStore } from "./store.js";
import type {
  AmsJobsConfig,
  AmsObjects,
  AmsObjectsDb,
  BaseEnvironment,
  DomainJob,
  ModelEntry,
} from "./types.js";

export type DomainJobOptions = JobOptions & {
  domainNames: Iterable<string>;
  stageDir?: string | null;
};

export function createDomainJob(options: DomainJobOptions): DomainJob {
  const { domainNames, stageDir, ...jobOptions } = options;
  return {
    kind: "domain",
    ...buildJobFields(jobOptions),
    domainNames: Array.from(new Set(domainNames)),
    stageDir: stageDir ?? null,
    amsObjectsPath: null,
  };
}

export function domainJobFromDescription(
  descr: unknown,
  options: { stageDir?: string | null; baseEnvironment?: BaseEnvironment } = {},
): DomainJob {
  const parsed = checkValue(DomainJobDescriptionSchema, descr, "domain job description");
  return createDomainJob({
    name: parsed.name,
    domainNames: parsed.domain_names,
    stageDir: options.stageDir,
    baseEnvironment: options.baseEnvironment,
    amsLog: parsed.ams_log ?? false,
    resources: resourceInputFromDict(parsed.resources),
    executable: parsed.cli.executable,
    cliArgs: parsed.cli.cli_args,
    cliKwargs: parsed.cli.cli_kwargs,
    stdout: parsed.cli.stdout,
    stderr: parsed.cli.stderr,
    isMpi: parsed.cli.is_mpi,
  });
}

function describeDb(job: DomainJob, store: DataStore, broker: BrokerConfig | null): AmsObjectsDb {
  if (broker) {
    return {
      rmq_config: broker.toConnectionDescriptor(true),
      dbType: "rmq",
      update_surrogate: false,
    };
  }
  return { fs_path: job.stageDir ?? store.getCandidatePath(), dbType: "hdf5" };
}

/**
 * Without a registered model the domain gathers data on every sample:
 * a random UQ entry with threshold 1 marks everything as uncertain.
 */
function dataGatheringEntry(domainName: string): ModelEntry {
  return {
    uq_type: "random",
    model_path: "",
    uq_aggregate: "mean",
    threshold: 1,
    db_label: domainName,
  };
}

export async function buildAmsObjects(
  job: DomainJob,
  store: DataStore,
  broker: BrokerConfig | null = null,
): Promise<AmsObjects> {
  const objects: AmsObjects = {
    db: describeDb(job, store, broker),
    ml_models: {},
    domain_models: {},
  };

  for (const [index, domainName] of job.domainNames.entries()) {
    const models = await store.search(domainName, "models", "latest");
    logger.debug(`[ams-jobs] ${domainName}: ${models.length} model(s) registered`);

    const model = models[0];
    let entry: ModelEntry;
    if (!model) {
      entry = dataGatheringEntry(domainName);
    } else {
      if (model.uq_type === undefined || model.threshold === undefined) {
        throw new StoreError(
          `Model ${model.file} for domain "${domainName}" is missing uq_type or threshold`,
        );
      }
      entry = {
        uq_type: model.uq_type,
        model_path: model.file,
        uq_aggregate: "mean",
        threshold: model.threshold,
        db_label: domainName,
      };
    }

    const key = `model_${index}`;
    objects.ml_models[key] = entry;
    objects.domain_models[domainName] = key;
  }

  return objects;
}

/**
 * Writes a fresh AMS objects file under the store and points `AMS_OBJECTS`
 * at it. Every call writes a new file; the previous one is left in place.
 */
export async function deployDomainJob(
  job: DomainJob,
  store: DataStore,
  broker: BrokerConfig | null = null,
  config: AmsJobsConfig = DEFAULT_CONFIG,
): Promise<string> {
  const objects = await buildAmsObjects(job, store, broker);
  // The job must be able to read this directory from its compute nodes.
  const artifactDir = await store.mkdir(config.artifactDir);
  const artifactPath = path.join(artifactDir, `${store.uniqueFilename()}.json`);
  await fs.writeFile(artifactPath, JSON.stringify(objects), { encoding: "utf8", flag: "wx" });

  job.amsObjectsPath = artifactPath;
  job.environment.AMS_OBJECTS = artifactPath;
  if (job.amsLog) {
    job.environment.AMS_LOG_LEVEL = "debug";
  }
  logger.info(`[ams-jobs] ${job.name}: wrote AMS objects to ${artifactPath}`);
  return artifactPath;
}
