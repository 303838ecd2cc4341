export type ResourceSpec = Readonly<{
  nodes: number;
  tasksPerNode: number;
  coresPerTask: number;
  exclusive: boolean;
  gpusPerTask: number;
}>;

export type CliValue = string | number | boolean;

export type CliKwargs = Record<string, CliValue>;

export type JobEnvironment = Record<string, string>;

/** Environment-like input such as `process.env`, where entries may be undefined. */
export type BaseEnvironment = Readonly<Record<string, string | undefined>>;

export type JobKind = "job" | "domain" | "train" | "sub-select" | "stage" | "orchestrator";

export type JobFields = {
  name: string;
  executable: string;
  environment: JobEnvironment;
  resources: ResourceSpec | null;
  stdout: string | null;
  stderr: string | null;
  cliArgs: CliValue[];
  cliKwargs: CliKwargs;
  isMpi: boolean;
  amsLog: boolean;
};

export type GenericJob = JobFields & {
  kind: "job";
};

export type DomainJob = JobFields & {
  kind: "domain";
  domainNames: string[];
  stageDir: string | null;
  amsObjectsPath: string | null;
};

export type MlJob = JobFields & {
  kind: "train" | "sub-select";
  domain: string;
};

export type StageVariant = "fs" | "network" | "fs-persistent";

export type StageSource =
  | { mechanism: "fs"; src: string; srcType: string | null; pattern: string }
  | { mechanism: "network"; creds: string; updateModels: boolean };

export type StageJob = JobFields & {
  kind: "stage";
  variant: StageVariant;
  destinationPath: string;
  persistentStorePath: string;
  storeFlag: boolean;
  dbType: string;
  policy: string;
  pruneModulePath: string | null;
  pruneClass: string | null;
  source: StageSource;
};

export type OrchestratorJob = JobFields & {
  kind: "orchestrator";
  schedulerUri: string;
  brokerConfigPath: string;
};

export type JobDescription = GenericJob | DomainJob | MlJob | StageJob | OrchestratorJob;

export type SubmissionSpec = {
  command: string[];
  totalTasks: number;
  nodes: number;
  coresPerTask: number;
  gpusPerTask: number;
  exclusive: boolean;
  stdout?: string;
  stderr?: string;
  environment: JobEnvironment;
  cwd: string;
  mpi?: string;
  gpuAffinity?: string;
  /** Set for nested scheduler instances that hold a resource partition. */
  nested?: boolean;
};

export type ModelEntry = {
  uq_type: string;
  model_path: string;
  uq_aggregate: string;
  threshold: number;
  db_label: string;
};

export type AmsObjectsDb =
  | { fs_path: string; dbType: "hdf5" }
  | { rmq_config: Record<string, string | number>; dbType: "rmq"; update_surrogate: false };

export type AmsObjects = {
  db: AmsObjectsDb;
  ml_models: Record<string, ModelEntry>;
  domain_models: Record<string, string>;
};

export type AmsJobsConfig = {
  defaultStdout: string;
  defaultStderr: string;
  mpiFlavor: string;
  gpuAffinity: string;
  artifactDir: string;
};
