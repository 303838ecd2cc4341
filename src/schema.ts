import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigurationError } from "./errors.js";

export const CliValueSchema = Type.Union([Type.String(), Type.Number(), Type.Boolean()]);

export const ResourceDictSchema = Type.Object(
  {
    nodes: Type.Integer({ minimum: 1 }),
    tasks_per_node: Type.Integer({ minimum: 1 }),
    cores_per_task: Type.Optional(Type.Integer({ minimum: 1 })),
    exclusive: Type.Optional(Type.Boolean()),
    gpus_per_task: Type.Optional(Type.Integer({ minimum: 0 })),
  },
  { additionalProperties: false },
);

const NullableString = Type.Union([Type.String(), Type.Null()]);

const JobDictBase = Type.Object({
  name: Type.String(),
  executable: Type.String({ minLength: 1 }),
  environment: Type.Record(Type.String(), Type.String()),
  resources: Type.Union([ResourceDictSchema, Type.Null()]),
  stdout: NullableString,
  stderr: NullableString,
  cli_args: Type.Array(CliValueSchema),
  cli_kwargs: Type.Record(Type.String(), CliValueSchema),
  is_mpi: Type.Boolean(),
  ams_log: Type.Boolean(),
});

export const GenericJobDictSchema = Type.Composite([
  JobDictBase,
  Type.Object({ kind: Type.Literal("job") }),
]);

export const DomainJobDictSchema = Type.Composite([
  JobDictBase,
  Type.Object({
    kind: Type.Literal("domain"),
    domain_names: Type.Array(Type.String({ minLength: 1 })),
    stage_dir: NullableString,
    ams_objects_path: NullableString,
  }),
]);

export const MlJobDictSchema = Type.Composite([
  JobDictBase,
  Type.Object({
    kind: Type.Union([Type.Literal("train"), Type.Literal("sub-select")]),
    domain: Type.String({ minLength: 1 }),
  }),
]);

export const StageSourceDictSchema = Type.Union([
  Type.Object({
    mechanism: Type.Literal("fs"),
    src: Type.String(),
    src_type: Type.Union([Type.String(), Type.Null()]),
    pattern: Type.String(),
  }),
  Type.Object({
    mechanism: Type.Literal("network"),
    creds: Type.String(),
    update_models: Type.Boolean(),
  }),
]);

export const StageJobDictSchema = Type.Composite([
  JobDictBase,
  Type.Object({
    kind: Type.Literal("stage"),
    variant: Type.Union([
      Type.Literal("fs"),
      Type.Literal("network"),
      Type.Literal("fs-persistent"),
    ]),
    destination_path: Type.String(),
    persistent_store_path: Type.String(),
    store: Type.Boolean(),
    db_type: Type.String(),
    policy: Type.String(),
    prune_module_path: NullableString,
    prune_class: NullableString,
    source: StageSourceDictSchema,
  }),
]);

export const OrchestratorJobDictSchema = Type.Composite([
  JobDictBase,
  Type.Object({
    kind: Type.Literal("orchestrator"),
    scheduler_uri: Type.String(),
    broker_config_path: Type.String(),
  }),
]);

export const JobDictSchema = Type.Union([
  GenericJobDictSchema,
  DomainJobDictSchema,
  MlJobDictSchema,
  StageJobDictSchema,
  OrchestratorJobDictSchema,
]);

export type ResourceDict = Static<typeof ResourceDictSchema>;
export type JobDict = Static<typeof JobDictSchema>;
export type StageSourceDict = Static<typeof StageSourceDictSchema>;

const CliDescriptionSchema = Type.Object({
  executable: Type.String({ minLength: 1 }),
  cli_args: Type.Optional(Type.Array(CliValueSchema)),
  cli_kwargs: Type.Optional(Type.Record(Type.String(), CliValueSchema)),
  stdout: Type.Optional(Type.String()),
  stderr: Type.Optional(Type.String()),
  is_mpi: Type.Optional(Type.Boolean()),
});

export const DomainJobDescriptionSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  domain_names: Type.Array(Type.String({ minLength: 1 }), { minItems: 1 }),
  resources: ResourceDictSchema,
  ams_log: Type.Optional(Type.Boolean()),
  cli: CliDescriptionSchema,
});

export const MlJobDescriptionSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  domain_name: Type.String({ minLength: 1 }),
  resources: ResourceDictSchema,
  ams_log: Type.Optional(Type.Boolean()),
  cli: CliDescriptionSchema,
});

export const NetworkStageDescriptionSchema = Type.Object(
  {
    store: Type.Optional(Type.Boolean()),
    db_type: Type.Optional(Type.String()),
    update_models: Type.Optional(Type.Boolean()),
    environ: Type.Optional(Type.Union([Type.Record(Type.String(), Type.String()), Type.Null()])),
    prune_module_path: Type.Optional(Type.String()),
    prune_class: Type.Optional(Type.String()),
    stdout: Type.Optional(Type.String()),
    stderr: Type.Optional(Type.String()),
    cli_args: Type.Optional(Type.Array(CliValueSchema)),
    cli_kwargs: Type.Optional(Type.Record(Type.String(), CliValueSchema)),
  },
  { additionalProperties: false },
);

export type DomainJobDescription = Static<typeof DomainJobDescriptionSchema>;
export type MlJobDescription = Static<typeof MlJobDescriptionSchema>;
export type NetworkStageDescription = Static<typeof NetworkStageDescriptionSchema>;

export function checkValue<T extends TSchema>(
  schema: T,
  value: unknown,
  label: string,
  fail: (message: string) => Error = (message) => new ConfigurationError(message),
): Static<T> {
  if (Value.Check(schema, value)) {
    return value;
  }
  const first = Value.Errors(schema, value).First();
  const detail = first ? `${first.path || "/"}: ${first.message}` : "does not match schema";
  throw fail(`${label} is invalid (${detail})`);
}
