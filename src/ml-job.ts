import { ConfigurationError } from "./errors.js";
import { buildJobFields, type JobOptions } from "./job.js";
import { resourceInputFromDict } from "./resources.js";
import { MlJobDescriptionSchema, checkValue } from "./schema.js";
import type { DataStore } from "./store.js";
import type { CliKwargs, CliValue, MlJob } from "./types.js";

export const FORMATTING_KEYS = ["AMS_STORE_PATH"] as const;

export type FormattingKey = (typeof FORMATTING_KEYS)[number];

export type FormattingContext = Readonly<Record<FormattingKey, string>>;

const TEMPLATE_TOKEN = /\{\{|\}\}|\{([^{}]*)\}|[{}]/g;

function isFormattingKey(key: string): key is FormattingKey {
  return FORMATTING_KEYS.some((known) => known === key);
}

export function generateFormatting(store: Pick<DataStore, "rootPath">): FormattingContext {
  return { AMS_STORE_PATH: store.rootPath };
}

/** Substitutes `{KEY}` placeholders; `{{` and `}}` stand for literal braces. */
export function formatTemplate(template: string, context: FormattingContext): string {
  return template.replace(TEMPLATE_TOKEN, (match: string, key: string | undefined) => {
    if (match === "{{") {
      return "{";
    }
    if (match === "}}") {
      return "}";
    }
    if (key === undefined) {
      throw new ConfigurationError(`Unbalanced "${match}" in template "${template}"`);
    }
    if (!isFormattingKey(key)) {
      throw new ConfigurationError(
        `Unknown template key "${key}" in "${template}" (known: ${FORMATTING_KEYS.join(", ")})`,
      );
    }
    return context[key];
  });
}

function formatValue(value: CliValue, context: FormattingContext): CliValue {
  return typeof value === "string" ? formatTemplate(value, context) : value;
}

export type MlJobOptions = JobOptions & {
  domain: string;
  /** String arguments are formatted against it at construction. */
  formatting: FormattingContext;
};

function createMlJob(kind: MlJob["kind"], options: MlJobOptions): MlJob {
  const { domain, formatting, ...jobOptions } = options;
  if (!domain.trim()) {
    throw new ConfigurationError(`ML job "${options.name}" requires a domain`);
  }

  const cliArgs = (jobOptions.cliArgs ?? []).map((value) => formatValue(value, formatting));
  const cliKwargs: CliKwargs = {};
  for (const [flag, value] of Object.entries(jobOptions.cliKwargs ?? {})) {
    cliKwargs[flag] = formatValue(value, formatting);
  }

  return {
    kind,
    ...buildJobFields({ ...jobOptions, cliArgs, cliKwargs }),
    domain: domain.trim(),
  };
}

export function createTrainingJob(options: MlJobOptions): MlJob {
  return createMlJob("train", options);
}

export function createSubSelectJob(options: MlJobOptions): MlJob {
  return createMlJob("sub-select", options);
}

/**
 * Builds a training or sub-selection job from a workflow manifest entry.
 * Store paths are substituted into its arguments immediately, so unknown
 * template keys fail here rather than at submission.
 */
export function mlJobFromDescription(
  kind: MlJob["kind"],
  store: Pick<DataStore, "rootPath">,
  descr: unknown,
): MlJob {
  const parsed = checkValue(MlJobDescriptionSchema, descr, `${kind} job description`);
  return createMlJob(kind, {
    name: parsed.name,
    domain: parsed.domain_name,
    formatting: generateFormatting(store),
    environment: null,
    executable: parsed.cli.executable,
    cliArgs: parsed.cli.cli_args,
    cliKwargs: parsed.cli.cli_kwargs,
    stdout: parsed.cli.stdout,
    stderr: parsed.cli.stderr,
    isMpi: parsed.cli.is_mpi,
    amsLog: parsed.ams_log ?? false,
    resources: resourceInputFromDict(parsed.resources),
  });
}
