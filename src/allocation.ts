import { ConfigurationError } from "./errors.js";
import type { JobEnvironment, SubmissionSpec } from "./types.js";

export type NestedInstanceOptions = {
  numNodes: number;
  coresPerNode: number;
  gpusPerNode: number;
  /** Sleep duration of the placeholder; `inf` holds the partition until cancelled. */
  time?: string;
  stdout?: string;
  stderr?: string;
  environment?: Readonly<JobEnvironment>;
  cwd?: string;
};

function requireCount(value: number, field: string, minimum: number): number {
  if (!Number.isInteger(value) || value < minimum) {
    throw new ConfigurationError(`${field} must be an integer >= ${minimum} (got ${value})`);
  }
  return value;
}

/**
 * A nested scheduler instance that sleeps on one slot per node to carve a
 * partition out of the parent allocation.
 */
export function nestedInstanceSpec(options: NestedInstanceOptions): SubmissionSpec {
  const numNodes = requireCount(options.numNodes, "numNodes", 1);
  const spec: SubmissionSpec = {
    command: ["sleep", options.time ?? "inf"],
    totalTasks: numNodes,
    nodes: numNodes,
    coresPerTask: requireCount(options.coresPerNode, "coresPerNode", 1),
    gpusPerTask: requireCount(options.gpusPerNode, "gpusPerNode", 0),
    // The parent must not place other jobs on the partition's resources.
    exclusive: true,
    environment: { ...options.environment },
    cwd: options.cwd ?? process.cwd(),
    nested: true,
  };
  if (options.stdout !== undefined) {
    spec.stdout = options.stdout;
  }
  if (options.stderr !== undefined) {
    spec.stderr = options.stderr;
  }
  return spec;
}

/** One-task probe job, useful to check that submission works at all. */
export function echoJobSpec(message: string, cwd: string = process.cwd()): SubmissionSpec {
  return {
    command: ["echo", message],
    totalTasks: 1,
    nodes: 1,
    coresPerTask: 1,
    gpusPerTask: 0,
    exclusive: true,
    environment: {},
    cwd,
  };
}
