import { ConfigurationError, ResourceError } from "./errors.js";
import { ResourceDictSchema, checkValue, type ResourceDict } from "./schema.js";
import type { DomainJob, ResourceSpec } from "./types.js";

export type ResourceSpecInput = {
  nodes: number;
  tasksPerNode: number;
  coresPerTask?: number;
  exclusive?: boolean;
  gpusPerTask?: number;
};

function readCount(value: number, field: string, minimum: number): number {
  if (!Number.isInteger(value) || value < minimum) {
    throw new ConfigurationError(`${field} must be an integer >= ${minimum} (got ${value})`);
  }
  return value;
}

export function createResourceSpec(input: ResourceSpecInput): ResourceSpec {
  return Object.freeze({
    nodes: readCount(input.nodes, "nodes", 1),
    tasksPerNode: readCount(input.tasksPerNode, "tasksPerNode", 1),
    coresPerTask: readCount(input.coresPerTask ?? 1, "coresPerTask", 1),
    exclusive: input.exclusive ?? true,
    gpusPerTask: readCount(input.gpusPerTask ?? 0, "gpusPerTask", 0),
  });
}

export function totalTasks(resources: ResourceSpec): number {
  return resources.nodes * resources.tasksPerNode;
}

export function resourcesToDict(resources: ResourceSpec): Required<ResourceDict> {
  return {
    nodes: resources.nodes,
    tasks_per_node: resources.tasksPerNode,
    cores_per_task: resources.coresPerTask,
    exclusive: resources.exclusive,
    gpus_per_task: resources.gpusPerTask,
  };
}

export function resourceInputFromDict(dict: ResourceDict): ResourceSpecInput {
  return {
    nodes: dict.nodes,
    tasksPerNode: dict.tasks_per_node,
    coresPerTask: dict.cores_per_task,
    exclusive: dict.exclusive,
    gpusPerTask: dict.gpus_per_task,
  };
}

export function resourcesFromDict(value: unknown, label = "resources"): ResourceSpec {
  return createResourceSpec(resourceInputFromDict(checkValue(ResourceDictSchema, value, label)));
}

/**
 * Resources for a filesystem-to-persistent staging job that runs next to a
 * domain job: one non-exclusive five-core task on each of its nodes.
 */
export function stageResourcesFromDomainJob(
  job: Pick<DomainJob, "name" | "resources">,
): ResourceSpec {
  if (!job.resources) {
    throw new ResourceError(`Domain job "${job.name}" has no resources to derive staging from`);
  }
  return createResourceSpec({
    nodes: job.resources.nodes,
    tasksPerNode: 1,
    coresPerTask: 5,
    exclusive: false,
    gpusPerTask: job.resources.gpusPerTask,
  });
}
