import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { RmqConfiguration } from "./broker.js";
import { parseAmsJobsConfig } from "./config.js";
import {
  buildAmsObjects,
  createDomainJob,
  deployDomainJob,
  domainJobFromDescription,
} from "./domain-job.js";
import { ConfigurationError, StoreError } from "./errors.js";
import { LedgerDataStore, type DataStore } from "./store.js";

const tmpDirs: string[] = [];

afterEach(async () => {
  await Promise.all(
    tmpDirs.splice(0).map(async (dir) => {
      await fs.rm(dir, { recursive: true, force: true });
    }),
  );
});

async function createStore(): Promise<LedgerDataStore> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "ams-domain-store-"));
  tmpDirs.push(root);
  return new LedgerDataStore({ rootPath: root });
}

function createSimulation(domainNames: string[] = ["a", "b"]) {
  return createDomainJob({
    name: "sim",
    executable: "./sim",
    domainNames,
    resources: { nodes: 1, tasksPerNode: 4 },
  });
}

const brokerConfig = {
  "service-host": "broker.example",
  "service-port": 5671,
  "rabbitmq-user": "ams",
  "rabbitmq-password": "test-secret",
  "rabbitmq-vhost": "/ams",
  "rabbitmq-outbound-queue": "ams-out",
  "rabbitmq-exchange": "ams-exchange",
  "rabbitmq-routing-key": "training",
};

describe("domain job construction", () => {
  it("deduplicates domain names in order", () => {
    const job = createSimulation(["a", "b", "a"]);
    expect(job.domainNames).toEqual(["a", "b"]);
    expect(job.stageDir).toBeNull();
    expect(job.amsObjectsPath).toBeNull();
  });

  it("builds from a manifest entry with an explicit base environment", () => {
    const job = domainJobFromDescription(
      {
        name: "binomial",
        domain_names: ["options"],
        ams_log: true,
        resources: { nodes: 2, tasks_per_node: 8, gpus_per_task: 1 },
        cli: {
          executable: "./binomial",
          cli_args: ["--steps", 100],
          cli_kwargs: { "-S": 2 },
          stdout: "binomial.out",
        },
      },
      { stageDir: "/stage", baseEnvironment: { PATH: "/usr/bin" } },
    );
    expect(job.kind).toBe("domain");
    expect(job.name).toBe("binomial");
    expect(job.amsLog).toBe(true);
    expect(job.stageDir).toBe("/stage");
    expect(job.environment).toEqual({ PATH: "/usr/bin" });
    expect(job.resources).toEqual({
      nodes: 2,
      tasksPerNode: 8,
      coresPerTask: 1,
      exclusive: true,
      gpusPerTask: 1,
    });
    expect(job.cliArgs).toEqual(["--steps", 100]);
    expect(job.stdout).toBe("binomial.out");
    expect(job.stderr).toBeNull();
  });

  it("rejects a manifest entry without domains", () => {
    expect(() =>
      domainJobFromDescription({
        name: "binomial",
        domain_names: [],
        resources: { nodes: 1, tasks_per_node: 1 },
        cli: { executable: "./binomial" },
      }),
    ).toThrow(ConfigurationError);
  });
});

describe("AMS objects", () => {
  it("uses the latest model and a data-gathering entry for domains without one", async () => {
    const store = await createStore();
    await store.add("models", "a", { file: "old.pt", uq_type: "deltauq", threshold: 0.9 });
    await store.add("models", "a", { file: "m.pt", uq_type: "faiss", threshold: 0.5 });

    const objects = await buildAmsObjects(createSimulation(), store);

    expect(objects).toEqual({
      db: { fs_path: store.getCandidatePath(), dbType: "hdf5" },
      ml_models: {
        model_0: {
          uq_type: "faiss",
          model_path: "m.pt",
          uq_aggregate: "mean",
          threshold: 0.5,
          db_label: "a",
        },
        model_1: {
          uq_type: "random",
          model_path: "",
          uq_aggregate: "mean",
          threshold: 1,
          db_label: "b",
        },
      },
      domain_models: { a: "model_0", b: "model_1" },
    });
  });

  it("points the filesystem db at the stage directory when set", async () => {
    const store = await createStore();
    const job = createDomainJob({
      name: "sim",
      executable: "./sim",
      domainNames: ["a"],
      stageDir: "/scratch/stage",
    });
    const objects = await buildAmsObjects(job, store);
    expect(objects.db).toEqual({ fs_path: "/scratch/stage", dbType: "hdf5" });
  });

  it("describes a broker-backed db when a broker is given", async () => {
    const store = await createStore();
    const broker = RmqConfiguration.fromObject(brokerConfig);
    const objects = await buildAmsObjects(createSimulation(["a"]), store, broker);
    expect(objects.db).toEqual({
      rmq_config: brokerConfig,
      dbType: "rmq",
      update_surrogate: false,
    });
  });

  it("rejects model records without uq information", async () => {
    const store = await createStore();
    await store.add("models", "a", { file: "m.pt" });
    await expect(buildAmsObjects(createSimulation(["a"]), store)).rejects.toThrow(StoreError);
  });
});

describe("domain job deployment", () => {
  it("writes the artifact under the store tmp directory and exports it", async () => {
    const store = await createStore();
    await store.add("models", "a", { file: "m.pt", uq_type: "faiss", threshold: 0.5 });
    const job = createSimulation();

    const artifactPath = await deployDomainJob(job, store);

    expect(path.dirname(artifactPath)).toBe(path.join(store.rootPath, "tmp"));
    expect(artifactPath.endsWith(".json")).toBe(true);
    expect(job.environment.AMS_OBJECTS).toBe(artifactPath);
    expect(job.environment.AMS_LOG_LEVEL).toBeUndefined();
    expect(job.amsObjectsPath).toBe(artifactPath);

    const written = JSON.parse(await fs.readFile(artifactPath, "utf8"));
    expect(Object.keys(written.ml_models)).toHaveLength(2);
    expect(written.ml_models.model_1.uq_type).toBe("random");
    expect(written.ml_models.model_1.model_path).toBe("");
    expect(written.ml_models.model_1.threshold).toBe(1);
    expect(Object.keys(written.domain_models)).toHaveLength(2);
  });

  it("creates a new artifact on every call", async () => {
    const store = await createStore();
    const job = createSimulation(["a"]);

    const first = await deployDomainJob(job, store);
    const second = await deployDomainJob(job, store);

    expect(second).not.toBe(first);
    expect(job.environment.AMS_OBJECTS).toBe(second);
    const files = await fs.readdir(path.join(store.rootPath, "tmp"));
    expect(files.sort()).toEqual([path.basename(first), path.basename(second)].sort());
  });

  it("enables debug logging of the application when requested", async () => {
    const store = await createStore();
    const job = createDomainJob({
      name: "sim",
      executable: "./sim",
      domainNames: ["a"],
      amsLog: true,
    });
    await deployDomainJob(job, store);
    expect(job.environment.AMS_LOG_LEVEL).toBe("debug");
  });

  it("honours the configured artifact directory", async () => {
    const store = await createStore();
    const job = createSimulation(["a"]);
    const artifactPath = await deployDomainJob(
      job,
      store,
      null,
      parseAmsJobsConfig({ artifactDir: "objects" }),
    );
    expect(path.dirname(artifactPath)).toBe(path.join(store.rootPath, "objects"));
  });

  it("propagates store failures without touching the environment", async () => {
    const failure = new StoreError("index unavailable");
    const store: DataStore = {
      rootPath: "/unused",
      getCandidatePath: () => "/unused/candidates",
      search: vi.fn(async () => {
        throw failure;
      }),
      mkdir: vi.fn(async (subpath: string) => `/unused/${subpath}`),
      uniqueFilename: () => "never",
    };
    const job = createSimulation(["a"]);

    await expect(deployDomainJob(job, store)).rejects.toBe(failure);
    expect(job.environment).toEqual({});
    expect(store.mkdir).not.toHaveBeenCalled();
  });
});
