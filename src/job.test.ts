import { describe, expect, it } from "vitest";
import { parseAmsJobsConfig } from "./config.js";
import { createDomainJob } from "./domain-job.js";
import { ConfigurationError, ResourceError } from "./errors.js";
import {
  createJob,
  describeJob,
  generateCommand,
  jobFromDict,
  jobToDict,
  toSubmissionSpec,
  validateEnvironment,
} from "./job.js";
import { createTrainingJob } from "./ml-job.js";
import { createOrchestratorJob } from "./orchestrator.js";
import { createNetworkStageJob } from "./stage-job.js";

describe("job environment", () => {
  it("defaults to an empty environment", () => {
    expect(createJob({ name: "probe", executable: "hostname" }).environment).toEqual({});
  });

  it("copies a string map", () => {
    const env = { OMP_NUM_THREADS: "4" };
    const job = createJob({ name: "probe", executable: "hostname", environment: env });
    env.OMP_NUM_THREADS = "8";
    expect(job.environment).toEqual({ OMP_NUM_THREADS: "4" });
  });

  it("merges an explicit base environment under the job environment", () => {
    const job = createJob({
      name: "probe",
      executable: "hostname",
      baseEnvironment: { PATH: "/usr/bin", HOME: undefined, OMP_NUM_THREADS: "1" },
      environment: { OMP_NUM_THREADS: "4" },
    });
    expect(job.environment).toEqual({ PATH: "/usr/bin", OMP_NUM_THREADS: "4" });
  });

  it("rejects values that are not string maps", () => {
    expect(() => validateEnvironment("PATH=/usr/bin")).toThrow(ConfigurationError);
    expect(() => validateEnvironment(["PATH"])).toThrow(/Unknown type array for environment/);
    expect(() => validateEnvironment({ OMP_NUM_THREADS: 4 })).toThrow(
      /environment\.OMP_NUM_THREADS must be a string/,
    );
  });

  it("rejects objects that are not plain maps", () => {
    class Settings {
      PATH = "/usr/bin";
    }
    expect(() => validateEnvironment(new Map([["PATH", "/usr/bin"]]))).toThrow(
      /Unknown type Map for environment/,
    );
    expect(() => validateEnvironment(new Date(0))).toThrow(/Unknown type Date for environment/);
    expect(() => validateEnvironment(new Settings())).toThrow(ConfigurationError);
    expect(validateEnvironment(Object.assign(Object.create(null), { PATH: "/usr/bin" }))).toEqual({
      PATH: "/usr/bin",
    });
  });

  it("rejects an empty executable", () => {
    expect(() => createJob({ name: "probe", executable: "  " })).toThrow(/requires an executable/);
  });
});

describe("job command", () => {
  it("places the executable, flags, then positional arguments", () => {
    const job = createJob({
      name: "run",
      executable: "run",
      cliArgs: ["a", "b"],
      cliKwargs: { "--x": 1 },
    });
    expect(generateCommand(job)).toEqual(["run", "--x", "1", "a", "b"]);
  });
});

describe("submission spec", () => {
  it("derives task counts, defaults and working directory", () => {
    const job = createJob({
      name: "sim",
      executable: "./sim",
      environment: { AMS_OBJECTS: "/tmp/a.json" },
      resources: { nodes: 2, tasksPerNode: 3, coresPerTask: 4 },
    });

    const spec = toSubmissionSpec(job, { cwd: "/work" });
    expect(spec).toEqual({
      command: ["./sim"],
      totalTasks: 6,
      nodes: 2,
      coresPerTask: 4,
      gpusPerTask: 0,
      exclusive: true,
      stdout: "ams_test.out",
      stderr: "ams_test.err",
      environment: { AMS_OBJECTS: "/tmp/a.json" },
      cwd: "/work",
      gpuAffinity: "per-task",
    });
  });

  it("uses the process working directory by default", () => {
    const job = createJob({ name: "sim", executable: "./sim", resources: { nodes: 1, tasksPerNode: 1 } });
    expect(toSubmissionSpec(job).cwd).toBe(process.cwd());
  });

  it("sets mpi and gpu affinity shell options", () => {
    const job = createJob({
      name: "sim",
      executable: "./sim",
      isMpi: true,
      stdout: "sim.out",
      resources: { nodes: 1, tasksPerNode: 4, gpusPerTask: 1 },
    });
    const spec = toSubmissionSpec(job, { cwd: "/work" });
    expect(spec.mpi).toBe("spectrum");
    expect(spec.gpuAffinity).toBe("per-task");
    expect(spec.stdout).toBe("sim.out");
    expect(spec.stderr).toBe("ams_test.err");
  });

  it("follows configured defaults", () => {
    const config = parseAmsJobsConfig({ defaultStdout: "run.out", mpiFlavor: "pmix" });
    const job = createJob({
      name: "sim",
      executable: "./sim",
      isMpi: true,
      resources: { nodes: 1, tasksPerNode: 1 },
    });
    const spec = toSubmissionSpec(job, { config, cwd: "/work" });
    expect(spec.stdout).toBe("run.out");
    expect(spec.mpi).toBe("pmix");
    expect(spec.gpuAffinity).toBe("per-task");
  });

  it("sets gpu affinity on jobs without GPUs", () => {
    const job = createJob({ name: "sim", executable: "./sim", resources: { nodes: 1, tasksPerNode: 1 } });
    const spec = toSubmissionSpec(job, {
      config: parseAmsJobsConfig({ gpuAffinity: "per-node" }),
      cwd: "/work",
    });
    expect(spec.gpusPerTask).toBe(0);
    expect(spec.gpuAffinity).toBe("per-node");
    expect(spec.mpi).toBeUndefined();
  });

  it("copies the environment", () => {
    const job = createJob({ name: "sim", executable: "./sim", resources: { nodes: 1, tasksPerNode: 1 } });
    const spec = toSubmissionSpec(job, { cwd: "/work" });
    job.environment.LATE = "1";
    expect(spec.environment).toEqual({});
  });

  it("fails without resources", () => {
    const job = createJob({ name: "sim", executable: "./sim" });
    expect(() => toSubmissionSpec(job)).toThrow(ResourceError);
  });
});

describe("job dictionaries", () => {
  it("round-trips a generic job", () => {
    const job = createJob({
      name: "probe",
      executable: "hostname",
      environment: { A: "1" },
      resources: { nodes: 1, tasksPerNode: 2, exclusive: false },
      cliArgs: ["-f", 3, true],
      cliKwargs: { "--level": 2 },
      isMpi: true,
      amsLog: true,
      stderr: "probe.err",
    });
    const dict = jobToDict(job);
    expect(dict).toEqual({
      kind: "job",
      name: "probe",
      executable: "hostname",
      environment: { A: "1" },
      resources: { nodes: 1, tasks_per_node: 2, cores_per_task: 1, exclusive: false, gpus_per_task: 0 },
      stdout: null,
      stderr: "probe.err",
      cli_args: ["-f", 3, true],
      cli_kwargs: { "--level": 2 },
      is_mpi: true,
      ams_log: true,
    });
    expect(jobFromDict(JSON.parse(JSON.stringify(dict)))).toEqual(job);
  });

  it("round-trips every variant", () => {
    const jobs = [
      createDomainJob({
        name: "sim",
        executable: "./sim",
        domainNames: ["a", "b"],
        stageDir: "/stage",
        resources: { nodes: 2, tasksPerNode: 2 },
      }),
      createTrainingJob({
        name: "train",
        executable: "python",
        domain: "a",
        formatting: { AMS_STORE_PATH: "/store" },
        resources: { nodes: 1, tasksPerNode: 1, gpusPerTask: 1 },
      }),
      createNetworkStageJob({
        resources: { nodes: 1, tasksPerNode: 1 },
        destinationPath: "/dest",
        persistentStorePath: "/store",
        creds: "/creds.json",
        updateModels: true,
      }),
      createOrchestratorJob({ schedulerUri: "local:///run/flux", brokerConfigPath: "/rmq.json" }),
    ];
    for (const job of jobs) {
      expect(jobFromDict(JSON.parse(JSON.stringify(jobToDict(job))))).toEqual(job);
    }
  });

  it("keeps a job without resources", () => {
    const job = createJob({ name: "probe", executable: "hostname" });
    expect(jobFromDict(jobToDict(job)).resources).toBeNull();
  });

  it("rejects malformed dictionaries", () => {
    expect(() => jobFromDict({ kind: "job", name: "x" })).toThrow(ConfigurationError);
    const dict = { ...jobToDict(createJob({ name: "probe", executable: "hostname" })), kind: "batch" };
    expect(() => jobFromDict(dict)).toThrow(/job description is invalid/);
  });
});

describe("job summary", () => {
  it("shows the variant, command line and description", () => {
    const job = createJob({ name: "probe", executable: "echo", cliArgs: ["hello world"] });
    const lines = describeJob(job).split("\n");
    expect(lines[0]).toBe("job");
    expect(lines[1]).toBe("CLI: echo 'hello world'");
    expect(lines[2]).toBe(`Description: ${JSON.stringify(jobToDict(job))}`);
  });
});
