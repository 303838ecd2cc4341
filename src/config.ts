import { ConfigurationError } from "./errors.js";
import type { AmsJobsConfig } from "./types.js";

export const DEFAULT_CONFIG: Readonly<AmsJobsConfig> = Object.freeze({
  defaultStdout: "ams_test.out",
  defaultStderr: "ams_test.err",
  mpiFlavor: "spectrum",
  gpuAffinity: "per-task",
  artifactDir: "tmp",
});

export function asObject(value: unknown, label: string): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new ConfigurationError(`${label} must be an object`);
  }
  return Object.fromEntries(Object.entries(value));
}

export function readString(value: unknown, field: string): string | undefined {
  if (value == null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ConfigurationError(`${field} must be a string`);
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function readRelativeDir(value: unknown, field: string): string | undefined {
  const dir = readString(value, field);
  if (dir === undefined) {
    return undefined;
  }
  if (dir.startsWith("/") || dir.split(/[\\/]/).includes("..")) {
    throw new ConfigurationError(`${field} must stay inside the store root (${dir})`);
  }
  return dir;
}

export function parseAmsJobsConfig(value: unknown): AmsJobsConfig {
  if (value == null) {
    return { ...DEFAULT_CONFIG };
  }

  const obj = asObject(value, "ams-jobs config");

  return {
    defaultStdout: readString(obj.defaultStdout, "defaultStdout") ?? DEFAULT_CONFIG.defaultStdout,
    defaultStderr: readString(obj.defaultStderr, "defaultStderr") ?? DEFAULT_CONFIG.defaultStderr,
    mpiFlavor: readString(obj.mpiFlavor, "mpiFlavor") ?? DEFAULT_CONFIG.mpiFlavor,
    gpuAffinity: readString(obj.gpuAffinity, "gpuAffinity") ?? DEFAULT_CONFIG.gpuAffinity,
    artifactDir: readRelativeDir(obj.artifactDir, "artifactDir") ?? DEFAULT_CONFIG.artifactDir,
  };
}
