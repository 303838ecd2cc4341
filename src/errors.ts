export class AmsJobsError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid job input: bad environment, unknown template key, missing pruning module. */
export class ConfigurationError extends AmsJobsError {}

/** A job without a usable resource spec reached submission. */
export class ResourceError extends AmsJobsError {}

export class StoreError extends AmsJobsError {}
