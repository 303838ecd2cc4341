import fs from "node:fs/promises";
import { Type, type Static } from "@sinclair/typebox";
import { ConfigurationError } from "./errors.js";
import { checkValue } from "./schema.js";

export type ConnectionDescriptor = Record<string, string | number>;

/** The message-broker configuration shared by the domain and staging jobs. */
export interface BrokerConfig {
  /**
   * `forLibrary` selects the subset read by the instrumented application;
   * otherwise every field, including the ones only the services need.
   */
  toConnectionDescriptor(forLibrary: boolean): ConnectionDescriptor;
}

const RmqConfigSchema = Type.Object({
  "service-host": Type.String({ minLength: 1 }),
  "service-port": Type.Integer({ minimum: 1, maximum: 65535 }),
  "rabbitmq-user": Type.String(),
  "rabbitmq-password": Type.String(),
  "rabbitmq-vhost": Type.String(),
  "rabbitmq-cert": Type.Optional(Type.String()),
  "rabbitmq-outbound-queue": Type.String(),
  "rabbitmq-exchange": Type.String(),
  "rabbitmq-routing-key": Type.String(),
  "rabbitmq-inbound-queue": Type.Optional(Type.String()),
  "rabbitmq-name": Type.Optional(Type.String()),
  "rabbitmq-erlang-cookie": Type.Optional(Type.String()),
});

export type RmqConfig = Static<typeof RmqConfigSchema>;

const LIBRARY_KEYS = [
  "service-host",
  "service-port",
  "rabbitmq-user",
  "rabbitmq-password",
  "rabbitmq-vhost",
  "rabbitmq-cert",
  "rabbitmq-outbound-queue",
  "rabbitmq-exchange",
  "rabbitmq-routing-key",
] as const satisfies ReadonlyArray<keyof RmqConfig>;

export class RmqConfiguration implements BrokerConfig {
  private constructor(private readonly config: RmqConfig) {}

  static fromObject(value: unknown): RmqConfiguration {
    return new RmqConfiguration(checkValue(RmqConfigSchema, value, "rabbitmq config"));
  }

  static async fromFile(filePath: string): Promise<RmqConfiguration> {
    const raw = await fs.readFile(filePath, "utf8");
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new ConfigurationError(`rabbitmq config ${filePath} is not valid JSON`, {
        cause: error,
      });
    }
    return RmqConfiguration.fromObject(parsed);
  }

  get host(): string {
    return this.config["service-host"];
  }

  get port(): number {
    return this.config["service-port"];
  }

  toConnectionDescriptor(forLibrary: boolean): ConnectionDescriptor {
    const descriptor: ConnectionDescriptor = {};
    const keys: ReadonlyArray<keyof RmqConfig> = forLibrary
      ? LIBRARY_KEYS
      : Object.keys(RmqConfigSchema.properties).filter(isRmqKey);
    for (const key of keys) {
      const value = this.config[key];
      if (value !== undefined) {
        descriptor[key] = value;
      }
    }
    return descriptor;
  }
}

function isRmqKey(key: string): key is keyof RmqConfig {
  return key in RmqConfigSchema.properties;
}
