import fs from "node:fs/promises";
import path from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { StoreError } from "./errors.js";
import { logger } from "./logger.js";
import { ensureDir, isPathInside, uniqueName } from "./paths.js";
import { checkValue } from "./schema.js";

export const STORE_ENTRIES = ["models", "data", "candidates"] as const;

export type StoreEntry = (typeof STORE_ENTRIES)[number];

export type StoreVersion = "latest" | "all" | number;

const StoreRecordSchema = Type.Object({
  domain_name: Type.String(),
  version: Type.Integer({ minimum: 1 }),
  file: Type.String(),
  uq_type: Type.Optional(Type.String()),
  threshold: Type.Optional(Type.Number()),
  created_at: Type.String(),
});

const EntryTableSchema = Type.Record(Type.String(), Type.Array(StoreRecordSchema));

const StoreLedgerSchema = Type.Object({
  entries: Type.Object({
    models: EntryTableSchema,
    data: EntryTableSchema,
    candidates: EntryTableSchema,
  }),
});

export type StoreRecord = Static<typeof StoreRecordSchema>;
export type StoreLedger = Static<typeof StoreLedgerSchema>;

/** The persistent store holding trained models and staged data. */
export interface DataStore {
  readonly rootPath: string;
  /** Directory where freshly produced candidate samples are gathered. */
  getCandidatePath(): string;
  search(domainName: string, entry: StoreEntry, version?: StoreVersion): Promise<StoreRecord[]>;
  /** Creates `subpath` under the store root if missing and returns its absolute path. */
  mkdir(subpath: string): Promise<string>;
  uniqueFilename(): string;
}

function emptyLedger(): StoreLedger {
  return { entries: { models: {}, data: {}, candidates: {} } };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export type LedgerDataStoreParams = {
  rootPath: string;
  now?: () => Date;
};

/**
 * Filesystem store keeping its index in `<root>/ams_store.json`. Records are
 * versioned per domain and entry kind; a new record gets the next version.
 */
export class LedgerDataStore implements DataStore {
  readonly rootPath: string;
  private readonly now: () => Date;

  constructor(params: LedgerDataStoreParams) {
    this.rootPath = path.resolve(params.rootPath);
    this.now = params.now ?? (() => new Date());
  }

  get ledgerPath(): string {
    return path.join(this.rootPath, "ams_store.json");
  }

  getCandidatePath(): string {
    return path.join(this.rootPath, "candidates");
  }

  async load(): Promise<StoreLedger> {
    let raw: string;
    try {
      raw = await fs.readFile(this.ledgerPath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        return emptyLedger();
      }
      throw new StoreError(`Unable to read store ledger ${this.ledgerPath}`, { cause: error });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new StoreError(`Store ledger ${this.ledgerPath} is not valid JSON`, { cause: error });
    }
    return checkValue(
      StoreLedgerSchema,
      parsed,
      `store ledger ${this.ledgerPath}`,
      (message) => new StoreError(message),
    );
  }

  async save(ledger: StoreLedger): Promise<void> {
    await ensureDir(this.rootPath);
    await fs.writeFile(this.ledgerPath, `${JSON.stringify(ledger, null, 2)}\n`, "utf8");
  }

  async add(
    entry: StoreEntry,
    domainName: string,
    record: { file: string; uq_type?: string; threshold?: number },
  ): Promise<StoreRecord> {
    const ledger = await this.load();
    const existing = ledger.entries[entry][domainName] ?? [];
    const version = existing.reduce((max, item) => Math.max(max, item.version), 0) + 1;
    const stored: StoreRecord = {
      ...record,
      domain_name: domainName,
      version,
      created_at: this.now().toISOString(),
    };
    ledger.entries[entry][domainName] = [...existing, stored];
    await this.save(ledger);
    logger.debug(`[ams-store] added ${entry} v${version} for ${domainName}: ${record.file}`);
    return stored;
  }

  async search(
    domainName: string,
    entry: StoreEntry,
    version: StoreVersion = "latest",
  ): Promise<StoreRecord[]> {
    const ledger = await this.load();
    const records = [...(ledger.entries[entry][domainName] ?? [])].sort(
      (a, b) => a.version - b.version,
    );
    if (version === "all") {
      return records;
    }
    if (version === "latest") {
      const latest = records.at(-1);
      return latest ? [latest] : [];
    }
    return records.filter((record) => record.version === version);
  }

  async mkdir(subpath: string): Promise<string> {
    const target = path.resolve(this.rootPath, subpath);
    if (!isPathInside(this.rootPath, target)) {
      throw new StoreError(`Store directory must stay inside ${this.rootPath}: ${subpath}`);
    }
    return await ensureDir(target);
  }

  uniqueFilename(): string {
    return uniqueName(this.now());
  }
}
