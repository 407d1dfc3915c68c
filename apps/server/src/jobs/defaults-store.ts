import { readFile } from "node:fs/promises";
import { ErrorReporter } from "../notify/error-reporter";
import { ProbeDefaults } from "../types";
import { isMissingFile, writeJsonAtomic } from "./json-file";
import { storedDefaultsSchema } from "./schemas";

export interface DefaultsStoreOptions {
  filePath: string;
  errorReporter: ErrorReporter;
}

export class DefaultsStore {
  private readonly filePath: string;
  private readonly errorReporter: ErrorReporter;
  private tail: Promise<void> = Promise.resolve();

  constructor(options: DefaultsStoreOptions) {
    this.filePath = options.filePath;
    this.errorReporter = options.errorReporter;
  }

  // Saved values win over the environment; fields never saved keep the fallback.
  async load(fallback: ProbeDefaults): Promise<ProbeDefaults> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (!isMissingFile(error)) {
        await this.errorReporter.report(error, "defaults store: load");
      }
      return { ...fallback };
    }

    try {
      const saved = storedDefaultsSchema.parse(JSON.parse(raw));
      return {
        intervalSec: saved.intervalSec ?? fallback.intervalSec,
        count: saved.count ?? fallback.count
      };
    } catch (error) {
      await this.errorReporter.report(error, "defaults store: load");
      return { ...fallback };
    }
  }

  async save(defaults: ProbeDefaults): Promise<void> {
    const written = this.tail.then(() => writeJsonAtomic(this.filePath, defaults));
    this.tail = written.then(
      () => undefined,
      () => undefined
    );

    try {
      await written;
    } catch (error) {
      await this.errorReporter.report(error, "defaults store: save");
      throw error;
    }
  }
}
