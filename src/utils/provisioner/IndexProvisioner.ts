import { loggers, logError } from "../../config/logger";
import { resolveIndexName } from "../indexName";
import type { IndexBody, TopicMappingEntry } from "../../config/types";
import type { DocumentStore } from "../documentStore/types";

export interface EnsureResult {
  index: string;
  created: boolean;
}

export interface RemovalReport {
  removed: string[];
  missing: string[];
  failed: Array<{ index: string; error: string }>;
}

const log = loggers.provisioner;

/**
 * Makes sure indices exist before anything is written to them. Every call
 * resolves the template against the clock once and works on that name.
 */
export class IndexProvisioner {
  constructor(
    private readonly store: DocumentStore,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async ensureIndex(template: string, body: IndexBody): Promise<EnsureResult> {
    const index = resolveIndexName(template, this.clock());

    if (await this.store.indexExists(index)) {
      log.debug(`Skip creation of index ${index}, it already exists`);
      return { index, created: false };
    }

    log.info(`Creating index: ${index}`);
    await this.store.createIndex(index, body);
    return { index, created: true };
  }

  /**
   * Deletes the resolved index when present. Returns false when there was
   * nothing to delete.
   */
  async removeIndex(template: string): Promise<boolean> {
    return this.removeResolved(resolveIndexName(template, this.clock()));
  }

  private async removeResolved(index: string): Promise<boolean> {
    if (!(await this.store.indexExists(index))) {
      log.debug(`Skip removal of index ${index}, it does not exist`);
      return false;
    }

    log.warn(`Removing index: ${index}`);
    await this.store.deleteIndex(index);
    return true;
  }

  // Runs in mapping order; the first failure stops startup
  async provisionAll(entries: readonly TopicMappingEntry[]): Promise<EnsureResult[]> {
    const results: EnsureResult[] = [];
    for (const entry of entries) {
      results.push(await this.ensureIndex(entry.indexNameTemplate, entry.indexBody));
    }
    log.info("Index provisioning finished", {
      created: results.filter((result) => result.created).map((result) => result.index),
    });
    return results;
  }

  async removeAll(entries: readonly TopicMappingEntry[]): Promise<RemovalReport> {
    const report: RemovalReport = { removed: [], missing: [], failed: [] };

    for (const entry of entries) {
      const index = resolveIndexName(entry.indexNameTemplate, this.clock());
      try {
        if (await this.removeResolved(index)) {
          report.removed.push(index);
        } else {
          report.missing.push(index);
        }
      } catch (error) {
        logError(error, { index, topic: entry.topic }, log, "Index removal failed");
        report.failed.push({
          index,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    log.info("Index removal finished", { ...report });
    return report;
  }
}
