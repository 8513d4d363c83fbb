import { log, errorMessage } from "backend/utils/log";
import type { IIntelStorage, RetentionTable } from "../queries/intel-storage";
import { daysAgo } from "./date-normalizer";

const SOURCE = "retention";
const RETENTION_TABLES: RetentionTable[] = ["cves", "newsitems", "raw_articles"];

export interface TableCleanup {
  table: RetentionTable;
  rows: number;
  error?: string;
}

export interface CleanupReport {
  dryRun: boolean;
  cutoff: string;
  tables: TableCleanup[];
  totalRows: number;
}

/**
 * Deletes rows older than months * 30 days. Tables are cleaned one by one
 * and a failing table does not stop the others. A dry run only counts.
 */
export async function cleanupExpired(
  storage: IIntelStorage,
  options: { months: number; dryRun?: boolean; now?: Date },
): Promise<CleanupReport> {
  const dryRun = options.dryRun ?? false;
  const cutoff = daysAgo(options.months * 30, options.now);
  log(`${dryRun ? "Dry run: counting" : "Deleting"} rows older than ${cutoff.toISOString()}`, SOURCE);

  const tables: TableCleanup[] = [];
  for (const table of RETENTION_TABLES) {
    try {
      const rows = dryRun
        ? await storage.countExpired(table, cutoff)
        : await storage.deleteExpired(table, cutoff);
      tables.push({ table, rows });
      log(`${table}: ${rows} ${dryRun ? "would be deleted" : "deleted"}`, SOURCE);
    } catch (error) {
      const message = errorMessage(error);
      log(`Cleanup of ${table} failed: ${message}`, SOURCE, "error");
      tables.push({ table, rows: 0, error: message });
    }
  }

  return {
    dryRun,
    cutoff: cutoff.toISOString(),
    tables,
    totalRows: tables.reduce((sum, t) => sum + t.rows, 0),
  };
}
