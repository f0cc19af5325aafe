import * as fs from "fs";
import * as path from "path";
import type { FailureEntry, FailureSink } from "../types";
import { logger } from "../utils/logger";

const log = logger.child("failures");

export const FAILURE_CSV_HEADER = "Date,Email,Subject,Body,Reason";

const pad = (n: number) => String(n).padStart(2, "0");

// YYYY-MM-DD HH:MM in UTC
export function formatTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}` +
    ` ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`
  );
}

export function sanitizeField(value: string): string {
  return value.replace(/"/g, "'").replace(/\r\n|\r|\n/g, " ");
}

export function toCsvRow(entry: FailureEntry): string {
  return [
    formatTimestamp(entry.receivedAt),
    entry.sender,
    entry.subject,
    entry.body,
    entry.reason,
  ]
    .map((field) => `"${sanitizeField(field)}"`)
    .join(",");
}

/**
 * Writes failed messages to a CSV for manual review. The file is replaced
 * on every run that has failures; a run without failures leaves it alone.
 */
export class FailureReporter implements FailureSink {
  constructor(private readonly destination: string) {}

  async report(entries: readonly FailureEntry[]): Promise<void> {
    if (entries.length === 0) {
      log.info("All job emails parsed and written successfully.");
      return;
    }

    try {
      fs.mkdirSync(path.dirname(this.destination), {
        recursive: true,
        mode: 0o755,
      });
      const lines = [FAILURE_CSV_HEADER, ...entries.map(toCsvRow)];
      fs.writeFileSync(this.destination, lines.join("\n") + "\n");
    } catch (error) {
      log.error(`Failed to write ${this.destination}`, error);
      return;
    }

    log.info(
      `Wrote ${entries.length} failed emails to ${path.basename(this.destination)}`
    );
  }
}
