// Status reporter: read-side views of the job table for display.

import type { JobRecord, JobState } from "./jobs.ts";
import type { JobStore } from "./store/index.ts";

export interface JobSummary {
  id: string;
  name: string;
  state: JobState;
  exitCode: number | null;
}

function truncate(value: string, max: number): string {
  const oneLine = value.replace(/\s*\n\s*/g, " ");
  if (oneLine.length <= max) return oneLine;
  return oneLine.slice(0, max - 3) + "...";
}

export function formatJobRow(row: JobSummary): string {
  const code = row.exitCode === null ? "-" : String(row.exitCode);
  return `${row.id.padEnd(24)}  ${row.state.padEnd(9)}  ${code.padEnd(4)}  ${truncate(row.name, 60)}`;
}

export function formatJobTable(rows: JobSummary[]): string {
  if (rows.length === 0) return "No jobs";
  const header = `${"JOB_ID".padEnd(24)}  ${"STATE".padEnd(9)}  ${"CODE".padEnd(4)}  NAME`;
  return [header, "-".repeat(80), ...rows.map(formatJobRow)].join("\n");
}

export function toSummary(record: JobRecord): JobSummary {
  return {
    id: record.id,
    name: record.name,
    state: record.state,
    exitCode: record.exitCode ?? null,
  };
}

export class StatusReporter {
  private readonly store: JobStore;

  constructor(store: JobStore) {
    this.store = store;
  }

  /** One row per job, in submission order. */
  summarize(): JobSummary[] {
    return Array.from(this.store.list(), toSummary);
  }

  /** Most recent first. */
  recent(limit: number): JobRecord[] {
    if (limit <= 0) return [];
    return Array.from(this.store.list()).reverse().slice(0, limit);
  }

  /** Plain-text report: the job table followed by every job's full log. */
  renderReport(now: Date = new Date()): string {
    const records = Array.from(this.store.list());
    const sections = [
      `bgjob report ${now.toISOString()}`,
      "",
      formatJobTable(records.map(toSummary)),
      "",
    ];
    for (const record of records) {
      sections.push(`===== ${record.id} =====`);
      sections.push(this.store.readLog(record)?.toString("utf-8") ?? "(no log)");
      sections.push("");
    }
    return sections.join("\n");
  }
}

export function reportFileName(now: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `report-${date}-${time}.txt`;
}
