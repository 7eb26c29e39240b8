/**
 * Table and summary formatters
 */

import color from "picocolors";
import type { SnapshotStatus } from "../../types";

export const TABLE_WIDTHS = {
  snapshotId: 22,
  volumeId: 21,
  device: 12,
  status: 9,
  started: 19,
  expires: 10,
} as const;

export interface SummaryItem {
  label: string;
  value: string | number | null | undefined;
}

export function formatSummary(items: SummaryItem[]): string {
  const shown = items.filter((i) => i.value !== null && i.value !== undefined);
  const maxLabelLen = Math.max(0, ...shown.map((i) => i.label.length));
  return shown.map((i) => `${color.dim(i.label.padEnd(maxLabelLen))}  ${i.value}`).join("\n");
}

export function formatTableRow(columns: string[], widths: number[]): string {
  return columns.map((col, i) => col.padEnd(widths[i] ?? 0)).join(color.dim(" │ "));
}

export function formatTableSeparator(widths: number[]): string {
  return color.dim(widths.map((w) => "─".repeat(w)).join("─┼─"));
}

export function formatStatus(status: SnapshotStatus | null): string {
  switch (status) {
    case "completed":
      return color.green("completed");
    case "error":
      return color.red("error");
    case "pending":
      return color.yellow("pending");
    default:
      return color.dim("-");
  }
}
