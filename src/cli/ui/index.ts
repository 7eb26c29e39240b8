/**
 * CLI UI module exports
 */

export type { SummaryItem } from "./formatters";
// Formatters
export {
  formatStatus,
  formatSummary,
  formatTableRow,
  formatTableSeparator,
  TABLE_WIDTHS,
} from "./formatters";
// Output
export {
  banner,
  color,
  error,
  info,
  intro,
  LINKS,
  note,
  outro,
  step,
  VERSION,
  warn,
} from "./output";

import * as output from "./output";

export const ui = {
  banner: output.banner,
  intro: output.intro,
  outro: output.outro,
  note: output.note,
  info: output.info,
  warn: output.warn,
  error: output.error,
  step: output.step,
};
