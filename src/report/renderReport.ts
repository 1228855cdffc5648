import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import type { ReportRow } from '../analyzer/types';

/** Row shape the report template's script reads from `$table_json`. */
export type TableJsonRow = {
  url: string;
  count: number;
  count_perc: number;
  time_sum: number;
  time_perc: number;
  time_avg: number;
  time_max: number;
  time_med: number;
};

const PLACEHOLDER = /\$(?:(\$)|\{([_a-zA-Z][_a-zA-Z0-9]*)\}|([_a-zA-Z][_a-zA-Z0-9]*))/g;

/**
 * Substitutes `$name` / `${name}` placeholders. Unknown names are left as they are,
 * and `$$` collapses to a literal `$`.
 */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(
    PLACEHOLDER,
    (whole: string, escaped: string | undefined, braced: string | undefined, bare: string | undefined) => {
      if (escaped) {
        return '$';
      }
      const name = braced ?? bare ?? '';
      return Object.prototype.hasOwnProperty.call(values, name) ? (values[name] ?? whole) : whole;
    },
  );
}

export function toTableJsonRow(row: ReportRow): TableJsonRow {
  return {
    url: row.url,
    count: row.count,
    count_perc: row.countPerc,
    time_sum: row.timeSum,
    time_perc: row.timePerc,
    time_avg: row.timeAvg,
    time_max: row.timeMax,
    time_med: row.timeMed,
  };
}

/** JSON that can be dropped into a `<script>` block as-is. */
export function toScriptSafeJson(value: unknown): string {
  return JSON.stringify(value).replace(/</g, '\\u003c');
}

export function renderReport(template: string, rows: ReportRow[]): string {
  return renderTemplate(template, { table_json: toScriptSafeJson(rows.map(toTableJsonRow)) });
}

export async function writeReport(templatePath: string, reportPath: string, rows: ReportRow[]): Promise<void> {
  const template = await fs.readFile(templatePath, 'utf8');
  const html = renderReport(template, rows);

  // Written beside the target, then renamed over it.
  const tmpPath = path.join(path.dirname(reportPath), `.${path.basename(reportPath)}.tmp`);
  await fs.writeFile(tmpPath, html, 'utf8');
  await fs.rename(tmpPath, reportPath);
}
