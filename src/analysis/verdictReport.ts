import type { VerdictRow } from '../csv/writer.js';

export const REPORT_LABELS = ['NTA', 'YTA', 'ESH', 'NAH'] as const;

type ReportLabel = (typeof REPORT_LABELS)[number];

export interface Transition {
  from: string;
  to: string;
  count: number;
}

export interface VerdictReport {
  total: number;
  unchanged: number;
  changed: number;
  /** Percentage of rows whose verdict differs from the ground-truth label. */
  changeRate: number;
  /** confusion[groundTruth][verdict], restricted to REPORT_LABELS. */
  confusion: Record<ReportLabel, Record<ReportLabel, number>>;
  topTransitions: Transition[];
}

export function buildVerdictReport(rows: readonly VerdictRow[], topCount: number = 8): VerdictReport {
  const total = rows.length;
  const unchanged = rows.filter((row) => row.verdict === row.ground_truth_label).length;
  const changed = total - unchanged;

  const confusion = {
    NTA: emptyConfusionRow(),
    YTA: emptyConfusionRow(),
    ESH: emptyConfusionRow(),
    NAH: emptyConfusionRow(),
  };
  for (const row of rows) {
    // Labels come from the CSV, so only the known ones may index the matrix.
    const truth = row.ground_truth_label;
    const verdict = row.verdict;
    if (isReportLabel(truth) && isReportLabel(verdict)) {
      confusion[truth][verdict] += 1;
    }
  }

  // Map preserves first-seen order, which breaks count ties.
  const transitionCounts = new Map<string, Transition>();
  for (const row of rows) {
    if (row.verdict === row.ground_truth_label) {
      continue;
    }
    const key = `${row.ground_truth_label}\u0000${row.verdict}`;
    const existing = transitionCounts.get(key);
    if (existing) {
      existing.count += 1;
    } else {
      transitionCounts.set(key, { from: row.ground_truth_label, to: row.verdict, count: 1 });
    }
  }
  const topTransitions = [...transitionCounts.values()].sort((a, b) => b.count - a.count).slice(0, topCount);

  return {
    total,
    unchanged,
    changed,
    changeRate: total === 0 ? 0 : (changed * 100) / total,
    confusion,
    topTransitions,
  };
}

function emptyConfusionRow(): Record<ReportLabel, number> {
  return { NTA: 0, YTA: 0, ESH: 0, NAH: 0 };
}

function isReportLabel(value: string): value is ReportLabel {
  return REPORT_LABELS.some((label) => label === value);
}

export function formatVerdictReport(report: VerdictReport): string {
  const rule = '='.repeat(40);
  const lines = [
    rule,
    'VERDICT CHANGE ANALYSIS',
    rule,
    `Total Posts:          ${report.total}`,
    `Unchanged Verdicts:   ${report.unchanged}`,
    `Changed Verdicts:     ${report.changed}`,
    `Change Rate:          ${report.changeRate.toFixed(1)}%`,
    rule,
    '',
    'Confusion Matrix (rows: ground truth, columns: verdict)',
    ['', ...REPORT_LABELS].map((cell) => cell.padStart(6)).join(''),
    ...REPORT_LABELS.map((truth) =>
      [truth, ...REPORT_LABELS.map((label) => String(report.confusion[truth][label]))]
        .map((cell) => cell.padStart(6))
        .join(''),
    ),
    '',
    'Top Verdict Changes:',
  ];

  if (report.topTransitions.length === 0) {
    lines.push('  (none)');
  }
  for (const transition of report.topTransitions) {
    lines.push(`  ${transition.from} → ${transition.to}: ${transition.count}`);
  }

  return lines.join('\n');
}
