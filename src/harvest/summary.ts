/**
 * Outcome of one phase for one dataset. Every count is in the dataset's key:
 * events, contests or entities. `contest_results` counts contests.
 */
export interface PhaseSummary {
  dataset: string;
  /** Keys known after enumeration, including those already persisted. */
  candidates: number;
  /** Candidates an earlier run already persisted. */
  alreadyPresent: number;
  /** Keys appended during this run. */
  written: number;
  /** Detail pages that failed after retries; retried on the next run. */
  failed: number;
}

export function formatSummary(summaries: readonly PhaseSummary[]): string {
  const width = Math.max(...summaries.map((s) => s.dataset.length), 'dataset'.length);
  const lines = summaries.map(
    (s) =>
      `${s.dataset.padEnd(width)}  written=${s.written} already_present=${s.alreadyPresent} failed=${s.failed}`,
  );
  return lines.join('\n');
}
