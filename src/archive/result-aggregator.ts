/**
 * Result Aggregator
 *
 * Reshapes per-identifier outcomes into the summary returned by the HTTP
 * and CLI entry points.
 *
 * @module archive/result-aggregator
 */

import { Outcome, SummaryEntry, SummaryResponse } from '../types';

/**
 * Success/failure tally of a run
 */
export interface OutcomeCounts {
  total: number;
  succeeded: number;
  failed: number;
}

/**
 * Convert one outcome into its summary entry
 */
export function toSummaryEntry(outcome: Outcome): SummaryEntry {
  if (outcome.status === 'success') {
    return {
      identifier: outcome.identifier,
      status: 'success',
      message_count: outcome.messageCount,
      archive_locator: outcome.archiveLocator,
    };
  }
  return {
    identifier: outcome.identifier,
    status: 'failed',
    error: outcome.error,
  };
}

/**
 * Build the summary response, preserving outcome order
 */
export function summarize(outcomes: readonly Outcome[]): SummaryResponse {
  return { summary: outcomes.map(toSummaryEntry) };
}

/**
 * Count successes and failures
 */
export function countOutcomes(outcomes: readonly Outcome[]): OutcomeCounts {
  const succeeded = outcomes.filter((outcome) => outcome.status === 'success').length;
  return {
    total: outcomes.length,
    succeeded,
    failed: outcomes.length - succeeded,
  };
}

/**
 * One-line description of a run for logs
 *
 * @example
 * formatSummaryLine([...])
 * // 'Processed 3 chat(s): 2 succeeded, 1 failed'
 */
export function formatSummaryLine(outcomes: readonly Outcome[]): string {
  const { total, succeeded, failed } = countOutcomes(outcomes);
  return `Processed ${total} chat(s): ${succeeded} succeeded, ${failed} failed`;
}
