/**
 * Unit tests for the Result Aggregator
 *
 * @module archive/result-aggregator.test
 */

import { countOutcomes, formatSummaryLine, summarize, toSummaryEntry } from './result-aggregator';
import { Outcome } from '../types';

const SUCCESS: Outcome = {
  identifier: 'alice',
  status: 'success',
  messageCount: 42,
  archiveLocator: 'https://chat-archive.s3.us-east-1.amazonaws.com/telegram_alice.json',
};

const FAILURE: Outcome = {
  identifier: 'ghost_user',
  status: 'failed',
  error: "Chat 'ghost_user' not found or inaccessible.",
};

describe('toSummaryEntry', () => {
  it('should report count and locator for a success', () => {
    expect(toSummaryEntry(SUCCESS)).toEqual({
      identifier: 'alice',
      status: 'success',
      message_count: 42,
      archive_locator: 'https://chat-archive.s3.us-east-1.amazonaws.com/telegram_alice.json',
    });
  });

  it('should report only the error for a failure', () => {
    expect(toSummaryEntry(FAILURE)).toEqual({
      identifier: 'ghost_user',
      status: 'failed',
      error: "Chat 'ghost_user' not found or inaccessible.",
    });
  });

  it('should keep a zero message count', () => {
    expect(toSummaryEntry({ ...SUCCESS, messageCount: 0 }).message_count).toBe(0);
  });
});

describe('summarize', () => {
  it('should keep outcome order', () => {
    const result = summarize([FAILURE, SUCCESS]);

    expect(result.summary.map((entry) => entry.identifier)).toEqual(['ghost_user', 'alice']);
  });

  it('should serialize to the response shape', () => {
    expect(JSON.parse(JSON.stringify(summarize([SUCCESS, FAILURE])))).toEqual({
      summary: [
        {
          identifier: 'alice',
          status: 'success',
          message_count: 42,
          archive_locator: 'https://chat-archive.s3.us-east-1.amazonaws.com/telegram_alice.json',
        },
        {
          identifier: 'ghost_user',
          status: 'failed',
          error: "Chat 'ghost_user' not found or inaccessible.",
        },
      ],
    });
  });

  it('should return an empty summary for no outcomes', () => {
    expect(summarize([])).toEqual({ summary: [] });
  });
});

describe('countOutcomes', () => {
  it('should tally successes and failures', () => {
    expect(countOutcomes([SUCCESS, FAILURE, SUCCESS])).toEqual({ total: 3, succeeded: 2, failed: 1 });
  });
});

describe('formatSummaryLine', () => {
  it('should describe the run in one line', () => {
    expect(formatSummaryLine([SUCCESS, FAILURE])).toBe('Processed 2 chat(s): 1 succeeded, 1 failed');
  });
});
