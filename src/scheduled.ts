/**
 * Scheduled daily archive
 *
 * EventBridge-triggered Lambda that archives the previous day's messages for
 * every chat in IDENTIFIERS_FILE. "Previous day" is judged in
 * SCHEDULE_TIMEZONE (default America/Los_Angeles), so a rule firing shortly
 * after local midnight covers the day that just ended.
 *
 * @module scheduled
 */

import { ScheduledEvent } from 'aws-lambda';
import { Outcome } from './types';
import { previousDayWindow } from './telegram/date-filter';
import { readIdentifierFile } from './archive/identifier-list';
import { formatSummaryLine, summarize } from './archive/result-aggregator';
import { Orchestrator } from './archive/batch-orchestrator';
import { ScheduleConfig, loadScheduleConfig } from './config/config';
import { getOrchestrator } from './handler';

/**
 * Dependencies of the scheduled run
 */
export interface ScheduledRunDependencies {
  getOrchestrator: () => Promise<Orchestrator>;
  loadConfig: () => ScheduleConfig;
  readIdentifiers: (path: string) => Promise<string[]>;
}

/**
 * Archive yesterday's messages
 *
 * @param now - Time the run was triggered
 * @returns The run's outcomes
 */
export async function runDailyArchive(
  now: Date,
  dependencies: ScheduledRunDependencies
): Promise<Outcome[]> {
  const config = dependencies.loadConfig();
  const window = previousDayWindow(now, config.timeZone);
  const identifiers = await dependencies.readIdentifiers(config.identifiersFile);
  console.log(`Running scheduled archive for ${window.from}`, { chats: identifiers.length });

  const orchestrator = await dependencies.getOrchestrator();
  const outcomes = await orchestrator.run(identifiers, window);

  console.log(`Daily processing completed. ${formatSummaryLine(outcomes)}`, summarize(outcomes));
  return outcomes;
}

/**
 * Lambda handler for the EventBridge schedule
 *
 * Errors propagate so the invocation is reported as failed.
 */
export async function scheduledHandler(event: ScheduledEvent): Promise<void> {
  const triggeredAt = new Date(event.time);
  await runDailyArchive(Number.isNaN(triggeredAt.getTime()) ? new Date() : triggeredAt, {
    getOrchestrator,
    loadConfig: () => loadScheduleConfig(),
    readIdentifiers: readIdentifierFile,
  });
}
