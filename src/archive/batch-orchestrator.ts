/**
 * Batch Orchestrator
 *
 * Runs the archive pipeline for a list of chat identifiers:
 * - Streams each chat's history from the SessionGateway
 * - Narrows it to the date window
 * - Writes the archive through the ArchiveWriter
 * - Records exactly one Outcome per identifier, in input order
 *
 * @module archive/batch-orchestrator
 */

import { ArchivedMessage, DateWindow, Outcome } from '../types';
import { SessionGateway } from '../telegram/session-gateway';
import { filterByWindow } from '../telegram/date-filter';
import { ArchiveWriter } from './archive-writer';
import {
  SessionFatalError,
  describeFailure,
  sanitizeMessage,
} from '../errors/error-handler';

/**
 * Interface for the BatchOrchestrator
 */
export interface Orchestrator {
  /**
   * Archive every identifier and report one outcome per identifier
   *
   * @param identifiers - Chats to archive, in display order
   * @param window - Inclusive date window applied to every chat
   * @returns Outcomes in the same order as identifiers
   * @throws SessionFatalError if the Telegram session is lost mid-run
   */
  run(identifiers: readonly string[], window: DateWindow): Promise<Outcome[]>;
}

/**
 * Sequential implementation of the Orchestrator
 *
 * Identifiers are processed one at a time because they share a single
 * Telegram session. Each identifier runs inside its own try/catch, so a
 * missing chat or a failed upload only affects that identifier's outcome.
 *
 * Chats whose window holds no messages still get an (empty) archive, so a
 * success outcome always carries a locator.
 */
export class BatchOrchestrator implements Orchestrator {
  private readonly gateway: SessionGateway;
  private readonly writer: ArchiveWriter;

  constructor(gateway: SessionGateway, writer: ArchiveWriter) {
    this.gateway = gateway;
    this.writer = writer;
  }

  async run(identifiers: readonly string[], window: DateWindow): Promise<Outcome[]> {
    console.log(`Starting archive run for ${identifiers.length} chat(s)`, { window });

    const outcomes: Outcome[] = [];
    for (const identifier of identifiers) {
      outcomes.push(await this.processIdentifier(identifier, window));
    }
    return outcomes;
  }

  /**
   * Run the pipeline for one identifier and convert any per-identifier
   * failure into a failed outcome
   *
   * @throws SessionFatalError, the only error allowed to end the run
   */
  async processIdentifier(identifier: string, window: DateWindow): Promise<Outcome> {
    try {
      const messages = await this.collectMessages(identifier, window);
      const archiveLocator = await this.writer.write({ identifier, window, messages });

      console.log(`Archived ${messages.length} message(s) for '${identifier}': ${archiveLocator}`);
      return {
        identifier,
        status: 'success',
        messageCount: messages.length,
        archiveLocator,
      };
    } catch (error) {
      if (error instanceof SessionFatalError) {
        throw error;
      }

      const description = describeFailure(error);
      console.error(`Failed to process '${identifier}': ${sanitizeMessage(description)}`);
      return {
        identifier,
        status: 'failed',
        error: description,
      };
    }
  }

  /**
   * Drain the gateway's sequence through the date filter
   *
   * The gateway holds its session lock until this loop ends, which is
   * before the archive upload starts. One chat's in-window history is held
   * in memory at a time.
   */
  private async collectMessages(identifier: string, window: DateWindow): Promise<ArchivedMessage[]> {
    const messages: ArchivedMessage[] = [];
    for await (const message of filterByWindow(this.gateway.fetchMessages(identifier, window), window)) {
      messages.push(message);
    }
    return messages;
  }
}

/**
 * Create an Orchestrator with the given dependencies
 */
export function createOrchestrator(gateway: SessionGateway, writer: ArchiveWriter): Orchestrator {
  return new BatchOrchestrator(gateway, writer);
}
