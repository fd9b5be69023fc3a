/**
 * Core TypeScript interfaces for the Telegram Message Archiver
 *
 * This module defines the types shared by the archiving pipeline: messages
 * pulled from Telegram, the optional date window, per-chat outcomes and the
 * JSON documents written to S3.
 *
 * @module types
 */

// ============================================================================
// Message Types
// ============================================================================

/**
 * A message retrieved from a Telegram chat
 *
 * Read-only snapshot of a single chat message. Service messages (joins,
 * pins, title changes) never produce an ArchivedMessage.
 */
export interface ArchivedMessage {
  /** Telegram message ID, unique within the chat */
  readonly id: number;
  /** Send time as an ISO-8601 UTC timestamp */
  readonly timestamp: string;
  /** Sender's Telegram ID as a decimal string, null for anonymous channel posts */
  readonly senderId: string | null;
  /**
   * Message text, or a `media:<Type>` reference for media-only messages
   * (e.g. `media:MessageMediaPhoto`)
   */
  readonly textOrMediaRef: string;
}

// ============================================================================
// Date Window
// ============================================================================

/**
 * Inclusive calendar-date range used to narrow retrieved messages
 *
 * Both bounds are `YYYY-MM-DD` strings compared against the UTC date of each
 * message. An absent bound leaves that side open.
 *
 * @example
 * // January 2024 only
 * { from: '2024-01-01', to: '2024-01-31' }
 *
 * @example
 * // Everything up to and including 1 March 2024
 * { to: '2024-03-01' }
 */
export interface DateWindow {
  from?: string;
  to?: string;
}

// ============================================================================
// Outcome Types
// ============================================================================

/**
 * Successful archive of one chat
 */
export interface SuccessOutcome {
  identifier: string;
  status: 'success';
  /** Number of messages inside the window that were archived */
  messageCount: number;
  /** Public URL of the archive object */
  archiveLocator: string;
}

/**
 * Failed archive of one chat
 */
export interface FailureOutcome {
  identifier: string;
  status: 'failed';
  /** Human-readable reason, recorded in the summary as-is */
  error: string;
}

/**
 * Result of processing a single identifier. Every input identifier maps to
 * exactly one outcome.
 */
export type Outcome = SuccessOutcome | FailureOutcome;

// ============================================================================
// Wire Formats
// ============================================================================

/**
 * One entry of the summary returned to the HTTP and CLI callers
 */
export interface SummaryEntry {
  identifier: string;
  status: 'success' | 'failed';
  message_count?: number;
  archive_locator?: string;
  error?: string;
}

/**
 * Response body of `POST /process-messages`
 */
export interface SummaryResponse {
  summary: SummaryEntry[];
}

/**
 * A message as serialized inside an archive document
 */
export interface ArchiveMessageRecord {
  message_id: number;
  timestamp: string;
  sender: string | null;
  text_or_media_ref: string;
}

/**
 * JSON document stored in S3 for one identifier and one run
 *
 * @remarks
 * - Written once, never updated in place
 * - generated_at makes two runs over the same history distinguishable
 */
export interface ArchiveDocument {
  identifier: string;
  window: DateWindow;
  generated_at: string;
  message_count: number;
  messages: ArchiveMessageRecord[];
}

/**
 * Health check response body
 */
export interface HealthResponse {
  status: 'healthy';
  service: string;
}
