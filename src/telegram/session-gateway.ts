/**
 * Telegram Session Gateway
 *
 * Owns the authenticated MTProto connection (GramJS user session), resolves
 * chat identifiers and exposes paginated, lazily consumed message history.
 *
 * @module telegram/session-gateway
 */

import { Api, TelegramClient } from 'telegram';
import { StringSession } from 'telegram/sessions';
import { RPCError } from 'telegram/errors';
import type { EntityLike } from 'telegram/define';
import bigInt from 'big-integer';
import { ArchivedMessage, DateWindow } from '../types';
import {
  ChatNotFoundError,
  SessionFatalError,
  toError,
} from '../errors/error-handler';
import { SessionLock } from './session-lock';
import { startOfDayEpochSeconds, startOfNextDayEpochSeconds } from './date-filter';
import { TelegramConfig } from '../config/config';

// ============================================================================
// Constants
// ============================================================================

/**
 * Largest page Telegram serves for messages.getHistory
 */
export const MAX_PAGE_SIZE = 100;

/**
 * RPC error messages meaning the chat does not exist or this account
 * cannot read it
 */
const CHAT_NOT_FOUND_RPC_ERRORS = new Set([
  'USERNAME_NOT_OCCUPIED',
  'USERNAME_INVALID',
  'CHAT_INVALID',
  'CHANNEL_INVALID',
  'CHANNEL_PRIVATE',
  'CHAT_FORBIDDEN',
  'PEER_ID_INVALID',
  'CHAT_ADMIN_REQUIRED',
]);

/**
 * RPC error messages meaning the session itself is gone
 */
const SESSION_FATAL_RPC_ERRORS = new Set([
  'AUTH_KEY_UNREGISTERED',
  'AUTH_KEY_INVALID',
  'SESSION_REVOKED',
  'SESSION_EXPIRED',
  'USER_DEACTIVATED',
  'USER_DEACTIVATED_BAN',
]);

/**
 * GramJS raises plain Errors for failed entity lookups
 */
const ENTITY_LOOKUP_FAILURE = /cannot find any entity|no user has|could not find the input entity/i;

// ============================================================================
// Interfaces
// ============================================================================

/**
 * Source of chat history consumed by the batch orchestrator
 */
export interface SessionGateway {
  /**
   * Resolve a chat and stream its messages, newest first
   *
   * The returned sequence is single-pass. Resolution happens on the first
   * pull, so a ChatNotFoundError surfaces while iterating.
   *
   * @param identifier - Username or numeric chat ID
   * @param window - Used to bound pagination; callers still filter
   * @throws ChatNotFoundError if the chat cannot be resolved or read
   * @throws SessionFatalError if the session is lost
   */
  fetchMessages(identifier: string, window: DateWindow): AsyncIterable<ArchivedMessage>;
}

/**
 * Answers needed for an interactive phone login
 */
export interface LoginPrompts {
  phoneNumber: string;
  phoneCode: () => Promise<string>;
  password: () => Promise<string>;
}

/**
 * Configuration options for TelegramSessionGateway
 */
export interface TelegramSessionGatewayOptions {
  /** Messages requested per history call (default and maximum: 100) */
  pageSize?: number;
  /** Lock guarding the client; pass one to share it with other users of the client */
  lock?: SessionLock;
  /** Session whose string is returned by saveSession() */
  session?: StringSession;
}

// ============================================================================
// Message Mapping
// ============================================================================

/**
 * Convert a GramJS message into an ArchivedMessage
 *
 * @returns null for service messages and messages with neither text nor media
 */
export function toArchivedMessage(message: Api.Message): ArchivedMessage | null {
  if (typeof message.date !== 'number') {
    return null;
  }

  const text = typeof message.message === 'string' ? message.message : '';
  const mediaType = message.media && message.media.className !== 'MessageMediaEmpty'
    ? message.media.className
    : undefined;

  let textOrMediaRef: string;
  if (text.length > 0) {
    textOrMediaRef = text;
  } else if (mediaType !== undefined) {
    textOrMediaRef = `media:${mediaType}`;
  } else {
    return null;
  }

  return {
    id: message.id,
    timestamp: new Date(message.date * 1000).toISOString(),
    senderId: message.senderId !== undefined ? message.senderId.toString() : null,
    textOrMediaRef,
  };
}

/**
 * Turn an identifier into something GramJS can resolve
 *
 * Numeric IDs (including the -100 prefixed channel form) become big integers,
 * everything else is looked up as a username.
 */
export function toEntityLike(identifier: string): string | bigInt.BigInteger {
  return /^-?\d+$/.test(identifier) ? bigInt(identifier) : identifier;
}

/**
 * Map a Telegram failure onto the archiver's error taxonomy
 *
 * @param error - Error thrown by GramJS
 * @param identifier - Chat being processed when the error occurred
 * @returns ChatNotFoundError, SessionFatalError, or the original error
 */
export function classifyTelegramError(error: unknown, identifier: string): Error {
  if (error instanceof ChatNotFoundError || error instanceof SessionFatalError) {
    return error;
  }

  const cause = toError(error);

  if (error instanceof RPCError) {
    if (CHAT_NOT_FOUND_RPC_ERRORS.has(error.errorMessage)) {
      return new ChatNotFoundError(identifier, cause);
    }
    if (SESSION_FATAL_RPC_ERRORS.has(error.errorMessage)) {
      return new SessionFatalError(`Telegram session is no longer valid (${error.errorMessage}).`, cause);
    }
    return cause;
  }

  if (ENTITY_LOOKUP_FAILURE.test(cause.message)) {
    return new ChatNotFoundError(identifier, cause);
  }

  return cause;
}

// ============================================================================
// GramJS Gateway
// ============================================================================

/**
 * SessionGateway backed by a single GramJS client
 *
 * The client is passed in and owned by this gateway for its lifetime. Every
 * history retrieval holds the gateway's SessionLock from chat resolution
 * until its sequence is exhausted or abandoned, so concurrent runs sharing
 * the gateway take turns rather than interleaving requests.
 */
export class TelegramSessionGateway implements SessionGateway {
  private readonly client: TelegramClient;
  private readonly pageSize: number;
  private readonly lock: SessionLock;
  private readonly session?: StringSession;

  constructor(client: TelegramClient, options: TelegramSessionGatewayOptions = {}) {
    const pageSize = options.pageSize ?? MAX_PAGE_SIZE;
    if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
      throw new RangeError(`pageSize must be an integer between 1 and ${MAX_PAGE_SIZE}`);
    }

    this.client = client;
    this.pageSize = pageSize;
    this.lock = options.lock ?? new SessionLock();
    this.session = options.session;
  }

  /**
   * Connect and make sure the session is authorized
   *
   * With login prompts, performs an interactive phone login first.
   *
   * @throws SessionFatalError if the connection fails or the session is not authorized
   */
  async open(login?: LoginPrompts): Promise<void> {
    try {
      if (login) {
        await this.client.start({
          phoneNumber: login.phoneNumber,
          phoneCode: login.phoneCode,
          password: login.password,
          onError: (err: Error) => {
            console.error('Telegram login failed:', err.message);
            return Promise.resolve(true);
          },
        });
      } else {
        await this.client.connect();
      }
    } catch (error) {
      throw new SessionFatalError('Unable to connect to Telegram.', toError(error));
    }

    const authorized = await this.client.checkAuthorization();
    if (!authorized) {
      throw new SessionFatalError('Telegram session is not authorized. Log in again to create a new session.');
    }
    console.log('Telegram session ready');
  }

  /**
   * Disconnect the client
   */
  async close(): Promise<void> {
    if (this.client.connected) {
      await this.client.disconnect();
      console.log('Telegram client disconnected');
    }
  }

  /**
   * Session string to persist after an interactive login
   */
  saveSession(): string | undefined {
    return this.session?.save();
  }

  async *fetchMessages(identifier: string, window: DateWindow): AsyncGenerator<ArchivedMessage> {
    const release = await this.lock.acquire();
    try {
      await this.ensureConnected();
      const entity = await this.resolveChat(identifier);
      yield* this.paginate(entity, identifier, window);
    } finally {
      release();
    }
  }

  /**
   * Reconnect a dropped client before use
   *
   * @throws SessionFatalError if reconnecting fails
   */
  private async ensureConnected(): Promise<void> {
    if (this.client.connected) {
      return;
    }
    console.warn('Telegram client disconnected, reconnecting');
    try {
      await this.client.connect();
    } catch (error) {
      throw new SessionFatalError('Lost connection to Telegram.', toError(error));
    }
  }

  private async resolveChat(identifier: string): Promise<EntityLike> {
    try {
      return await this.client.getEntity(toEntityLike(identifier));
    } catch (error) {
      const classified = classifyTelegramError(error, identifier);
      if (classified instanceof ChatNotFoundError) {
        console.warn(`Chat not found: ${identifier}`);
      }
      throw classified;
    }
  }

  /**
   * Walk a chat's history page by page, newest first
   *
   * The first page starts just after window.to when set. Iteration ends on
   * an empty page, or once a page reaches back past window.from.
   */
  private async *paginate(
    entity: EntityLike,
    identifier: string,
    window: DateWindow
  ): AsyncGenerator<ArchivedMessage> {
    const lowerBound = window.from !== undefined ? startOfDayEpochSeconds(window.from) : undefined;
    let offsetId = 0;
    let offsetDate = window.to !== undefined ? startOfNextDayEpochSeconds(window.to) : undefined;

    while (true) {
      let page: Api.Message[];
      try {
        page = await this.client.getMessages(entity, {
          limit: this.pageSize,
          offsetId,
          ...(offsetDate !== undefined && { offsetDate }),
        });
      } catch (error) {
        throw classifyTelegramError(error, identifier);
      }

      if (page.length === 0) {
        return;
      }

      for (const raw of page) {
        const message = toArchivedMessage(raw);
        if (message) {
          yield message;
        }
      }

      const oldest = page[page.length - 1];
      if (lowerBound !== undefined && oldest.date < lowerBound) {
        return;
      }
      offsetId = oldest.id;
      offsetDate = undefined;
    }
  }
}

/**
 * Create a gateway over a fresh GramJS client
 *
 * @param config - Telegram credentials and paging settings
 * @returns The gateway; call open() before use
 */
export function createTelegramSessionGateway(config: TelegramConfig): TelegramSessionGateway {
  const session = new StringSession(config.session ?? '');
  const client = new TelegramClient(session, config.apiId, config.apiHash, {
    connectionRetries: 5,
  });
  return new TelegramSessionGateway(client, { pageSize: config.pageSize, session });
}
