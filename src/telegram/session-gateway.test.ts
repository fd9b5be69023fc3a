/**
 * Unit tests for the Telegram Session Gateway
 *
 * GramJS is replaced by a hand-built client object; no connection is made.
 *
 * @module telegram/session-gateway.test
 */

import { Api, TelegramClient } from 'telegram';
import { RPCError } from 'telegram/errors';
import bigInt from 'big-integer';
import {
  TelegramSessionGateway,
  classifyTelegramError,
  toArchivedMessage,
  toEntityLike,
} from './session-gateway';
import { SessionLock } from './session-lock';
import { ArchivedMessage } from '../types';
import { ChatNotFoundError, SessionFatalError } from '../errors/error-handler';

// ============================================================================
// Fakes
// ============================================================================

interface FakeClient {
  connected: boolean;
  connect: jest.Mock;
  disconnect: jest.Mock;
  checkAuthorization: jest.Mock;
  start: jest.Mock;
  getEntity: jest.Mock;
  getMessages: jest.Mock;
}

function createFakeClient(): FakeClient {
  return {
    connected: true,
    connect: jest.fn().mockResolvedValue(true),
    disconnect: jest.fn().mockResolvedValue(undefined),
    checkAuthorization: jest.fn().mockResolvedValue(true),
    start: jest.fn().mockResolvedValue(undefined),
    getEntity: jest.fn().mockResolvedValue({ id: 'entity' }),
    getMessages: jest.fn().mockResolvedValue([]),
  };
}

function asClient(fake: FakeClient): TelegramClient {
  return fake as unknown as TelegramClient;
}

function seconds(iso: string): number {
  return Math.floor(Date.parse(iso) / 1000);
}

function rawMessage(
  id: number,
  iso: string,
  fields: { text?: string; senderId?: number; mediaClass?: string } = {}
): Api.Message {
  return {
    id,
    date: seconds(iso),
    message: fields.text ?? `text ${id}`,
    senderId: fields.senderId !== undefined ? bigInt(fields.senderId) : undefined,
    media: fields.mediaClass ? { className: fields.mediaClass } : undefined,
  } as unknown as Api.Message;
}

function rpcError(errorMessage: string): RPCError {
  return new RPCError(errorMessage, new Api.contacts.ResolveUsername({ username: 'someone' }), 400);
}

async function collect(source: AsyncIterable<ArchivedMessage>): Promise<ArchivedMessage[]> {
  const out: ArchivedMessage[] = [];
  for await (const m of source) {
    out.push(m);
  }
  return out;
}

// ============================================================================
// Mapping helpers
// ============================================================================

describe('toArchivedMessage', () => {
  it('should map a text message', () => {
    const result = toArchivedMessage(rawMessage(10, '2024-01-15T12:30:00Z', { text: 'Hello', senderId: 777 }));

    expect(result).toEqual({
      id: 10,
      timestamp: '2024-01-15T12:30:00.000Z',
      senderId: '777',
      textOrMediaRef: 'Hello',
    });
  });

  it('should reference media for media-only messages', () => {
    const result = toArchivedMessage(
      rawMessage(11, '2024-01-15T12:30:00Z', { text: '', mediaClass: 'MessageMediaPhoto' })
    );

    expect(result?.textOrMediaRef).toBe('media:MessageMediaPhoto');
  });

  it('should prefer the caption text over the media reference', () => {
    const result = toArchivedMessage(
      rawMessage(12, '2024-01-15T12:30:00Z', { text: 'Look', mediaClass: 'MessageMediaPhoto' })
    );

    expect(result?.textOrMediaRef).toBe('Look');
  });

  it('should use null for messages without a sender', () => {
    expect(toArchivedMessage(rawMessage(13, '2024-01-15T12:30:00Z'))?.senderId).toBeNull();
  });

  it('should skip messages with neither text nor media', () => {
    expect(toArchivedMessage(rawMessage(14, '2024-01-15T12:30:00Z', { text: '' }))).toBeNull();
  });

  it('should skip empty media placeholders', () => {
    expect(
      toArchivedMessage(rawMessage(15, '2024-01-15T12:30:00Z', { text: '', mediaClass: 'MessageMediaEmpty' }))
    ).toBeNull();
  });

  it('should skip entries without a date', () => {
    expect(toArchivedMessage({ id: 16 } as unknown as Api.Message)).toBeNull();
  });
});

describe('toEntityLike', () => {
  it('should keep usernames as strings', () => {
    expect(toEntityLike('alice')).toBe('alice');
  });

  it('should turn numeric identifiers into big integers', () => {
    const entity = toEntityLike('-1001234567890');

    expect(bigInt.isInstance(entity)).toBe(true);
    expect(entity.toString()).toBe('-1001234567890');
  });
});

describe('classifyTelegramError', () => {
  it('should map USERNAME_NOT_OCCUPIED to ChatNotFoundError', () => {
    const result = classifyTelegramError(rpcError('USERNAME_NOT_OCCUPIED'), 'ghost_user');

    expect(result).toBeInstanceOf(ChatNotFoundError);
    expect(result.message).toBe("Chat 'ghost_user' not found or inaccessible.");
  });

  it('should map CHANNEL_PRIVATE to ChatNotFoundError', () => {
    expect(classifyTelegramError(rpcError('CHANNEL_PRIVATE'), 'secret')).toBeInstanceOf(ChatNotFoundError);
  });

  it('should map AUTH_KEY_UNREGISTERED to SessionFatalError', () => {
    const result = classifyTelegramError(rpcError('AUTH_KEY_UNREGISTERED'), 'alice');

    expect(result).toBeInstanceOf(SessionFatalError);
    expect(result.message).toBe('Telegram session is no longer valid (AUTH_KEY_UNREGISTERED).');
  });

  it('should map failed GramJS entity lookups to ChatNotFoundError', () => {
    const error = new Error('Cannot find any entity corresponding to "ghost_user"');

    expect(classifyTelegramError(error, 'ghost_user')).toBeInstanceOf(ChatNotFoundError);
  });

  it('should keep the original cause', () => {
    const cause = rpcError('USERNAME_INVALID');
    const result = classifyTelegramError(cause, 'bad name');

    expect((result as ChatNotFoundError).cause).toBe(cause);
  });

  it('should pass other RPC errors through unchanged', () => {
    const error = rpcError('FLOOD_WAIT_X');

    expect(classifyTelegramError(error, 'alice')).toBe(error);
  });

  it('should wrap non-Error values', () => {
    const result = classifyTelegramError('timeout', 'alice');

    expect(result).toBeInstanceOf(Error);
    expect(result.message).toBe('timeout');
  });
});

// ============================================================================
// TelegramSessionGateway
// ============================================================================

describe('TelegramSessionGateway', () => {
  let fake: FakeClient;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    fake = createFakeClient();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('constructor', () => {
    it('should reject page sizes above the Telegram maximum', () => {
      expect(() => new TelegramSessionGateway(asClient(fake), { pageSize: 101 })).toThrow(RangeError);
    });

    it('should reject a zero page size', () => {
      expect(() => new TelegramSessionGateway(asClient(fake), { pageSize: 0 })).toThrow(RangeError);
    });
  });

  describe('open()', () => {
    it('should connect and verify authorization', async () => {
      const gateway = new TelegramSessionGateway(asClient(fake));

      await gateway.open();

      expect(fake.connect).toHaveBeenCalledTimes(1);
      expect(fake.checkAuthorization).toHaveBeenCalledTimes(1);
    });

    it('should fail with SessionFatalError when the session is not authorized', async () => {
      fake.checkAuthorization.mockResolvedValue(false);
      const gateway = new TelegramSessionGateway(asClient(fake));

      await expect(gateway.open()).rejects.toBeInstanceOf(SessionFatalError);
    });

    it('should fail with SessionFatalError when connecting fails', async () => {
      fake.connect.mockRejectedValue(new Error('ECONNREFUSED'));
      const gateway = new TelegramSessionGateway(asClient(fake));

      await expect(gateway.open()).rejects.toThrow('Unable to connect to Telegram.');
    });

    it('should run an interactive login when prompts are given', async () => {
      const gateway = new TelegramSessionGateway(asClient(fake));
      const phoneCode = jest.fn().mockResolvedValue('12345');
      const password = jest.fn().mockResolvedValue('test-password');

      await gateway.open({ phoneNumber: '+10000000000', phoneCode, password });

      expect(fake.connect).not.toHaveBeenCalled();
      expect(fake.start).toHaveBeenCalledWith(
        expect.objectContaining({ phoneNumber: '+10000000000', phoneCode, password })
      );
    });
  });

  describe('close()', () => {
    it('should disconnect a connected client', async () => {
      await new TelegramSessionGateway(asClient(fake)).close();

      expect(fake.disconnect).toHaveBeenCalledTimes(1);
    });

    it('should do nothing when already disconnected', async () => {
      fake.connected = false;

      await new TelegramSessionGateway(asClient(fake)).close();

      expect(fake.disconnect).not.toHaveBeenCalled();
    });
  });

  describe('fetchMessages()', () => {
    it('should page through history newest first until an empty page', async () => {
      fake.getMessages
        .mockResolvedValueOnce([rawMessage(5, '2024-01-05T00:00:00Z'), rawMessage(4, '2024-01-04T00:00:00Z')])
        .mockResolvedValueOnce([rawMessage(3, '2024-01-03T00:00:00Z'), rawMessage(2, '2024-01-02T00:00:00Z')])
        .mockResolvedValueOnce([rawMessage(1, '2024-01-01T00:00:00Z')])
        .mockResolvedValueOnce([]);
      const gateway = new TelegramSessionGateway(asClient(fake), { pageSize: 2 });

      const result = await collect(gateway.fetchMessages('alice', {}));

      expect(result.map((m) => m.id)).toEqual([5, 4, 3, 2, 1]);
      expect(fake.getEntity).toHaveBeenCalledWith('alice');
      expect(fake.getMessages).toHaveBeenCalledTimes(4);
      expect(fake.getMessages).toHaveBeenNthCalledWith(1, { id: 'entity' }, { limit: 2, offsetId: 0 });
      expect(fake.getMessages).toHaveBeenNthCalledWith(2, { id: 'entity' }, { limit: 2, offsetId: 4 });
      expect(fake.getMessages).toHaveBeenNthCalledWith(3, { id: 'entity' }, { limit: 2, offsetId: 2 });
      expect(fake.getMessages).toHaveBeenNthCalledWith(4, { id: 'entity' }, { limit: 2, offsetId: 1 });
    });

    it('should start the first page after the upper bound of the window', async () => {
      fake.getMessages
        .mockResolvedValueOnce([rawMessage(9, '2024-01-31T20:00:00Z')])
        .mockResolvedValueOnce([]);
      const gateway = new TelegramSessionGateway(asClient(fake), { pageSize: 100 });

      await collect(gateway.fetchMessages('alice', { to: '2024-01-31' }));

      expect(fake.getMessages).toHaveBeenNthCalledWith(1, { id: 'entity' }, {
        limit: 100,
        offsetId: 0,
        offsetDate: 1706745600,
      });
      expect(fake.getMessages).toHaveBeenNthCalledWith(2, { id: 'entity' }, { limit: 100, offsetId: 9 });
    });

    it('should stop once a page reaches back past the lower bound', async () => {
      fake.getMessages.mockResolvedValueOnce([
        rawMessage(8, '2024-01-12T00:00:00Z'),
        rawMessage(7, '2024-01-09T23:00:00Z'),
      ]);
      const gateway = new TelegramSessionGateway(asClient(fake), { pageSize: 2 });

      const result = await collect(gateway.fetchMessages('alice', { from: '2024-01-10' }));

      expect(result.map((m) => m.id)).toEqual([8, 7]);
      expect(fake.getMessages).toHaveBeenCalledTimes(1);
    });

    it('should skip service messages', async () => {
      fake.getMessages
        .mockResolvedValueOnce([
          rawMessage(3, '2024-01-03T00:00:00Z'),
          rawMessage(2, '2024-01-02T00:00:00Z', { text: '' }),
          rawMessage(1, '2024-01-01T00:00:00Z'),
        ])
        .mockResolvedValueOnce([]);
      const gateway = new TelegramSessionGateway(asClient(fake));

      const result = await collect(gateway.fetchMessages('alice', {}));

      expect(result.map((m) => m.id)).toEqual([3, 1]);
    });

    it('should resolve numeric identifiers as big integers', async () => {
      const gateway = new TelegramSessionGateway(asClient(fake));

      await collect(gateway.fetchMessages('123456', {}));

      const [entityArg] = fake.getEntity.mock.calls[0];
      expect(bigInt.isInstance(entityArg)).toBe(true);
      expect(String(entityArg)).toBe('123456');
    });

    it('should raise ChatNotFoundError when the chat cannot be resolved', async () => {
      fake.getEntity.mockRejectedValue(rpcError('USERNAME_NOT_OCCUPIED'));
      const gateway = new TelegramSessionGateway(asClient(fake));

      await expect(collect(gateway.fetchMessages('ghost_user', {}))).rejects.toThrow(
        "Chat 'ghost_user' not found or inaccessible."
      );
      expect(fake.getMessages).not.toHaveBeenCalled();
    });

    it('should raise ChatNotFoundError when history is private', async () => {
      fake.getMessages.mockRejectedValue(rpcError('CHANNEL_PRIVATE'));
      const gateway = new TelegramSessionGateway(asClient(fake));

      await expect(collect(gateway.fetchMessages('secret', {}))).rejects.toBeInstanceOf(ChatNotFoundError);
    });

    it('should raise SessionFatalError when the session is revoked mid-history', async () => {
      fake.getMessages
        .mockResolvedValueOnce([rawMessage(2, '2024-01-02T00:00:00Z')])
        .mockRejectedValueOnce(rpcError('SESSION_REVOKED'));
      const gateway = new TelegramSessionGateway(asClient(fake));

      await expect(collect(gateway.fetchMessages('alice', {}))).rejects.toBeInstanceOf(SessionFatalError);
    });

    it('should reconnect a dropped client before fetching', async () => {
      fake.connected = false;
      const gateway = new TelegramSessionGateway(asClient(fake));

      await collect(gateway.fetchMessages('alice', {}));

      expect(fake.connect).toHaveBeenCalledTimes(1);
    });

    it('should raise SessionFatalError when reconnecting fails', async () => {
      fake.connected = false;
      fake.connect.mockRejectedValue(new Error('network down'));
      const gateway = new TelegramSessionGateway(asClient(fake));

      await expect(collect(gateway.fetchMessages('alice', {}))).rejects.toThrow('Lost connection to Telegram.');
    });

    it('should release the session lock after a failure', async () => {
      const lock = new SessionLock();
      fake.getEntity.mockRejectedValueOnce(rpcError('USERNAME_INVALID'));
      const gateway = new TelegramSessionGateway(asClient(fake), { lock });

      await expect(collect(gateway.fetchMessages('bad name', {}))).rejects.toBeInstanceOf(ChatNotFoundError);

      expect(lock.pending).toBe(0);
    });

    it('should not interleave two concurrent retrievals', async () => {
      const calls: string[] = [];
      fake.getEntity.mockImplementation(async (entity: unknown) => {
        calls.push(`resolve:${String(entity)}`);
        return { id: String(entity) };
      });
      fake.getMessages.mockImplementation(async (entity: { id: string }, params: { offsetId: number }) => {
        calls.push(`page:${entity.id}:${params.offsetId}`);
        return params.offsetId === 0 ? [rawMessage(1, '2024-01-01T00:00:00Z')] : [];
      });
      const gateway = new TelegramSessionGateway(asClient(fake));

      await Promise.all([
        collect(gateway.fetchMessages('alice', {})),
        collect(gateway.fetchMessages('bob', {})),
      ]);

      expect(calls).toEqual([
        'resolve:alice',
        'page:alice:0',
        'page:alice:1',
        'resolve:bob',
        'page:bob:0',
        'page:bob:1',
      ]);
    });
  });

  describe('saveSession()', () => {
    it('should return undefined without a StringSession', () => {
      expect(new TelegramSessionGateway(asClient(fake)).saveSession()).toBeUndefined();
    });
  });
});
