/**
 * S3 Archive Writer
 *
 * Serializes one chat's filtered messages into a self-describing JSON
 * document and uploads it to S3, returning the object's public URL.
 *
 * @module archive/archive-writer
 */

import { PutObjectCommand, S3Client, S3ClientConfig } from '@aws-sdk/client-s3';
import {
  ArchiveDocument,
  ArchiveMessageRecord,
  ArchivedMessage,
  DateWindow,
} from '../types';
import { StorageError, toError } from '../errors/error-handler';
import { StorageConfig } from '../config/config';

/**
 * Maximum retry attempts for S3 operations
 * Raised from the SDK default of 3 to ride out transient throttling
 */
const MAX_RETRY_ATTEMPTS = 5;

/**
 * Indentation used for archive JSON
 */
const JSON_INDENT = 4;

/**
 * Characters allowed verbatim in an object key's identifier segment
 */
const UNSAFE_KEY_CHARS = /[^A-Za-z0-9_.-]/g;

/**
 * Everything the writer needs to produce one archive
 */
export interface ArchiveInput {
  identifier: string;
  window: DateWindow;
  messages: readonly ArchivedMessage[];
}

/**
 * Interface for archive persistence
 */
export interface ArchiveWriter {
  /**
   * Persist an archive
   *
   * @returns Public URL of the stored archive
   * @throws StorageError if the upload fails
   */
  write(input: ArchiveInput): Promise<string>;
}

/**
 * Options for S3ArchiveWriter
 */
export interface S3ArchiveWriterOptions {
  bucketName: string;
  region: string;
  /** S3-compatible endpoint; switches locators to path-style URLs */
  endpoint?: string;
  /** Prefix for every object key, without trailing slash */
  keyPrefix?: string;
  /** Source of the run time (defaults to the system clock) */
  clock?: () => Date;
}

/**
 * Convert a message into its archive representation
 */
export function toArchiveRecord(message: ArchivedMessage): ArchiveMessageRecord {
  return {
    message_id: message.id,
    timestamp: message.timestamp,
    sender: message.senderId,
    text_or_media_ref: message.textOrMediaRef,
  };
}

/**
 * Build the JSON document for an archive
 *
 * @param input - Identifier, window and messages
 * @param generatedAt - Run time recorded in the document
 */
export function buildArchiveDocument(input: ArchiveInput, generatedAt: Date): ArchiveDocument {
  return {
    identifier: input.identifier,
    window: { ...input.window },
    generated_at: generatedAt.toISOString(),
    message_count: input.messages.length,
    messages: input.messages.map(toArchiveRecord),
  };
}

/**
 * Derive the object key for an archive
 *
 * @example
 * buildArchiveKey('alice', new Date('2024-02-01T08:15:30.250Z'))
 * // 'telegram_alice_2024-02-01T08-15-30-250Z.json'
 *
 * buildArchiveKey('@news/feed', new Date('2024-02-01T08:15:30.250Z'), 'archives')
 * // 'archives/telegram__news_feed_2024-02-01T08-15-30-250Z.json'
 */
export function buildArchiveKey(identifier: string, generatedAt: Date, keyPrefix?: string): string {
  const safeIdentifier = identifier.replace(UNSAFE_KEY_CHARS, '_');
  const stamp = generatedAt.toISOString().replace(/[:.]/g, '-');
  const fileName = `telegram_${safeIdentifier}_${stamp}.json`;
  const prefix = keyPrefix?.replace(/^\/+|\/+$/g, '');
  return prefix ? `${prefix}/${fileName}` : fileName;
}

/**
 * Public URL of an object
 *
 * Virtual-hosted AWS URL by default, path-style under a custom endpoint.
 */
export function buildArchiveUrl(
  key: string,
  options: Pick<S3ArchiveWriterOptions, 'bucketName' | 'region' | 'endpoint'>
): string {
  const encodedKey = key.split('/').map(encodeURIComponent).join('/');
  if (options.endpoint) {
    return `${options.endpoint.replace(/\/+$/, '')}/${options.bucketName}/${encodedKey}`;
  }
  return `https://${options.bucketName}.s3.${options.region}.amazonaws.com/${encodedKey}`;
}

/**
 * ArchiveWriter that stores archives as S3 objects
 *
 * Every write creates a new object; existing archives are never updated.
 */
export class S3ArchiveWriter implements ArchiveWriter {
  private readonly client: S3Client;
  private readonly options: S3ArchiveWriterOptions;
  private readonly clock: () => Date;

  constructor(client: S3Client, options: S3ArchiveWriterOptions) {
    this.client = client;
    this.options = options;
    this.clock = options.clock ?? (() => new Date());
  }

  async write(input: ArchiveInput): Promise<string> {
    const generatedAt = this.clock();
    const key = buildArchiveKey(input.identifier, generatedAt, this.options.keyPrefix);
    const document = buildArchiveDocument(input, generatedAt);

    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.options.bucketName,
          Key: key,
          Body: JSON.stringify(document, null, JSON_INDENT),
          ContentType: 'application/json',
        })
      );
    } catch (error) {
      const cause = toError(error);
      console.error(`Failed to upload archive '${key}' to S3:`, cause.message);
      throw new StorageError(`Failed to upload archive to S3: ${cause.message}`, key, cause);
    }

    console.log(`Archive for '${input.identifier}' uploaded to S3 bucket '${this.options.bucketName}' as '${key}'`);
    return buildArchiveUrl(key, this.options);
  }
}

/**
 * Create an S3 client from storage settings
 */
export function createS3Client(config: StorageConfig): S3Client {
  const clientConfig: S3ClientConfig = {
    region: config.region,
    maxAttempts: MAX_RETRY_ATTEMPTS,
  };

  if (config.credentials) {
    clientConfig.credentials = config.credentials;
  }
  if (config.endpoint) {
    clientConfig.endpoint = config.endpoint;
    clientConfig.forcePathStyle = true;
  }

  return new S3Client(clientConfig);
}

/**
 * Create an S3ArchiveWriter from storage settings
 *
 * @param config - Bucket, region and optional endpoint/prefix
 * @param clock - Optional run-time source
 */
export function createArchiveWriter(config: StorageConfig, clock?: () => Date): ArchiveWriter {
  return new S3ArchiveWriter(createS3Client(config), {
    bucketName: config.bucketName,
    region: config.region,
    endpoint: config.endpoint,
    keyPrefix: config.keyPrefix,
    clock,
  });
}
