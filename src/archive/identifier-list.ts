/**
 * Identifier list parsing
 *
 * @module archive/identifier-list
 */

import { readFile } from 'fs/promises';
import { ConfigurationError, toError } from '../errors/error-handler';

/**
 * Split a line-delimited identifier file
 *
 * Lines are trimmed and blank lines dropped. Order and duplicates are kept:
 * every remaining line produces one outcome.
 */
export function parseIdentifierList(text: string): string[] {
  return text
    .replace(/^\uFEFF/, '')
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Read and parse an identifier file
 *
 * @throws ConfigurationError if the file cannot be read
 */
export async function readIdentifierFile(path: string): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    const reason = toError(error).message;
    throw new ConfigurationError(`Cannot read identifier file '${path}': ${reason}`, 'identifiers_file');
  }
  return parseIdentifierList(content);
}
