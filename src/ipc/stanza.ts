/**
 * Stanza Codec
 *
 * Encodes commands into request lines and decodes response frames into
 * ordered stanzas of key-value pairs.
 *
 * @module ipc/stanza
 */

import { InvalidArgumentError, MalformedResponseError } from './errors.js';
import { DEFAULT_LINE_TERMINATOR, type Command, type LineTerminator } from './protocol.js';

// =============================================================================
// Types
// =============================================================================

/**
 * One block of `key: value` lines. Iteration order is wire order.
 */
export type Stanza = ReadonlyMap<string, string>;

export interface DecodeOptions {
  /** Line terminator (default: LF) */
  terminator?: LineTerminator;
  /** Command name, attached to decode errors */
  command?: string;
}

// =============================================================================
// Encoding
// =============================================================================

/** Tokens may not contain whitespace or control characters */
const INVALID_TOKEN = /[\s\x00-\x1f\x7f]/;

function assertToken(value: string, argument: string): void {
  if (value.length === 0) {
    throw new InvalidArgumentError(argument, 'must not be empty');
  }
  const match = INVALID_TOKEN.exec(value);
  if (match) {
    throw new InvalidArgumentError(
      argument,
      `contains forbidden character ${JSON.stringify(match[0])}`
    );
  }
}

/**
 * Serialize a command to its request line, terminator included.
 *
 * @throws {InvalidArgumentError} if the name or an argument is not a single token
 */
export function encodeCommand(
  command: Command,
  terminator: LineTerminator = DEFAULT_LINE_TERMINATOR
): string {
  assertToken(command.name, 'command name');
  const args = command.args ?? [];
  args.forEach((arg, index) => assertToken(arg, `${command.name} argument ${index + 1}`));
  return [command.name, ...args].join(' ') + terminator;
}

// =============================================================================
// Decoding
// =============================================================================

const utf8 = new TextDecoder('utf-8', { fatal: true });

/** Characters that may never appear inside a decoded line */
const STRAY_BREAK = /[\r\n\x00]/;

function decodeUtf8(raw: Buffer, command?: string): string {
  try {
    return utf8.decode(raw);
  } catch (err) {
    throw new MalformedResponseError('response is not valid UTF-8', { command, cause: err });
  }
}

/**
 * Decode a response frame into its stanzas.
 *
 * An empty frame yields an empty array.
 *
 * @throws {MalformedResponseError} on bytes that are not valid UTF-8, a line
 * without a separator, an empty key, a duplicate key within one stanza, or a
 * value spanning several lines
 */
export function decodeResponse(raw: Buffer | string, options: DecodeOptions = {}): Stanza[] {
  const terminator = options.terminator ?? DEFAULT_LINE_TERMINATOR;
  const text = typeof raw === 'string' ? raw : decodeUtf8(raw, options.command);
  const stanzas: Stanza[] = [];

  if (text.length === 0) {
    return stanzas;
  }

  let current = new Map<string, string>();
  const lines = text.split(terminator);

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const details = { command: options.command, line: i + 1, raw: line };

    if (line.length === 0) {
      if (current.size > 0) {
        stanzas.push(current);
        current = new Map();
      }
      continue;
    }

    if (STRAY_BREAK.test(line)) {
      throw new MalformedResponseError(`line ${i + 1} spans multiple lines`, details);
    }

    const separator = line.indexOf(':');
    if (separator === -1) {
      throw new MalformedResponseError(`line ${i + 1} has no key separator`, details);
    }
    if (separator === 0) {
      throw new MalformedResponseError(`line ${i + 1} has an empty key`, details);
    }

    const key = line.slice(0, separator);
    const value = line.slice(separator + 1).replace(/^[ \t]+/, '');

    if (current.has(key)) {
      throw new MalformedResponseError(`duplicate key "${key}" on line ${i + 1}`, details);
    }
    current.set(key, value);
  }

  if (current.size > 0) {
    stanzas.push(current);
  }

  return stanzas;
}

/**
 * Build a stanza from plain entries.
 */
export function stanzaOf(entries: Record<string, string>): Stanza {
  return new Map(Object.entries(entries));
}
