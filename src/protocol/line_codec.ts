/**
 * Line codec for the AT-command channel.
 *
 * Outgoing commands are framed as `AT+<VERB><PARAM>\r\n`. Incoming bytes
 * are split into CR LF delimited lines. The incomplete tail of a read is
 * carried in an explicit {@link LineBuffer} that the caller passes back on
 * the next call; the codec itself holds no state.
 *
 * Text is handled as latin1 so that a line decoded from opaque payload
 * re-encodes to exactly the bytes that arrived.
 *
 * @module protocol/line_codec
 */

import { COMMAND_PREFIX, CR, LF, LINE_TERMINATOR, VERB_TOKENS, DEFAULT_MAX_LINE_LENGTH } from './constants';
import type { Command, CommandIntent, Result, Verb } from './types';

/** Bytes received after the last complete line. */
export interface LineBuffer {
  pending: Uint8Array;
}

/** Output of a single {@link decode_lines} call. */
export interface DecodeResult {
  /** Complete lines, terminator stripped, in arrival order. */
  lines: string[];
  /** Buffer to pass to the next call. */
  buffer: LineBuffer;
  /** True when an over-long tail was discarded during this call. */
  overflow: boolean;
}

/** A fresh, empty line buffer. */
export function empty_line_buffer(): LineBuffer {
  return { pending: new Uint8Array(0) };
}

/** Check whether a string names a verb in the closed set. */
export function is_verb(name: string): name is Verb {
  return Object.prototype.hasOwnProperty.call(VERB_TOKENS, name);
}

/** Reverse lookup: wire token -> verb. `null` for tokens outside the set. */
export function verb_for_token(token: string): Verb | null {
  for (const verb of Object.keys(VERB_TOKENS)) {
    if (is_verb(verb) && VERB_TOKENS[verb] === token && token !== '') {
      return verb;
    }
  }
  return null;
}

/**
 * Build a command, rejecting verbs outside the closed set.
 *
 * @param verb   - Verb name, possibly from an untyped caller.
 * @param intent - What the command asks for.
 * @param param  - Parameter text (required for `set`, forbidden otherwise).
 */
export function build_command(
  verb: string,
  intent: CommandIntent,
  param?: string
): Result<Command, string> {
  if (!is_verb(verb)) {
    return { ok: false, error: `unknown verb "${verb}"` };
  }
  if (intent === 'set') {
    if (param === undefined || param.length === 0) {
      return { ok: false, error: `set ${verb} needs a parameter` };
    }
    if (param.includes('\r') || param.includes('\n')) {
      return { ok: false, error: `parameter for ${verb} contains a line terminator` };
    }
    return { ok: true, value: { verb, intent, param } };
  }
  if (param !== undefined) {
    return { ok: false, error: `${intent} ${verb} takes no parameter` };
  }
  return { ok: true, value: { verb, intent } };
}

/** Command text without the terminator, e.g. `AT+NAMEDX-BT24`. */
export function command_text(command: Command): string {
  const token = VERB_TOKENS[command.verb];
  if (token === '') {
    return COMMAND_PREFIX;
  }
  return `${COMMAND_PREFIX}+${token}${command.param ?? ''}`;
}

/**
 * Encode a command as wire bytes.
 *
 * @returns `AT+<VERB><PARAM>\r\n` as ASCII, or `AT\r\n` for Test.
 */
export function encode_command(command: Command): Uint8Array {
  return new Uint8Array(Buffer.from(command_text(command) + LINE_TERMINATOR, 'latin1'));
}

/** Encode a decoded line back into its wire bytes, terminator included. */
export function encode_line(line: string): Uint8Array {
  return new Uint8Array(Buffer.from(line + LINE_TERMINATOR, 'latin1'));
}

/**
 * Split a chunk of inbound bytes into complete lines.
 *
 * Returns zero or more complete lines and the buffer holding any trailing
 * partial line. Back-to-back terminators produce empty lines, so the bytes
 * of a payload stream can be rebuilt exactly. A tail longer than
 * `max_line_length` is dropped and reported via `overflow`.
 *
 * @param buffer          - Buffer returned by the previous call.
 * @param chunk           - Newly received bytes.
 * @param max_line_length - Upper bound for a retained tail.
 */
export function decode_lines(
  buffer: LineBuffer,
  chunk: Uint8Array,
  max_line_length: number = DEFAULT_MAX_LINE_LENGTH
): DecodeResult {
  const data = new Uint8Array(buffer.pending.length + chunk.length);
  data.set(buffer.pending, 0);
  data.set(chunk, buffer.pending.length);

  const lines: string[] = [];
  let start = 0;

  for (let i = 0; i + 1 < data.length; i++) {
    if (data[i] === CR && data[i + 1] === LF) {
      lines.push(Buffer.from(data.subarray(start, i)).toString('latin1'));
      start = i + 2;
      i++;
    }
  }

  let pending = data.slice(start);
  let overflow = false;
  if (pending.length > max_line_length) {
    pending = new Uint8Array(0);
    overflow = true;
  }

  return { lines, buffer: { pending }, overflow };
}
