/**
 * Response classifier.
 *
 * Categorises a decoded line given the driver's mode belief and the reply
 * the outstanding command is waiting for, if any. Connect notifications are
 * recognised in every state. Outside `at_command`, a line is claimed as a
 * reply only when it is exactly what the outstanding command still accepts;
 * everything else is peer payload. A genuine reply arriving right after a
 * mode switch is therefore not lost, and payload that merely looks like
 * interpreter output is not swallowed.
 *
 * This module never throws.
 *
 * @module protocol/classifier
 */

import { COMMAND_PREFIX, CONNECT_PATTERN, OK_TOKEN, SUCCESS_PATTERN } from './constants';
import { encode_line, verb_for_token } from './line_codec';
import type { ChannelMode, ClassifiedLine, Verb } from './types';

/** What the in-flight command will still accept as its reply. */
export interface AwaitedReply {
  verb: Verb;
  /** A `+VERB=` line for this verb completes it. */
  accepts_value: boolean;
  /** A bare `OK` completes it (an action, or the OK closing a set). */
  accepts_ok: boolean;
}

/** What the classifier needs to know about the driver. */
export interface ClassifierContext {
  channel_mode: ChannelMode;
  /** Reply awaited by the command in flight, or null when idle. */
  outstanding: AwaitedReply | null;
}

/**
 * Classify one decoded line.
 *
 * @param line    - Line text without its terminator.
 * @param context - Current mode belief and outstanding verb.
 */
export function classify_line(line: string, context: ClassifierContext): ClassifiedLine {
  const connect = CONNECT_PATTERN.exec(line);
  if (connect) {
    const address = connect[1];
    return {
      kind: 'unsolicited',
      event: { type: 'connect', peer_address: address ? address.toUpperCase() : null },
      line
    };
  }

  if (context.channel_mode === 'at_command') {
    return parse_reply(line) ?? { kind: 'unrecognized', line };
  }

  if (context.outstanding) {
    const reply = match_awaited(line, context.outstanding);
    if (reply) {
      return reply;
    }
  }

  return { kind: 'passthrough', bytes: encode_line(line) };
}

/** Claim a line only if it is the reply the in-flight command accepts. */
function match_awaited(line: string, awaited: AwaitedReply): ClassifiedLine | null {
  if (line === OK_TOKEN) {
    return awaited.accepts_ok ? { kind: 'plain_ok', line } : null;
  }

  const success = SUCCESS_PATTERN.exec(line);
  if (success && awaited.accepts_value && verb_for_token(success[1]) === awaited.verb) {
    return { kind: 'success', verb: awaited.verb, value: success[2], line };
  }
  return null;
}

/** Parse a line as interpreter output. `null` when it is none of those. */
function parse_reply(line: string): ClassifiedLine | null {
  if (line === OK_TOKEN) {
    return { kind: 'plain_ok', line };
  }

  const success = SUCCESS_PATTERN.exec(line);
  if (success) {
    const verb = verb_for_token(success[1]);
    if (verb !== null) {
      return { kind: 'success', verb, value: success[2], line };
    }
    return null;
  }

  if (line.startsWith(COMMAND_PREFIX)) {
    return { kind: 'echo', line };
  }

  return null;
}

/**
 * Format a 12-digit hex peer address as colon-separated octets.
 *
 * @example format_peer_address('A1B2C3D4E5F6') // 'A1:B2:C3:D4:E5:F6'
 */
export function format_peer_address(address: string): string {
  const pairs = address.toUpperCase().match(/.{2}/g);
  return pairs ? pairs.join(':') : address;
}
