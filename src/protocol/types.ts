/**
 * Protocol types for the BLE-UART AT-command driver.
 *
 * Commands, classified replies, module state and the failure taxonomy
 * shared by every layer above the line codec.
 *
 * @module protocol/types
 */

import { VERB_TOKENS } from './constants';

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

/** Semantic verb name (closed set). */
export type Verb = keyof typeof VERB_TOKENS;

/**
 * What a command asks of the module.
 *
 * - `set`    -- carries a parameter, reply is `+VERB=VALUE` then `OK`
 * - `query`  -- no parameter, reply is `+VERB=VALUE`
 * - `action` -- no parameter, reply is the plain `OK` (Test, Reset, Default)
 */
export type CommandIntent = 'set' | 'query' | 'action';

/** A single command addressed to the module. */
export interface Command {
  verb: Verb;
  intent: CommandIntent;
  /** Raw parameter text, already validated. Only present for `set`. */
  param?: string;
}

// ---------------------------------------------------------------------------
// Classified lines
// ---------------------------------------------------------------------------

/** Notification emitted by the module without being asked. */
export type UnsolicitedEvent = { type: 'connect'; peer_address: string | null };

/** A decoded inbound line, categorised by the classifier. */
export type ClassifiedLine =
  | { kind: 'echo'; line: string }
  | { kind: 'success'; verb: Verb; value: string; line: string }
  | { kind: 'plain_ok'; line: string }
  | { kind: 'unsolicited'; event: UnsolicitedEvent; line: string }
  | { kind: 'passthrough'; bytes: Uint8Array }
  | { kind: 'unrecognized'; line: string };

/** Successful reply to a dispatched command. */
export interface CommandReply {
  verb: Verb;
  /** Value from the `+VERB=VALUE` line, or null for a plain `OK`. */
  value: string | null;
  /** Raw reply lines in arrival order. */
  lines: string[];
}

// ---------------------------------------------------------------------------
// Module state
// ---------------------------------------------------------------------------

/** Driver's belief about how the module interprets the shared channel. */
export type ChannelMode = 'unknown' | 'passthrough' | 'at_command';

/** Observed BLE link state. */
export type ConnectionState = 'disconnected' | 'advertising' | 'connected';

/** Session-scoped view of the module. Never persisted. */
export interface ModuleState {
  channel_mode: ChannelMode;
  /** The mode belief must be re-probed before it is trusted. */
  mode_stale: boolean;
  connection: ConnectionState;
  /** Peer address from the last `OK+CONN<addr>` notification. */
  peer_address: string | null;
  /** A changed setting needs a restart to take effect. */
  pending_restart: boolean;
  low_power: boolean;
}

// ---------------------------------------------------------------------------
// Failures
// ---------------------------------------------------------------------------

/** Every way an operation can fail. Returned, never thrown. */
export type DriverFailure =
  | { kind: 'validation'; message: string }
  | { kind: 'timeout'; verb: Verb; timeout_ms: number }
  | { kind: 'mode_mismatch'; required: ChannelMode; actual: ChannelMode }
  | { kind: 'desync'; message: string }
  | { kind: 'reply_mismatch'; verb: Verb; expected: string; received: string | null }
  | { kind: 'busy'; message: string }
  | { kind: 'transport'; message: string }
  | { kind: 'restore_failed'; severity: 'critical'; message: string };

/** Tagged success/failure result. */
export type Result<T, E = DriverFailure> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/** Build a failure result. */
export function fail(error: DriverFailure): Result<never> {
  return { ok: false, error };
}

/** One-line description of a failure, for logs and thrown wrappers. */
export function describe_failure(failure: DriverFailure): string {
  switch (failure.kind) {
    case 'validation':
      return `validation: ${failure.message}`;
    case 'timeout':
      return `timeout: no reply to ${failure.verb} within ${failure.timeout_ms}ms`;
    case 'mode_mismatch':
      return `mode mismatch: requires ${failure.required}, module is ${failure.actual}`;
    case 'desync':
      return `desync: ${failure.message}`;
    case 'reply_mismatch':
      return `reply mismatch on ${failure.verb}: expected "${failure.expected}", got "${failure.received ?? ''}"`;
    case 'busy':
      return `busy: ${failure.message}`;
    case 'transport':
      return `transport: ${failure.message}`;
    case 'restore_failed':
      return `CRITICAL restore failed: ${failure.message}`;
  }
}
