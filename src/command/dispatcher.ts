/**
 * Command dispatcher.
 *
 * Sends one command at a time and waits for its classified reply. The
 * protocol has no negative acknowledgement, so the only failure signal is
 * the deadline expiring; that is reported as a distinct `timeout` failure.
 *
 * Phase transitions:
 *   IDLE --> AWAITING_REPLY            on execute() (or when the queue advances)
 *   AWAITING_REPLY --> IDLE            on matching `+VERB=` (query) or `OK` (action)
 *   AWAITING_REPLY --> AWAITING_TRAILING_OK  on matching `+VERB=` (set)
 *   AWAITING_TRAILING_OK --> IDLE      on `OK`, or when the grace period ends
 *   AWAITING_REPLY --> IDLE            on deadline expiry (timeout failure)
 *
 * Commands issued while another is in flight are queued FIFO. Each deadline
 * starts when its command is written.
 *
 * @module command/dispatcher
 */

import { EventEmitter } from 'events';
import { encode_command, command_text, is_verb } from '../protocol/line_codec';
import { format_hex_ascii } from '../protocol/hex_dump';
import { fail, type ClassifiedLine, type Command, type CommandReply, type Result, type Verb } from '../protocol/types';
import type { AwaitedReply } from '../protocol/classifier';
import { DEFAULT_COMMAND_TIMEOUT_MS, DEFAULT_TRAILING_OK_GRACE_MS } from '../protocol/constants';
import { create_logger, type Logger } from '../util/logger';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Current phase of the in-flight exchange. */
export type DispatchPhase = 'idle' | 'awaiting_reply' | 'awaiting_trailing_ok';

/** Lines the dispatcher is offered by the channel reader. */
export type ReplyLine = Extract<ClassifiedLine, { kind: 'echo' | 'success' | 'plain_ok' | 'unrecognized' }>;

/** Callbacks the dispatcher uses to reach the transport. */
export interface DispatcherCallbacks {
  /** Write raw bytes to the transport. May throw. */
  send: (data: Uint8Array) => void;
}

export interface DispatcherOptions {
  default_timeout_ms: number;
  trailing_ok_grace_ms: number;
  logger: Logger;
}

interface QueuedCommand {
  command: Command;
  timeout_ms: number;
  resolve: (result: Result<CommandReply>) => void;
}

interface InFlight extends QueuedCommand {
  value: string | null;
  lines: string[];
  timer: ReturnType<typeof setTimeout> | null;
}

// ---------------------------------------------------------------------------
// CommandDispatcher
// ---------------------------------------------------------------------------

/**
 * Single-writer command dispatcher.
 *
 * Emits:
 *   'phase_change' (phase: DispatchPhase)
 *   'desync'       (message: string) -- a reply arrived with nothing outstanding
 */
export class CommandDispatcher extends EventEmitter {
  private phase: DispatchPhase = 'idle';
  private queue: QueuedCommand[] = [];
  private in_flight: InFlight | null = null;
  private callbacks: DispatcherCallbacks;
  private options: DispatcherOptions;

  constructor(callbacks: DispatcherCallbacks, options: Partial<DispatcherOptions> = {}) {
    super();
    this.callbacks = callbacks;
    this.options = {
      default_timeout_ms: options.default_timeout_ms ?? DEFAULT_COMMAND_TIMEOUT_MS,
      trailing_ok_grace_ms: options.trailing_ok_grace_ms ?? DEFAULT_TRAILING_OK_GRACE_MS,
      logger: options.logger ?? create_logger('DISPATCH')
    };
  }

  // -----------------------------------------------------------------------
  // Public accessors
  // -----------------------------------------------------------------------

  get_phase(): DispatchPhase {
    return this.phase;
  }

  /** Verb of the command whose reply is being awaited, or null. */
  outstanding_verb(): Verb | null {
    return this.in_flight?.command.verb ?? null;
  }

  /** What the in-flight command still accepts as its reply, or null when idle. */
  awaited_reply(): AwaitedReply | null {
    const current = this.in_flight;
    if (!current) return null;

    const { verb, intent } = current.command;
    if (this.phase === 'awaiting_trailing_ok') {
      return { verb, accepts_value: false, accepts_ok: true };
    }
    return { verb, accepts_value: intent !== 'action', accepts_ok: intent === 'action' };
  }

  /** True while a command is in flight. */
  is_busy(): boolean {
    return this.in_flight !== null;
  }

  /** Number of commands waiting behind the in-flight one. */
  queued_count(): number {
    return this.queue.length;
  }

  // -----------------------------------------------------------------------
  // Execution
  // -----------------------------------------------------------------------

  /**
   * Send a command and wait for its reply.
   *
   * Never rejects: every outcome is a {@link Result}.
   *
   * @param command    - Command to send.
   * @param timeout_ms - Reply deadline. Defaults to the dispatcher default.
   */
  execute(command: Command, timeout_ms: number = this.options.default_timeout_ms): Promise<Result<CommandReply>> {
    if (!is_verb(command.verb)) {
      return Promise.resolve(fail({ kind: 'validation', message: `unknown verb "${String(command.verb)}"` }));
    }

    return new Promise<Result<CommandReply>>((resolve) => {
      this.queue.push({ command, timeout_ms, resolve });
      this._start_next();
    });
  }

  // -----------------------------------------------------------------------
  // Reply ingestion
  // -----------------------------------------------------------------------

  /**
   * Offer a classified interpreter line.
   *
   * Lines that do not belong to the outstanding command are logged and
   * discarded; they never complete it.
   */
  on_reply(reply: ReplyLine): void {
    const current = this.in_flight;

    if (!current) {
      this._handle_idle_line(reply);
      return;
    }

    if (this.phase === 'awaiting_trailing_ok') {
      if (reply.kind === 'plain_ok') {
        current.lines.push(reply.line);
        this._complete();
      } else {
        this.options.logger.debug(`discarding "${reply.line}" while waiting for OK after ${current.command.verb}`);
      }
      return;
    }

    const { command } = current;

    switch (reply.kind) {
      case 'success':
        if (reply.verb === command.verb && command.intent !== 'action') {
          current.value = reply.value;
          current.lines.push(reply.line);
          if (command.intent === 'set') {
            this._await_trailing_ok();
          } else {
            this._complete();
          }
          return;
        }
        this.options.logger.warn(`discarding reply for ${reply.verb} while awaiting ${command.verb}`);
        return;
      case 'plain_ok':
        if (command.intent === 'action') {
          current.lines.push(reply.line);
          this._complete();
          return;
        }
        this.options.logger.debug(`discarding OK while awaiting +${command.verb} reply`);
        return;
      case 'echo':
        this.options.logger.debug(`ignoring echo "${reply.line}"`);
        return;
      case 'unrecognized':
        this.options.logger.warn(`discarding unrecognized line "${reply.line}" while awaiting ${command.verb}`);
        return;
    }
  }

  /**
   * Resolve the in-flight command and everything queued with a transport
   * failure. Used when the session ends.
   */
  cancel_all(reason: string): void {
    const current = this.in_flight;
    const queued = this.queue;
    this.queue = [];

    if (current) {
      this._clear_timer(current);
      this.in_flight = null;
      current.resolve(fail({ kind: 'transport', message: reason }));
    }
    for (const entry of queued) {
      entry.resolve(fail({ kind: 'transport', message: reason }));
    }
    this._transition('idle');
  }

  // -----------------------------------------------------------------------
  // Private: exchange internals
  // -----------------------------------------------------------------------

  /** Lines with nothing outstanding: a late reply, a stray OK, or desync. */
  private _handle_idle_line(reply: ReplyLine): void {
    switch (reply.kind) {
      case 'success': {
        const message = `reply "${reply.line}" arrived with no command outstanding`;
        this.options.logger.warn(message);
        this.emit('desync', message);
        return;
      }
      case 'plain_ok':
        this.options.logger.debug('discarding OK with no command outstanding');
        return;
      default:
        this.options.logger.debug(`discarding "${reply.line}" with no command outstanding`);
        return;
    }
  }

  /** Send the next queued command if nothing is in flight. */
  private _start_next(): void {
    while (!this.in_flight && this.queue.length > 0) {
      const next = this.queue.shift();
      if (!next) return;

      const entry: InFlight = { ...next, value: null, lines: [], timer: null };
      this.in_flight = entry;
      this._transition('awaiting_reply');

      const bytes = encode_command(entry.command);
      try {
        this.options.logger.debug(`TX ${command_text(entry.command)}  ${format_hex_ascii(bytes)}`);
        this.callbacks.send(bytes);
      } catch (err) {
        this.in_flight = null;
        this._transition('idle');
        entry.resolve(
          fail({
            kind: 'transport',
            message: `send failed: ${err instanceof Error ? err.message : String(err)}`
          })
        );
        continue;
      }

      entry.timer = setTimeout(() => {
        entry.timer = null;
        this._on_timeout(entry);
      }, entry.timeout_ms);
    }
  }

  /** Deadline expired with no matching reply. */
  private _on_timeout(entry: InFlight): void {
    if (this.in_flight !== entry) return;

    this.options.logger.warn(`no reply to ${command_text(entry.command)} within ${entry.timeout_ms}ms`);
    this.in_flight = null;
    this._transition('idle');
    entry.resolve(fail({ kind: 'timeout', verb: entry.command.verb, timeout_ms: entry.timeout_ms }));
    this._start_next();
  }

  /** Set reply seen; hold the channel briefly for the trailing OK. */
  private _await_trailing_ok(): void {
    const entry = this.in_flight;
    if (!entry) return;

    this._clear_timer(entry);
    this._transition('awaiting_trailing_ok');
    entry.timer = setTimeout(() => {
      entry.timer = null;
      if (this.in_flight === entry) {
        this._complete();
      }
    }, this.options.trailing_ok_grace_ms);
  }

  /** Resolve the in-flight command successfully and advance the queue. */
  private _complete(): void {
    const entry = this.in_flight;
    if (!entry) return;

    this._clear_timer(entry);
    this.in_flight = null;
    this._transition('idle');
    entry.resolve({
      ok: true,
      value: { verb: entry.command.verb, value: entry.value, lines: entry.lines }
    });
    this._start_next();
  }

  private _clear_timer(entry: InFlight): void {
    if (entry.timer !== null) {
      clearTimeout(entry.timer);
      entry.timer = null;
    }
  }

  private _transition(next: DispatchPhase): void {
    if (this.phase === next) return;
    this.phase = next;
    this.emit('phase_change', next);
  }
}
