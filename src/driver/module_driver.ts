/**
 * Module driver: one session over one byte channel.
 *
 * Wires the channel reader, dispatcher, mode controller, configuration
 * registry and connection tracker around a {@link ByteTransport} it owns
 * exclusively. Every protocol outcome is returned as a {@link Result};
 * nothing here throws for device behaviour.
 *
 * Emits:
 *   'passthrough'  (bytes: Uint8Array)         payload from the peer
 *   'connection'   (change: ConnectionChange)  link state changed
 *   'mode_change'  (mode: ChannelMode)
 *   'desync'       (message: string)           mode belief marked stale
 *   'error'        (err: Error)                transport error (only if listened for)
 *
 * @module driver/module_driver
 */

import { EventEmitter } from 'events';
import { CommandDispatcher } from '../command/dispatcher';
import { ModeController } from '../command/mode_controller';
import { ConfigRegistry, type SetOutcome } from '../config/config_registry';
import { resolve_driver_options, type DriverOptions } from '../config/driver_options';
import { BAUD_RATES, FACTORY_BAUD_INDEX, type SettingName, type SettingValueMap } from '../config/settings';
import { ModuleStateStore, type RestartKind } from '../store/module_state';
import { ConnectionTracker } from '../store/connection_tracker';
import { ChannelReader } from './channel_reader';
import { build_command } from '../protocol/line_codec';
import { format_hex_ascii } from '../protocol/hex_dump';
import { RESTART_VERBS } from '../protocol/constants';
import { fail, type ChannelMode, type CommandIntent, type CommandReply, type DriverFailure, type ModuleState, type Result } from '../protocol/types';
import type { ByteTransport } from '../transport/types';
import { create_logger, type Logger } from '../util/logger';

export class ModuleDriver extends EventEmitter {
  readonly dispatcher: CommandDispatcher;
  readonly mode: ModeController;
  readonly config: ConfigRegistry;
  readonly connection: ConnectionTracker;

  private store: ModuleStateStore;
  private reader: ChannelReader;
  private transport: ByteTransport;
  private options: DriverOptions;
  private log: Logger;
  private closed = false;

  /** Line rate to follow once the module comes back from a restart. */
  private line_rate_after_restart: number | null = null;

  private readonly _on_data = (chunk: Uint8Array): void => {
    this.reader.push(chunk);
  };
  private readonly _on_close = (): void => {
    this.log.warn('transport closed');
    this._end_session('transport closed');
  };
  private readonly _on_error = (err: Error): void => {
    this.log.error(`transport error: ${err.message}`);
    if (this.listenerCount('error') > 0) {
      this.emit('error', err);
    }
  };

  /**
   * @param transport - Open duplex channel. The driver becomes its only user.
   * @param overrides - Option overrides; see {@link DriverOptions}.
   * @throws If an option is invalid.
   */
  constructor(transport: ByteTransport, overrides: Partial<DriverOptions> = {}) {
    super();
    this.transport = transport;
    this.options = resolve_driver_options(overrides);
    const level = this.options.log_level;
    this.log = create_logger('DRIVER', level);

    this.store = new ModuleStateStore();

    this.dispatcher = new CommandDispatcher(
      { send: (data) => this.transport.send(data) },
      {
        default_timeout_ms: this.options.command_timeout_ms,
        trailing_ok_grace_ms: this.options.trailing_ok_grace_ms,
        logger: create_logger('DISPATCH', level)
      }
    );

    this.mode = new ModeController(this.dispatcher, this.store, {
      probe_timeout_ms: this.options.probe_timeout_ms,
      command_timeout_ms: this.options.command_timeout_ms,
      restart_settle_ms: this.options.restart_settle_ms,
      logger: create_logger('MODE', level),
      on_restarted: () => this._follow_line_rate()
    });

    this.config = new ConfigRegistry(this.dispatcher, this.mode, this.store, {
      command_timeout_ms: this.options.command_timeout_ms,
      logger: create_logger('CONFIG', level)
    });

    this.connection = new ConnectionTracker(this.store);

    this.reader = new ChannelReader(
      {
        context: () => ({
          channel_mode: this.store.get_snapshot().channel_mode,
          outstanding: this.dispatcher.awaited_reply()
        }),
        on_reply: (reply) => this.dispatcher.on_reply(reply),
        on_unsolicited: (event) => this.connection.on_unsolicited(event),
        on_passthrough: (bytes) => this.emit('passthrough', bytes)
      },
      { max_line_length: this.options.max_line_length, logger: create_logger('RX', level) }
    );

    this.dispatcher.on('desync', (message: string) => {
      this.mode.mark_stale(message);
      this.emit('desync', message);
    });
    this.mode.on('mode_change', (mode: ChannelMode) => this.emit('mode_change', mode));
    this.connection.subscribe((change) => this.emit('connection', change));

    this.transport.on('data', this._on_data);
    this.transport.on('close', this._on_close);
    this.transport.on('error', this._on_error);
  }

  // -----------------------------------------------------------------------
  // Session
  // -----------------------------------------------------------------------

  /**
   * Begin the session: the module is assumed up and advertising, and the
   * channel mode is resolved with a probe.
   */
  async start(): Promise<Result<ChannelMode>> {
    if (this.closed) return fail(closed_failure());
    if (!this.transport.is_connected()) {
      return fail({ kind: 'transport', message: 'transport is not connected' });
    }
    this.connection.mark_advertising();
    return this.mode.probe();
  }

  /** Snapshot of the module state. */
  state(): ModuleState {
    return this.store.get_snapshot();
  }

  /**
   * End the session and release the transport. Outstanding commands resolve
   * with a transport failure. Safe to call twice.
   */
  close(): void {
    this.transport.off('data', this._on_data);
    this.transport.off('close', this._on_close);
    this.transport.off('error', this._on_error);
    this._end_session('driver closed');
    this.transport.disconnect?.();
  }

  // -----------------------------------------------------------------------
  // Commands
  // -----------------------------------------------------------------------

  /**
   * Send one command by verb name.
   *
   * With a parameter the command is a set; without one it is a query (or
   * the Test action). The interpreter must be active; an unknown or stale
   * mode is probed first. Restart verbs and the interpreter flag are
   * refused: they change the channel's meaning and have dedicated
   * operations.
   */
  async execute(verb: string, param?: string): Promise<Result<CommandReply>> {
    if (this.closed) return fail(closed_failure());

    if (RESTART_VERBS.some((v) => v === verb)) {
      return fail({
        kind: 'validation',
        message: `${verb} restarts the module; use reset_and_restore_passthrough()`
      });
    }
    if (verb === 'interpreter') {
      return fail({
        kind: 'validation',
        message: 'use enter_command_mode() / enter_passthrough() to change the interpreter flag'
      });
    }

    const intent: CommandIntent = verb === 'test' ? 'action' : param === undefined ? 'query' : 'set';
    const built = build_command(verb, intent, param);
    if (!built.ok) {
      return fail({ kind: 'validation', message: built.error });
    }

    const ready = await this.mode.ensure_command_mode();
    if (!ready.ok) return ready;

    return this.dispatcher.execute(built.value, this.options.command_timeout_ms);
  }

  /** Query a setting. See {@link ConfigRegistry.get}. */
  get<K extends SettingName>(name: K): Promise<Result<SettingValueMap[K]>> {
    if (this.closed) return Promise.resolve(fail(closed_failure()));
    return this.config.get(name);
  }

  /** Write a setting. See {@link ConfigRegistry.set}. */
  set<K extends SettingName>(name: K, value: SettingValueMap[K]): Promise<Result<SetOutcome>> {
    if (this.closed) return Promise.resolve(fail(closed_failure()));
    return this.config.set(name, value);
  }

  enter_command_mode(): Promise<Result<void>> {
    if (this.closed) return Promise.resolve(fail(closed_failure()));
    return this.mode.enter_command_mode();
  }

  enter_passthrough(): Promise<Result<void>> {
    if (this.closed) return Promise.resolve(fail(closed_failure()));
    return this.mode.enter_passthrough();
  }

  /**
   * Restart the module and leave it in passthrough.
   *
   * A baud change stored before a reset (or the factory rate, after a
   * defaults restore) becomes active on the module during the restart; the
   * transport is moved to it before the interpreter is disabled.
   *
   * Holds the module for its whole duration: commands, settings, mode
   * changes and passthrough writes issued meanwhile fail with `busy`.
   */
  reset_and_restore_passthrough(kind: RestartKind = 'reset'): Promise<Result<void>> {
    if (this.closed) return Promise.resolve(fail(closed_failure()));
    // Refused as busy; the running restart keeps the line rate it captured.
    if (this.mode.is_restarting()) return this.mode.reset_and_restore_passthrough(kind);

    const index = kind === 'defaults' ? FACTORY_BAUD_INDEX : this.config.pending_value('baud');
    this.line_rate_after_restart = index === undefined ? null : BAUD_RATES[index] ?? null;

    return this.mode.reset_and_restore_passthrough(kind);
  }

  // -----------------------------------------------------------------------
  // Passthrough
  // -----------------------------------------------------------------------

  /**
   * Write payload to the peer.
   *
   * Refused unless the module is known to be in passthrough and no command
   * is in flight, so payload can never be read as a command.
   */
  write_passthrough(data: Uint8Array): Result<void> {
    if (this.closed) return fail(closed_failure());

    if (this.mode.is_restarting()) {
      return fail({ kind: 'busy', message: 'module restart in progress' });
    }

    const s = this.store.get_snapshot();
    if (s.channel_mode !== 'passthrough' || s.mode_stale) {
      return fail({
        kind: 'mode_mismatch',
        required: 'passthrough',
        actual: s.mode_stale ? 'unknown' : s.channel_mode
      });
    }
    if (this.dispatcher.is_busy()) {
      return fail({ kind: 'busy', message: `command ${this.dispatcher.outstanding_verb() ?? ''} in flight` });
    }

    try {
      this.log.debug(`TX payload ${format_hex_ascii(data)}`);
      this.transport.send(data);
    } catch (err) {
      return fail({
        kind: 'transport',
        message: `send failed: ${err instanceof Error ? err.message : String(err)}`
      });
    }
    return { ok: true, value: undefined };
  }

  // -----------------------------------------------------------------------
  // Private
  // -----------------------------------------------------------------------

  private async _follow_line_rate(): Promise<void> {
    const rate = this.line_rate_after_restart;
    this.line_rate_after_restart = null;
    if (rate === null || !this.transport.update_baud_rate) return;

    this.log.info(`following module line rate to ${rate}`);
    await this.transport.update_baud_rate(rate);
  }

  private _end_session(reason: string): void {
    if (this.closed) return;
    this.closed = true;
    this.mode.close(reason);
    this.dispatcher.cancel_all(reason);
    this.reader.reset();
    this.connection.on_transport_closed();
    this.connection.dispose();
  }
}

function closed_failure(): DriverFailure {
  return { kind: 'transport', message: 'driver is closed' };
}
