/**
 * Channel mode controller.
 *
 * Tracks whether the module treats the shared channel as a transparent pipe
 * (`passthrough`) or as command input (`at_command`). The interpreter flag
 * lives on the device and survives resets, so the driver's belief starts as
 * `unknown` and is only ever updated on a confirmed reply.
 *
 * State transitions:
 *   UNKNOWN --> AT_COMMAND         probe answered with OK
 *   UNKNOWN --> PASSTHROUGH        probe unanswered (documented default)
 *   * --> AT_COMMAND               on confirmed `+ENAT=1`
 *   * --> PASSTHROUGH              on confirmed `+ENAT=0`
 *   unconfirmed transition         state unchanged, belief marked stale
 *
 * A restart holds the controller for its whole duration: every other mode
 * operation returns `busy` until the module is back in passthrough (or the
 * restore has failed). Closing the controller ends a restart that is still
 * settling without touching the module again.
 *
 * @module command/mode_controller
 */

import { EventEmitter } from 'events';
import type { CommandDispatcher } from './dispatcher';
import type { ModuleStateStore, RestartKind } from '../store/module_state';
import { fail, type ChannelMode, type Result } from '../protocol/types';
import {
  DEFAULT_COMMAND_TIMEOUT_MS,
  DEFAULT_PROBE_TIMEOUT_MS,
  DEFAULT_RESTART_SETTLE_MS,
  INTERPRETER_OFF,
  INTERPRETER_ON
} from '../protocol/constants';
import { create_logger, type Logger } from '../util/logger';

export interface ModeControllerOptions {
  probe_timeout_ms: number;
  command_timeout_ms: number;
  restart_settle_ms: number;
  logger: Logger;
  /**
   * Runs once a restart has settled and before the interpreter is disabled,
   * e.g. to follow a baud change that the restart made active.
   */
  on_restarted?: (kind: RestartKind) => Promise<void>;
}

/**
 * Mode state machine over the driver's channel belief.
 *
 * Emits:
 *   'mode_change' (mode: ChannelMode)
 */
export class ModeController extends EventEmitter {
  private dispatcher: CommandDispatcher;
  private store: ModuleStateStore;
  private options: ModeControllerOptions;

  /** Verb of the restart in progress, or null. */
  private restarting: 'reset' | 'restore_defaults' | null = null;
  private closed_reason: string | null = null;
  private settle: { timer: ReturnType<typeof setTimeout>; resolve: () => void } | null = null;

  constructor(dispatcher: CommandDispatcher, store: ModuleStateStore, options: Partial<ModeControllerOptions> = {}) {
    super();
    this.dispatcher = dispatcher;
    this.store = store;
    this.options = {
      probe_timeout_ms: options.probe_timeout_ms ?? DEFAULT_PROBE_TIMEOUT_MS,
      command_timeout_ms: options.command_timeout_ms ?? DEFAULT_COMMAND_TIMEOUT_MS,
      restart_settle_ms: options.restart_settle_ms ?? DEFAULT_RESTART_SETTLE_MS,
      logger: options.logger ?? create_logger('MODE'),
      on_restarted: options.on_restarted
    };
  }

  // -----------------------------------------------------------------------
  // Public accessors
  // -----------------------------------------------------------------------

  get_mode(): ChannelMode {
    return this.store.get_snapshot().channel_mode;
  }

  /** True when the belief must be re-probed before it is trusted. */
  is_stale(): boolean {
    return this.store.get_snapshot().mode_stale;
  }

  /** True while a reset or defaults restore is running. */
  is_restarting(): boolean {
    return this.restarting !== null;
  }

  /** Distrust the current belief; the next mode-dependent operation re-probes. */
  mark_stale(reason: string): void {
    this.options.logger.warn(`mode belief is stale: ${reason}`);
    this.store.update({ mode_stale: true });
  }

  // -----------------------------------------------------------------------
  // Transitions
  // -----------------------------------------------------------------------

  /**
   * Resolve the mode with the Test command, which both states accept.
   *
   * An `OK` means the interpreter is active. Silence means the bytes went
   * out as payload, so the module is taken to be in passthrough.
   */
  async probe(): Promise<Result<ChannelMode>> {
    const refused = this._refuse();
    if (refused) return refused;
    return this._probe();
  }

  /** Switch the module's interpreter on. */
  enter_command_mode(): Promise<Result<void>> {
    const refused = this._refuse();
    if (refused) return Promise.resolve(refused);
    return this._set_interpreter(true);
  }

  /** Switch the module's interpreter off. */
  enter_passthrough(): Promise<Result<void>> {
    const refused = this._refuse();
    if (refused) return Promise.resolve(refused);
    return this._set_interpreter(false);
  }

  /**
   * Make sure the interpreter is known to be active.
   *
   * Probes an unknown or stale belief first. Does not switch modes: a
   * module in passthrough yields `mode_mismatch`, since entering the
   * interpreter changes what the peer's bytes mean.
   */
  async ensure_command_mode(): Promise<Result<void>> {
    const refused = this._refuse();
    if (refused) return refused;

    const resolved = await this._resolve_mode();
    if (!resolved.ok) return resolved;

    const interrupted = this._refuse();
    if (interrupted) return interrupted;

    if (resolved.value !== 'at_command') {
      return fail({ kind: 'mode_mismatch', required: 'at_command', actual: resolved.value });
    }
    return { ok: true, value: undefined };
  }

  /**
   * Restart the module (Reset or Default restore) and leave it in
   * passthrough.
   *
   * The interpreter flag survives the restart, so the disable step after
   * the module comes back is part of this operation. If that step is not
   * confirmed the module's persisted flag still has the interpreter on and
   * needs outside recovery: that is reported as `restore_failed`.
   *
   * A restart that was not acknowledged still gets the disable step; the
   * result then carries the restart timeout.
   */
  async reset_and_restore_passthrough(kind: RestartKind = 'reset'): Promise<Result<void>> {
    const refused = this._refuse();
    if (refused) return refused;

    const verb = kind === 'reset' ? 'reset' : 'restore_defaults';
    this.restarting = verb;
    try {
      return await this._restart(kind, verb);
    } finally {
      this.restarting = null;
    }
  }

  /**
   * End the session. A restart waiting for the module to settle stops
   * there; later calls fail with a transport failure.
   */
  close(reason: string): void {
    if (this.closed_reason !== null) return;
    this.closed_reason = reason;
    if (this.settle) {
      clearTimeout(this.settle.timer);
      this.settle.resolve();
      this.settle = null;
    }
  }

  // -----------------------------------------------------------------------
  // Private: guards
  // -----------------------------------------------------------------------

  /** Failure for an operation that may not start now, or null. */
  private _refuse(): Result<never> | null {
    if (this.closed_reason !== null) {
      return fail({ kind: 'transport', message: this.closed_reason });
    }
    if (this.restarting !== null) {
      return fail({ kind: 'busy', message: `${this.restarting} in progress` });
    }
    return null;
  }

  // -----------------------------------------------------------------------
  // Private: state machine internals
  // -----------------------------------------------------------------------

  private async _probe(): Promise<Result<ChannelMode>> {
    const reply = await this.dispatcher.execute({ verb: 'test', intent: 'action' }, this.options.probe_timeout_ms);

    if (reply.ok) {
      this._set_mode('at_command');
      return { ok: true, value: 'at_command' };
    }
    if (reply.error.kind === 'timeout') {
      this.options.logger.info(`probe unanswered after ${this.options.probe_timeout_ms}ms, assuming passthrough`);
      this._set_mode('passthrough');
      return { ok: true, value: 'passthrough' };
    }
    return reply;
  }

  private async _restart(kind: RestartKind, verb: 'reset' | 'restore_defaults'): Promise<Result<void>> {
    const resolved = await this._resolve_mode();
    if (!resolved.ok) return resolved;

    if (resolved.value !== 'at_command') {
      const entered = await this._set_interpreter(true);
      if (!entered.ok) return entered;
    }

    this.options.logger.info(`restarting module (${verb})`);
    const restart = await this.dispatcher.execute({ verb, intent: 'action' }, this.options.command_timeout_ms);

    if (!restart.ok && restart.error.kind !== 'timeout') {
      return restart;
    }
    if (!restart.ok) {
      this.options.logger.warn(`${verb} not acknowledged, restoring passthrough anyway`);
    }

    await this._settle();
    if (this.closed_reason !== null) {
      this.options.logger.warn(`${verb} abandoned: ${this.closed_reason}`);
      return fail({ kind: 'transport', message: this.closed_reason });
    }

    if (restart.ok) {
      this.store.mark_restarted(kind);
      if (this.options.on_restarted) {
        try {
          await this.options.on_restarted(kind);
        } catch (err) {
          this.options.logger.error(
            `post-restart hook failed: ${err instanceof Error ? err.message : String(err)}`
          );
        }
      }
      if (this.closed_reason !== null) {
        return fail({ kind: 'transport', message: this.closed_reason });
      }
    }

    const restore = await this.dispatcher.execute(
      { verb: 'interpreter', intent: 'set', param: INTERPRETER_OFF },
      this.options.command_timeout_ms
    );

    if (!restore.ok && this.closed_reason !== null) {
      return restore;
    }
    if (!restore.ok || restore.value.value !== INTERPRETER_OFF) {
      const detail = restore.ok
        ? `module answered +ENAT=${restore.value.value ?? ''}`
        : `no confirmation within ${this.options.command_timeout_ms}ms`;
      const message =
        `interpreter still enabled after ${verb} (${detail}); ` +
        'passthrough writes will be parsed as commands until the flag is cleared';
      this.options.logger.error(message);
      this.store.update({ channel_mode: 'at_command', mode_stale: true });
      return fail({ kind: 'restore_failed', severity: 'critical', message });
    }

    this._set_mode('passthrough');
    if (!restart.ok) return restart;
    return { ok: true, value: undefined };
  }

  /** Wait for the module to come back up; cut short by close(). */
  private _settle(): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.settle = null;
        resolve();
      }, this.options.restart_settle_ms);
      this.settle = { timer, resolve: () => resolve() };
    });
  }

  /** Probe when the belief is unknown or stale; otherwise trust it. */
  private async _resolve_mode(): Promise<Result<ChannelMode>> {
    const s = this.store.get_snapshot();
    if (s.channel_mode === 'unknown' || s.mode_stale) {
      return this._probe();
    }
    return { ok: true, value: s.channel_mode };
  }

  /** Send the interpreter flag and update the belief only on confirmation. */
  private async _set_interpreter(enable: boolean): Promise<Result<void>> {
    const target: ChannelMode = enable ? 'at_command' : 'passthrough';
    const param = enable ? INTERPRETER_ON : INTERPRETER_OFF;

    const s = this.store.get_snapshot();
    if (s.mode_stale) {
      const probed = await this._probe();
      if (!probed.ok) return probed;
      if (probed.value === target) return { ok: true, value: undefined };
    } else if (s.channel_mode === target) {
      this.options.logger.debug(`already in ${target}`);
      return { ok: true, value: undefined };
    }

    const previous = this.get_mode();
    const reply = await this.dispatcher.execute(
      { verb: 'interpreter', intent: 'set', param },
      this.options.command_timeout_ms
    );

    if (!reply.ok) {
      if (reply.error.kind !== 'timeout') return reply;
      this.mark_stale(`no confirmation for interpreter=${param}`);
      return fail({
        kind: 'desync',
        message: `switch to ${target} not confirmed within ${reply.error.timeout_ms}ms; still treating module as ${previous}`
      });
    }

    if (reply.value.value !== param) {
      this.mark_stale(`interpreter reply ${reply.value.value ?? ''} does not match ${param}`);
      return fail({ kind: 'reply_mismatch', verb: 'interpreter', expected: param, received: reply.value.value });
    }

    this._set_mode(target);
    return { ok: true, value: undefined };
  }

  private _set_mode(mode: ChannelMode): void {
    const previous = this.get_mode();
    this.store.update({ channel_mode: mode, mode_stale: false });
    if (previous !== mode) {
      this.options.logger.info(`channel mode ${previous} -> ${mode}`);
      this.emit('mode_change', mode);
    }
  }
}
