/**
 * Configuration registry.
 *
 * Maps semantic settings onto query / set commands. Values are validated
 * against their closed domain before a command is built, so a bad value
 * never reaches the transport. Settings that need a restart are recorded as
 * pending and flagged on the module state; a completed restart makes them
 * active.
 *
 * @module config/config_registry
 */

import type { CommandDispatcher } from '../command/dispatcher';
import type { ModeController } from '../command/mode_controller';
import type { ModuleStateStore, RestartKind } from '../store/module_state';
import { fail, type Result, type Verb } from '../protocol/types';
import { DEFAULT_COMMAND_TIMEOUT_MS } from '../protocol/constants';
import { SETTINGS, type SettingName, type SettingValueMap } from './settings';
import { create_logger, type Logger } from '../util/logger';

/** Outcome of a successful {@link ConfigRegistry.set}. */
export interface SetOutcome {
  /** The new value is stored but inactive until the module restarts. */
  pending_restart: boolean;
}

/** Static facts about a setting. */
export interface SettingInfo {
  name: SettingName;
  verb: Verb;
  writable: boolean;
  requires_restart: boolean;
}

export interface ConfigRegistryOptions {
  command_timeout_ms: number;
  logger: Logger;
}

export class ConfigRegistry {
  private dispatcher: CommandDispatcher;
  private mode: ModeController;
  private store: ModuleStateStore;
  private options: ConfigRegistryOptions;
  private active: Partial<SettingValueMap> = {};
  private pending: Partial<SettingValueMap> = {};

  constructor(
    dispatcher: CommandDispatcher,
    mode: ModeController,
    store: ModuleStateStore,
    options: Partial<ConfigRegistryOptions> = {}
  ) {
    this.dispatcher = dispatcher;
    this.mode = mode;
    this.store = store;
    this.options = {
      command_timeout_ms: options.command_timeout_ms ?? DEFAULT_COMMAND_TIMEOUT_MS,
      logger: options.logger ?? create_logger('CONFIG')
    };
    store.on_restart((kind) => this._on_restart(kind));
  }

  /** Verb, writability and restart behaviour of a setting. */
  describe(name: SettingName): SettingInfo {
    const def = SETTINGS[name];
    return { name, verb: def.verb, writable: def.writable, requires_restart: def.requires_restart };
  }

  /** Last value known to be active on the module, if any. */
  cached<K extends SettingName>(name: K): SettingValueMap[K] | undefined {
    return this.active[name];
  }

  /** Value written but not yet active (waiting for a restart), if any. */
  pending_value<K extends SettingName>(name: K): SettingValueMap[K] | undefined {
    return this.pending[name];
  }

  /**
   * Query a setting from the module.
   *
   * Resolves the channel mode first; fails with `mode_mismatch` when the
   * module is in passthrough.
   */
  async get<K extends SettingName>(name: K): Promise<Result<SettingValueMap[K]>> {
    const def = SETTINGS[name];

    const ready = await this.mode.ensure_command_mode();
    if (!ready.ok) return ready;

    const reply = await this.dispatcher.execute({ verb: def.verb, intent: 'query' }, this.options.command_timeout_ms);
    if (!reply.ok) return reply;

    const raw = reply.value.value ?? '';
    const value = def.decode(raw);
    if (value === null) {
      return fail({ kind: 'reply_mismatch', verb: def.verb, expected: `a valid ${name} value`, received: raw });
    }

    this.active[name] = value;
    if (name === 'low_power' && typeof value === 'boolean') {
      this.store.update({ low_power: value });
    }
    return { ok: true, value };
  }

  /**
   * Write a setting.
   *
   * The value is validated before anything is sent. For settings that need
   * a restart, success means the module stored the value, not that it is
   * in effect: `pending_restart` is raised until the next restart.
   */
  async set<K extends SettingName>(name: K, value: SettingValueMap[K]): Promise<Result<SetOutcome>> {
    const def = SETTINGS[name];

    if (!def.writable) {
      return fail({ kind: 'validation', message: `${name} is read-only` });
    }
    const encoded = def.encode(value);
    if (!encoded.ok) {
      return fail({ kind: 'validation', message: `${name}: ${encoded.error}` });
    }

    const ready = await this.mode.ensure_command_mode();
    if (!ready.ok) return ready;

    const reply = await this.dispatcher.execute(
      { verb: def.verb, intent: 'set', param: encoded.value },
      this.options.command_timeout_ms
    );
    if (!reply.ok) return reply;

    const echoed = reply.value.value;
    if (echoed === null || echoed.trim().toUpperCase() !== encoded.value.toUpperCase()) {
      return fail({ kind: 'reply_mismatch', verb: def.verb, expected: encoded.value, received: echoed });
    }

    if (def.requires_restart) {
      this.pending[name] = value;
      this.store.update({ pending_restart: true });
      this.options.logger.info(`${name} stored, takes effect after restart`);
    } else {
      this.active[name] = value;
    }
    return { ok: true, value: { pending_restart: def.requires_restart } };
  }

  private _on_restart(kind: RestartKind): void {
    if (kind === 'defaults') {
      this.active = {};
      this.pending = {};
      this.store.update({ low_power: false });
      return;
    }

    this.active = { ...this.active, ...this.pending };
    this.pending = {};
    if (this.active.low_power !== undefined) {
      this.store.update({ low_power: this.active.low_power });
    }
  }
}
