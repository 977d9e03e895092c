/**
 * Settings table: semantic module settings, their verbs, value domains and
 * restart behaviour.
 *
 * Each entry encodes a typed value into the exact parameter text sent on
 * the wire, rejecting anything outside the documented domain, and decodes
 * the value text of a `+VERB=VALUE` reply.
 *
 * Only `notify_enable` and `notify_address` take effect without a restart.
 *
 * @module config/settings
 */

import type { Result, Verb } from '../protocol/types';

// ---------------------------------------------------------------------------
// Value domains
// ---------------------------------------------------------------------------

/** Baud index -> line rate. */
export const BAUD_RATES: Readonly<Record<number, number>> = {
  1: 2400,
  2: 4800,
  3: 9600,
  4: 19200,
  5: 38400,
  6: 57600,
  7: 115200
};

/** Baud index a defaults restore puts the module back to (9600). */
export const FACTORY_BAUD_INDEX = 3;

export enum StopBits {
  One = 0,
  Two = 1
}

export enum Parity {
  None = 0,
  Odd = 1,
  Even = 2
}

export enum DeviceType {
  Peripheral = 0,
  Central = 1,
  Beacon = 2
}

/** Longest advertised name the module stores. */
export const MAX_NAME_LENGTH = 18;

// ---------------------------------------------------------------------------
// Setting table
// ---------------------------------------------------------------------------

/** Value type of every setting. */
export interface SettingValueMap {
  version: string;
  address: string;
  name: string;
  name_suffix: boolean;
  baud: number;
  stop_bits: number;
  parity: number;
  notify_enable: boolean;
  notify_address: boolean;
  service_uuid: string;
  characteristic_uuid: string;
  write_uuid: string;
  low_power: boolean;
  adv_interval: number;
  tx_power: number;
  device_type: number;
  pin: string;
}

export type SettingName = keyof SettingValueMap;

export interface SettingDefinition<T> {
  verb: Verb;
  /** False for read-only properties (version, address). */
  writable: boolean;
  /** Takes effect only after the module restarts. */
  requires_restart: boolean;
  /** Value -> wire parameter, or an error message for out-of-domain input. */
  encode: (value: T) => Result<string, string>;
  /** Reply value text -> value, or null when it cannot be read. */
  decode: (raw: string) => T | null;
}

type SettingTable = { [K in SettingName]: SettingDefinition<SettingValueMap[K]> };

// ---------------------------------------------------------------------------
// Codec helpers
// ---------------------------------------------------------------------------

function read_only(): Result<string, string> {
  return { ok: false, error: 'setting is read-only' };
}

/** Integer domain [min, max] sent as a decimal digit string. */
function int_codec(min: number, max: number): Pick<SettingDefinition<number>, 'encode' | 'decode'> {
  return {
    encode: (value) =>
      Number.isInteger(value) && value >= min && value <= max
        ? { ok: true, value: String(value) }
        : { ok: false, error: `${value} is outside ${min}-${max}` },
    decode: (raw) => {
      if (!/^\d+$/.test(raw.trim())) return null;
      const value = parseInt(raw.trim(), 10);
      return value >= min && value <= max ? value : null;
    }
  };
}

const flag_codec: Pick<SettingDefinition<boolean>, 'encode' | 'decode'> = {
  encode: (value) => ({ ok: true, value: value ? '1' : '0' }),
  decode: (raw) => {
    const v = raw.trim();
    if (v === '1') return true;
    if (v === '0') return false;
    return null;
  }
};

/** 16-bit UUID as four hex digits, normalised to upper case. */
const uuid16_codec: Pick<SettingDefinition<string>, 'encode' | 'decode'> = {
  encode: (value) =>
    /^[0-9A-Fa-f]{4}$/.test(value)
      ? { ok: true, value: value.toUpperCase() }
      : { ok: false, error: `"${value}" is not a 16-bit UUID (4 hex digits)` },
  decode: (raw) => {
    const v = raw.trim().replace(/^0x/i, '');
    return /^[0-9A-Fa-f]{4}$/.test(v) ? v.toUpperCase() : null;
  }
};

const text_decode = (raw: string): string => raw.trim();

// ---------------------------------------------------------------------------
// The table
// ---------------------------------------------------------------------------

export const SETTINGS: SettingTable = {
  version: { verb: 'version', writable: false, requires_restart: false, encode: read_only, decode: text_decode },
  address: {
    verb: 'address',
    writable: false,
    requires_restart: false,
    encode: read_only,
    decode: (raw) => {
      const v = raw.trim().replace(/:/g, '');
      return /^[0-9A-Fa-f]{12}$/.test(v) ? v.toUpperCase() : null;
    }
  },
  name: {
    verb: 'name',
    writable: true,
    requires_restart: true,
    encode: (value) => {
      if (value.length < 1 || value.length > MAX_NAME_LENGTH) {
        return { ok: false, error: `name must be 1-${MAX_NAME_LENGTH} characters, got ${value.length}` };
      }
      if (!/^[\x21-\x7e]+$/.test(value) || value.includes('=')) {
        return { ok: false, error: 'name must be printable ASCII without spaces or "="' };
      }
      return { ok: true, value };
    },
    decode: text_decode
  },
  name_suffix: { verb: 'name_suffix', writable: true, requires_restart: true, ...flag_codec },
  baud: { verb: 'baud', writable: true, requires_restart: true, ...int_codec(1, 7) },
  stop_bits: { verb: 'stop_bits', writable: true, requires_restart: true, ...int_codec(StopBits.One, StopBits.Two) },
  parity: { verb: 'parity', writable: true, requires_restart: true, ...int_codec(Parity.None, Parity.Even) },
  notify_enable: { verb: 'notify_enable', writable: true, requires_restart: false, ...flag_codec },
  notify_address: { verb: 'notify_address', writable: true, requires_restart: false, ...flag_codec },
  service_uuid: { verb: 'service_uuid', writable: true, requires_restart: true, ...uuid16_codec },
  characteristic_uuid: { verb: 'characteristic_uuid', writable: true, requires_restart: true, ...uuid16_codec },
  write_uuid: { verb: 'write_uuid', writable: true, requires_restart: true, ...uuid16_codec },
  low_power: { verb: 'low_power', writable: true, requires_restart: true, ...flag_codec },
  adv_interval: {
    verb: 'adv_interval',
    writable: true,
    requires_restart: true,
    encode: (value) =>
      Number.isInteger(value) && value >= 0x0 && value <= 0xf
        ? { ok: true, value: value.toString(16).toUpperCase() }
        : { ok: false, error: `${value} is outside 0x0-0xF` },
    decode: (raw) => (/^[0-9A-Fa-f]$/.test(raw.trim()) ? parseInt(raw.trim(), 16) : null)
  },
  tx_power: { verb: 'tx_power', writable: true, requires_restart: true, ...int_codec(0, 3) },
  device_type: {
    verb: 'device_type',
    writable: true,
    requires_restart: true,
    ...int_codec(DeviceType.Peripheral, DeviceType.Beacon)
  },
  pin: {
    verb: 'pin',
    writable: true,
    requires_restart: true,
    encode: (value) =>
      /^\d{6}$/.test(value) ? { ok: true, value } : { ok: false, error: 'pin must be exactly 6 digits' },
    decode: (raw) => (/^\d{6}$/.test(raw.trim()) ? raw.trim() : null)
  }
};

/** All setting names, in table order. */
export const SETTING_NAMES: readonly SettingName[] = [
  'version',
  'address',
  'name',
  'name_suffix',
  'baud',
  'stop_bits',
  'parity',
  'notify_enable',
  'notify_address',
  'service_uuid',
  'characteristic_uuid',
  'write_uuid',
  'low_power',
  'adv_interval',
  'tx_power',
  'device_type',
  'pin'
];

/**
 * Baud index for a line rate.
 *
 * @returns The index (1-7), or null if the module does not support the rate.
 */
export function baud_index_for(rate: number): number | null {
  for (const [index, value] of Object.entries(BAUD_RATES)) {
    if (value === rate) return Number(index);
  }
  return null;
}
