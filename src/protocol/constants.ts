/**
 * Protocol constants for the BLE-UART AT-command module.
 *
 * Wire tokens, the closed verb table, reply patterns and default timeouts.
 *
 * @module protocol/constants
 */

// ---------------------------------------------------------------------------
// Framing
// ---------------------------------------------------------------------------

/** Carriage return (first byte of the line terminator). */
export const CR = 0x0d;

/** Line feed (second byte of the line terminator). */
export const LF = 0x0a;

/** Line terminator as text. */
export const LINE_TERMINATOR = '\r\n';

/** Prefix of every command sent to the module. */
export const COMMAND_PREFIX = 'AT';

/** Plain acknowledgement line (reply to Test, Reset and Default). */
export const OK_TOKEN = 'OK';

/** Unsolicited link-connected notification token. */
export const CONNECT_TOKEN = 'OK+CONN';

// ---------------------------------------------------------------------------
// Verbs
// ---------------------------------------------------------------------------

/**
 * Closed verb table: semantic verb name -> wire token.
 *
 * `test` has an empty token and goes out as the bare `AT` line.
 */
export const VERB_TOKENS = {
  test: '',
  version: 'VERSION',
  address: 'LADDR',
  name: 'NAME',
  name_suffix: 'NAMAC',
  baud: 'BAUD',
  stop_bits: 'STOP',
  parity: 'PARI',
  notify_enable: 'NOTI',
  notify_address: 'NOTP',
  service_uuid: 'UUID',
  characteristic_uuid: 'CHAR',
  write_uuid: 'WCHAR',
  low_power: 'PWRM',
  adv_interval: 'ADVI',
  tx_power: 'POWE',
  interpreter: 'ENAT',
  device_type: 'ROLE',
  pin: 'PIN',
  reset: 'RESET',
  restore_defaults: 'DEFAULT'
} as const;

/** Verbs whose execution restarts the module. */
export const RESTART_VERBS = ['reset', 'restore_defaults'] as const;

/** Interpreter flag values carried by the `interpreter` verb. */
export const INTERPRETER_ON = '1';
export const INTERPRETER_OFF = '0';

// ---------------------------------------------------------------------------
// Reply patterns
// ---------------------------------------------------------------------------

/** `+<TOKEN>=<VALUE>` success reply. */
export const SUCCESS_PATTERN = /^\+([A-Z]+)=(.*)$/;

/** `OK+CONN` optionally followed by a 12-digit hex peer address. */
export const CONNECT_PATTERN = /^OK\+CONN([0-9A-Fa-f]{12})?$/;

// ---------------------------------------------------------------------------
// Timing defaults (milliseconds)
// ---------------------------------------------------------------------------

/** Deadline for an ordinary command reply. */
export const DEFAULT_COMMAND_TIMEOUT_MS = 1000;

/** Deadline for the mode probe (Test command). */
export const DEFAULT_PROBE_TIMEOUT_MS = 500;

/** Time the module needs to come back up after Reset or Default. */
export const DEFAULT_RESTART_SETTLE_MS = 1500;

/** How long a set reply waits for its trailing OK line. */
export const DEFAULT_TRAILING_OK_GRACE_MS = 50;

/** Longest incomplete line kept between reads before it is dropped. */
export const DEFAULT_MAX_LINE_LENGTH = 512;
