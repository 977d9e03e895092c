/**
 * Command and configuration driver for BLE-UART modules that multiplex an
 * AT-command interpreter with a transparent payload channel.
 *
 * @module index
 */

import { ModuleDriver } from './driver/module_driver';
import { SerialTransport } from './transport/serial_transport';
import { resolve_driver_options, type DriverOptions } from './config/driver_options';
import { describe_failure } from './protocol/types';

export { ModuleDriver } from './driver/module_driver';
export { ChannelReader } from './driver/channel_reader';
export { CommandDispatcher } from './command/dispatcher';
export type { DispatchPhase, ReplyLine } from './command/dispatcher';
export { ModeController } from './command/mode_controller';
export { ConfigRegistry } from './config/config_registry';
export type { SetOutcome, SettingInfo } from './config/config_registry';
export {
  SETTINGS,
  SETTING_NAMES,
  BAUD_RATES,
  MAX_NAME_LENGTH,
  StopBits,
  Parity,
  DeviceType,
  baud_index_for
} from './config/settings';
export type { SettingName, SettingValueMap, SettingDefinition } from './config/settings';
export { DEFAULT_DRIVER_OPTIONS, resolve_driver_options } from './config/driver_options';
export type { DriverOptions } from './config/driver_options';
export { ModuleStateStore, INITIAL_MODULE_STATE } from './store/module_state';
export type { RestartKind } from './store/module_state';
export { ConnectionTracker } from './store/connection_tracker';
export type { ConnectionChange, ConnectionSnapshot } from './store/connection_tracker';
export { build_command, encode_command, decode_lines, empty_line_buffer, is_verb } from './protocol/line_codec';
export type { LineBuffer, DecodeResult } from './protocol/line_codec';
export { classify_line, format_peer_address } from './protocol/classifier';
export type { AwaitedReply, ClassifierContext } from './protocol/classifier';
export { format_hex_ascii, parse_hex } from './protocol/hex_dump';
export { describe_failure } from './protocol/types';
export type {
  Verb,
  Command,
  CommandIntent,
  CommandReply,
  ClassifiedLine,
  UnsolicitedEvent,
  ChannelMode,
  ConnectionState,
  ModuleState,
  DriverFailure,
  Result
} from './protocol/types';
export { SerialTransport, DEFAULT_BAUD_RATE } from './transport/serial_transport';
export { scan_ports } from './transport/port_scanner';
export type { PortInfo, ScanOptions } from './transport/port_scanner';
export type { ByteTransport, TransportEvents } from './transport/types';
export { create_logger } from './util/logger';
export type { Logger, LogLevel } from './util/logger';

export interface SerialDriverOptions extends Partial<DriverOptions> {
  /** Host line rate. Defaults to the module's factory rate. */
  baud?: number;
}

/**
 * Open a serial port and start a driver on it.
 *
 * The returned driver has already probed the channel mode.
 *
 * @throws If the port cannot be opened or the session cannot start.
 */
export async function open_serial_driver(path: string, options: SerialDriverOptions = {}): Promise<ModuleDriver> {
  const { baud, ...overrides } = options;
  const driver_options = resolve_driver_options(overrides);
  const transport = new SerialTransport();
  await transport.connect(path, baud);

  const driver = new ModuleDriver(transport, driver_options);
  const started = await driver.start();
  if (!started.ok) {
    driver.close();
    throw new Error(`open_serial_driver: ${describe_failure(started.error)}`);
  }
  return driver;
}
