/**
 * Serial port scanner.
 *
 * Lists serial ports through the `serialport` package so a caller can pick
 * the adapter the module is wired to.
 *
 * @module transport/port_scanner
 */

import { SerialPort } from 'serialport';
import { create_logger } from '../util/logger';

const log = create_logger('SCAN');

/** Metadata for a single serial port. */
export interface PortInfo {
  /** OS device path (e.g., COM3 on Windows, /dev/ttyUSB0 on Linux). */
  path: string;
  /** USB vendor id, lower-case hex (e.g., "1a86"). */
  vid?: string;
  /** USB product id, lower-case hex. */
  pid?: string;
  manufacturer?: string;
  /** Manufacturer and path, for display. */
  label: string;
}

export interface ScanOptions {
  /** Only return ports whose USB vendor id is in this list (case-insensitive). */
  vendor_ids?: readonly string[];
}

/**
 * List available serial ports.
 *
 * Enumeration failures (e.g., missing permissions) are logged and yield an
 * empty list.
 */
export async function scan_ports(options: ScanOptions = {}): Promise<PortInfo[]> {
  let raw_ports: Awaited<ReturnType<typeof SerialPort.list>>;
  try {
    raw_ports = await SerialPort.list();
  } catch (err) {
    log.warn(`port enumeration failed: ${err instanceof Error ? err.message : String(err)}`);
    return [];
  }

  const wanted = options.vendor_ids?.map((id) => id.toLowerCase());

  const ports: PortInfo[] = raw_ports.map((p) => {
    const vid = p.vendorId?.toLowerCase();
    const pid = p.productId?.toLowerCase();
    const manufacturer = p.manufacturer;
    return {
      path: p.path,
      vid,
      pid,
      manufacturer,
      label: manufacturer ? `${manufacturer} - ${p.path}` : p.path
    };
  });

  if (!wanted || wanted.length === 0) return ports;
  return ports.filter((p) => p.vid !== undefined && wanted.includes(p.vid));
}
