/**
 * UART connection to the module over a USB serial adapter.
 *
 * Bytes are passed through untouched in both directions: line framing is
 * the driver's job, since the same stream also carries raw payload.
 *
 * @module transport/serial_transport
 */

import { SerialPort } from 'serialport';
import { EventEmitter } from 'events';
import type { ByteTransport } from './types';

/** Factory line rate of the module. */
export const DEFAULT_BAUD_RATE = 9600;

/**
 * Manages the serial port the module's UART is wired to.
 *
 * Usage:
 * ```ts
 * const link = new SerialTransport();
 * link.on('data', (chunk) => { ... });
 * await link.connect('/dev/ttyUSB0');
 * link.send(new Uint8Array([0x41, 0x54, 0x0d, 0x0a]));
 * link.disconnect();
 * ```
 */
export class SerialTransport extends EventEmitter implements ByteTransport {
  private port: SerialPort | null = null;

  /**
   * Open the serial port.
   *
   * @param path - OS serial port path (e.g., "COM3" or "/dev/ttyUSB0").
   * @param baud - Line rate. Defaults to the module's factory rate.
   * @throws If already connected, or if the open fails.
   */
  async connect(path: string, baud: number = DEFAULT_BAUD_RATE): Promise<void> {
    if (this.port) {
      throw new Error('SerialTransport: already connected, call disconnect() first');
    }

    return new Promise<void>((resolve, reject) => {
      try {
        const port = new SerialPort({ path, baudRate: baud, autoOpen: false });

        port.on('data', (buf: Buffer) => {
          this.emit('data', new Uint8Array(buf));
        });
        port.on('error', (err: Error) => {
          this.emit('error', err);
        });
        port.on('close', () => {
          // A close from a port we already replaced must not end the new session.
          if (this.port === port) {
            this.port = null;
            this.emit('close');
          }
        });

        port.open((err) => {
          if (err) {
            port.removeAllListeners();
            this.port = null;
            reject(new Error(`SerialTransport: failed to open ${path}: ${err.message}`));
            return;
          }
          this.port = port;
          resolve();
        });
      } catch (err) {
        reject(
          new Error(
            `SerialTransport: failed to create serial port: ${err instanceof Error ? err.message : String(err)}`
          )
        );
      }
    });
  }

  /**
   * Close the serial port. Emits `'close'` once, if a port was open.
   * Safe to call when already disconnected.
   */
  disconnect(): void {
    if (!this.port) {
      return;
    }

    const old_port = this.port;
    this.port = null;
    old_port.removeAllListeners();

    try {
      if (old_port.isOpen) {
        old_port.close();
      }
    } catch (err) {
      this.emit(
        'error',
        new Error(`SerialTransport: error during disconnect: ${err instanceof Error ? err.message : String(err)}`)
      );
    }
    this.emit('close');
  }

  /**
   * Write raw bytes.
   *
   * @throws If not connected.
   */
  send(data: Uint8Array): void {
    if (!this.port || !this.port.isOpen) {
      throw new Error('SerialTransport: not connected');
    }

    this.port.write(Buffer.from(data), (err) => {
      if (err) {
        this.emit('error', new Error(`SerialTransport: write failed: ${err.message}`));
      }
    });
  }

  /**
   * Follow a line-rate change on the module side.
   *
   * @throws If not connected, or if the port rejects the rate.
   */
  async update_baud_rate(baud: number): Promise<void> {
    const port = this.port;
    if (!port || !port.isOpen) {
      throw new Error('SerialTransport: not connected');
    }

    return new Promise<void>((resolve, reject) => {
      port.update({ baudRate: baud }, (err) => {
        if (err) {
          reject(new Error(`SerialTransport: failed to set baud ${baud}: ${err.message}`));
          return;
        }
        resolve();
      });
    });
  }

  is_connected(): boolean {
    return this.port !== null && this.port.isOpen;
  }
}
