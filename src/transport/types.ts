/**
 * Duplex byte channel the driver is handed.
 *
 * The driver never opens, pairs or discovers anything itself: it receives a
 * channel that is already open and only needs to write bytes, read bytes
 * and hear about the channel closing.
 *
 * @module transport/types
 */

/**
 * Events a {@link ByteTransport} emits.
 *
 * - `'data'`  -- Raw inbound bytes, in arrival order.
 * - `'error'` -- Channel-level error. The channel may still be open.
 * - `'close'` -- The channel closed (unplugged, link lost).
 */
export interface TransportEvents {
  data: (chunk: Uint8Array) => void;
  error: (err: Error) => void;
  close: () => void;
}

export interface ByteTransport {
  /**
   * Write raw bytes.
   *
   * @throws If the channel is not open.
   */
  send(data: Uint8Array): void;

  is_connected(): boolean;

  on<E extends keyof TransportEvents>(event: E, listener: TransportEvents[E]): this;
  off<E extends keyof TransportEvents>(event: E, listener: TransportEvents[E]): this;

  /** Release the channel. The owning driver calls this when it closes. */
  disconnect?(): void;

  /** Change the host-side line rate. Only meaningful for UART links. */
  update_baud_rate?(baud: number): Promise<void>;
}
