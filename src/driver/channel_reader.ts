/**
 * Inbound channel reader.
 *
 * Sole consumer of the transport's inbound bytes. Each chunk is split into
 * lines, each line is classified against the mode belief and outstanding
 * verb at the moment it is processed, and delivered to exactly one
 * destination in arrival order:
 *
 *   success / plain_ok / echo / unrecognized --> dispatcher
 *   unsolicited                              --> connection tracker
 *   passthrough                              --> payload consumer
 *
 * While the channel is (or may be) a transparent pipe and no command is
 * outstanding, an incomplete trailing line is handed over as payload at
 * once instead of being held back waiting for a terminator.
 */

import { decode_lines, empty_line_buffer, type LineBuffer } from '../protocol/line_codec';
import { classify_line, type ClassifierContext } from '../protocol/classifier';
import { format_hex_ascii } from '../protocol/hex_dump';
import type { UnsolicitedEvent } from '../protocol/types';
import type { ReplyLine } from '../command/dispatcher';
import { DEFAULT_MAX_LINE_LENGTH } from '../protocol/constants';
import { create_logger, type Logger } from '../util/logger';

export interface ChannelReaderTargets {
  /** Current mode belief and outstanding verb. */
  context: () => ClassifierContext;
  on_reply: (reply: ReplyLine) => void;
  on_unsolicited: (event: UnsolicitedEvent) => void;
  on_passthrough: (bytes: Uint8Array) => void;
}

export interface ChannelReaderOptions {
  max_line_length: number;
  logger: Logger;
}

export class ChannelReader {
  private buffer: LineBuffer = empty_line_buffer();
  private targets: ChannelReaderTargets;
  private options: ChannelReaderOptions;

  constructor(targets: ChannelReaderTargets, options: Partial<ChannelReaderOptions> = {}) {
    this.targets = targets;
    this.options = {
      max_line_length: options.max_line_length ?? DEFAULT_MAX_LINE_LENGTH,
      logger: options.logger ?? create_logger('RX')
    };
  }

  /** Process one chunk from the transport. */
  push(chunk: Uint8Array): void {
    if (chunk.length === 0) return;
    this.options.logger.debug(`RX ${format_hex_ascii(chunk)}`);

    const decoded = decode_lines(this.buffer, chunk, this.options.max_line_length);
    this.buffer = decoded.buffer;
    if (decoded.overflow) {
      this.options.logger.warn(`line longer than ${this.options.max_line_length} bytes discarded`);
    }

    for (const line of decoded.lines) {
      this._route(line);
    }

    const context = this.targets.context();
    if (context.outstanding === null && context.channel_mode !== 'at_command' && this.buffer.pending.length > 0) {
      const tail = this.buffer.pending;
      this.buffer = empty_line_buffer();
      this.targets.on_passthrough(tail);
    }
  }

  /** Drop any buffered partial line (session ended). */
  reset(): void {
    this.buffer = empty_line_buffer();
  }

  private _route(line: string): void {
    const classified = classify_line(line, this.targets.context());

    switch (classified.kind) {
      case 'unrecognized':
        // Blank lines carry nothing for the interpreter.
        if (line !== '') this.targets.on_reply(classified);
        return;
      case 'unsolicited':
        this.targets.on_unsolicited(classified.event);
        return;
      case 'passthrough':
        this.targets.on_passthrough(classified.bytes);
        return;
      default:
        this.targets.on_reply(classified);
        return;
    }
  }
}
