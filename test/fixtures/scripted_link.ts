/**
 * Dispatcher wired to a scripted responder, for component tests that sit
 * above the dispatcher (mode controller, configuration registry).
 *
 * Each written command line is looked up in the script; the reply lines
 * are classified as interpreter output and fed back on a microtask, the
 * way a serial read would arrive after the write returns.
 *
 * @module test/fixtures/scripted_link
 */

import { CommandDispatcher } from '../../src/command/dispatcher';
import { classify_line } from '../../src/protocol/classifier';
import { ModuleStateStore } from '../../src/store/module_state';
import { create_logger, type Logger } from '../../src/util/logger';

/** Command line (without CR LF) -> reply lines. Missing entries stay silent. */
export type ReplyScript = Record<string, string[]>;

export interface ScriptedLink {
  dispatcher: CommandDispatcher;
  store: ModuleStateStore;
  /** Command lines written, in order, without CR LF. */
  sent: string[];
  /** Replace the script mid-test. */
  set_script: (script: ReplyScript) => void;
}

export const SILENT_LOGGER: Logger = create_logger('TEST', 'silent');

export function create_scripted_link(script: ReplyScript = {}): ScriptedLink {
  const sent: string[] = [];
  const store = new ModuleStateStore();
  let current = script;

  const dispatcher: CommandDispatcher = new CommandDispatcher(
    {
      send: (data) => {
        const line = Buffer.from(data).toString('latin1').replace(/\r\n$/, '');
        sent.push(line);
        const replies = current[line] ?? [];
        queueMicrotask(() => {
          for (const reply of replies) {
            const classified = classify_line(reply, {
              channel_mode: 'at_command',
              outstanding: dispatcher.awaited_reply()
            });
            if (classified.kind !== 'unsolicited' && classified.kind !== 'passthrough') {
              dispatcher.on_reply(classified);
            }
          }
        });
      }
    },
    { default_timeout_ms: 1000, trailing_ok_grace_ms: 50, logger: SILENT_LOGGER }
  );

  return {
    dispatcher,
    store,
    sent,
    set_script: (next) => {
      current = next;
    }
  };
}
