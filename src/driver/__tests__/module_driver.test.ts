/**
 * Tests for the driver facade against the in-process fake module.
 *
 * Covers session start, the generic execute path and its refusals,
 * passthrough writes and reads, link notifications, desync handling,
 * transport loss, close, following a baud change across a restart, and
 * the restart's exclusive hold on the module.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ModuleDriver } from '../module_driver';
import type { ConnectionChange } from '../../store/connection_tracker';
import { FakeModule, type FakeModuleOptions } from '../../../test/fixtures/fake_module';

function text(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('latin1');
}

function make_driver(options: FakeModuleOptions = {}): { module: FakeModule; driver: ModuleDriver } {
  const module = new FakeModule(options);
  const driver = new ModuleDriver(module, {
    command_timeout_ms: 1000,
    probe_timeout_ms: 500,
    restart_settle_ms: 1500,
    log_level: 'silent'
  });
  return { module, driver };
}

/** Driver started against a module whose interpreter is already on. */
async function started_in_command_mode(options: FakeModuleOptions = {}) {
  const pair = make_driver({ ...options, interpreter: true });
  const started = await pair.driver.start();
  expect(started).toEqual({ ok: true, value: 'at_command' });
  return pair;
}

/** Driver started against a module in passthrough. */
async function started_in_passthrough() {
  const pair = make_driver({ interpreter: false });
  const pending = pair.driver.start();
  await vi.advanceTimersByTimeAsync(500);
  expect(await pending).toEqual({ ok: true, value: 'passthrough' });
  return pair;
}

describe('ModuleDriver', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  // --- Session start ----------------------------------------------------------

  it('starts with an unknown mode and resolves it with a probe', async () => {
    const { module, driver } = make_driver({ interpreter: true });
    expect(driver.state().channel_mode).toBe('unknown');

    await driver.start();

    expect(module.commands).toEqual(['AT']);
    expect(driver.state().channel_mode).toBe('at_command');
    expect(driver.connection.current().state).toBe('advertising');
  });

  it('falls back to passthrough when the probe is swallowed as payload', async () => {
    const { module, driver } = await started_in_passthrough();

    expect(driver.state().channel_mode).toBe('passthrough');
    expect(module.payload_text()).toBe('AT\r\n');
  });

  it('refuses to start on a closed channel', async () => {
    const { module, driver } = make_driver();
    module.connected = false;

    expect(await driver.start()).toEqual({
      ok: false,
      error: { kind: 'transport', message: 'transport is not connected' }
    });
  });

  it('rejects invalid options at construction', () => {
    expect(() => new ModuleDriver(new FakeModule(), { command_timeout_ms: -5 })).toThrow(
      'DriverOptions: command_timeout_ms must be a non-negative integer, got -5'
    );
  });

  // --- execute ----------------------------------------------------------------

  it('queries by verb name', async () => {
    const { driver } = await started_in_command_mode();

    expect(await driver.execute('version')).toEqual({
      ok: true,
      value: { verb: 'version', value: 'BT24-V2.1', lines: ['+VERSION=BT24-V2.1'] }
    });
  });

  it('sets by verb name when a parameter is given', async () => {
    const { module, driver } = await started_in_command_mode();

    const result = await driver.execute('tx_power', '3');

    expect(result.ok).toBe(true);
    expect(module.commands).toEqual(['AT', 'AT+POWE3']);
  });

  it('refuses restart verbs and the interpreter flag without writing', async () => {
    const { module, driver } = await started_in_command_mode();
    const writes = module.written.length;

    expect(await driver.execute('reset')).toEqual({
      ok: false,
      error: { kind: 'validation', message: 'reset restarts the module; use reset_and_restore_passthrough()' }
    });
    expect((await driver.execute('restore_defaults')).ok).toBe(false);
    expect((await driver.execute('interpreter', '0')).ok).toBe(false);
    expect(module.written.length).toBe(writes);
  });

  it('rejects unknown verbs', async () => {
    const { driver } = await started_in_command_mode();
    expect(await driver.execute('FLASH')).toEqual({
      ok: false,
      error: { kind: 'validation', message: 'unknown verb "FLASH"' }
    });
  });

  it('refuses commands while the module is in passthrough', async () => {
    const { module, driver } = await started_in_passthrough();
    const writes = module.written.length;

    expect(await driver.execute('version')).toEqual({
      ok: false,
      error: { kind: 'mode_mismatch', required: 'at_command', actual: 'passthrough' }
    });
    expect(module.written.length).toBe(writes);
  });

  it('times out after exactly the command deadline', async () => {
    const { driver } = await started_in_command_mode({ silent: ['VERSION'] });

    let settled = false;
    const pending = driver.execute('version').then((r) => {
      settled = true;
      return r;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(settled).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    expect(await pending).toEqual({ ok: false, error: { kind: 'timeout', verb: 'version', timeout_ms: 1000 } });
  });

  // --- Passthrough --------------------------------------------------------------

  it('writes payload unchanged in passthrough', async () => {
    const { module, driver } = await started_in_passthrough();

    expect(driver.write_passthrough(new Uint8Array(Buffer.from('AT+RESET\r\n')))).toEqual({
      ok: true,
      value: undefined
    });
    expect(module.payload_text()).toBe('AT\r\nAT+RESET\r\n');
    expect(module.restarts).toEqual([]);
  });

  it('refuses payload while the interpreter is active', async () => {
    const { module, driver } = await started_in_command_mode();
    const writes = module.written.length;

    expect(driver.write_passthrough(new Uint8Array([0x01]))).toEqual({
      ok: false,
      error: { kind: 'mode_mismatch', required: 'passthrough', actual: 'at_command' }
    });
    expect(module.written.length).toBe(writes);
  });

  it('refuses payload while a command is in flight', async () => {
    const { driver } = await started_in_passthrough();

    const switching = driver.enter_command_mode();
    expect(driver.write_passthrough(new Uint8Array([0x01]))).toEqual({
      ok: false,
      error: { kind: 'busy', message: 'command interpreter in flight' }
    });
    expect((await switching).ok).toBe(true);
  });

  it('reports a failing write as a transport failure', async () => {
    const { module, driver } = await started_in_passthrough();
    module.connected = false;

    expect(driver.write_passthrough(new Uint8Array([0x01]))).toEqual({
      ok: false,
      error: { kind: 'transport', message: 'send failed: FakeModule: not connected' }
    });
  });

  it('emits peer data as passthrough without waiting for a line end', async () => {
    const { module, driver } = await started_in_passthrough();
    const received: string[] = [];
    driver.on('passthrough', (bytes: Uint8Array) => received.push(text(bytes)));

    module.receive('hello\r\nwor');
    module.receive('ld');

    expect(received).toEqual(['hello\r\n', 'wor', 'ld']);
  });

  it('keeps blank payload lines', async () => {
    const { module, driver } = await started_in_passthrough();
    const received: string[] = [];
    driver.on('passthrough', (bytes: Uint8Array) => received.push(text(bytes)));

    module.receive('A\r\n\r\nB');
    module.receive('\r\n');

    expect(received.join('')).toBe('A\r\n\r\nB\r\n');
  });

  // --- Link state -------------------------------------------------------------

  it('tracks connect notifications in either mode', async () => {
    const { module, driver } = await started_in_passthrough();
    const changes: ConnectionChange[] = [];
    driver.on('connection', (c: ConnectionChange) => changes.push(c));
    const payload: Uint8Array[] = [];
    driver.on('passthrough', (b: Uint8Array) => payload.push(b));

    module.receive('OK+CONNA1B2C3D4E5F6\r\n');

    expect(changes.map((c) => c.current)).toEqual(['connected']);
    expect(driver.state().peer_address).toBe('A1B2C3D4E5F6');
    expect(payload).toEqual([]);
  });

  // --- Desync -----------------------------------------------------------------

  it('marks the mode stale on an unexpected reply and re-probes before the next command', async () => {
    const { module, driver } = await started_in_command_mode();
    const desyncs: string[] = [];
    driver.on('desync', (m: string) => desyncs.push(m));

    module.receive('+NAME=GHOST\r\n');

    expect(desyncs).toEqual(['reply "+NAME=GHOST" arrived with no command outstanding']);
    expect(driver.state().mode_stale).toBe(true);

    expect((await driver.execute('version')).ok).toBe(true);
    expect(module.commands).toEqual(['AT', 'AT', 'AT+VERSION']);
    expect(driver.state().mode_stale).toBe(false);
  });

  // --- Transport loss and close ---------------------------------------------------

  it('fails outstanding work and goes disconnected when the transport closes', async () => {
    const { module, driver } = await started_in_command_mode({ silent: ['VERSION'] });

    const pending = driver.execute('version');
    await vi.advanceTimersByTimeAsync(10);
    module.unplug();

    expect(await pending).toEqual({ ok: false, error: { kind: 'transport', message: 'transport closed' } });
    expect(driver.state().connection).toBe('disconnected');
    expect(await driver.execute('version')).toEqual({
      ok: false,
      error: { kind: 'transport', message: 'driver is closed' }
    });
  });

  it('close releases the transport and ends change feeds', async () => {
    const { module, driver } = await started_in_command_mode();
    const feed = driver.connection.changes();
    const next = feed.next();

    driver.close();
    driver.close();

    expect((await next).value?.current).toBe('disconnected');
    expect(await feed.next()).toEqual({ value: undefined, done: true });
    expect(module.disconnects).toBe(2);
    expect(driver.write_passthrough(new Uint8Array([0x01])).ok).toBe(false);
  });

  it('forwards transport errors only when someone listens', async () => {
    const { module, driver } = await started_in_command_mode();

    expect(() => module.emit('error', new Error('EIO'))).not.toThrow();

    const errors: string[] = [];
    driver.on('error', (err: Error) => errors.push(err.message));
    module.emit('error', new Error('EIO'));
    expect(errors).toEqual(['EIO']);
  });

  // --- Settings and restart ---------------------------------------------------------

  it('moves the transport to a new baud rate across the restart', async () => {
    const { module, driver } = await started_in_command_mode();

    expect(await driver.set('baud', 7)).toEqual({ ok: true, value: { pending_restart: true } });
    expect(driver.state().pending_restart).toBe(true);

    const pending = driver.reset_and_restore_passthrough();
    await vi.advanceTimersByTimeAsync(1500);

    expect(await pending).toEqual({ ok: true, value: undefined });
    expect(module.baud_updates).toEqual([115200]);
    expect(module.interpreter).toBe(false);
    expect(driver.state().pending_restart).toBe(false);
    expect(driver.config.cached('baud')).toBe(7);
  });

  it('leaves the line rate alone for a reset without a baud change', async () => {
    const { module, driver } = await started_in_command_mode();

    const pending = driver.reset_and_restore_passthrough();
    await vi.advanceTimersByTimeAsync(1500);
    await pending;

    expect(module.baud_updates).toEqual([]);
  });

  it('returns to the factory rate after a defaults restore', async () => {
    const { module, driver } = await started_in_command_mode();

    const pending = driver.reset_and_restore_passthrough('defaults');
    await vi.advanceTimersByTimeAsync(1500);

    expect((await pending).ok).toBe(true);
    expect(module.restarts).toEqual(['defaults']);
    expect(module.baud_updates).toEqual([9600]);
  });

  it('holds the module for the whole restart', async () => {
    const { module, driver } = await started_in_command_mode();

    const pending = driver.reset_and_restore_passthrough();
    await vi.advanceTimersByTimeAsync(10);

    expect(await driver.get('name')).toEqual({ ok: false, error: { kind: 'busy', message: 'reset in progress' } });
    expect(await driver.execute('version')).toEqual({
      ok: false,
      error: { kind: 'busy', message: 'reset in progress' }
    });
    expect(await driver.reset_and_restore_passthrough('defaults')).toEqual({
      ok: false,
      error: { kind: 'busy', message: 'reset in progress' }
    });
    expect(driver.write_passthrough(new Uint8Array([0x41]))).toEqual({
      ok: false,
      error: { kind: 'busy', message: 'module restart in progress' }
    });

    await vi.advanceTimersByTimeAsync(1490);
    expect(await pending).toEqual({ ok: true, value: undefined });
    expect(module.commands).toEqual(['AT', 'AT+RESET', 'AT+ENAT0']);
    expect(module.restarts).toEqual(['reset']);
  });

  it('abandons a settling restart when the driver closes', async () => {
    const { module, driver } = await started_in_command_mode();

    const pending = driver.reset_and_restore_passthrough();
    await vi.advanceTimersByTimeAsync(100);
    driver.close();

    expect(await pending).toEqual({ ok: false, error: { kind: 'transport', message: 'driver closed' } });
    await vi.advanceTimersByTimeAsync(2000);
    expect(module.commands).toEqual(['AT', 'AT+RESET']);
    expect(driver.state().connection).toBe('disconnected');
  });

  it('reads settings through the registry', async () => {
    const { driver } = await started_in_command_mode();
    expect(await driver.get('service_uuid')).toEqual({ ok: true, value: 'FFE0' });
  });
});
