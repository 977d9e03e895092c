import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

interface ListedPort {
  path: string;
  vendorId?: string;
  productId?: string;
  manufacturer?: string;
}

interface ListState {
  ports: ListedPort[];
  error: Error | null;
}

const listing = vi.hoisted(() => {
  const state: ListState = { ports: [], error: null };
  return state;
});

vi.mock('serialport', () => ({
  SerialPort: {
    list: async (): Promise<ListedPort[]> => {
      if (listing.error) throw listing.error;
      return listing.ports;
    }
  }
}));

import { scan_ports } from '../port_scanner';

describe('scan_ports', () => {
  beforeEach(() => {
    listing.error = null;
    listing.ports = [
      { path: '/dev/ttyUSB0', vendorId: '1A86', productId: '7523', manufacturer: 'QinHeng' },
      { path: '/dev/ttyACM0', vendorId: '2341', productId: '0043' },
      { path: '/dev/ttyS0' }
    ];
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('lists every port with normalised ids and a label', async () => {
    expect(await scan_ports()).toEqual([
      { path: '/dev/ttyUSB0', vid: '1a86', pid: '7523', manufacturer: 'QinHeng', label: 'QinHeng - /dev/ttyUSB0' },
      { path: '/dev/ttyACM0', vid: '2341', pid: '0043', manufacturer: undefined, label: '/dev/ttyACM0' },
      { path: '/dev/ttyS0', vid: undefined, pid: undefined, manufacturer: undefined, label: '/dev/ttyS0' }
    ]);
  });

  it('filters by vendor id regardless of case', async () => {
    const ports = await scan_ports({ vendor_ids: ['1A86'] });
    expect(ports.map((p) => p.path)).toEqual(['/dev/ttyUSB0']);
  });

  it('returns everything for an empty vendor filter', async () => {
    expect(await scan_ports({ vendor_ids: [] })).toHaveLength(3);
  });

  it('returns an empty list when enumeration fails', async () => {
    listing.error = new Error('permission denied');
    expect(await scan_ports()).toEqual([]);
    expect(console.warn).toHaveBeenCalledWith('[SCAN]', 'port enumeration failed: permission denied');
  });
});
