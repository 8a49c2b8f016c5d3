import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { errnoCode, SystemProcessTable } from '../../src/services/process-table.js';

interface FoundProcess {
  pid: number;
  name: string;
  cmd: string;
}

const { mockPidtree, mockFindProcess } = vi.hoisted(() => ({
  mockPidtree: vi.fn<(pid: number) => Promise<number[]>>(),
  mockFindProcess: vi.fn<(type: 'name' | 'pid' | 'port', value: string | number) => Promise<FoundProcess[]>>(),
}));

vi.mock('pidtree', () => ({ default: mockPidtree }));
vi.mock('find-process', () => ({ default: mockFindProcess }));

// Above the default pid_max of 4194304
const UNUSED_PID = 99_999_999;

describe('errnoCode', () => {
  it('should read the code of a system error', () => {
    const error = Object.assign(new Error('kill ESRCH'), { code: 'ESRCH' });
    expect(errnoCode(error)).toBe('ESRCH');
  });

  it('should return undefined for other values', () => {
    expect(errnoCode(new Error('plain'))).toBeUndefined();
    expect(errnoCode('ESRCH')).toBeUndefined();
  });
});

describe('SystemProcessTable', () => {
  const table = new SystemProcessTable();

  beforeEach(() => {
    mockPidtree.mockReset();
    mockFindProcess.mockReset();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('checkProcess', () => {
    it('should report this process as alive under its executable name', async () => {
      mockFindProcess.mockResolvedValue([{ pid: process.pid, name: '/usr/bin/node', cmd: 'node vitest' }]);

      const liveness = await table.checkProcess(process.pid);

      expect(liveness).toEqual({ status: 'alive', pid: process.pid, name: 'node' });
      expect(mockFindProcess).toHaveBeenCalledWith('pid', process.pid);
    });

    it('should report an unused pid as not found without a lookup', async () => {
      const liveness = await table.checkProcess(UNUSED_PID);

      expect(liveness).toEqual({ status: 'not-found', pid: UNUSED_PID });
      expect(mockFindProcess).not.toHaveBeenCalled();
    });

    it('should report not found when the lookup comes back empty', async () => {
      mockFindProcess.mockResolvedValue([]);

      expect(await table.checkProcess(process.pid)).toEqual({ status: 'not-found', pid: process.pid });
    });
  });

  describe('listDescendants', () => {
    it('should return every descendant pidtree reports', async () => {
      mockPidtree.mockResolvedValue([4101, 4102, 4103]);

      expect(await table.listDescendants(process.pid)).toEqual([4101, 4102, 4103]);
      expect(mockPidtree).toHaveBeenCalledWith(process.pid);
    });

    it('should return nothing when the root has already gone', async () => {
      mockPidtree.mockRejectedValue(new Error('No matching pid found'));

      expect(await table.listDescendants(UNUSED_PID)).toEqual([]);
    });

    it('should rethrow lookup failures for a live root', async () => {
      mockPidtree.mockRejectedValue(new Error('ps failed'));

      await expect(table.listDescendants(process.pid)).rejects.toThrow('ps failed');
    });
  });

  describe('findByNames', () => {
    it('should merge matches for every name, once per pid, sorted by pid', async () => {
      mockFindProcess.mockImplementation(async (_type, value) =>
        value === 'firefox'
          ? [
              { pid: 7002, name: 'firefox', cmd: 'firefox --no-remote' },
              { pid: 7001, name: 'firefox', cmd: 'firefox' },
            ]
          : [{ pid: 7003, name: 'Xvfb', cmd: 'Xvfb :10' }]
      );

      expect(await table.findByNames(['firefox', 'xvfb'])).toEqual([
        { pid: 7001, name: 'firefox' },
        { pid: 7002, name: 'firefox' },
        { pid: 7003, name: 'Xvfb' },
      ]);
      expect(mockFindProcess).toHaveBeenCalledWith('name', 'firefox');
      expect(mockFindProcess).toHaveBeenCalledWith('name', 'xvfb');
    });

    it('should skip matches on the command line only and this process', async () => {
      mockFindProcess.mockResolvedValue([
        { pid: process.pid, name: 'xpra-helper', cmd: 'node server' },
        { pid: 7004, name: 'bash', cmd: 'bash -c xpra start' },
        { pid: 7005, name: 'xpra', cmd: 'xpra start :10' },
      ]);

      expect(await table.findByNames(['xpra'])).toEqual([{ pid: 7005, name: 'xpra' }]);
    });
  });

  describe('signal', () => {
    it('should report signal 0 to a missing pid as not found', () => {
      expect(table.signal(UNUSED_PID, 0)).toBe('not-found');
    });

    it('should report a missing process group as not found', () => {
      expect(table.signalGroup(UNUSED_PID, 'SIGKILL')).toBe('not-found');
    });

    it('should address the group through the negated pid', () => {
      const kill = vi.spyOn(process, 'kill').mockImplementation(() => true);

      expect(table.signalGroup(4200, 'SIGKILL')).toBe('sent');
      expect(kill).toHaveBeenCalledWith(-4200, 'SIGKILL');
    });
  });
});
