import { describe, it, expect } from '@jest/globals';
import { detectHostHardware, parseFreeGigabytes, parseLscpu } from '../../../src/profiles';
import { DependencyMissingError, InternalError, ValidationError } from '../../../src/errors';
import { FakeCommandRunner, failed, ok } from '../../utils/fake-command-runner';

const LSCPU = `Architecture:            x86_64
CPU(s):                  32
On-line CPU(s) list:     0-31
Model name:              Test Xeon CPU @ 2.40GHz
Thread(s) per core:      2
Core(s) per socket:      8
Socket(s):               2
CPU max MHz:             3200.0000
CPU min MHz:             1200.5000
NUMA node0 CPU(s):       0-7,16-23
`;

const FREE = `               total        used        free      shared  buff/cache   available
Mem:             125          10         100           0          15         113
Swap:              3           0           3
`;

describe('parseLscpu', () => {
  it('should read the topology and truncate frequencies', () => {
    expect(parseLscpu(LSCPU)).toEqual({
      cpuThreads: 32,
      threadsPerCore: 2,
      coresPerSocket: 8,
      sockets: 2,
      cpuModel: 'Test Xeon CPU @ 2.40GHz',
      cpuMinMHz: 1200,
      cpuMaxMHz: 3200,
    });
  });

  it('should leave out frequencies lscpu does not report', () => {
    const info = parseLscpu(
      'CPU(s): 2\nThread(s) per core: 1\nCore(s) per socket: 2\nSocket(s): 1\n',
    );

    expect(info).toEqual({ cpuThreads: 2, threadsPerCore: 1, coresPerSocket: 2, sockets: 1 });
  });

  it('should list every missing topology field', () => {
    let caught: unknown;
    try {
      parseLscpu('CPU(s): 4\n');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught instanceof ValidationError && caught.violations.map((v) => v.field)).toEqual([
      'Thread(s) per core',
      'Core(s) per socket',
      'Socket(s)',
    ]);
  });
});

describe('parseFreeGigabytes', () => {
  it('should read the total of the Mem row', () => {
    expect(parseFreeGigabytes(FREE)).toBe(125);
  });

  it('should reject output without a Mem row', () => {
    expect(() => parseFreeGigabytes('Swap: 3 0 3\n')).toThrow('Unexpected free output');
  });
});

describe('detectHostHardware', () => {
  it('should combine lscpu and free', async () => {
    const runner = new FakeCommandRunner(['lscpu', 'free'])
      .on('lscpu', [], ok(LSCPU))
      .on('free', ['-g'], ok(FREE));

    await expect(detectHostHardware(runner)).resolves.toEqual({
      cpuThreads: 32,
      cpuCores: 16,
      sockets: 2,
      threadsPerCore: 2,
      memoryGB: 125,
      cpuModel: 'Test Xeon CPU @ 2.40GHz',
      cpuMinMHz: 1200,
      cpuMaxMHz: 3200,
    });
    expect(runner.calls).toEqual([
      { command: 'lscpu', args: [] },
      { command: 'free', args: ['-g'] },
    ]);
  });

  it('should fail when lscpu is not installed', async () => {
    const runner = new FakeCommandRunner(['free']);

    const detection = detectHostHardware(runner);

    await expect(detection).rejects.toBeInstanceOf(DependencyMissingError);
    await expect(detection).rejects.toThrow('lscpu not found on PATH');
  });

  it('should fail when a tool exits non-zero', async () => {
    const runner = new FakeCommandRunner(['lscpu', 'free']).on(
      'lscpu',
      [],
      failed('lscpu: cannot open /proc/cpuinfo'),
    );

    const detection = detectHostHardware(runner);

    await expect(detection).rejects.toBeInstanceOf(InternalError);
    await expect(detection).rejects.toThrow(
      'lscpu exited with 1: lscpu: cannot open /proc/cpuinfo',
    );
  });
});
