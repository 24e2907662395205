import { describe, it, expect } from '@jest/globals';
import type { V1ContainerStatus, V1Endpoints, V1Pod } from '@kubernetes/client-node';
import {
  exitCodeFromStatus,
  summarizeEndpoints,
  summarizePod,
} from '../../../src/infrastructure/kubernetes';

const containerStatus = (name: string, restartCount: number): V1ContainerStatus => ({
  name,
  image: `${name}:latest`,
  imageID: '',
  ready: true,
  restartCount,
});

describe('summarizePod', () => {
  it('should read readiness from the Ready condition and sum restarts', () => {
    const pod: V1Pod = {
      metadata: { name: 'kepler-x7k2p', namespace: 'kepler', labels: { app: 'kepler' } },
      spec: { containers: [{ name: 'kepler-exporter' }, { name: 'sidecar' }] },
      status: {
        phase: 'Running',
        conditions: [
          { type: 'Initialized', status: 'True' },
          { type: 'Ready', status: 'True' },
        ],
        containerStatuses: [containerStatus('kepler-exporter', 2), containerStatus('sidecar', 1)],
      },
    };

    expect(summarizePod(pod)).toEqual({
      name: 'kepler-x7k2p',
      namespace: 'kepler',
      phase: 'Running',
      ready: true,
      labels: { app: 'kepler' },
      containers: ['kepler-exporter', 'sidecar'],
      restarts: 3,
    });
  });

  it('should treat a pod without status as not ready', () => {
    expect(summarizePod({ metadata: { name: 'pending' } })).toEqual({
      name: 'pending',
      namespace: '',
      phase: 'Unknown',
      ready: false,
      labels: {},
      containers: [],
      restarts: 0,
    });
  });
});

describe('summarizeEndpoints', () => {
  it('should count addresses across subsets', () => {
    const endpoints: V1Endpoints = {
      metadata: { name: 'kepler-exporter', namespace: 'kepler' },
      subsets: [
        {
          addresses: [{ ip: '10.0.0.1' }, { ip: '10.0.0.2' }],
          notReadyAddresses: [{ ip: '10.0.0.3' }],
          ports: [{ name: 'http', port: 9102 }],
        },
        { addresses: [{ ip: '10.0.1.1' }], ports: [{ port: 9090 }] },
      ],
    };

    expect(summarizeEndpoints(endpoints)).toEqual({
      name: 'kepler-exporter',
      namespace: 'kepler',
      readyAddresses: 3,
      notReadyAddresses: 1,
      ports: [{ name: 'http', port: 9102 }, { port: 9090 }],
    });
  });
});

describe('exitCodeFromStatus', () => {
  it('should map success to 0', () => {
    expect(exitCodeFromStatus({ status: 'Success' })).toBe(0);
  });

  it('should read the exit code cause', () => {
    expect(
      exitCodeFromStatus({
        status: 'Failure',
        reason: 'NonZeroExitCode',
        details: { causes: [{ reason: 'ExitCode', message: '7' }] },
      }),
    ).toBe(7);
  });

  it('should fall back to 1 without a cause', () => {
    expect(exitCodeFromStatus({ status: 'Failure' })).toBe(1);
  });
});
