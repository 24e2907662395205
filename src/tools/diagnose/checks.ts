/**
 * The Prometheus <-> Kepler checklist.
 *
 * Checks run in `order`; each may read what earlier ones stored in
 * `context.state` and reports `skipped` when that data is missing.
 * Every check is read-only.
 */

import { z } from 'zod';
import { API_VERSIONS, type KubeObject, type Labels } from '../../domain/types/manifest';
import { KEPLER_DEFAULTS, PROMETHEUS_DEFAULTS } from '../../config/defaults';
import { formatSelector, selectorMatches } from '../../manifests/selectors';
import { LabelSelectorSchema, ServiceMonitorSpecSchema } from '../../manifests/schemas';
import type { HintId } from './hints';
import type { CheckOutcome, DiagnosticCheck } from './types';

const MONITORING_API_VERSION = API_VERSIONS.ServiceMonitor;

// Live objects carry server-filled fields, so these read only what the checks need
const LiveServiceSpecSchema = z.object({
  type: z.string().optional(),
  ports: z
    .array(
      z.object({
        name: z.string().optional(),
        port: z.number(),
        targetPort: z.union([z.number(), z.string()]).optional(),
      }),
    )
    .default([]),
});

const PrometheusSpecSchema = z.object({
  serviceMonitorSelector: LabelSelectorSchema.optional(),
  serviceMonitorNamespaceSelector: LabelSelectorSchema.optional(),
});

type LiveServicePort = z.infer<typeof LiveServiceSpecSchema>['ports'][number];

const ERROR_LINE = /level=error|\berr(or)?=/i;

const passed = (details: string[]): CheckOutcome => ({ verdict: 'passed', details });

const failed = (details: string[], hint?: HintId): CheckOutcome =>
  hint ? { verdict: 'failed', details, hint } : { verdict: 'failed', details };

const skipped = (reason: string): CheckOutcome => ({ verdict: 'skipped', details: [reason] });

const labelsOf = (object: KubeObject): Labels => object.metadata.labels ?? {};

const formatLabels = (labels: Labels): string =>
  Object.entries(labels)
    .map(([key, value]) => `${key}=${value}`)
    .join(',') || '(none)';

function servicePorts(service: KubeObject): LiveServicePort[] {
  const spec = LiveServiceSpecSchema.safeParse(service.spec ?? {});
  return spec.success ? spec.data.ports : [];
}

const formatPort = (port: LiveServicePort): string =>
  port.name ? `${port.name}/${port.port}` : String(port.port);

function describeService(service: KubeObject): string {
  const spec = LiveServiceSpecSchema.safeParse(service.spec ?? {});
  const type = spec.success ? (spec.data.type ?? 'ClusterIP') : 'unknown';
  const ports = servicePorts(service).map(formatPort).join(', ') || 'no ports';
  return `${service.metadata.name}: ${type}, ${ports}`;
}

const objectKey = (object: KubeObject, fallbackNamespace: string): string =>
  `${object.metadata.namespace ?? fallbackNamespace}/${object.metadata.name}`;

export const keplerPodsCheck: DiagnosticCheck = {
  order: 1,
  id: 'kepler-pods',
  description: 'Kepler pods exist and are Ready',
  hint: 'pod-not-ready',
  async run(ctx) {
    const pods = await ctx.client.listPods(ctx.keplerNamespace, KEPLER_DEFAULTS.podSelector);
    ctx.state.keplerPods = pods;

    if (pods.length === 0) {
      return failed([`No pods matching ${KEPLER_DEFAULTS.podSelector} in ${ctx.keplerNamespace}`]);
    }
    const details = pods.map(
      (pod) =>
        `${pod.name}: ${pod.phase}, ${pod.ready ? 'ready' : 'not ready'}, ${pod.restarts} restarts`,
    );
    return pods.every((pod) => pod.ready) ? passed(details) : failed(details);
  },
};

export const keplerServiceCheck: DiagnosticCheck = {
  order: 2,
  id: 'kepler-service',
  description: 'A Service exists in the Kepler namespace',
  async run(ctx) {
    const services = await ctx.client.listObjects(API_VERSIONS.Service, 'Service', {
      namespace: ctx.keplerNamespace,
    });
    ctx.state.services = services;

    return services.length === 0
      ? failed([`No Service in ${ctx.keplerNamespace}`])
      : passed(services.map(describeService));
  },
};

export const serviceLabelsCheck: DiagnosticCheck = {
  order: 3,
  id: 'service-labels',
  description: 'Kepler Services carry labels a ServiceMonitor can select',
  hint: 'label-mismatch',
  async run(ctx) {
    const services = ctx.state.services;
    if (!services || services.length === 0) {
      return skipped('No Kepler Service to inspect');
    }

    const details = services.map((s) => `${s.metadata.name}: ${formatLabels(labelsOf(s))}`);
    const unlabeled = services.filter((s) => Object.keys(labelsOf(s)).length === 0);
    if (unlabeled.length > 0) {
      details.push(`${unlabeled.map((s) => s.metadata.name).join(', ')} carry no labels`);
      return failed(details);
    }
    return passed(details);
  },
};

export const serviceMonitorCheck: DiagnosticCheck = {
  order: 4,
  id: 'servicemonitor',
  description: 'A ServiceMonitor exists in the Kepler namespace',
  async run(ctx) {
    const monitors = await ctx.client.listObjects(MONITORING_API_VERSION, 'ServiceMonitor', {
      namespace: ctx.keplerNamespace,
    });
    ctx.state.serviceMonitors = monitors;

    if (monitors.length === 0) {
      return failed([
        `No ServiceMonitor in ${ctx.keplerNamespace}`,
        'The Kepler chart creates one when installed with serviceMonitor.enabled=true',
      ]);
    }
    return passed(monitors.map((m) => `${m.metadata.name}: ${formatLabels(labelsOf(m))}`));
  },
};

export const serviceMonitorSelectorCheck: DiagnosticCheck = {
  order: 5,
  id: 'servicemonitor-selector',
  description: "ServiceMonitor selectors match the Kepler Service's labels",
  hint: 'label-mismatch',
  async run(ctx) {
    const { serviceMonitors: monitors, services } = ctx.state;
    if (!monitors || monitors.length === 0) {
      return skipped('No ServiceMonitor to inspect');
    }
    if (!services || services.length === 0) {
      return skipped('No Service to match the selectors against');
    }

    const targets = new Map<string, string[]>();
    const details: string[] = [];
    let ok = true;

    for (const monitor of monitors) {
      const name = monitor.metadata.name;
      const spec = ServiceMonitorSpecSchema.safeParse(monitor.spec ?? {});
      if (!spec.success) {
        ok = false;
        details.push(`${name}: unreadable spec (${spec.error.issues[0]?.message ?? 'invalid'})`);
        continue;
      }

      const selector = spec.data.selector;
      const matched = services
        .filter((service) => selectorMatches(selector, labelsOf(service)))
        .map((service) => service.metadata.name);
      targets.set(name, matched);

      if (matched.length === 0) {
        ok = false;
        details.push(`${name}: selector ${formatSelector(selector)} matches no Service`);
      } else {
        details.push(`${name}: selector ${formatSelector(selector)} matches ${matched.join(', ')}`);
      }
    }

    ctx.state.monitorTargets = targets;
    return ok ? passed(details) : failed(details);
  },
};

export const serviceMonitorVisibilityCheck: DiagnosticCheck = {
  order: 6,
  id: 'servicemonitor-visibility',
  description: 'Kepler ServiceMonitors are listed cluster-wide',
  hint: 'namespace-mismatch',
  async run(ctx) {
    const monitors = ctx.state.serviceMonitors;
    if (!monitors || monitors.length === 0) {
      return skipped('No Kepler ServiceMonitor to look for');
    }

    const all = await ctx.client.listObjects(MONITORING_API_VERSION, 'ServiceMonitor');
    const visible = new Set(all.map((m) => objectKey(m, '')));
    const missing = monitors.filter((m) => !visible.has(objectKey(m, ctx.keplerNamespace)));

    const details = [`${all.length} ServiceMonitor(s) across all namespaces`];
    if (missing.length > 0) {
      details.push(`Not listed: ${missing.map((m) => m.metadata.name).join(', ')}`);
      return failed(details);
    }
    return passed(details);
  },
};

export const prometheusSelectorCheck: DiagnosticCheck = {
  order: 7,
  id: 'prometheus-selector',
  description: 'Prometheus selects the Kepler ServiceMonitor',
  async run(ctx) {
    const prometheuses = await ctx.client.listObjects(MONITORING_API_VERSION, 'Prometheus', {
      namespace: ctx.monitoringNamespace,
    });
    if (prometheuses.length === 0) {
      return failed([`No Prometheus resource in ${ctx.monitoringNamespace}`]);
    }

    const monitors = ctx.state.serviceMonitors ?? [];
    const details: string[] = [];
    const problems: Array<{ hint?: HintId; message: string }> = [];

    for (const prometheus of prometheuses) {
      const name = prometheus.metadata.name;
      const spec = PrometheusSpecSchema.safeParse(prometheus.spec ?? {});
      if (!spec.success) {
        problems.push({
          message: `${name}: unreadable spec (${spec.error.issues[0]?.message ?? 'invalid'})`,
        });
        continue;
      }
      const selector = spec.data.serviceMonitorSelector;
      if (!selector) {
        problems.push({
          hint: 'empty-selector',
          message: `${name}: serviceMonitorSelector is not set; no ServiceMonitor is selected`,
        });
        continue;
      }
      details.push(`${name}: serviceMonitorSelector ${formatSelector(selector)}`);

      if (monitors.length > 0 && !monitors.some((m) => selectorMatches(selector, labelsOf(m)))) {
        problems.push({
          hint: 'label-mismatch',
          message: `${name}: selector matches none of ${monitors
            .map((m) => `${m.metadata.name} [${formatLabels(labelsOf(m))}]`)
            .join('; ')}`,
        });
      }

      if (ctx.keplerNamespace === ctx.monitoringNamespace) {
        continue;
      }
      const namespaceSelector = spec.data.serviceMonitorNamespaceSelector;
      if (!namespaceSelector) {
        problems.push({
          hint: 'namespace-mismatch',
          message:
            `${name}: no serviceMonitorNamespaceSelector; only ServiceMonitors in ` +
            `${ctx.monitoringNamespace} are watched, not ${ctx.keplerNamespace}`,
        });
        continue;
      }

      const namespace = await ctx.client.readObject({
        apiVersion: 'v1',
        kind: 'Namespace',
        namespace: '',
        name: ctx.keplerNamespace,
      });
      const namespaceLabels = namespace?.metadata.labels ?? {
        'kubernetes.io/metadata.name': ctx.keplerNamespace,
      };
      if (!selectorMatches(namespaceSelector, namespaceLabels)) {
        problems.push({
          hint: 'namespace-mismatch',
          message:
            `${name}: serviceMonitorNamespaceSelector ${formatSelector(namespaceSelector)} ` +
            `does not match namespace ${ctx.keplerNamespace}`,
        });
      }
    }

    const [first] = problems;
    if (first) {
      return failed([...details, ...problems.map((p) => p.message)], first.hint);
    }
    return passed(details);
  },
};

export const keplerEndpointsCheck: DiagnosticCheck = {
  order: 8,
  id: 'kepler-endpoints',
  description: 'The Kepler Service has ready endpoints',
  hint: 'no-endpoints',
  async run(ctx) {
    const services = ctx.state.services;
    if (!services || services.length === 0) {
      return skipped('No Kepler Service whose Endpoints to inspect');
    }

    // Endpoints share their Service's name
    const names = services.map((s) => s.metadata.name);
    const endpoints = (await ctx.client.listEndpoints(ctx.keplerNamespace)).filter((e) =>
      names.includes(e.name),
    );
    ctx.state.endpoints = endpoints;

    if (endpoints.length === 0) {
      return failed([`No Endpoints for ${names.join(', ')} in ${ctx.keplerNamespace}`]);
    }
    const details = endpoints.map(
      (e) => `${e.name}: ${e.readyAddresses} ready, ${e.notReadyAddresses} not ready`,
    );
    return endpoints.some((e) => e.readyAddresses > 0) ? passed(details) : failed(details);
  },
};

export const serviceMonitorPortCheck: DiagnosticCheck = {
  order: 9,
  id: 'servicemonitor-port',
  description: 'ServiceMonitor endpoints name ports the Service exposes',
  hint: 'port-mismatch',
  async run(ctx) {
    const { serviceMonitors: monitors, services, monitorTargets } = ctx.state;
    if (!monitors || !services || !monitorTargets) {
      return skipped('ServiceMonitor selection was not resolved');
    }

    const details: string[] = [];
    let checked = 0;
    let ok = true;

    for (const monitor of monitors) {
      const name = monitor.metadata.name;
      const targets = monitorTargets.get(name) ?? [];
      const spec = ServiceMonitorSpecSchema.safeParse(monitor.spec ?? {});
      if (!spec.success || targets.length === 0) {
        details.push(`${name}: selects no Service, ports not checked`);
        continue;
      }

      const ports = services
        .filter((service) => targets.includes(service.metadata.name))
        .flatMap(servicePorts);
      const exposed = ports.map(formatPort).join(', ') || 'none';

      spec.data.endpoints.forEach((endpoint, index) => {
        checked++;
        const label = `${name} endpoint ${index}`;
        if (endpoint.port !== undefined) {
          if (ports.some((p) => p.name === endpoint.port)) {
            details.push(`${label}: port "${endpoint.port}" found`);
          } else {
            ok = false;
            details.push(
              `${label}: port "${endpoint.port}" not exposed (Service ports: ${exposed})`,
            );
          }
        } else if (endpoint.targetPort !== undefined) {
          const target = endpoint.targetPort;
          if (ports.some((p) => p.targetPort === target || p.port === target)) {
            details.push(`${label}: targetPort ${target} found`);
          } else {
            ok = false;
            details.push(
              `${label}: targetPort ${target} not exposed (Service ports: ${exposed})`,
            );
          }
        } else {
          ok = false;
          details.push(`${label}: names neither port nor targetPort`);
        }
      });
    }

    if (checked === 0) {
      return skipped('No ServiceMonitor endpoint could be matched to a Service');
    }
    return ok ? passed(details) : failed(details);
  },
};

export const keplerMetricsCheck: DiagnosticCheck = {
  order: 10,
  id: 'kepler-metrics',
  description: 'The Kepler pod serves kepler_* metrics',
  async run(ctx) {
    const pod = ctx.state.keplerPods?.[0];
    if (!pod) {
      return skipped('No Kepler pod to query');
    }

    const url = `localhost:${ctx.metricsPort}/metrics`;
    const result = await ctx.client.execInPod(ctx.keplerNamespace, pod.name, undefined, [
      'curl',
      '-s',
      url,
    ]);

    const samples = result.stdout.split('\n').filter((line) => line.startsWith('kepler_'));
    if (result.stdout.includes('kepler_')) {
      return passed([
        `${pod.name}: ${samples.length} kepler_ samples at ${url}`,
        ...samples.slice(0, 5),
      ]);
    }
    return failed([
      `${pod.name}: no kepler_ metrics at ${url} (exit ${result.exitCode})`,
      ...(result.stderr ? [result.stderr.trim()] : []),
    ]);
  },
};

export const prometheusLogsCheck: DiagnosticCheck = {
  order: 11,
  id: 'prometheus-logs',
  description: 'Recent Prometheus logs show no Kepler scrape errors',
  async run(ctx) {
    const pods = await ctx.client.listPods(
      ctx.monitoringNamespace,
      PROMETHEUS_DEFAULTS.podSelector,
    );
    const pod = pods[0];
    if (!pod) {
      return skipped(`No Prometheus pod in ${ctx.monitoringNamespace}`);
    }

    const logs = await ctx.client.readPodLogs(ctx.monitoringNamespace, pod.name, {
      container: PROMETHEUS_DEFAULTS.container,
      tailLines: PROMETHEUS_DEFAULTS.logTailLines,
    });
    const mentions = logs.split('\n').filter((line) => /kepler/i.test(line));
    if (mentions.length === 0) {
      return passed([
        `No mention of kepler in the last ${PROMETHEUS_DEFAULTS.logTailLines} lines of ${pod.name}`,
      ]);
    }

    const errors = mentions.filter((line) => ERROR_LINE.test(line));
    return errors.length > 0 ? failed(errors) : passed(mentions);
  },
};

export const DIAGNOSTIC_CHECKS: readonly DiagnosticCheck[] = [
  keplerPodsCheck,
  keplerServiceCheck,
  serviceLabelsCheck,
  serviceMonitorCheck,
  serviceMonitorSelectorCheck,
  serviceMonitorVisibilityCheck,
  prometheusSelectorCheck,
  keplerEndpointsCheck,
  serviceMonitorPortCheck,
  keplerMetricsCheck,
  prometheusLogsCheck,
];
