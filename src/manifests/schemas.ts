/**
 * Zod schemas for manifests.
 *
 * The wire schema checks the object envelope; kind schemas check the spec of
 * the kinds the reconciler knows about. Other kinds pass with envelope checks only.
 */

import { z } from 'zod';
import { ValidationError, type Violation } from '../errors';
import type { Manifest } from '../domain/types/manifest';

const DNS_SUBDOMAIN = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?(\.[a-z0-9]([-a-z0-9]*[a-z0-9])?)*$/;
const DNS_LABEL = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;
const LABEL_VALUE = /^(([A-Za-z0-9][-A-Za-z0-9_.]*)?[A-Za-z0-9])?$/;
const CIDR = /^((\d{1,3}\.){3}\d{1,3}\/\d{1,2}|[0-9a-fA-F:]+\/\d{1,3})$/;

export const LabelsSchema = z.record(
  z.string().max(63).regex(LABEL_VALUE, 'must be a valid label value'),
);

export const LabelSelectorSchema = z.object({
  matchLabels: LabelsSchema.optional(),
  matchExpressions: z
    .array(
      z.object({
        key: z.string().min(1),
        operator: z.enum(['In', 'NotIn', 'Exists', 'DoesNotExist']),
        values: z.array(z.string()).optional(),
      }),
    )
    .optional(),
});

const ProtocolSchema = z.enum(['TCP', 'UDP', 'SCTP']);

const PortRefSchema = z.union([z.number().int().min(1).max(65535), z.string().min(1)]);

export const NetworkPolicyPortSchema = z.object({
  protocol: ProtocolSchema.optional(),
  port: PortRefSchema.optional(),
  endPort: z.number().int().min(1).max(65535).optional(),
});

export const NetworkPolicyPeerSchema = z
  .object({
    namespaceSelector: LabelSelectorSchema.optional(),
    podSelector: LabelSelectorSchema.optional(),
    ipBlock: z
      .object({
        cidr: z.string().regex(CIDR, 'must be a CIDR block'),
        except: z.array(z.string().regex(CIDR, 'must be a CIDR block')).optional(),
      })
      .optional(),
  })
  .refine((peer) => !(peer.ipBlock && (peer.namespaceSelector || peer.podSelector)), {
    message: 'ipBlock cannot be combined with namespaceSelector or podSelector',
  });

export const NetworkPolicySpecSchema = z.object({
  podSelector: LabelSelectorSchema,
  policyTypes: z.array(z.enum(['Ingress', 'Egress'])).optional(),
  ingress: z
    .array(
      z.object({
        from: z.array(NetworkPolicyPeerSchema).optional(),
        ports: z.array(NetworkPolicyPortSchema).optional(),
      }),
    )
    .optional(),
  egress: z
    .array(
      z.object({
        to: z.array(NetworkPolicyPeerSchema).optional(),
        ports: z.array(NetworkPolicyPortSchema).optional(),
      }),
    )
    .optional(),
});

export const ServiceMonitorSpecSchema = z.object({
  selector: LabelSelectorSchema,
  namespaceSelector: z
    .object({ any: z.boolean().optional(), matchNames: z.array(z.string()).optional() })
    .optional(),
  endpoints: z
    .array(
      z.object({
        port: z.string().min(1).optional(),
        targetPort: PortRefSchema.optional(),
        path: z.string().optional(),
        interval: z.string().optional(),
        scheme: z.enum(['http', 'https']).optional(),
      }),
    )
    .min(1, 'at least one endpoint is required'),
  jobLabel: z.string().optional(),
});

export const ServiceSpecSchema = z.object({
  type: z.enum(['ClusterIP', 'NodePort', 'LoadBalancer', 'ExternalName']).optional(),
  selector: LabelsSchema.optional(),
  ports: z
    .array(
      z.object({
        name: z.string().optional(),
        port: z.number().int().min(1).max(65535),
        targetPort: PortRefSchema.optional(),
        nodePort: z.number().int().min(30000).max(32767).optional(),
        protocol: ProtocolSchema.optional(),
      }),
    )
    .min(1, 'at least one port is required'),
});

const SPEC_SCHEMAS: Record<string, z.ZodTypeAny> = {
  NetworkPolicy: NetworkPolicySpecSchema,
  ServiceMonitor: ServiceMonitorSpecSchema,
  Service: ServiceSpecSchema,
};

export const KubeObjectSchema = z.object({
  apiVersion: z.string().min(1),
  kind: z.string().min(1),
  metadata: z.object({
    name: z.string().min(1).max(253).regex(DNS_SUBDOMAIN, 'must be a DNS subdomain name'),
    namespace: z.string().max(63).regex(DNS_LABEL, 'must be a DNS label').default('default'),
    labels: LabelsSchema.default({}),
  }),
  spec: z.record(z.unknown()).default({}),
});

function toViolations(issues: z.ZodIssue[], prefix: string[] = []): Violation[] {
  return issues.map((issue) => ({
    field: [...prefix, ...issue.path].join('.') || '(root)',
    message: issue.message,
  }));
}

/**
 * Check one raw document and return every violation found
 */
export function collectManifestViolations(raw: unknown): Violation[] {
  const envelope = KubeObjectSchema.safeParse(raw);
  if (!envelope.success) {
    return toViolations(envelope.error.issues);
  }

  const specSchema = SPEC_SCHEMAS[envelope.data.kind];
  if (!specSchema) {
    return [];
  }
  const spec = specSchema.safeParse(envelope.data.spec);
  return spec.success ? [] : toViolations(spec.error.issues, ['spec']);
}

/**
 * Parse a raw wire document into a Manifest, failing with every violation
 */
export function parseManifest(raw: unknown, source = 'manifest'): Manifest {
  const violations = collectManifestViolations(raw);
  const envelope = KubeObjectSchema.safeParse(raw);

  if (violations.length > 0 || !envelope.success) {
    throw ValidationError.invalidSpec(
      `${source} failed validation`,
      violations.map((v) => ({ ...v, field: `${source}: ${v.field}` })),
    );
  }

  const { apiVersion, kind, metadata, spec } = envelope.data;
  return {
    apiVersion,
    kind,
    namespace: metadata.namespace,
    name: metadata.name,
    labels: metadata.labels,
    spec,
  };
}
