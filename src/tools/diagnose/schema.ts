/**
 * Schema definition for diagnose tool
 */

import { z } from 'zod';
import { DEFAULT_NAMESPACES, KEPLER_DEFAULTS } from '../../config/defaults';

export const diagnoseSchema = z.object({
  keplerNamespace: z
    .string()
    .min(1)
    .default(DEFAULT_NAMESPACES.kepler)
    .describe('Namespace of the Kepler exporter'),
  monitoringNamespace: z
    .string()
    .min(1)
    .default(DEFAULT_NAMESPACES.monitoring)
    .describe('Namespace of the Prometheus stack'),
  metricsPort: z
    .number()
    .int()
    .min(1)
    .max(65535)
    .default(KEPLER_DEFAULTS.metricsPort)
    .describe('Port of the Kepler metrics endpoint inside the pod'),
  output: z.enum(['text', 'json']).default('text').describe('Report format'),
});

export type DiagnoseParams = z.infer<typeof diagnoseSchema>;
export type DiagnoseInput = z.input<typeof diagnoseSchema>;
