/**
 * Schema definition for install-chart tool
 */

import { z } from 'zod';
import { DEFAULT_TIMEOUTS } from '../../config/defaults';

const DNS_LABEL = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;

export const waitConditionSchema = z.object({
  labelSelector: z.string().min(1).describe('Pods that must become Ready'),
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUTS.readiness),
  pollIntervalMs: z.number().int().positive().default(DEFAULT_TIMEOUTS.readinessPoll),
});

export const chartReleaseSchema = z.object({
  name: z.string().max(53).regex(DNS_LABEL, 'must be a DNS label').describe('Release name'),
  repoName: z.string().min(1).describe('Local name of the chart repository'),
  repoURL: z.string().url().describe('Chart repository URL'),
  chartName: z.string().min(1).describe('Chart within the repository'),
  namespace: z.string().max(63).regex(DNS_LABEL, 'must be a DNS label'),
  values: z.record(z.string()).default({}).describe('Dotted --set values'),
  waitCondition: waitConditionSchema,
});

export type ChartRelease = z.infer<typeof chartReleaseSchema>;
export type ChartReleaseInput = z.input<typeof chartReleaseSchema>;
