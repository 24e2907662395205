/**
 * Schema definition for apply-manifest tool
 */

import { z } from 'zod';

export const manifestPresetSchema = z
  .enum(['kepler-access', 'monitoring-access'])
  .describe('Built-in manifest set');

export const applyManifestsSchema = z
  .object({
    file: z.string().min(1).optional().describe('Manifest file (YAML or JSON, multi-document)'),
    preset: manifestPresetSchema.optional(),
    keplerNamespace: z.string().min(1).optional().describe('Namespace of the Kepler exporter'),
    monitoringNamespace: z
      .string()
      .min(1)
      .optional()
      .describe('Namespace of the Prometheus stack'),
  })
  .refine((params) => (params.file === undefined) !== (params.preset === undefined), {
    message: 'Provide either a manifest file or a preset, not both',
    path: ['file'],
  });

export type ApplyManifestsParams = z.infer<typeof applyManifestsSchema>;
