/**
 * CLI command handlers
 *
 * Each handler resolves to a process exit code. Human output goes through
 * `io.out` (stdout); errors and warnings through `io.err` (stderr); logs stay
 * on the logger.
 */

import type { Logger } from 'pino';
import type { AppConfig } from '../config';
import { describeRef } from '../domain/types/manifest';
import { ValidationError, getErrorMessage, isApplicationError } from '../errors';
import type { CommandRunner } from '../infrastructure/command-executor';
import type { HelmClient } from '../infrastructure/helm';
import type { KubernetesClient } from '../infrastructure/kubernetes';
import {
  ProfileRegistry,
  createProfile,
  deriveStressParameters,
  detectHostHardware,
  toRecord,
} from '../profiles';
import type { RetryPolicy } from '../shared/transient';
import { applyAll, applyManifestsSchema, resolveTargetStore } from '../tools/apply-manifest';
import { diagnoseSchema, renderReport, reportPassed, runDiagnostics } from '../tools/diagnose';
import {
  CHART_PRESETS,
  installChart,
  isChartPreset,
  parseSetFlags,
  type ChartReleaseInput,
} from '../tools/install-chart';
import { ExitCodes, exitCodeFor, type ExitCode } from './exit-codes';

export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
  /** Absent when stdin is not interactive */
  confirm?: (question: string) => Promise<boolean>;
}

export interface CliContext {
  config: AppConfig;
  logger: Logger;
  io: CliIO;
  kubernetes: () => KubernetesClient;
  helm: () => HelmClient;
  runner: CommandRunner;
}

const SERVICE_MONITOR_API = 'monitoring.coreos.com/v1';

function retryPolicyOf(config: AppConfig): RetryPolicy {
  return { attempts: config.retry.attempts, delayMs: config.retry.delayMs };
}

export function reportError(io: CliIO, error: unknown): ExitCode {
  io.err(`Error: ${getErrorMessage(error)}`);
  if (error instanceof ValidationError) {
    for (const violation of error.violations) {
      io.err(`  - ${violation.field}: ${violation.message}`);
    }
  }
  return exitCodeFor(error);
}

async function guarded(ctx: CliContext, command: () => Promise<ExitCode>): Promise<ExitCode> {
  try {
    return await command();
  } catch (error) {
    if (!isApplicationError(error)) {
      ctx.logger.error({ error }, 'Unexpected failure');
    }
    return reportError(ctx.io, error);
  }
}

// ===== apply =====

export interface ApplyCommandOptions {
  file?: string;
  preset?: string;
}

export function applyCommand(ctx: CliContext, options: ApplyCommandOptions): Promise<ExitCode> {
  return guarded(ctx, async () => {
    const parsed = applyManifestsSchema.safeParse({
      file: options.file,
      preset: options.preset,
      keplerNamespace: ctx.config.kubernetes.keplerNamespace,
      monitoringNamespace: ctx.config.kubernetes.monitoringNamespace,
    });
    if (!parsed.success) {
      throw new ValidationError(
        'Invalid apply arguments',
        parsed.error.issues.map((issue) => ({
          field: issue.path.join('.') || 'arguments',
          message: issue.message,
        })),
      );
    }

    const store = await resolveTargetStore(parsed.data);
    const result = await applyAll(store, {
      client: ctx.kubernetes(),
      logger: ctx.logger,
      retryPolicy: retryPolicyOf(ctx.config),
      onApplied: (outcome) =>
        ctx.io.out(`${outcome.action.padEnd(9)} ${describeRef(outcome.ref)}`),
    });
    if (!result.ok) {
      return reportError(ctx.io, result.error);
    }
    const changed = result.value.filter((o) => o.changed).length;
    ctx.io.out(`${result.value.length} manifest(s) applied, ${changed} changed`);
    return ExitCodes.SUCCESS;
  });
}

// ===== install =====

export interface InstallCommandOptions {
  chart?: string;
  preset?: string;
  namespace?: string;
  set?: string[];
  release?: string;
  repoName?: string;
  repoUrl?: string;
  selector?: string;
}

function buildRelease(ctx: CliContext, options: InstallCommandOptions): ChartReleaseInput {
  const overrides = parseSetFlags(options.set ?? []);
  const wait = {
    timeoutMs: ctx.config.readiness.timeoutMs,
    pollIntervalMs: ctx.config.readiness.pollIntervalMs,
  };

  if (options.preset !== undefined) {
    if (options.chart !== undefined) {
      throw new ValidationError('Provide either a chart or a preset, not both', [
        { field: 'chart', message: 'not allowed together with --preset' },
      ]);
    }
    if (!isChartPreset(options.preset)) {
      throw new ValidationError(`Unknown chart preset ${options.preset}`, [
        { field: 'preset', message: `expected one of: ${Object.keys(CHART_PRESETS).join(', ')}` },
      ]);
    }
    const preset = CHART_PRESETS[options.preset]({
      namespace: options.namespace ?? ctx.config.kubernetes.keplerNamespace,
      ...wait,
    });
    return { ...preset, values: { ...preset.values, ...overrides } };
  }

  const chart = options.chart;
  if (chart === undefined) {
    throw new ValidationError('Provide a chart or a preset', [
      { field: 'chart', message: 'required when no preset is given' },
    ]);
  }
  if (options.repoUrl === undefined) {
    throw new ValidationError(`No repository URL for chart ${chart}`, [
      { field: 'repoUrl', message: 'required when no preset is given' },
    ]);
  }
  return {
    name: options.release ?? chart,
    repoName: options.repoName ?? chart,
    repoURL: options.repoUrl,
    chartName: chart,
    namespace: options.namespace ?? 'default',
    values: overrides,
    waitCondition: {
      labelSelector: options.selector ?? `app.kubernetes.io/name=${chart}`,
      ...wait,
    },
  };
}

/**
 * Post-install listing of the release namespace. Listing failures are shown
 * inline and never change the exit code.
 */
async function printInventory(
  ctx: CliContext,
  client: KubernetesClient,
  namespace: string,
): Promise<void> {
  const section = async (title: string, list: () => Promise<string[]>): Promise<void> => {
    ctx.io.out(`${title} in ${namespace}:`);
    try {
      const lines = await list();
      if (lines.length === 0) {
        ctx.io.out('  (none)');
      }
      lines.forEach((line) => ctx.io.out(`  ${line}`));
    } catch (error) {
      ctx.logger.warn({ error: getErrorMessage(error), title }, 'Inventory listing failed');
      ctx.io.out(`  (unavailable: ${getErrorMessage(error)})`);
    }
  };

  await section('Pods', async () =>
    (await client.listPods(namespace)).map(
      (pod) => `${pod.name}  ${pod.phase}  ${pod.ready ? 'ready' : 'not ready'}`,
    ),
  );
  await section('ServiceMonitors', async () =>
    (await client.listObjects(SERVICE_MONITOR_API, 'ServiceMonitor', { namespace })).map(
      (object) => object.metadata.name,
    ),
  );
  await section('Services', async () =>
    (await client.listObjects('v1', 'Service', { namespace })).map(
      (object) => object.metadata.name,
    ),
  );
}

export function installCommand(ctx: CliContext, options: InstallCommandOptions): Promise<ExitCode> {
  return guarded(ctx, async () => {
    const release = buildRelease(ctx, options);
    const client = ctx.kubernetes();
    const result = await installChart(release, {
      helm: ctx.helm(),
      client,
      logger: ctx.logger,
      retryPolicy: retryPolicyOf(ctx.config),
    });
    if (!result.ok) {
      return reportError(ctx.io, result.error);
    }

    const outcome = result.value;
    const { name, namespace, revision, status } = outcome.release;
    ctx.io.out(
      `Release ${name} in ${namespace}: revision ${revision}, ${status}` +
        (outcome.changed ? '' : ' (unchanged)'),
    );
    for (const warning of outcome.warnings) {
      ctx.io.err(`Warning: ${warning.message}`);
    }
    await printInventory(ctx, client, namespace);
    return ExitCodes.SUCCESS;
  });
}

// ===== diagnose =====

export interface DiagnoseCommandOptions {
  namespace?: string;
  monitoringNamespace?: string;
  output?: string;
}

export function diagnoseCommand(
  ctx: CliContext,
  options: DiagnoseCommandOptions,
): Promise<ExitCode> {
  return guarded(ctx, async () => {
    const parsed = diagnoseSchema.safeParse({
      keplerNamespace: options.namespace ?? ctx.config.kubernetes.keplerNamespace,
      monitoringNamespace:
        options.monitoringNamespace ?? ctx.config.kubernetes.monitoringNamespace,
      metricsPort: ctx.config.kubernetes.keplerMetricsPort,
      output: options.output,
    });
    if (!parsed.success) {
      throw new ValidationError(
        'Invalid diagnose arguments',
        parsed.error.issues.map((issue) => ({
          field: issue.path.join('.'),
          message: issue.message,
        })),
      );
    }
    const params = parsed.data;

    const client = ctx.kubernetes();
    if (!(await client.ping())) {
      ctx.io.err('Error: the Kubernetes API server is unreachable; check --kubeconfig/--context');
      return ExitCodes.UNREACHABLE;
    }

    const result = await runDiagnostics(
      params,
      { client, logger: ctx.logger },
      {
        onCheckComplete: (check) =>
          ctx.logger.info({ check: check.id, verdict: check.verdict }, 'Check finished'),
      },
    );
    if (!result.ok) {
      return reportError(ctx.io, result.error);
    }
    ctx.io.out(renderReport(result.value, params.output));
    return reportPassed(result.value) ? ExitCodes.SUCCESS : ExitCodes.DIAGNOSTICS_FAILED;
  });
}

// ===== profile =====

export function profileGetCommand(ctx: CliContext, name: string): Promise<ExitCode> {
  return guarded(ctx, async () => {
    const registry = await ProfileRegistry.load(ctx.config.profiles.path);
    ctx.io.out(JSON.stringify(toRecord(registry.get(name)), null, 2));
    return ExitCodes.SUCCESS;
  });
}

export function profileValidateCommand(ctx: CliContext, file: string): Promise<ExitCode> {
  return guarded(ctx, async () => {
    const registry = await ProfileRegistry.load(file);
    ctx.io.out(`${file}: ${registry.size} valid profile(s): ${registry.names().join(', ')}`);
    return ExitCodes.SUCCESS;
  });
}

export function profileDeriveCommand(ctx: CliContext): Promise<ExitCode> {
  return guarded(ctx, async () => {
    const hardware = await detectHostHardware(ctx.runner);
    ctx.io.out(
      JSON.stringify({ hardware, stress: deriveStressParameters(hardware) }, null, 2),
    );
    return ExitCodes.SUCCESS;
  });
}

export interface ProfileAddOptions {
  yes?: boolean;
}

export function profileAddCommand(
  ctx: CliContext,
  cluster: string,
  site: string,
  options: ProfileAddOptions,
): Promise<ExitCode> {
  return guarded(ctx, async () => {
    const path = ctx.config.profiles.path;
    const registry = await ProfileRegistry.load(path, { allowMissing: true });
    if (registry.has(cluster)) {
      throw new ValidationError(`Machine profile ${cluster} already exists in ${path}`, [
        { field: cluster, message: 'profiles are append-only; choose another cluster name' },
      ]);
    }

    const profile = createProfile(cluster, site, await detectHostHardware(ctx.runner));
    ctx.io.out(JSON.stringify({ [cluster]: toRecord(profile) }, null, 2));

    if (!options.yes) {
      const accepted = ctx.io.confirm
        ? await ctx.io.confirm(`Add profile ${cluster} to ${path}?`)
        : false;
      if (!accepted) {
        ctx.io.err(
          ctx.io.confirm
            ? 'Aborted; profile not saved'
            : 'Not saved: pass --yes to add a profile non-interactively',
        );
        return ctx.io.confirm ? ExitCodes.SUCCESS : ExitCodes.FAILURE;
      }
    }

    await registry.withProfile(profile).save(path);
    ctx.io.out(`Saved profile ${cluster} to ${path}`);
    return ExitCodes.SUCCESS;
  });
}
