/**
 * Helm Client - wraps the helm CLI through the command executor
 *
 * Repository and release operations used by the chart installer. Output is
 * requested as JSON wherever helm offers it.
 */

import type { Logger } from 'pino';
import {
  ChartNotFoundError,
  ClusterUnreachableError,
  ErrorCodes,
  HelmError,
  RepoUnreachableError,
  getErrorMessage,
  type ApplicationError,
} from '../../errors';
import { DEFAULT_TIMEOUTS } from '../../config/defaults';
import type { CommandResult, CommandRunner } from '../command-executor';

export interface HelmRelease {
  name: string;
  namespace: string;
  revision: number;
  status: string;
  chart?: string;
}

export interface InstalledRelease extends HelmRelease {
  /** User-supplied values, as `helm get values -o json` reports them */
  values: Record<string, unknown>;
}

export interface UpgradeInstallRequest {
  release: string;
  chart: string;
  namespace: string;
  values: Record<string, string>;
  createNamespace?: boolean;
}

export interface HelmClient {
  readonly binary: string;
  isAvailable: () => Promise<boolean>;
  addRepo: (name: string, url: string) => Promise<void>;
  updateRepo: (name: string) => Promise<void>;
  /** Resolves undefined when no such release exists */
  getRelease: (name: string, namespace: string) => Promise<InstalledRelease | undefined>;
  upgradeInstall: (request: UpgradeInstallRequest) => Promise<HelmRelease>;
}

export interface HelmClientOptions {
  binary?: string;
  timeoutMs?: number;
}

const REPO_UNREACHABLE_PATTERNS = [
  /is not a valid chart repository or cannot be reached/i,
  /no such host/i,
  /connection refused/i,
  /i\/o timeout/i,
  /TLS handshake timeout/i,
  /context deadline exceeded/i,
  /dial tcp/i,
];

const CHART_NOT_FOUND_PATTERNS = [
  /chart "[^"]*"( version "[^"]*")? not found/i,
  /no chart name found/i,
  /no chart version found/i,
  /repo [^ ]+ not found/i,
];

const RELEASE_NOT_FOUND = /release: not found/i;
const CLUSTER_UNREACHABLE = /Kubernetes cluster unreachable/i;

export interface HelmFailureContext {
  args: string[];
  repoURL?: string;
  chart?: string;
}

/**
 * Map a failed helm invocation onto an error class by its stderr
 */
export function classifyHelmFailure(
  result: CommandResult,
  context: HelmFailureContext,
): ApplicationError {
  const stderr = result.stderr;
  const summary = stderr.split('\n')[0] ?? '';
  const command = `helm ${context.args.slice(0, 2).join(' ')}`;

  if (result.timedOut) {
    return context.repoURL
      ? new RepoUnreachableError(`${command} timed out`, stderr, context.repoURL)
      : new HelmError(`${command} timed out`, ErrorCodes.HELM_ERROR, stderr);
  }
  if (CHART_NOT_FOUND_PATTERNS.some((p) => p.test(stderr))) {
    return new ChartNotFoundError(`Chart not found: ${summary}`, stderr, context.chart);
  }
  if (CLUSTER_UNREACHABLE.test(stderr)) {
    return new ClusterUnreachableError(`${command} could not reach the cluster: ${summary}`);
  }
  if (REPO_UNREACHABLE_PATTERNS.some((p) => p.test(stderr))) {
    return new RepoUnreachableError(
      `Chart repository unreachable: ${summary}`,
      stderr,
      context.repoURL,
    );
  }
  return new HelmError(
    `${command} failed (exit ${result.exitCode}): ${summary}`,
    ErrorCodes.HELM_ERROR,
    stderr,
  );
}

/**
 * Escape a literal value for `--set`: helm splits on `,`, treats `\\` as an
 * escape and reads a leading `{` as a list.
 */
export function escapeSetValue(value: string): string {
  return value.replace(/[\\,]/g, (char) => `\\${char}`).replace(/^\{/, '\\{');
}

/**
 * Expand `--set` values into the `--set k=v` argument list, in key order
 */
export function setArgs(values: Record<string, string>): string[] {
  return Object.keys(values)
    .sort()
    .flatMap((key) => ['--set', `${key}=${escapeSetValue(values[key])}`]);
}

function parseJson(text: string, what: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new HelmError(`Unexpected ${what} output from helm: ${getErrorMessage(error)}`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Release fields from `helm status -o json` / `helm upgrade -o json`
 */
export function parseReleaseJson(text: string): HelmRelease {
  const data = parseJson(text, 'release');
  if (!isRecord(data) || typeof data.name !== 'string') {
    throw new HelmError('helm release output is missing the release name');
  }

  const info = isRecord(data.info) ? data.info : {};
  const chart = isRecord(data.chart) && isRecord(data.chart.metadata) ? data.chart.metadata : {};
  const chartName = typeof chart.name === 'string' ? chart.name : undefined;
  const chartVersion = typeof chart.version === 'string' ? chart.version : undefined;

  const release: HelmRelease = {
    name: data.name,
    namespace: typeof data.namespace === 'string' ? data.namespace : '',
    revision: typeof data.version === 'number' ? data.version : 0,
    status: typeof info.status === 'string' ? info.status : 'unknown',
  };
  if (chartName) {
    release.chart = chartVersion ? `${chartName}-${chartVersion}` : chartName;
  }
  return release;
}

/**
 * Create a helm client bound to one binary
 */
export const createHelmClient = (
  logger: Logger,
  runner: CommandRunner,
  options: HelmClientOptions = {},
): HelmClient => {
  const binary = options.binary ?? 'helm';
  const timeout = options.timeoutMs ?? DEFAULT_TIMEOUTS.command;

  const run = async (args: string[]): Promise<CommandResult> => {
    logger.debug({ args }, 'Running helm');
    return runner.execute(binary, args, { timeout });
  };

  return {
    binary,

    async isAvailable(): Promise<boolean> {
      return runner.isAvailable(binary);
    },

    async addRepo(name: string, url: string): Promise<void> {
      const args = ['repo', 'add', name, url, '--force-update'];
      const result = await run(args);
      if (result.exitCode !== 0) {
        throw classifyHelmFailure(result, { args, repoURL: url });
      }
      logger.info({ repo: name, url }, 'Helm repository registered');
    },

    async updateRepo(name: string): Promise<void> {
      const args = ['repo', 'update', name];
      const result = await run(args);
      if (result.exitCode !== 0) {
        throw classifyHelmFailure(result, { args, repoURL: name });
      }
    },

    async getRelease(name: string, namespace: string): Promise<InstalledRelease | undefined> {
      const statusArgs = ['status', name, '--namespace', namespace, '--output', 'json'];
      const status = await run(statusArgs);
      if (status.exitCode !== 0) {
        if (RELEASE_NOT_FOUND.test(status.stderr)) {
          return undefined;
        }
        throw classifyHelmFailure(status, { args: statusArgs });
      }

      const valuesArgs = ['get', 'values', name, '--namespace', namespace, '--output', 'json'];
      const values = await run(valuesArgs);
      if (values.exitCode !== 0) {
        throw classifyHelmFailure(values, { args: valuesArgs });
      }

      // helm prints `null` when the release has no user-supplied values
      const parsedValues = parseJson(values.stdout || 'null', 'values');
      return {
        ...parseReleaseJson(status.stdout),
        values: isRecord(parsedValues) ? parsedValues : {},
      };
    },

    async upgradeInstall(request: UpgradeInstallRequest): Promise<HelmRelease> {
      const args = [
        'upgrade',
        '--install',
        request.release,
        request.chart,
        '--namespace',
        request.namespace,
        ...(request.createNamespace === false ? [] : ['--create-namespace']),
        ...setArgs(request.values),
        '--output',
        'json',
      ];
      const result = await run(args);
      if (result.exitCode !== 0) {
        throw classifyHelmFailure(result, { args, chart: request.chart });
      }
      const release = parseReleaseJson(result.stdout);
      logger.info(
        { release: release.name, namespace: release.namespace, revision: release.revision },
        'Helm release upgraded',
      );
      return release;
    },
  };
};
