#!/usr/bin/env node
/**
 * Kepler Reconciler CLI
 * Command-line interface for applying access policies, installing the Kepler
 * chart, diagnosing Prometheus scraping and managing machine profiles
 */

import { program } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { exit, argv, stdin, stderr } from 'node:process';
import { createInterface } from 'node:readline/promises';
import { z } from 'zod';
import { createAppConfig, withOverrides, getConfigSummary } from '../config';
import { createLogger } from '../lib/logger';
import { CommandExecutor } from '../infrastructure/command-executor';
import { createHelmClient } from '../infrastructure/helm';
import { createKubernetesClient, type KubernetesClient } from '../infrastructure/kubernetes';
import {
  applyCommand,
  diagnoseCommand,
  installCommand,
  profileAddCommand,
  profileDeriveCommand,
  profileGetCommand,
  profileValidateCommand,
  reportError,
  type CliContext,
  type CliIO,
  type InstallCommandOptions,
} from './commands';
import type { ExitCode } from './exit-codes';

const packageJsonPath = __dirname.includes('dist')
  ? join(__dirname, '../../../package.json') // dist/src/cli/ -> root
  : join(__dirname, '../../package.json'); // src/cli/ -> root
const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));

interface GlobalOptions {
  kubeconfig?: string;
  context?: string;
  logLevel?: string;
  profiles?: string;
}

async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: stdin, output: stderr });
  try {
    const answer = await rl.question(`${question} [y/N] `);
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    rl.close();
  }
}

const io: CliIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
  ...(stdin.isTTY ? { confirm } : {}),
};

function createContext(): CliContext {
  const globals = program.opts<GlobalOptions>();
  const config = withOverrides(createAppConfig(), {
    kubeconfig: globals.kubeconfig,
    context: globals.context,
    logLevel: globals.logLevel,
    profilesPath: globals.profiles,
  });
  const logger = createLogger({ name: 'cli', level: config.server.logLevel });
  logger.debug({ config: getConfigSummary(config) }, 'Configuration loaded');

  const runner = new CommandExecutor(logger);
  let client: KubernetesClient | undefined;

  return {
    config,
    logger,
    io,
    runner,
    kubernetes: () => {
      if (!client) {
        client = createKubernetesClient(logger, {
          kubeconfig: config.kubernetes.kubeconfig,
          context: config.kubernetes.context,
        });
      }
      return client;
    },
    helm: () =>
      createHelmClient(logger, runner, {
        binary: config.helm.binary,
        timeoutMs: config.helm.commandTimeoutMs,
      }),
  };
}

/**
 * Run a handler and record its exit code; configuration errors surface here
 */
async function run(handler: (ctx: CliContext) => Promise<ExitCode>): Promise<void> {
  let code: ExitCode;
  try {
    code = await handler(createContext());
  } catch (error) {
    code = reportError(io, error);
  }
  process.exitCode = code;
}

const collect = (value: string, previous: string[]): string[] => [...previous, value];

program
  .name('kepler-reconciler')
  .description('Reconcile and diagnose a Kepler power-monitoring stack on Kubernetes')
  .version(packageJson.version)
  .option('--kubeconfig <path>', 'kubeconfig file (default: $KUBECONFIG or ~/.kube/config)')
  .option('--context <name>', 'kubeconfig context to use (default: current context)')
  .option('--log-level <level>', 'logging level: trace, debug, info, warn, error, silent')
  .option('--profiles <path>', 'machine profiles file (default: configs/machine_profiles.json)')
  .showHelpAfterError();

program
  .command('apply')
  .description('Create or update the manifests of a file or a built-in preset')
  .argument('[file]', 'manifest file (YAML or JSON, multi-document)')
  .option('--preset <name>', 'built-in manifest set: kepler-access, monitoring-access')
  .action(async (file: string | undefined, options: { preset?: string }) => {
    await run((ctx) => applyCommand(ctx, { file, preset: options.preset }));
  });

program
  .command('install')
  .description('Install or upgrade a Helm chart and wait for its pods')
  .argument('[chart]', 'chart name inside the repository')
  .option('--preset <name>', 'built-in release: kepler')
  .option('-n, --namespace <namespace>', 'release namespace')
  .option('--set <key=value>', 'chart value, repeatable', collect, [])
  .option('--release <name>', 'release name (default: chart name)')
  .option('--repo-name <name>', 'local repository alias (default: chart name)')
  .option('--repo-url <url>', 'chart repository URL')
  .option('--selector <selector>', 'label selector of the pods to wait for')
  .action(async (chart: string | undefined, options: Omit<InstallCommandOptions, 'chart'>) => {
    await run((ctx) => installCommand(ctx, { ...options, chart }));
  });

program
  .command('diagnose')
  .description('Check why Prometheus is or is not scraping Kepler')
  .option('-n, --namespace <namespace>', 'Kepler namespace')
  .option('--monitoring-namespace <namespace>', 'Prometheus namespace')
  .option('-o, --output <format>', 'report format: text or json', 'text')
  .action(
    async (options: { namespace?: string; monitoringNamespace?: string; output?: string }) => {
      await run((ctx) => diagnoseCommand(ctx, options));
    },
  );

const profile = program.command('profile').description('Machine profiles for stress tests');

profile
  .command('get')
  .description('Print one profile')
  .argument('<name>', 'cluster name')
  .action(async (name: string) => {
    await run((ctx) => profileGetCommand(ctx, name));
  });

profile
  .command('validate')
  .description('Validate a profiles file, listing every violation')
  .argument('<file>', 'profiles JSON file')
  .action(async (file: string) => {
    await run((ctx) => profileValidateCommand(ctx, file));
  });

profile
  .command('derive')
  .description('Detect this host and print the derived stress parameters')
  .action(async () => {
    await run((ctx) => profileDeriveCommand(ctx));
  });

profile
  .command('add')
  .description('Detect this host and append it as a new profile')
  .argument('<cluster>', 'cluster name')
  .argument('<site>', 'site name')
  .option('-y, --yes', 'skip the confirmation prompt')
  .action(async (cluster: string, site: string, options: { yes?: boolean }) => {
    await run((ctx) => profileAddCommand(ctx, cluster, site, options));
  });

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled rejection:', reason);
  exit(1);
});

program.parseAsync(argv).catch((error: unknown) => {
  process.exitCode = reportError(io, error);
});
