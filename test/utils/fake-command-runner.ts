/**
 * Scripted CommandRunner: responses are matched on the command and an
 * argument prefix, first match wins
 */

import type {
  CommandOptions,
  CommandResult,
  CommandRunner,
} from '../../src/infrastructure/command-executor';

interface Response {
  command: string;
  prefix: string[];
  result: CommandResult | Error;
  once: boolean;
}

export const ok = (stdout = ''): CommandResult => ({ stdout, stderr: '', exitCode: 0 });

export const failed = (stderr: string, exitCode = 1): CommandResult => ({
  stdout: '',
  stderr,
  exitCode,
});

export class FakeCommandRunner implements CommandRunner {
  readonly calls: Array<{ command: string; args: string[] }> = [];
  readonly available = new Set<string>();
  private readonly responses: Response[] = [];

  constructor(available: string[] = []) {
    available.forEach((command) => this.available.add(command));
  }

  /** Answer every matching call */
  on(command: string, prefix: string[], result: CommandResult | Error): this {
    this.responses.push({ command, prefix, result, once: false });
    return this;
  }

  /** Answer the next matching call only */
  once(command: string, prefix: string[], result: CommandResult | Error): this {
    this.responses.push({ command, prefix, result, once: true });
    return this;
  }

  async execute(
    command: string,
    args: string[] = [],
    _options?: CommandOptions,
  ): Promise<CommandResult> {
    this.calls.push({ command, args });
    const index = this.responses.findIndex(
      (r) => r.command === command && r.prefix.every((arg, i) => args[i] === arg),
    );
    const response = this.responses[index];
    if (!response) {
      return failed(`unexpected command: ${command} ${args.join(' ')}`, 127);
    }
    if (response.once) {
      this.responses.splice(index, 1);
    }
    if (response.result instanceof Error) {
      throw response.result;
    }
    return response.result;
  }

  async isAvailable(command: string): Promise<boolean> {
    return this.available.has(command);
  }
}
