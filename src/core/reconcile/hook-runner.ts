import { spawn, type ChildProcessByStdio } from 'child_process';
import type { Readable } from 'stream';
import which from 'which';
import type { HookCommand } from '../categories/definitions.js';
import type { HookRunner } from './types.js';
import type { Environment } from '../../utils/env-expansion.js';
import { HookExecutionError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface ProcessHookRunnerOptions {
  cwd?: string;
  env?: Environment;
}

export interface SpawnInvocation {
  file: string;
  args: string[];
  shell: boolean;
}

const WINDOWS_BATCH_FILE = /\.(cmd|bat)$/i;

function quoteForCmd(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

/**
 * Windows batch files cannot be spawned directly; they go through cmd.exe with
 * every argument quoted.
 */
export function buildSpawnInvocation(
  resolved: string,
  args: readonly string[],
  platform: NodeJS.Platform = process.platform
): SpawnInvocation {
  if (platform === 'win32' && WINDOWS_BATCH_FILE.test(resolved)) {
    return { file: quoteForCmd(resolved), args: args.map(quoteForCmd), shell: true };
  }
  return { file: resolved, args: [...args], shell: false };
}

/**
 * Runs hooks as child processes. The executable is looked up on PATH at run
 * time; stdout and stderr are captured together in arrival order.
 */
export class ProcessHookRunner implements HookRunner {
  constructor(private readonly options: ProcessHookRunnerOptions = {}) {}

  private get env(): Environment {
    return this.options.env ?? process.env;
  }

  async resolve(command: HookCommand): Promise<string | undefined> {
    const resolved = await which(command.args[0], { nothrow: true, path: this.env.PATH });
    return resolved ?? undefined;
  }

  async run(command: HookCommand): Promise<string> {
    const [executable, ...args] = command.args;
    const env = this.env;

    const resolved = await this.resolve(command);
    if (!resolved) {
      throw new HookExecutionError(command.args, null, '', `could not run: '${executable}' was not found on PATH`);
    }
    logger.debug(`Running hook ${resolved}`, { args });
    const invocation = buildSpawnInvocation(resolved, args);

    return new Promise<string>((resolve, reject) => {
      const chunks: Buffer[] = [];
      const collected = (): string => Buffer.concat(chunks).toString('utf8');

      let child: ChildProcessByStdio<null, Readable, Readable>;
      try {
        child = spawn(invocation.file, invocation.args, {
          cwd: this.options.cwd,
          env,
          shell: invocation.shell,
          stdio: ['ignore', 'pipe', 'pipe']
        });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        reject(new HookExecutionError(command.args, null, '', `could not start: ${message}`));
        return;
      }

      child.stdout.on('data', (chunk: Buffer) => chunks.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => chunks.push(chunk));

      child.on('error', (error) => {
        reject(new HookExecutionError(command.args, null, collected(), `could not start: ${error.message}`));
      });

      child.on('close', (code) => {
        if (code === 0) {
          resolve(collected());
        } else {
          reject(new HookExecutionError(command.args, code, collected()));
        }
      });
    });
  }
}
