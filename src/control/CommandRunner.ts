import { spawn } from 'child_process';
import { Logger, createLogger } from '../common/logger';
import { ControlCommandError } from './errors';

/**
 * Runs an external command to completion, rejecting if it does not succeed
 */
export interface CommandRunner {
  run(command: readonly string[]): Promise<void>;
}

export interface ProcessCommandRunnerOptions {
  /** Prepended to every command, e.g. ["nsenter", "-t", "1"] */
  prefix?: readonly string[];
  logger?: Logger;
}

export class ProcessCommandRunner implements CommandRunner {
  private readonly prefix: readonly string[];
  private readonly logger: Logger;

  constructor(options: ProcessCommandRunnerOptions = {}) {
    this.prefix = options.prefix ?? [];
    this.logger = options.logger ?? createLogger({ component: 'command' });
  }

  run(command: readonly string[]): Promise<void> {
    const [file, ...args] = [...this.prefix, ...command];
    if (file === undefined) {
      return Promise.reject(new ControlCommandError(command, null, null));
    }
    const cli = [file, ...args];
    this.logger.info(`running: ${cli.join(' ')}`);

    return new Promise((resolve, reject) => {
      const child = spawn(file, args, { stdio: ['ignore', 'inherit', 'pipe'] });
      const stderrChunks: string[] = [];

      child.stderr?.on('data', (chunk: Buffer) => {
        stderrChunks.push(chunk.toString());
      });
      child.once('error', error => {
        reject(new ControlCommandError(cli, null, null, error));
      });
      child.once('close', (code, signal) => {
        if (code === 0) {
          resolve();
          return;
        }
        const stderr = stderrChunks.join('').trim();
        if (stderr) {
          this.logger.warn(`${cli.join(' ')} stderr: ${stderr}`);
        }
        reject(new ControlCommandError(cli, code, signal));
      });
    });
  }
}
