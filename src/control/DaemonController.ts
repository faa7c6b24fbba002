import { CommandRunner, ProcessCommandRunner } from './CommandRunner';

export const DEFAULT_RELOAD_COMMAND: readonly string[] = ['ctdb', 'reloadnodes'];

/**
 * Control operations on the clustering daemon
 */
export interface DaemonController {
  /** Make the daemon re-read the nodes list */
  reloadNodes(): Promise<void>;
}

export interface CtdbControllerOptions {
  runner?: CommandRunner;
  reloadCommand?: readonly string[];
}

export class CtdbController implements DaemonController {
  private readonly runner: CommandRunner;
  private readonly reloadCommand: readonly string[];

  constructor(options: CtdbControllerOptions = {}) {
    this.runner = options.runner ?? new ProcessCommandRunner();
    this.reloadCommand = options.reloadCommand ?? DEFAULT_RELOAD_COMMAND;
  }

  async reloadNodes(): Promise<void> {
    await this.runner.run(this.reloadCommand);
  }
}
