/** An external daemon control command failed to run or exited unsuccessfully. */
export class ControlCommandError extends Error {
  constructor(
    readonly command: readonly string[],
    readonly exitCode: number | null,
    readonly signal: NodeJS.Signals | null,
    cause?: unknown
  ) {
    super(ControlCommandError.describe(command, exitCode, signal));
    this.name = 'ControlCommandError';
    this.cause = cause;
  }

  private static describe(command: readonly string[], exitCode: number | null, signal: NodeJS.Signals | null): string {
    const cli = command.join(' ');
    if (signal) {
      return `Command "${cli}" was terminated by ${signal}.`;
    }
    if (exitCode === null) {
      return `Command "${cli}" could not be started.`;
    }
    return `Command "${cli}" exited with status ${exitCode}.`;
  }
}
