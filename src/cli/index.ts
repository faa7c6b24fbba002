#!/usr/bin/env node
import { createLogger } from '../common/logger';
import { isAbortError } from '../common/utils';
import { buildProgram } from './program';

/**
 * Run the fleet-membership command line; SIGINT and SIGTERM abort the
 * running operation.
 */
export async function main(argv: string[] = process.argv): Promise<number> {
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    controller.abort(new Error(`received ${signal}`));
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    await buildProgram({ signal: controller.signal }).parseAsync(argv);
    return 0;
  } catch (error) {
    const logger = createLogger({ component: 'fleet-membership' });
    if (isAbortError(error, controller.signal)) {
      logger.warn('interrupted');
    } else {
      logger.error(error instanceof Error ? error.message : String(error));
    }
    return 1;
  } finally {
    process.removeListener('SIGINT', onSignal);
    process.removeListener('SIGTERM', onSignal);
  }
}

if (require.main === module) {
  main().then(code => {
    process.exitCode = code;
  }, (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
}
