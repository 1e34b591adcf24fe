import logger from '../../core/utils/logger.js';
import { getErrorMessage, isDocsError } from '../../core/utils/errors.js';

/**
 * Wrap an async command function so any un-handled error is logged and the
 * process exits with a non-zero code. The function may return an exit code.
 * Use it like:
 *   program.command('foo').action((...args) => run(() => foo(args)))
 */
export function run(fn: () => Promise<number | void>): void {
  fn()
    .then(code => {
      if (typeof code === 'number') process.exitCode = code;
    })
    .catch((err: unknown) => {
      if (err instanceof Error && err.message.includes('SIGINT')) {
        logger.warn('Operation cancelled');
        process.exit(0);
      }
      if (isDocsError(err)) {
        logger.error({ code: err.code, context: err.context }, err.message);
      } else if (err instanceof Error) {
        logger.error(err.message);
      } else {
        logger.error(getErrorMessage(err));
      }
      process.exit(1);
    });
}
