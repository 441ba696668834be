/**
 * @module cli
 * Process wrapper around {@link main}: fatal errors exit with status 1.
 */

import { formatFatalError, main } from './index';

main(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (error: unknown) => {
    // eslint-disable-next-line no-console
    console.error(formatFatalError(error));
    process.exit(1);
  },
);
