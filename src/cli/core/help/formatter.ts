/**
 * Help Text Formatter
 *
 * Role:
 *   Format and display help information.
 *
 * Responsibilities:
 *   - Generate help text with the accepted network names and defaults
 *   - Escape/sanitize injected tokens for display
 */

import { NETWORK_NAMES } from '../../../lint/types.ts';
import { DEFAULT_ENDPOINT } from '../../config/config.ts';

/**
 * Sanitize a token for inclusion in help output.
 *
 * Removes non-printable or non-ASCII characters to avoid control
 * characters or terminal escape sequences in the help text.
 */
export const escapeHelpToken = (value: string): string =>
  // Keep only printable ASCII characters (remove control chars and emoji)
  value.replaceAll(/[^ -~]/g, '');

/**
 * Static help message template. The `[NETWORKS]` and `[ENDPOINT]`
 * placeholders are filled in by `showHelp()`.
 */
const HELP_MESSAGE = `
Leo Lint: compile and format a Leo package

USAGE:
  leo-lint [OPTIONS]

OPTIONS:
  --path <dir>          Package to lint (default: current directory)
  --home <dir>          Home directory for the registry cache (default: ~/.aleo)
  --endpoint <url>      Registry endpoint for network dependencies
                        (default: [ENDPOINT])
  --network <name>      Network passed to the compiler (default: testnet)
                        Available: [NETWORKS]
  --compiler <binary>   Compiler binary (default: leo)
  --log-dir <path>      Directory for log files, inside the package (default: ./logs)
  --structured-logs     Write one JSON object per log line
  --raw-logs            Write compiler output byte for byte
  --verbose             Print the resolved settings
  -h, --help            Show this help message
  -v, --version         Show version number

ENVIRONMENT:
  LEO_LINT_ENDPOINT              Default for --endpoint
  LEO_LINT_NETWORK               Default for --network
  LEO_LINT_COMPILER              Default for --compiler
  LEO_LINT_COMPILER_TIMEOUT_MS   Per-file compile timeout in milliseconds
  LEO_LINT_MAX_DEPTH             Deepest directory level searched under src/

EXAMPLES:
  leo-lint
  leo-lint --path ./programs/token --network mainnet
  leo-lint --compiler ./bin/leo --log-dir ./build-logs

NOTES:
  • Dependencies are compiled and formatted one at a time, the root last
  • The first failure stops the run; later dependencies are skipped
  • Sources are only rewritten after every file of a program compiles
`;

/**
 * Build the help message and inject the accepted values.
 */
export function showHelp(): string {
  const networks = NETWORK_NAMES.map((name) => escapeHelpToken(name)).join(', ');
  return HELP_MESSAGE.replace('[NETWORKS]', networks).replace(
    '[ENDPOINT]',
    escapeHelpToken(DEFAULT_ENDPOINT),
  );
}
