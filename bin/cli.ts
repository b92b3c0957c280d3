/**
 * Shared CLI bootstrap for the `modsource` and `modsource-dot` binaries.
 *
 * Usage:
 *   modsource <module> [args...]
 *   modsource-dot <module> [args...]
 *
 * Configuration comes from the environment (see src/config). Errors raised
 * while loading the module are not caught here.
 */

import { createResolverContext } from '../src/context/index.js';
import { runEntryPoint } from '../src/dispatch/index.js';
import { createLogger } from '../src/logging/index.js';

const log = createLogger({ component: 'cli' });

export async function main(label: string, argv: readonly string[]): Promise<void> {
  const context = createResolverContext({ logEvents: true });

  log.debug('Starting entry point', {
    label,
    module_name: argv[0],
    arg_count: Math.max(argv.length - 1, 0),
    search_path_size: context.searchPath.size,
  });

  await runEntryPoint(context, label, argv);
}
