import { loggerFactory } from '@mutables/logger';
import type { BaseLogger } from '@mutables/logger';

import { libraryLogLevel } from '../config.mjs';

let shared: BaseLogger | undefined;

/**
 * Logger used by containers built without a `logger` option.
 * Created on first use so MUTABLES_LOG_LEVEL is read after the host
 * application had a chance to set it.
 */
export function libraryLogger(): BaseLogger {
  shared ??= loggerFactory({ name: 'mutables', level: libraryLogLevel() }).logger;
  return shared;
}
