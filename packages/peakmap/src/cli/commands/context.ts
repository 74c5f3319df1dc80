/**
 * Shared state handed to every command
 *
 * @module cli/commands/context
 */

import type { CLIConfig } from '../lib/config.js';
import type { CLILogger } from '../lib/logger.js';

export interface CommandContext {
  readonly config: CLIConfig;
  readonly logger: CLILogger;
}
