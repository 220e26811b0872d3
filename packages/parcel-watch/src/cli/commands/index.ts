/**
 * Commands Index
 *
 * - detect: run a comparison
 * - changes, change, parcel, search, watched: read-only queries
 */

import type { Command } from 'commander';
import { registerChangeCommand } from './change.js';
import { registerChangesCommand } from './changes.js';
import { registerDetectCommand } from './detect.js';
import { registerParcelCommand } from './parcel.js';
import { registerSearchCommand } from './search.js';
import { registerWatchedCommand } from './watched.js';

export function registerCommands(program: Command): void {
  registerDetectCommand(program);
  registerChangesCommand(program);
  registerChangeCommand(program);
  registerParcelCommand(program);
  registerSearchCommand(program);
  registerWatchedCommand(program);
}
