/**
 * vydoc command line
 */

import Build from './commands/build.js';
import Serve from './commands/serve.js';

export const commands = {
  build: Build,
  serve: Serve,
};

export { formatDiagnostic, summarizeDiagnostics } from './utils/diagnostics.js';
export type { DiagnosticSummary } from './utils/diagnostics.js';
export { serveUntilInterrupted, serverUrl } from './utils/serve.js';
export type { ServeUntilInterruptedOptions } from './utils/serve.js';
