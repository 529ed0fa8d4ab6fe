import type { AddressInfo } from 'node:net';
import chalk from 'chalk';
import open from 'open';
import { serveDocs } from '@vydoc/docgen';

export interface ServeUntilInterruptedOptions {
  port: number;
  /** Open the served URL in the default browser */
  openBrowser?: boolean;
  log: (message: string) => void;
}

/**
 * URL of a listening server, using the port it actually bound
 */
export function serverUrl(address: AddressInfo | string | null, fallbackPort: number): string {
  const port = address !== null && typeof address === 'object' ? address.port : fallbackPort;
  return `http://localhost:${port}`;
}

/**
 * Serve built HTML until the process receives SIGINT
 */
export async function serveUntilInterrupted(htmlDir: string, options: ServeUntilInterruptedOptions): Promise<void> {
  const { port, openBrowser = false, log } = options;
  const server = await serveDocs(htmlDir, { port });
  const url = serverUrl(server.address(), port);

  log(chalk.green('Serving documentation at ') + chalk.cyan(url));
  log(chalk.gray('Press Ctrl+C to stop'));

  if (openBrowser) {
    await open(url);
  }

  await new Promise<void>((resolve, reject) => {
    process.once('SIGINT', () => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  });
}
