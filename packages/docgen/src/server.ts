/**
 * Local server for the built HTML documentation
 */

import { createServer, type Server } from 'http';
import { stat } from 'fs/promises';
import { resolve } from 'path';
import express, { type Express, type Request, type Response } from 'express';
import { DocsNotFoundError } from './errors.js';

export interface ServeOptions {
  /** Port to listen on (default: 8000, 0 picks a free one) */
  port?: number;
  /** Interface to bind (default: all) */
  host?: string;
}

/**
 * Express app serving `root` as static files. Directories answer with their
 * index.html; anything else that is not a file under `root` gets a 404.
 */
export function createDocsApp(root: string): Express {
  const app = express();

  app.use(express.static(root));
  app.use((_request: Request, response: Response) => {
    response.status(404).type('text/plain').send('File Not Found!\n');
  });

  return app;
}

/**
 * Serve a built HTML directory until the returned server is closed
 *
 * @throws DocsNotFoundError if the directory does not exist
 */
export async function serveDocs(htmlDir: string, options: ServeOptions = {}): Promise<Server> {
  const root = resolve(htmlDir);
  const info = await stat(root).catch(() => null);
  if (!info?.isDirectory()) {
    throw new DocsNotFoundError(htmlDir);
  }

  const server = createServer(createDocsApp(root));

  await new Promise<void>((resolveListen, rejectListen) => {
    server.once('error', rejectListen);
    server.listen(options.port ?? 8000, options.host, () => {
      server.off('error', rejectListen);
      resolveListen();
    });
  });

  return server;
}
