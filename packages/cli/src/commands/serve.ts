import { Command, Flags } from '@oclif/core';
import path from 'node:path';
import chalk from 'chalk';
import { DocsNotFoundError } from '@vydoc/docgen';
import { serveUntilInterrupted } from '../utils/serve.js';

/**
 * Command to serve previously built documentation
 *
 * @example
 * ```bash
 * vydoc serve
 * vydoc serve --output ./site --port 8080
 * vydoc serve --open
 * ```
 */
export default class Serve extends Command {
  static override description = 'Serve built documentation on a local server';

  static override examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> --output ./site --port 8080',
    '<%= config.bin %> <%= command.id %> --open',
  ];

  static override flags = {
    output: Flags.string({
      char: 'o',
      description: 'Output directory the documentation was built in',
      default: '.',
    }),
    port: Flags.integer({
      char: 'p',
      description: 'Port number',
      default: 8000,
    }),
    open: Flags.boolean({
      description: 'Open the documentation in the default browser',
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(Serve);
    const htmlDir = path.join(path.resolve(flags.output), 'docs', '_build', 'html');

    this.log('');
    this.log(chalk.green('⚡') + ' ' + chalk.bold.white('vydoc') + ' : ' + chalk.gray('Documentation Server'));
    this.log('');

    try {
      await serveUntilInterrupted(htmlDir, {
        port: flags.port,
        openBrowser: flags.open,
        log: (message) => this.log(message),
      });
    } catch (error) {
      if (error instanceof DocsNotFoundError) {
        this.error(chalk.red(error.message));
      }
      this.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
    }
  }
}
