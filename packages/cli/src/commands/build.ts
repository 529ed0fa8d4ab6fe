// Build command - Generate Sphinx documentation from Vyper contracts
// Parses every contract under a directory, writes the Sphinx sources and builds HTML

import { Args, Command, Flags } from '@oclif/core';
import { resolve } from 'path';
import chalk from 'chalk';
import ora from 'ora';
import { parseContracts, DEFAULT_EXTENSIONS } from '@vydoc/parser';
import { buildHtml, generateDocs, DEFAULT_INDEX_TITLE, SphinxBuildError } from '@vydoc/docgen';
import type { Contract } from '@vydoc/core';
import { summarizeDiagnostics } from '../utils/diagnostics.js';
import { serveUntilInterrupted } from '../utils/serve.js';

export default class Build extends Command {
  static override description = 'Generate Sphinx documentation for Vyper contracts';

  static override examples = [
    '<%= config.bin %> <%= command.id %> ./contracts',
    '<%= config.bin %> <%= command.id %> ./contracts --output ./site',
    '<%= config.bin %> <%= command.id %> ./contracts --serve --port 8080',
    '<%= config.bin %> <%= command.id %> ./contracts --no-html',
  ];

  static override args = {
    contractsDir: Args.string({
      description: 'Directory containing Vyper contracts',
      required: true,
    }),
  };

  static override flags = {
    output: Flags.string({
      char: 'o',
      description: 'Output directory for documentation',
      default: '.',
    }),
    serve: Flags.boolean({
      char: 's',
      description: 'Serve documentation after building',
      default: false,
    }),
    port: Flags.integer({
      char: 'p',
      description: 'Port for the documentation server',
      default: 8000,
    }),
    open: Flags.boolean({
      description: 'Open the served documentation in the default browser (with --serve)',
      default: false,
    }),
    html: Flags.boolean({
      description: 'Build HTML with sphinx-build after writing the sources',
      default: true,
      allowNo: true,
    }),
    extension: Flags.string({
      char: 'e',
      description: 'Contract file extension (repeatable)',
      multiple: true,
      default: DEFAULT_EXTENSIONS,
    }),
    title: Flags.string({
      description: 'Title of the index page',
      default: DEFAULT_INDEX_TITLE,
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Build);
    const outputDir = resolve(flags.output);

    // Display banner
    this.log('');
    this.log(chalk.green('⚡') + ' ' + chalk.bold.white('vydoc') + ' : ' + chalk.gray('Build Documentation'));
    this.log('');

    // Parse contracts
    const spinner = ora('Parsing contracts...').start();
    let contracts: Contract[];
    try {
      contracts = await parseContracts(args.contractsDir, { extensions: flags.extension });
    } catch (error) {
      spinner.fail(chalk.red('Could not read contracts'));
      this.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
    }

    if (contracts.length === 0) {
      spinner.warn(chalk.yellow(`No contracts found in ${args.contractsDir}`));
    } else {
      spinner.succeed(chalk.green(`Parsed ${contracts.length} contract${contracts.length !== 1 ? 's' : ''}`));
    }

    for (const contract of contracts) {
      this.log(chalk.gray(`  - ${contract.path}`));
    }

    const diagnostics = summarizeDiagnostics(contracts);
    if (diagnostics.lines.length > 0) {
      this.log('');
      this.log(
        chalk.yellow(`${diagnostics.warnings} warning${diagnostics.warnings !== 1 ? 's' : ''}`) +
          ', ' +
          chalk.red(`${diagnostics.errors} error${diagnostics.errors !== 1 ? 's' : ''}`)
      );
      for (const line of diagnostics.lines) {
        this.log(line);
      }
    }
    this.log('');

    // Generate Sphinx sources
    spinner.start('Generating Sphinx sources...');
    const { docsDir, files } = await generateDocs({ contracts, outputDir, title: flags.title });
    spinner.succeed(chalk.green(`Wrote ${files.length} files to ${docsDir}`));

    if (!flags.html) {
      if (flags.serve) {
        this.log(chalk.yellow('Skipping --serve: no HTML was built (--no-html)'));
      }
      this.log('');
      this.log(chalk.green('✨ Done!'));
      return;
    }

    // Build HTML
    spinner.start('Building HTML with sphinx-build...');
    let htmlDir: string;
    try {
      htmlDir = await buildHtml(docsDir);
    } catch (error) {
      spinner.fail(chalk.red('sphinx-build failed'));
      if (error instanceof SphinxBuildError && error.stderr) {
        this.log(chalk.red(error.stderr));
      }
      this.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
    }
    spinner.succeed(chalk.green('HTML documentation built'));

    // Summary
    this.log('');
    this.log(chalk.green('✨ Done!'));
    this.log('');
    this.log(chalk.gray('Output directory:'));
    this.log(chalk.cyan(`  ${htmlDir}`));
    this.log('');

    if (flags.serve) {
      await serveUntilInterrupted(htmlDir, {
        port: flags.port,
        openBrowser: flags.open,
        log: (message) => this.log(message),
      });
    }
  }
}
