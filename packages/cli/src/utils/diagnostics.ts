import chalk from 'chalk';
import { collectDiagnostics, type Contract, type Diagnostic } from '@vydoc/core';

export interface DiagnosticSummary {
  warnings: number;
  errors: number;
  /** One line per diagnostic, colored by severity */
  lines: string[];
}

/**
 * Plain `path: subject: message` text for a diagnostic
 */
export function formatDiagnostic(contract: Contract, diagnostic: Diagnostic): string {
  return `${contract.path}: ${diagnostic.subject}: ${diagnostic.message}`;
}

/**
 * Count and format the diagnostics of every contract, in contract order
 */
export function summarizeDiagnostics(contracts: readonly Contract[]): DiagnosticSummary {
  const summary: DiagnosticSummary = { warnings: 0, errors: 0, lines: [] };

  for (const contract of contracts) {
    for (const diagnostic of collectDiagnostics(contract)) {
      const text = formatDiagnostic(contract, diagnostic);
      if (diagnostic.severity === 'error') {
        summary.errors++;
        summary.lines.push(chalk.red(`  ✗ ${text}`));
      } else {
        summary.warnings++;
        summary.lines.push(chalk.yellow(`  ! ${text}`));
      }
    }
  }

  return summary;
}
