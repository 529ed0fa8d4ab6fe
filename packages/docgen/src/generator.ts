/**
 * Main documentation generator
 */

import { writeFile, mkdir } from 'fs/promises';
import { join, resolve } from 'path';
import type { Contract } from '@vydoc/core';
import type { DocGenConfig, GeneratedPage, GenerationResult } from './types.js';
import { buildConfPy, buildContractPage, buildIndexPage } from './sphinx/page-builder.js';

/**
 * Generate a Sphinx source tree under `<outputDir>/docs`
 */
export async function generateDocs(config: DocGenConfig): Promise<GenerationResult> {
  const docsDir = resolve(config.outputDir, 'docs');
  await mkdir(docsDir, { recursive: true });

  // Pages are flat, so two contracts with one base name would share a page
  const documented = new Map<string, Contract>();
  for (const contract of config.contracts) {
    const first = documented.get(contract.name);
    if (first) {
      console.warn(
        `Warning: Skipping ${contract.path}: a page for ${contract.name} was already generated from ${first.path}`
      );
      continue;
    }
    documented.set(contract.name, contract);
  }
  const contracts = [...documented.values()];

  const pages: GeneratedPage[] = [
    await buildConfPy(config.project),
    await buildIndexPage(contracts, config.title),
  ];
  for (const contract of contracts) {
    pages.push(await buildContractPage(contract, config.vocabulary));
  }

  const files: string[] = [];
  for (const page of pages) {
    const pagePath = join(docsDir, page.path);
    await writeFile(pagePath, page.content, 'utf-8');
    files.push(pagePath);
  }

  return { docsDir, files };
}
