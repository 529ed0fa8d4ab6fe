/**
 * Sphinx page builder using Handlebars templates
 */

import Handlebars from 'handlebars';
import { readFile } from 'fs/promises';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import {
  DEFAULT_VOCABULARY,
  formatType,
  type Contract,
  type Enum,
  type TypeVocabulary,
  type VyperFunction,
} from '@vydoc/core';
import type { GeneratedPage, ProjectConfig } from '../types.js';
import { registerHelpers } from '../templates/helpers.js';

// Get __dirname equivalent in ESM
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const TEMPLATES_DIR = join(__dirname, '..', 'templates');

export const DEFAULT_INDEX_TITLE = 'Vyper Smart Contracts Documentation';

export const DEFAULT_PROJECT: ProjectConfig = {
  name: 'Vyper Smart Contracts',
  author: 'Vyper Developer',
  copyright: String(new Date().getFullYear()),
  theme: 'sphinx_rtd_theme',
};

interface NamedType {
  name: string;
  type: string;
}

interface FunctionView {
  signature: string;
  docstring: string | null;
}

/**
 * Contract with every type already printed, as the contract page template reads it
 */
export interface ContractView {
  name: string;
  docstring: string | null;
  enums: readonly Enum[];
  structs: Array<{ name: string; fields: NamedType[] }>;
  events: Array<{ name: string; fields: NamedType[] }>;
  constants: Array<NamedType & { value: string }>;
  variables: NamedType[];
  externalFunctions: FunctionView[];
  internalFunctions: FunctionView[];
}

const handlebars = Handlebars.create();

let compiledContractPage: HandlebarsTemplateDelegate<ContractView> | null = null;
let compiledIndexPage: HandlebarsTemplateDelegate<{ title: string; contracts: readonly Contract[] }> | null = null;
let compiledConfPy: HandlebarsTemplateDelegate<ProjectConfig> | null = null;

async function loadTemplate(name: string): Promise<string> {
  return readFile(join(TEMPLATES_DIR, name), 'utf-8');
}

/**
 * Initialize Handlebars templates
 */
async function initializeTemplates(): Promise<void> {
  if (compiledContractPage && compiledIndexPage && compiledConfPy) {
    return;
  }

  registerHelpers(handlebars);
  handlebars.registerPartial('function-section', await loadTemplate('function-section.hbs'));

  // Output is reStructuredText and conf.py source, never HTML
  compiledContractPage = handlebars.compile(await loadTemplate('contract-page.hbs'), { noEscape: true });
  compiledIndexPage = handlebars.compile(await loadTemplate('index.rst.hbs'), { noEscape: true });
  compiledConfPy = handlebars.compile(await loadTemplate('conf.py.hbs'), { noEscape: true });
}

/**
 * `name(a: T, b: U = 1) -> R`
 */
export function functionSignature(func: VyperFunction, vocabulary: TypeVocabulary = DEFAULT_VOCABULARY): string {
  const params = func.params
    .map((param) => {
      const declaration = `${param.name}: ${formatType(param.type, vocabulary)}`;
      return param.defaultValue === undefined ? declaration : `${declaration} = ${param.defaultValue}`;
    })
    .join(', ');
  const returns = func.returnType ? ` -> ${formatType(func.returnType, vocabulary)}` : '';

  return `${func.name}(${params})${returns}`;
}

/**
 * Print every type of a contract for the page template
 */
export function toContractView(contract: Contract, vocabulary: TypeVocabulary = DEFAULT_VOCABULARY): ContractView {
  const toFunctionView = (func: VyperFunction): FunctionView => ({
    signature: functionSignature(func, vocabulary),
    docstring: func.docstring,
  });

  return {
    name: contract.name,
    docstring: contract.docstring,
    enums: contract.enums,
    structs: contract.structs.map((struct) => ({
      name: struct.name,
      fields: struct.fields.map((field) => ({ name: field.name, type: formatType(field.type, vocabulary) })),
    })),
    events: contract.events.map((event) => ({
      name: event.name,
      fields: event.fields.map((field) => ({
        name: field.name,
        type: field.indexed ? `indexed(${field.type.name})` : field.type.name,
      })),
    })),
    constants: contract.constants.map((constant) => ({
      name: constant.name,
      type: constant.type.name,
      value: constant.value,
    })),
    variables: contract.variables.map((variable) => ({
      name: variable.name,
      type: variable.visibility === 'public' ? `public(${variable.type.name})` : variable.type.name,
    })),
    externalFunctions: contract.functions.filter((f) => f.visibility === 'external').map(toFunctionView),
    internalFunctions: contract.functions.filter((f) => f.visibility === 'internal').map(toFunctionView),
  };
}

/**
 * Build a contract documentation page
 */
export async function buildContractPage(
  contract: Contract,
  vocabulary: TypeVocabulary = DEFAULT_VOCABULARY
): Promise<GeneratedPage> {
  await initializeTemplates();

  if (!compiledContractPage) {
    throw new Error('Template not initialized');
  }

  return {
    path: `${contract.name}.rst`,
    content: compiledContractPage(toContractView(contract, vocabulary)),
  };
}

/**
 * Build the index page with a toctree entry per contract
 */
export async function buildIndexPage(
  contracts: readonly Contract[],
  title: string = DEFAULT_INDEX_TITLE
): Promise<GeneratedPage> {
  await initializeTemplates();

  if (!compiledIndexPage) {
    throw new Error('Template not initialized');
  }

  return {
    path: 'index.rst',
    content: compiledIndexPage({ title, contracts }),
  };
}

/**
 * Build the Sphinx configuration file
 */
export async function buildConfPy(project: Partial<ProjectConfig> = {}): Promise<GeneratedPage> {
  await initializeTemplates();

  if (!compiledConfPy) {
    throw new Error('Template not initialized');
  }

  return {
    path: 'conf.py',
    content: compiledConfPy({ ...DEFAULT_PROJECT, ...project }),
  };
}
