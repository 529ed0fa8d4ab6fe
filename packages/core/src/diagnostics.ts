import type { Contract, Diagnostic, DiagnosticCode } from './types.js';

export function warning(code: DiagnosticCode, subject: string, message: string): Diagnostic {
  return { severity: 'warning', code, subject, message };
}

export function fieldError(code: DiagnosticCode, subject: string, message: string): Diagnostic {
  return { severity: 'error', code, subject, message };
}

/**
 * Flatten every diagnostic of a contract, in section order
 */
export function collectDiagnostics(contract: Contract): Diagnostic[] {
  return [
    ...contract.enums,
    ...contract.structs,
    ...contract.events,
    ...contract.constants,
    ...contract.variables,
    ...contract.functions,
  ].flatMap((entity) => entity.diagnostics);
}
