/**
 * Data model for extracted Vyper contracts
 *
 * Every entity is built once by the parser and never mutated afterwards.
 */

/**
 * Atomic type such as `uint256`, `address` or `String[64]`
 */
export interface ScalarType {
  readonly kind: 'scalar';
  /** Type name exactly as written in the source */
  readonly name: string;
}

/**
 * Fixed-arity ordered grouping, written `(a, b, ...)`
 */
export interface TupleType {
  readonly kind: 'tuple';
  readonly members: readonly VyperType[];
}

/**
 * Upper bound given as an integer literal, exact at any size
 */
export interface IntegerLiteralBound {
  readonly kind: 'literal';
  readonly value: bigint;
}

/**
 * Upper bound naming a module-level constant
 *
 * `constant` is only present once the assembler found a matching declaration.
 */
export interface ConstantReferenceBound {
  readonly kind: 'constant';
  readonly name: string;
  readonly constant?: Constant;
}

export type ArrayBound = IntegerLiteralBound | ConstantReferenceBound;

/**
 * Variable-length sequence with a static upper bound, written `DynArray[T, N]`
 */
export interface DynArrayType {
  readonly kind: 'dynarray';
  readonly element: ScalarType;
  readonly bound: ArrayBound;
}

export type VyperType = ScalarType | TupleType | DynArrayType;

export type DiagnosticSeverity = 'warning' | 'error';

export type DiagnosticCode =
  | 'non-conforming-type'
  | 'malformed-type'
  | 'malformed-declaration'
  | 'duplicate-enum-value';

/**
 * Problem found while extracting an entity
 *
 * Warnings never stop extraction. Errors drop the single field or
 * parameter named by `subject`.
 */
export interface Diagnostic {
  readonly severity: DiagnosticSeverity;
  readonly code: DiagnosticCode;
  /** Dotted path of the offending entity, e.g. `transfer.amount` */
  readonly subject: string;
  readonly message: string;
}

/**
 * Function parameter or struct field
 */
export interface Parameter {
  readonly name: string;
  readonly type: VyperType;
  /** Default value source text (`x: uint256 = 0`) */
  readonly defaultValue?: string;
}

export interface EventField {
  readonly name: string;
  readonly type: ScalarType;
  readonly indexed: boolean;
}

export interface Enum {
  readonly name: string;
  readonly values: readonly string[];
  readonly diagnostics: readonly Diagnostic[];
}

export interface Constant {
  readonly name: string;
  readonly type: ScalarType;
  /** Literal value as written */
  readonly value: string;
  readonly diagnostics: readonly Diagnostic[];
}

export type VariableVisibility = 'public' | 'private';

export interface Variable {
  readonly name: string;
  readonly type: ScalarType;
  readonly visibility: VariableVisibility;
  readonly diagnostics: readonly Diagnostic[];
}

export interface Struct {
  readonly name: string;
  readonly fields: readonly Parameter[];
  readonly diagnostics: readonly Diagnostic[];
}

export interface Event {
  readonly name: string;
  readonly fields: readonly EventField[];
  readonly diagnostics: readonly Diagnostic[];
}

export type FunctionVisibility = 'external' | 'internal';

export interface VyperFunction {
  readonly name: string;
  readonly params: readonly Parameter[];
  readonly returnType: VyperType | null;
  readonly docstring: string | null;
  readonly visibility: FunctionVisibility;
  /** Decorators other than the visibility marker, without `@` (e.g. `view`) */
  readonly decorators: readonly string[];
  readonly diagnostics: readonly Diagnostic[];
}

/**
 * One source file
 *
 * `functions` lists every external function before every internal one,
 * each group in source order.
 */
export interface Contract {
  /** File name without extension */
  readonly name: string;
  /** Path relative to the source directory */
  readonly path: string;
  readonly docstring: string | null;
  readonly enums: readonly Enum[];
  readonly structs: readonly Struct[];
  readonly events: readonly Event[];
  readonly constants: readonly Constant[];
  readonly variables: readonly Variable[];
  readonly functions: readonly VyperFunction[];
}
