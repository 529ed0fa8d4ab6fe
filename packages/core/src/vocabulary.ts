/**
 * Scalar type vocabulary
 *
 * The vocabulary is a plain immutable value handed to the type resolver, so
 * callers (and tests) can swap it without touching shared state.
 */

export interface TypeVocabulary {
  /** Names that resolve to a scalar as written */
  readonly scalars: ReadonlySet<string>;
  /** Scalars that may also carry a length, e.g. `String[64]` */
  readonly sizedScalars: ReadonlySet<string>;
  /** Marker introducing a bounded dynamic array, e.g. `DynArray` */
  readonly arrayTag: string;
}

export interface VocabularyOptions {
  scalars: Iterable<string>;
  sizedScalars?: Iterable<string>;
  arrayTag?: string;
}

const SIZED_SCALAR_PATTERN = /^([A-Za-z_]\w*)\[\s*(\d+)\s*\]$/;

/**
 * Build a frozen vocabulary
 * @example createVocabulary({ scalars: ['felt'], arrayTag: 'List' })
 */
export function createVocabulary(options: VocabularyOptions): TypeVocabulary {
  return Object.freeze({
    scalars: new Set(options.scalars),
    sizedScalars: new Set(options.sizedScalars ?? []),
    arrayTag: options.arrayTag ?? 'DynArray',
  });
}

/** Every 8-bit width from 8 to 256 */
const INTEGER_WIDTHS = Array.from({ length: 32 }, (_, i) => 8 * (i + 1));

export const DEFAULT_VOCABULARY: TypeVocabulary = createVocabulary({
  scalars: [
    ...INTEGER_WIDTHS.map((bits) => `int${bits}`),
    ...INTEGER_WIDTHS.map((bits) => `uint${bits}`),
    'address',
    'bool',
    'Bytes',
    'String',
  ],
  sizedScalars: ['Bytes', 'String'],
  arrayTag: 'DynArray',
});

/**
 * Checks if a name is a scalar of the vocabulary, exactly as written.
 * @example isKnownScalar('uint256', DEFAULT_VOCABULARY) // true
 * @example isKnownScalar('String[8]', DEFAULT_VOCABULARY) // false
 */
export function isKnownScalar(name: string, vocabulary: TypeVocabulary): boolean {
  return vocabulary.scalars.has(name);
}

/**
 * Checks if a scalar name conforms, allowing a length on sized scalars.
 * @example isConformingScalar('String[8]', DEFAULT_VOCABULARY) // true
 * @example isConformingScalar('uint7', DEFAULT_VOCABULARY) // false
 */
export function isConformingScalar(name: string, vocabulary: TypeVocabulary): boolean {
  if (isKnownScalar(name, vocabulary)) {
    return true;
  }

  const sized = SIZED_SCALAR_PATTERN.exec(name);
  return sized !== null && vocabulary.sizedScalars.has(sized[1]);
}
