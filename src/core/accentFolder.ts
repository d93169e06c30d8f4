const COMBINING_MARKS = /\p{M}/gu;

/**
 * Strips diacritics by canonical decomposition (NFD) and dropping every
 * combining mark. Case is left alone; callers lowercase separately.
 *
 * `foldAccents('Ningún') === 'Ningun'`, and folding twice is the same as once.
 */
export function foldAccents(value: string): string {
  return value.normalize('NFD').replace(COMBINING_MARKS, '');
}
