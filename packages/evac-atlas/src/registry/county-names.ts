/**
 * Reference county-name canonicalisation
 *
 * Census names ("DeSoto County", "Suffolk city") are title-cased and stripped
 * of their County/Parish suffix so that registry keys share one spelling with
 * the resolver's output ("Desoto", "Suffolk City").
 */

/**
 * A word is a letter followed by letters or apostrophes, so "Mary's" and
 * "O'Brien" each stay one word while hyphens and periods split words.
 */
const WORD_PATTERN = /[A-Za-z][A-Za-z']*/g;

const REFERENCE_SUFFIX_PATTERN = /\s+(?:County|Parish)$/;

/**
 * Upper-case the first letter of every word and lower-case the rest
 *
 * @example titleCaseName('Isle of Wight County') // 'Isle Of Wight County'
 * @example titleCaseName('McIntosh County')      // 'Mcintosh County'
 */
export function titleCaseName(name: string): string {
  return name.replace(
    WORD_PATTERN,
    (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase()
  );
}

/**
 * Canonical registry spelling of a census county name
 */
export function canonicalReferenceName(censusName: string): string {
  return titleCaseName(censusName.trim()).replace(REFERENCE_SUFFIX_PATTERN, '');
}
