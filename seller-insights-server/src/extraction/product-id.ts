/**
 * Amazon product identifier (ASIN) detection.
 *
 * The model's claim is never trusted on its own: a literal match in the
 * utterance always wins.
 */

/** Most ASINs are "B" followed by nine alphanumerics */
const B_PREFIXED = /\b(B[A-Z0-9]{9})\b/g;
const ANY_TEN = /\b([A-Z0-9]{10})\b/g;

/**
 * A valid identifier is exactly ten uppercase alphanumerics with at least one
 * digit. The digit requirement keeps ten-letter words ("BESTSELLER") out.
 */
export function validateProductId(candidate: string): boolean {
  const value = candidate.trim().toUpperCase();
  return /^[A-Z0-9]{10}$/.test(value) && /\d/.test(value);
}

/**
 * Find an identifier in free text. B-prefixed tokens are tried first; any other
 * ten-character token is only returned when `allowGeneric` is set.
 */
export function extractProductIdFromText(text: string, allowGeneric = false): string | undefined {
  const upper = text.toUpperCase();

  for (const match of upper.matchAll(B_PREFIXED)) {
    if (validateProductId(match[1])) return match[1];
  }

  if (allowGeneric) {
    for (const match of upper.matchAll(ANY_TEN)) {
      if (validateProductId(match[1])) return match[1];
    }
  }
  return undefined;
}

/**
 * Decide the identifier for an utterance given what the model claimed.
 *
 * 1. a B-prefixed literal in the utterance
 * 2. when the model claimed one: any other valid ten-character literal
 * 3. the model's claim itself, if it validates
 */
export function reconcileProductId(utterance: string, claimed?: string): string | undefined {
  const fromText = extractProductIdFromText(utterance, claimed !== undefined);
  if (fromText) return fromText;

  if (claimed !== undefined && validateProductId(claimed)) {
    return claimed.trim().toUpperCase();
  }
  return undefined;
}
