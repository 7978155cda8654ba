/**
 * Utility helpers shared across domain modules.
 */

/**
 * Convert a lower snake case token to camel case.
 *
 * Clients send sort fields the way they appear in JSON columns
 * (`image_url`), while product attributes use camel case (`imageUrl`). The
 * first word is lower-cased, every later word gets an upper-case first letter
 * and a lower-case rest, so `IMAGE_URL` also becomes `imageUrl`.
 */
export function snakeToCamel(token: string): string {
  const [head = '', ...rest] = token.split('_');
  return (
    head.toLowerCase() +
    rest.map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase()).join('')
  );
}

// Normalise a name so we can compare without worrying about case or stray spaces.
export function nameKey(name: string): string {
  return name.trim().toLowerCase();
}
