/**
 * Author name handling for citation styles.
 * Accepts "Family, Given" and "Given Family"; CJK names are kept whole.
 */

export interface PersonName {
  family: string;
  given: string[];
}

const CJK_PATTERN = /[\u3400-\u9fff\uf900-\ufaff]/;

export function parsePersonName(raw: string): PersonName | null {
  const name = raw.replace(/\s+/g, ' ').trim();
  if (!name) return null;

  const commaIndex = name.indexOf(',');
  if (commaIndex >= 0) {
    const family = name.slice(0, commaIndex).trim();
    const given = name
      .slice(commaIndex + 1)
      .split(' ')
      .map((part) => part.trim())
      .filter(Boolean);
    if (family) return { family, given };
  }

  if (CJK_PATTERN.test(name)) {
    return { family: name.replace(/ /g, ''), given: [] };
  }
  const parts = name.split(' ').filter(Boolean);
  if (parts.length === 1) {
    return { family: name, given: [] };
  }
  const family = parts[parts.length - 1];
  return { family, given: parts.slice(0, -1) };
}

function firstLetter(part: string): string {
  const letter = Array.from(part.replace(/^[^\p{L}]+/u, ''))[0];
  return letter ? letter.toUpperCase() : '';
}

/** "Zhang W", "Li X M" */
export function gbAuthor(raw: string): string {
  const name = parsePersonName(raw);
  if (!name) return '';
  const initials = name.given
    .flatMap((part) => part.split('-'))
    .map(firstLetter)
    .filter(Boolean);
  return initials.length > 0 ? `${name.family} ${initials.join(' ')}` : name.family;
}

/** "W. Zhang", "X.-M. Li" */
export function ieeeAuthor(raw: string): string {
  const name = parsePersonName(raw);
  if (!name) return '';
  const initials = name.given
    .map((part) =>
      part
        .split('-')
        .map(firstLetter)
        .filter(Boolean)
        .map((letter) => `${letter}.`)
        .join('-')
    )
    .filter(Boolean);
  return initials.length > 0 ? `${initials.join(' ')} ${name.family}` : name.family;
}
