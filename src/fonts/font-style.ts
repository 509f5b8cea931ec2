function hasToken(s: string, token: string): boolean {
  if (!s) return false;
  return s.includes(token);
}

/**
 * Bold detection from the font's PostScript name. Matches "Bold", "SemiBold",
 * "ExtraBold", "Black" and friends anywhere in the name, subset prefix included.
 */
export function isBoldFontName(name: string): boolean {
  const s = (name || '').toLowerCase();
  return hasToken(s, 'bold') || hasToken(s, 'black');
}

