const VARIATION_SELECTOR = /\uFE0F/g;

/**
 * Canonical form of a button label or typed command, used only for equality checks.
 * Never shown back to the user.
 */
export const normalize = (text: string | null | undefined): string => {
  if (!text) {
    return '';
  }
  return text
    .replace(VARIATION_SELECTOR, '')
    .normalize('NFKC')
    .replace(/\s+/g, ' ')
    .trim()
    .toLowerCase();
};

export const sameLabel = (text: string | null | undefined, label: string): boolean =>
  normalize(text) === normalize(label);
