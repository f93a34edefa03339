export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Shortens by code points, so surrogate pairs are never split. */
export function truncate(text: string, maxLength: number): string {
  const chars = Array.from(text);
  if (chars.length <= maxLength) {
    return text;
  }

  return `${chars.slice(0, maxLength - 1).join('')}…`;
}

export function preview(text: string, maxLength: number = 60): string {
  return truncate(collapseWhitespace(text), maxLength);
}
