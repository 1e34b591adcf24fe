/**
 * Heading anchors, computed the way GitHub and DocFX compute them.
 */

/** Reduce inline Markdown in heading text to the text a reader sees */
export function stripInlineMarkup(text: string): string {
  return text
    .replace(/!?\[([^\]]*)\]\([^)]*\)/g, '$1')
    .replace(/`([^`]*)`/g, '$1')
    .replace(/<[^>]+>/g, '')
    .trim();
}

/**
 * Slug for one heading. Every character that is not a letter, mark, number,
 * connector, space or hyphen is dropped, then spaces become hyphens, so a
 * heading that opens with an emoji gets a slug that opens with `-`.
 */
export function slugify(text: string): string {
  return stripInlineMarkup(text)
    .toLowerCase()
    .replace(/[\uFE0E\uFE0F\u20E3]/g, '')
    .replace(/[^\p{L}\p{M}\p{N}\p{Pc} -]/gu, '')
    .replace(/ /g, '-');
}

/**
 * Hands out unique slugs within one document: the second "Setup" heading
 * becomes `setup-1`, the third `setup-2`.
 */
export class Slugger {
  private readonly occurrences = new Map<string, number>();

  slug(text: string): string {
    const original = slugify(text);
    let result = original;

    while (this.occurrences.has(result)) {
      const count = (this.occurrences.get(original) ?? 0) + 1;
      this.occurrences.set(original, count);
      result = `${original}-${count}`;
    }

    this.occurrences.set(result, 0);
    return result;
  }
}
