/**
 * Name Sanitizer
 * Reduces a display name to the words that look like a person's name.
 */

import { getTitleSet } from './titles';

const NON_LETTER = /[^\p{L}]/gu;

export class NameSanitizer {
  private titles: ReadonlySet<string>;

  constructor(titles: ReadonlySet<string> = getTitleSet()) {
    this.titles = titles;
  }

  /**
   * Remove non-letters, initials/acronyms (any token equal to its upper case)
   * and titles from a name.
   *
   * @example
   * sanitizer.sanitize('Brigadier General John A. B. C. Smith'); // 'John Smith'
   */
  sanitize(name: string): string {
    const kept: string[] = [];

    for (const rawToken of name.split(/\s+/)) {
      const token = rawToken.replace(NON_LETTER, '');

      // Also catches the empty token
      if (token.toUpperCase() === token) {
        continue;
      }

      if (this.titles.has(token)) {
        continue;
      }

      kept.push(token);
    }

    return kept.join(' ');
  }

  /**
   * Sanitize then split into tokens
   */
  tokenize(text: string): string[] {
    const sanitized = this.sanitize(text);
    return sanitized.length > 0 ? sanitized.split(' ') : [];
  }
}
