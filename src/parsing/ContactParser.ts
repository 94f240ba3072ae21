/**
 * Contact Parser
 * Splits `Display Name <address>` header values into name and address.
 */

import { NameSanitizer } from '../cleaning/NameSanitizer';
import { Contact } from './types';

// Greedy name, then the last <...> or [...] pair on the line
const CONTACT_PATTERN = /^(.*)[<[](.*)[>\]]/s;

export class ContactParser {
  private sanitizer: NameSanitizer;

  constructor(sanitizer: NameSanitizer = new NameSanitizer()) {
    this.sanitizer = sanitizer;
  }

  /**
   * Parse a header value into a contact.
   *
   * @example
   * parser.getContact('Poe, Edgar Allan <eapoe@uva.edu>');
   * // { name_original: 'Poe, Edgar Allan', name: 'Poe Edgar Allan', address: 'eapoe@uva.edu' }
   */
  getContact(line: string): Contact {
    const match = CONTACT_PATTERN.exec(line);

    if (!match) {
      const name = line.trim();
      return {
        name_original: name,
        name: this.sanitizer.sanitize(name),
        address: null,
      };
    }

    const name = match[1].trim();
    const address = match[2].trim().replace(/^mailto:/, '');

    return {
      name_original: name,
      name: this.sanitizer.sanitize(name),
      address,
    };
  }
}
