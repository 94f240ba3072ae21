/**
 * Reply Metadata Extractor
 * Reads Outlook-style header lines (From/To/Cc/Sent/Subject) at the top of a reply.
 */

import { ContactParser } from './ContactParser';
import { Contact, Reply, ReplyMetadata } from './types';

/** Lines 0..10 are examined; headers further down are ignored */
export const HEADER_SCAN_LIMIT = 10;

const FROM = 'From: ';
const TO = 'To: ';
const CC = 'Cc: ';
const RECIPIENT_PREFIXES = [TO, CC];
const SENT = 'Sent: ';
const SUBJECT = 'Subject: ';

export class ReplyMetadataExtractor {
  private contactParser: ContactParser;

  constructor(contactParser: ContactParser = new ContactParser()) {
    this.contactParser = contactParser;
  }

  /**
   * Extract sender, recipients, timestamp and subject from a reply.
   * The first From/Sent/Subject line wins; every To/Cc line adds one recipient.
   */
  extractMetadata(reply: Reply): ReplyMetadata {
    let sender: Contact | null = null;
    let recipients: Contact[] | null = null;
    let timestamp: string | null = null;
    let subject: string | null = null;

    const scanned = reply.slice(0, HEADER_SCAN_LIMIT + 1);

    for (const line of scanned) {
      const recipientPrefix = RECIPIENT_PREFIXES.find((prefix) => line.startsWith(prefix));

      if (line.startsWith(FROM)) {
        if (!sender) {
          sender = this.contactParser.getContact(line.slice(FROM.length));
        }
      } else if (recipientPrefix) {
        if (!recipients) {
          recipients = [];
        }
        recipients.push(this.contactParser.getContact(line.slice(recipientPrefix.length)));
      } else if (line.startsWith(SENT)) {
        if (timestamp === null) {
          timestamp = line.slice(SENT.length);
        }
      } else if (line.startsWith(SUBJECT)) {
        if (subject === null) {
          subject = line.slice(SUBJECT.length);
        }
      }
    }

    return {
      sender,
      recipients,
      timestamp,
      subject,
      lines: reply.length,
    };
  }
}
