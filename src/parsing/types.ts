/**
 * Parsing Types
 * Type definitions for reply splitting and header extraction
 */

/**
 * A participant parsed from a header line such as `Jane Doe <jane@example.com>`
 */
export interface Contact {
  /** Text before the bracketed address (or the whole line), trimmed */
  name_original: string;
  /** Sanitized form of name_original */
  name: string;
  address: string | null;
}

/**
 * One reply: contiguous lines of the message starting at a `From: ` line
 */
export type Reply = string[];

export interface ReplyMetadata {
  sender: Contact | null;
  recipients: Contact[] | null;
  timestamp: string | null;
  subject: string | null;
  /** Total line count of the reply */
  lines: number;
}

export interface DecodedMessage {
  text: string;
  /** Charset actually used to decode the bytes */
  charset: string;
}
