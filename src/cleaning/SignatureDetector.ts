/**
 * Signature Detector
 * Finds a trailing signature block by matching lines against the sender's name.
 */

import logger from '../utils/logger';
import { assertLengthDivisor } from '../config/extraction';
import { Contact, Reply } from '../parsing/types';
import { NameSanitizer } from './NameSanitizer';
import { SignatureBoundary, SignatureResult } from './types';

export const DEFAULT_LENGTH_DIVISOR = 2;

/** A name line needs at least this many tokens, so a lone "Thanks" never matches */
const MIN_NAME_TOKENS = 2;

// Replies shorter than this never carry a signature
const MIN_REPLY_LINES = 2;

const CLOSING_PATTERN =
  /^(best regards|kind regards|warm regards|regards|sincerely|many thanks|thanks|thank you|cheers|best|br)[\s,.!-]*$/i;

const NO_SIGNATURE: Readonly<SignatureResult> = {
  has_signature: false,
  signature: null,
  reply_text: null,
  address_in_signature: false,
};

export class SignatureDetector {
  private sanitizer: NameSanitizer;

  constructor(sanitizer: NameSanitizer = new NameSanitizer()) {
    this.sanitizer = sanitizer;
  }

  /**
   * Split a reply into body text and signature.
   *
   * Only the last `floor(reply.length / lengthDivisor)` lines are searched.
   */
  detectSignature(
    reply: Reply,
    sender: Contact,
    lengthDivisor: number = DEFAULT_LENGTH_DIVISOR
  ): SignatureResult {
    const boundary = this.detectSignatureBoundary(reply, sender, lengthDivisor);

    if (!boundary) {
      return { ...NO_SIGNATURE };
    }

    const signature = reply.slice(boundary.line_number).join('\n').trim();
    const replyText = reply.slice(0, boundary.line_number).join('\n').trim();
    const addressInSignature =
      !!sender.address && signature.toLowerCase().includes(sender.address.toLowerCase());

    logger.debug('Detected signature', {
      boundary_line: boundary.line_number,
      marker_type: boundary.marker_type,
      signature_lines: reply.length - boundary.line_number,
      address_in_signature: addressInSignature,
    });

    return {
      has_signature: true,
      signature,
      reply_text: replyText,
      address_in_signature: addressInSignature,
    };
  }

  /**
   * Locate the first signature line, walking backward from the end of the reply
   */
  detectSignatureBoundary(
    reply: Reply,
    sender: Contact,
    lengthDivisor: number = DEFAULT_LENGTH_DIVISOR
  ): SignatureBoundary | null {
    assertLengthDivisor(lengthDivisor);

    if (reply.length < MIN_REPLY_LINES) {
      return null;
    }

    const senderName = sender.name.toLowerCase();
    if (senderName.length === 0) {
      logger.debug('Sender has no usable name, skipping signature search');
      return null;
    }

    const maxLines = Math.floor(reply.length / lengthDivisor);

    for (let offset = 0; offset < maxLines; offset++) {
      const index = reply.length - 1 - offset;
      if (!this.isNameLine(reply[index], senderName)) {
        continue;
      }

      if (index > 0 && this.isClosing(reply[index - 1])) {
        return { line_number: index - 1, name_line_number: index, marker_type: 'closing' };
      }
      return { line_number: index, name_line_number: index, marker_type: 'name' };
    }

    return null;
  }

  /**
   * Check if text has a signature for this sender
   */
  hasSignature(reply: Reply, sender: Contact, lengthDivisor: number = DEFAULT_LENGTH_DIVISOR): boolean {
    return this.detectSignatureBoundary(reply, sender, lengthDivisor) !== null;
  }

  /**
   * Every sanitized token of the line must occur inside the sender's name
   */
  private isNameLine(line: string, senderName: string): boolean {
    const tokens = this.sanitizer.tokenize(line);
    if (tokens.length < MIN_NAME_TOKENS) {
      return false;
    }
    return tokens.every((token) => senderName.includes(token.toLowerCase()));
  }

  /**
   * Check if line is a closing (Best regards, etc.)
   */
  private isClosing(line: string): boolean {
    return CLOSING_PATTERN.test(line.trim());
  }
}
