/**
 * Reply Splitter
 * Breaks a concatenated thread into replies at each `From: ` header line.
 */

import logger from '../utils/logger';
import { Reply } from './types';

export const REPLY_HEADER_PREFIX = 'From: ';

// Outlook-style "----- Original Message -----" separators
const ORIGINAL_MESSAGE_SEPARATOR = /^-+\s*Original Message\s*-+$/i;

export class ReplySplitter {
  /**
   * Split message text into replies. Every line except "Original Message"
   * separators ends up in exactly one reply, in order.
   */
  splitReplies(text: string): Reply[] {
    const lines = this.removeSeparators(text.split('\n'));
    const boundaries = this.findBoundaries(lines);

    const replies: Reply[] = [];
    for (let i = 0; i < boundaries.length - 1; i++) {
      replies.push(lines.slice(boundaries[i], boundaries[i + 1]));
    }

    logger.debug('Split message into replies', {
      lines: lines.length,
      replies: replies.length,
    });

    return replies;
  }

  /**
   * Line indexes where replies start, bracketed by 0 and the line count
   */
  findBoundaries(lines: string[]): number[] {
    const boundaries = [0];

    lines.forEach((line, index) => {
      // Index 0 is already a boundary
      if (index > 0 && line.startsWith(REPLY_HEADER_PREFIX)) {
        boundaries.push(index);
      }
    });

    boundaries.push(lines.length);
    return boundaries;
  }

  private removeSeparators(lines: string[]): string[] {
    return lines.filter((line) => !ORIGINAL_MESSAGE_SEPARATOR.test(line.trim()));
  }
}
