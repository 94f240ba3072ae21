/**
 * Unit Tests for ReplyMetadataExtractor
 */

import { ReplyMetadataExtractor } from '../../parsing/ReplyMetadataExtractor';

describe('ReplyMetadataExtractor', () => {
  let extractor: ReplyMetadataExtractor;

  beforeEach(() => {
    extractor = new ReplyMetadataExtractor();
  });

  describe('extractMetadata', () => {
    it('should read sender, recipient and subject', () => {
      const metadata = extractor.extractMetadata([
        'From: A <a@x.com>',
        'To: B <b@x.com>',
        'Subject: Hi',
      ]);

      expect(metadata).toEqual({
        sender: { name_original: 'A', name: '', address: 'a@x.com' },
        recipients: [{ name_original: 'B', name: '', address: 'b@x.com' }],
        timestamp: null,
        subject: 'Hi',
        lines: 3,
      });
    });

    it('should read a full Outlook header block', () => {
      const reply = [
        'From: Jane Doe <jane.doe@example.org>',
        'Sent: Tuesday, March 3, 2026 9:15 AM',
        'To: John Smith <john.smith@example.com>',
        'Cc: Team Leads <leads@example.com>',
        'Subject: RE: Quarterly review',
        '',
        'Does Thursday work?',
      ];

      const metadata = extractor.extractMetadata(reply);

      expect(metadata.sender).toEqual({
        name_original: 'Jane Doe',
        name: 'Jane Doe',
        address: 'jane.doe@example.org',
      });
      expect(metadata.recipients).toEqual([
        { name_original: 'John Smith', name: 'John Smith', address: 'john.smith@example.com' },
        { name_original: 'Team Leads', name: 'Team Leads', address: 'leads@example.com' },
      ]);
      expect(metadata.timestamp).toBe('Tuesday, March 3, 2026 9:15 AM');
      expect(metadata.subject).toBe('RE: Quarterly review');
      expect(metadata.lines).toBe(7);
    });

    it('should collect Cc recipients on their own', () => {
      const metadata = extractor.extractMetadata([
        'From: Jane Doe <jane.doe@example.org>',
        'Cc: John Smith <john.smith@example.com>',
      ]);

      expect(metadata.recipients).toEqual([
        { name_original: 'John Smith', name: 'John Smith', address: 'john.smith@example.com' },
      ]);
    });

    it('should leave every field null when there are no headers', () => {
      expect(extractor.extractMetadata(['Just text', '', 'More text'])).toEqual({
        sender: null,
        recipients: null,
        timestamp: null,
        subject: null,
        lines: 3,
      });
    });

    it('should count lines of an empty reply', () => {
      expect(extractor.extractMetadata([]).lines).toBe(0);
    });

    it('should examine line index 10 but nothing after it', () => {
      const reply = Array.from({ length: 10 }, (_, i) => `filler ${i}`);
      reply.push('Subject: Still a header');
      reply.push('Sent: Too late');
      reply.push('To: Late Person <late@example.com>');

      const metadata = extractor.extractMetadata(reply);

      expect(metadata.subject).toBe('Still a header');
      expect(metadata.timestamp).toBeNull();
      expect(metadata.recipients).toBeNull();
      expect(metadata.lines).toBe(13);
    });

    it('should keep the first sender, timestamp and subject', () => {
      const metadata = extractor.extractMetadata([
        'From: Jane Doe <jane@example.org>',
        'Sent: first',
        'Subject: first subject',
        'From: John Smith <john@example.com>',
        'Sent: second',
        'Subject: second subject',
      ]);

      expect(metadata.sender?.address).toBe('jane@example.org');
      expect(metadata.timestamp).toBe('first');
      expect(metadata.subject).toBe('first subject');
    });

    it('should match prefixes case-sensitively and require the space', () => {
      const metadata = extractor.extractMetadata([
        'from: Jane Doe <jane@example.org>',
        'TO: John Smith <john@example.com>',
        'Subject:No space',
        'sent: Monday',
      ]);

      expect(metadata.sender).toBeNull();
      expect(metadata.recipients).toBeNull();
      expect(metadata.subject).toBeNull();
      expect(metadata.timestamp).toBeNull();
    });

    it('should keep subject and timestamp verbatim', () => {
      const metadata = extractor.extractMetadata(['Subject: RE:  FW: Budget  ', 'Sent: 3/2/2026 16:40']);

      expect(metadata.subject).toBe('RE:  FW: Budget  ');
      expect(metadata.timestamp).toBe('3/2/2026 16:40');
    });
  });
});
