/**
 * Tests for ReplyExtractionPipeline
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { ReplyExtractionPipeline } from '../../services/ReplyExtractionPipeline';
import { ConfigurationError, FileSystemError } from '../../errors/DomainError';

const THREAD_LINES = [
  'Sounds good, see you then.',
  '',
  'Thanks,',
  'Jane Doe',
  '-----Original Message-----',
  'From: Jane Doe <jane.doe@example.org>',
  'Sent: Tuesday, March 3, 2026 9:15 AM',
  'To: John Smith <john.smith@example.com>',
  'Cc: Team Leads <leads@example.com>',
  'Subject: RE: Quarterly review',
  '',
  'Does Thursday work for the review?',
  '',
  'Best regards,',
  'Jane Doe',
  'jane.doe@example.org',
  'From: John Smith <john.smith@example.com>',
  'Sent: Monday, March 2, 2026 4:40 PM',
  'To: Jane Doe <jane.doe@example.org>',
  'Subject: Quarterly review',
  '',
  'Hi Jane,',
  '',
  'Can we schedule the quarterly review this week?',
  '',
  'John Smith',
];

const THREAD = THREAD_LINES.join('\n');

describe('ReplyExtractionPipeline', () => {
  let pipeline: ReplyExtractionPipeline;
  let tmpDir: string;

  beforeAll(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'reply-pipeline-'));
  });

  afterAll(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    pipeline = new ReplyExtractionPipeline();
  });

  describe('extract', () => {
    it('should split the thread and summarise it', () => {
      const result = pipeline.extract(THREAD, 'thread.txt');

      expect(result.source).toBe('thread.txt');
      expect(result.charset).toBeNull();
      expect(result.reply_count).toBe(3);
      expect(result.signature_count).toBe(2);
      expect(result.replies.map((r) => r.lines.length)).toEqual([4, 11, 10]);
      expect(result.processing_time_ms).toBeGreaterThanOrEqual(0);
    });

    it('should reconstruct the thread minus the separator line', () => {
      const result = pipeline.extract(THREAD);
      const expected = THREAD_LINES.filter((l) => l !== '-----Original Message-----').join('\n');

      expect(result.replies.flatMap((r) => r.lines).join('\n')).toBe(expected);
    });

    it('should skip signature detection for a reply without a sender', () => {
      const [first] = pipeline.extract(THREAD).replies;

      expect(first.index).toBe(0);
      expect(first.metadata.sender).toBeNull();
      expect(first.signature).toBeNull();
    });

    it('should extract headers and signature of each reply', () => {
      const [, second, third] = pipeline.extract(THREAD).replies;

      expect(second.metadata).toEqual({
        sender: { name_original: 'Jane Doe', name: 'Jane Doe', address: 'jane.doe@example.org' },
        recipients: [
          { name_original: 'John Smith', name: 'John Smith', address: 'john.smith@example.com' },
          { name_original: 'Team Leads', name: 'Team Leads', address: 'leads@example.com' },
        ],
        timestamp: 'Tuesday, March 3, 2026 9:15 AM',
        subject: 'RE: Quarterly review',
        lines: 11,
      });
      expect(second.signature).toEqual({
        has_signature: true,
        signature: 'Best regards,\nJane Doe\njane.doe@example.org',
        reply_text: [
          'From: Jane Doe <jane.doe@example.org>',
          'Sent: Tuesday, March 3, 2026 9:15 AM',
          'To: John Smith <john.smith@example.com>',
          'Cc: Team Leads <leads@example.com>',
          'Subject: RE: Quarterly review',
          '',
          'Does Thursday work for the review?',
        ].join('\n'),
        address_in_signature: true,
      });

      expect(third.metadata.subject).toBe('Quarterly review');
      expect(third.signature).toMatchObject({
        has_signature: true,
        signature: 'John Smith',
        address_in_signature: false,
      });
    });

    it('should honour a configured length divisor', () => {
      const wide = new ReplyExtractionPipeline({ signature: { length_divisor: 1 } });
      const narrow = new ReplyExtractionPipeline({ signature: { length_divisor: 20 } });
      const reply = 'From: John Smith <john.smith@example.com>\nBody\nJohn Smith';

      expect(wide.extract(reply).signature_count).toBe(1);
      expect(narrow.extract(reply).signature_count).toBe(0);
    });
  });

  describe('configuration', () => {
    it('should reject a zero length divisor', () => {
      expect(() => new ReplyExtractionPipeline({ signature: { length_divisor: 0 } })).toThrow(
        ConfigurationError
      );
    });

    it('should expose the effective configuration', () => {
      const custom = new ReplyExtractionPipeline({
        signature: { length_divisor: 3 },
        decoding: { charset: 'windows-1252' },
      });

      expect(custom.getConfig()).toEqual({
        signature: { length_divisor: 3 },
        decoding: { charset: 'windows-1252' },
      });
    });
  });

  describe('toReport', () => {
    it('should list replies with a sender and attach the signature text', () => {
      const report = pipeline.toReport(pipeline.extract(THREAD));

      expect(report).toHaveLength(2);
      expect(Object.keys(report[0])).toEqual(['sender', 'recipients', 'timestamp', 'subject', 'lines']);
      expect(report[0].sender).toEqual({
        name_original: 'Jane Doe',
        name: 'Jane Doe',
        address: 'jane.doe@example.org',
        signature: 'Best regards,\nJane Doe\njane.doe@example.org',
      });
      expect(report[1].sender.signature).toBe('John Smith');
    });

    it('should report a null signature when none was found', () => {
      const report = pipeline.toReport(
        pipeline.extract('From: John Smith <john.smith@example.com>\nNo sign-off here')
      );

      expect(report).toEqual([
        {
          sender: {
            name_original: 'John Smith',
            name: 'John Smith',
            address: 'john.smith@example.com',
            signature: null,
          },
          recipients: null,
          timestamp: null,
          subject: null,
          lines: 2,
        },
      ]);
    });
  });

  describe('extractFile', () => {
    it('should read, decode and extract a message file', async () => {
      const filePath = path.join(tmpDir, 'thread.txt');
      fs.writeFileSync(filePath, THREAD.replace(/\n/g, '\r\n'));

      const result = await pipeline.extractFile(filePath);

      expect(result.source).toBe(filePath);
      expect(result.charset).toBe('utf-8');
      expect(result.reply_count).toBe(3);
      expect(result.replies[2].metadata.timestamp).toBe('Monday, March 2, 2026 4:40 PM');
    });
  });

  describe('extractBatch', () => {
    it('should report failing files without stopping the others', async () => {
      const goodPath = path.join(tmpDir, 'good.txt');
      const missingPath = path.join(tmpDir, 'missing.txt');
      fs.writeFileSync(goodPath, THREAD);

      const { results, failures } = await pipeline.extractBatch([goodPath, missingPath]);

      expect(results).toHaveLength(1);
      expect(results[0].source).toBe(goodPath);
      expect(failures).toHaveLength(1);
      expect(failures[0].filePath).toBe(missingPath);
      expect(failures[0].error).toBeInstanceOf(FileSystemError);
      expect(failures[0].error.code).toBe('FILE_001');
    });
  });
});
