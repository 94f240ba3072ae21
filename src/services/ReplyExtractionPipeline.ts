/**
 * Reply Extraction Pipeline
 * Splits a thread into replies, reads each reply's headers and separates its signature.
 */

import logger from '../utils/logger';
import { NameSanitizer } from '../cleaning/NameSanitizer';
import { SignatureDetector } from '../cleaning/SignatureDetector';
import { SignatureResult } from '../cleaning/types';
import {
  ExtractionConfig,
  ExtractionConfigOverrides,
  getExtractionConfig,
  validateExtractionConfig,
} from '../config/extraction';
import { DomainError, wrapError } from '../errors/DomainError';
import { ContactParser } from '../parsing/ContactParser';
import { readMessage } from '../parsing/MessageReader';
import { ReplyMetadataExtractor } from '../parsing/ReplyMetadataExtractor';
import { ReplySplitter } from '../parsing/ReplySplitter';
import { Contact, Reply, ReplyMetadata } from '../parsing/types';

export interface ExtractedReply {
  /** Position of the reply within the message */
  index: number;
  lines: Reply;
  metadata: ReplyMetadata;
  /** Null when the reply has no sender to match against */
  signature: SignatureResult | null;
}

export interface ExtractionResult {
  source: string;
  /** Charset the message was decoded with; null for text handed in directly */
  charset: string | null;
  replies: ExtractedReply[];
  reply_count: number;
  signature_count: number;
  processing_time_ms: number;
}

export interface ExtractionFailure {
  filePath: string;
  error: DomainError;
}

type BatchOutcome =
  | { filePath: string; result: ExtractionResult }
  | { filePath: string; error: DomainError };

export interface BatchExtractionResult {
  results: ExtractionResult[];
  failures: ExtractionFailure[];
}

export interface ReportSender extends Contact {
  signature: string | null;
}

export interface ReplyReport extends Omit<ReplyMetadata, 'sender'> {
  sender: ReportSender;
}

export interface ReplyExtractionPipelineOptions extends ExtractionConfigOverrides {
  /** Shared sanitizer; defaults to one backed by the process-wide title set */
  sanitizer?: NameSanitizer;
}

export class ReplyExtractionPipeline {
  private splitter: ReplySplitter;
  private metadataExtractor: ReplyMetadataExtractor;
  private signatureDetector: SignatureDetector;
  private config: ExtractionConfig;

  constructor(options: ReplyExtractionPipelineOptions = {}) {
    this.config = getExtractionConfig(options);
    validateExtractionConfig(this.config);

    const sanitizer = options.sanitizer ?? new NameSanitizer();
    this.splitter = new ReplySplitter();
    this.metadataExtractor = new ReplyMetadataExtractor(new ContactParser(sanitizer));
    this.signatureDetector = new SignatureDetector(sanitizer);
  }

  /**
   * Extract replies, metadata and signatures from message text
   */
  extract(text: string, source = '<memory>', charset: string | null = null): ExtractionResult {
    const startTime = Date.now();

    const replies = this.splitter.splitReplies(text).map((lines, index) =>
      this.extractReply(lines, index)
    );

    const result: ExtractionResult = {
      source,
      charset,
      replies,
      reply_count: replies.length,
      signature_count: replies.filter((r) => r.signature?.has_signature).length,
      processing_time_ms: Date.now() - startTime,
    };

    logger.info('Reply extraction complete', {
      source,
      replies: result.reply_count,
      with_sender: replies.filter((r) => r.metadata.sender !== null).length,
      signatures: result.signature_count,
      processing_time_ms: result.processing_time_ms,
    });

    return result;
  }

  /**
   * Read a message file and extract from it
   */
  async extractFile(filePath: string, charset?: string): Promise<ExtractionResult> {
    const message = await readMessage(filePath, charset ?? this.config.decoding.charset);
    return this.extract(message.text, filePath, message.charset);
  }

  /**
   * Extract from several files. A failing file is reported and does not stop the others.
   */
  async extractBatch(filePaths: string[], charset?: string): Promise<BatchExtractionResult> {
    logger.info('Starting batch extraction', { count: filePaths.length });

    const outcomes = await Promise.all(
      filePaths.map(async (filePath): Promise<BatchOutcome> => {
        try {
          return { filePath, result: await this.extractFile(filePath, charset) };
        } catch (error) {
          const domainError = wrapError(error);
          logger.error('Error extracting replies from file', {
            filePath,
            error: domainError.toJSON(),
          });
          return { filePath, error: domainError };
        }
      })
    );

    const results: ExtractionResult[] = [];
    const failures: ExtractionFailure[] = [];
    for (const outcome of outcomes) {
      if ('error' in outcome) {
        failures.push({ filePath: outcome.filePath, error: outcome.error });
      } else {
        results.push(outcome.result);
      }
    }

    logger.info('Batch extraction complete', {
      total: filePaths.length,
      successful: results.length,
      failed: failures.length,
    });

    return { results, failures };
  }

  /**
   * Records for every reply with a sender, with the detected signature text on the sender
   */
  toReport(result: ExtractionResult): ReplyReport[] {
    const report: ReplyReport[] = [];

    for (const reply of result.replies) {
      const sender = reply.metadata.sender;
      if (!sender) {
        continue;
      }
      report.push({
        ...reply.metadata,
        sender: { ...sender, signature: reply.signature?.signature ?? null },
      });
    }

    return report;
  }

  /**
   * Get current configuration
   */
  getConfig(): ExtractionConfig {
    return {
      signature: { ...this.config.signature },
      decoding: { ...this.config.decoding },
    };
  }

  private extractReply(lines: Reply, index: number): ExtractedReply {
    const metadata = this.metadataExtractor.extractMetadata(lines);
    const signature = metadata.sender
      ? this.signatureDetector.detectSignature(
          lines,
          metadata.sender,
          this.config.signature.length_divisor
        )
      : null;

    logger.debug('Extracted reply', {
      index,
      lines: metadata.lines,
      has_sender: metadata.sender !== null,
      has_signature: signature?.has_signature ?? false,
    });

    return { index, lines, metadata, signature };
  }
}
