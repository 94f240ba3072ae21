/**
 * Thread reply extraction: reply splitting, header metadata and name-based signature detection.
 */

export * from './cleaning';
export * from './parsing';
export * from './errors';
export {
  ReplyExtractionPipeline,
  ReplyExtractionPipelineOptions,
  ExtractedReply,
  ExtractionResult,
  ExtractionFailure,
  BatchExtractionResult,
  ReplyReport,
  ReportSender,
} from './services/ReplyExtractionPipeline';
export { config } from './config';
