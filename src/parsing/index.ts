/**
 * Parsing Module - Export Index
 * Exports reply splitting, header extraction and message decoding
 */

export { ContactParser } from './ContactParser';
export { ReplySplitter, REPLY_HEADER_PREFIX } from './ReplySplitter';
export { ReplyMetadataExtractor, HEADER_SCAN_LIMIT } from './ReplyMetadataExtractor';
export { readMessage, decodeMessage, detectBom, FALLBACK_CHARSET } from './MessageReader';

export { Contact, Reply, ReplyMetadata, DecodedMessage } from './types';

export {
  ExtractionConfig,
  ExtractionConfigOverrides,
  DEFAULT_EXTRACTION_CONFIG,
  getExtractionConfig,
  validateExtractionConfig,
} from '../config/extraction';
