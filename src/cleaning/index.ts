/**
 * Name sanitizing and signature detection
 */

export { NameSanitizer } from './NameSanitizer';
export { SignatureDetector, DEFAULT_LENGTH_DIVISOR } from './SignatureDetector';
export { getTitleSet, loadTitleSet, parseTitleList } from './titles';

export { SignatureResult, SignatureBoundary } from './types';
