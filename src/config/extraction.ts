/**
 * Configuration for reply extraction
 */

import { config } from './index';
import { ConfigurationError } from '../errors/DomainError';

export interface ExtractionConfig {
  signature: {
    /** Reply length is divided by this to get the number of trailing lines searched */
    length_divisor: number;
  };
  decoding: {
    /** Charset used when the caller names none and the file carries no BOM */
    charset?: string;
  };
}

export interface ExtractionConfigOverrides {
  signature?: Partial<ExtractionConfig['signature']>;
  decoding?: Partial<ExtractionConfig['decoding']>;
}

export const DEFAULT_EXTRACTION_CONFIG: ExtractionConfig = {
  signature: {
    length_divisor: 2,
  },
  decoding: {},
};

/**
 * Get extraction config from environment with overrides
 */
export function getExtractionConfig(overrides?: ExtractionConfigOverrides): ExtractionConfig {
  return {
    signature: {
      length_divisor:
        overrides?.signature?.length_divisor ?? config.signature.lengthDivisor,
    },
    decoding: {
      charset:
        overrides?.decoding?.charset ??
        config.defaultCharset ??
        DEFAULT_EXTRACTION_CONFIG.decoding.charset,
    },
  };
}

/**
 * Ensure a length divisor is a positive integer
 */
export function assertLengthDivisor(value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw ConfigurationError.notPositiveInteger('length_divisor', value);
  }
}

/**
 * Validate extraction configuration
 */
export function validateExtractionConfig(extractionConfig: ExtractionConfig): boolean {
  assertLengthDivisor(extractionConfig.signature.length_divisor);

  const charset = extractionConfig.decoding.charset;
  if (charset !== undefined && charset.trim().length === 0) {
    throw new ConfigurationError('decoding.charset must not be blank', 'decoding.charset');
  }

  return true;
}
