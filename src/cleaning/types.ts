/**
 * Cleaning Types
 */

export interface SignatureResult {
  has_signature: boolean;
  signature: string | null;
  /** Reply text above the signature */
  reply_text: string | null;
  /** Whether the sender's address is repeated inside the signature */
  address_in_signature: boolean;
}

export interface SignatureBoundary {
  /** Index of the first signature line within the reply */
  line_number: number;
  /** Index of the line that matched the sender's name */
  name_line_number: number;
  marker_type: 'name' | 'closing';
}
