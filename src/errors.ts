// ============================================================================
// Error Codes
// ============================================================================

export const ErrorCodes = {
  INSUFFICIENT_DATA: 'E101',
  FORMAT_NOT_FOUND: 'E201',
  MALFORMED_METADATA: 'E301',
  ENCODE_FAILED: 'E401',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ============================================================================
// Conversion Error
// ============================================================================

export type ConversionPhase = 'metadata' | 'probe' | 'decode' | 'encode';

export interface ConversionError {
  phase: ConversionPhase;
  code: ErrorCode;
  message: string;
  /** Metadata document the error refers to (e.g. "map_record") */
  document?: string;
  /** Field path inside the document (e.g. "charger_pose[1]") */
  field?: string;
  details?: Record<string, unknown>;
}

/**
 * Thrown by the encoder boundary when sharp rejects the raster.
 * The converter turns it into an E401 result.
 */
export class EncodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EncodeError';
  }
}

export function formatConversionError(error: ConversionError): string {
  const parts: string[] = [`error[${error.code}]`, error.phase];
  if (error.document) {
    parts.push(error.field ? `${error.document}.${error.field}` : error.document);
  }
  parts.push(error.message);
  return parts.join(': ');
}
