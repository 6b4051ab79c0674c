export type ConversionErrorCode =
  | 'content_root_missing'
  | 'invalid_mapping'
  | 'invalid_config'
  | 'invalid_location_id';

export class ConversionError extends Error {
  readonly code: ConversionErrorCode;
  readonly details?: unknown;

  constructor(code: ConversionErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'ConversionError';
    this.code = code;
    this.details = details;
  }
}

export function contentRootMissing(contentDir: string): ConversionError {
  return new ConversionError('content_root_missing', `content directory not found: ${contentDir}`);
}

export function invalidMapping(mappingFile: string, details?: unknown): ConversionError {
  return new ConversionError('invalid_mapping', `invalid POS mapping file: ${mappingFile}`, details);
}

export function invalidConfig(message: string, details?: unknown): ConversionError {
  return new ConversionError('invalid_config', message, details);
}

export function invalidLocationId(locationId: string): ConversionError {
  return new ConversionError(
    'invalid_location_id',
    `location id must be uppercase letters and underscores only: ${locationId}`
  );
}
