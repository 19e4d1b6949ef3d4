/**
 * Error types raised at the boundary. Scoring and composition never throw
 * these mid-computation; lookups and loaders do.
 */

export class UnsupportedPlatformError extends Error {
  readonly platform: string;
  readonly supported: string[];

  constructor(platform: string, supported: string[]) {
    super(`Unsupported platform. Choose from: ${supported.join(', ')}`);
    this.name = 'UnsupportedPlatformError';
    this.platform = platform;
    this.supported = supported;
  }
}

export class UnsupportedVoiceError extends Error {
  readonly voice: string;
  readonly supported: string[];

  constructor(voice: string, supported: string[]) {
    super(`Unsupported brand voice "${voice}". Choose from: ${supported.join(', ')}`);
    this.name = 'UnsupportedVoiceError';
    this.voice = voice;
    this.supported = supported;
  }
}

export class CatalogError extends Error {
  readonly file: string;

  constructor(file: string, message: string, options?: { cause?: unknown }) {
    super(`${file}: ${message}`, options);
    this.name = 'CatalogError';
    this.file = file;
  }
}

export class RequestValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(issues.join('; '));
    this.name = 'RequestValidationError';
    this.issues = issues;
  }
}
