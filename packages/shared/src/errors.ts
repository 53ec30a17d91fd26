/**
 * Classifier Errors
 *
 * Only configuration problems surface as exceptions. Every other failure
 * mode degrades to an unknown_template result with warnings.
 */

export class SignatureDirectoryError extends Error {
  constructor(readonly signaturesDir: string, reason: string) {
    super(`Signatures directory ${signaturesDir || '(empty path)'} ${reason}`);
    this.name = 'SignatureDirectoryError';
  }
}

export class ClassifierConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ClassifierConfigurationError';
  }
}
