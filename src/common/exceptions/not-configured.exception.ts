import { ServiceUnavailableException } from '@nestjs/common';

export const VOCABULARY_NOT_LOADED_MESSAGE =
  'OHDSI vocabularies not loaded. Please configure the vocabulary database in Settings.';

/**
 * A required collaborator (the vocabulary store) is not configured. Surfaced
 * as 503 and never retried automatically.
 */
export class NotConfiguredException extends ServiceUnavailableException {
  constructor(message = VOCABULARY_NOT_LOADED_MESSAGE) {
    super(message);
  }
}
