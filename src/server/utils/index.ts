/**
 * Utils Index
 *
 * Re-exports all utility functions for convenient importing.
 */

export {
  ProcessingError,
  INVALID_FILE_MESSAGE,
  EMPTY_FILE_MESSAGE
} from './processing-error';
export { writeTempFile, removeTempFile } from './temp-files';
export { readTextField, readBooleanField, readChoiceField, readListField } from './form-fields';

export type { ProcessingErrorKind, ErrorContext, ErrorResponseBody } from './processing-error';
