/**
 * Middleware Index
 *
 * Re-exports all middleware for convenient importing.
 */

export { errorHandler, notFoundHandler } from './error-handler';
export { asyncHandler } from './async-wrapper';
export { uploadFields, uploadSingle, uploadedFile } from './upload';
