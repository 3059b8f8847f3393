export { ApiError, errorHandler, notFoundHandler, asyncHandler, getPgErrorCode } from './errorHandler.js';
