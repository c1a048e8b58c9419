/**
 * Standardized error response format
 */
export interface ApiError {
  error: string;
  code?: string;
  details?: unknown;
}

export function createErrorResponse(message: string, code?: string, details?: unknown): ApiError {
  const response: ApiError = { error: message };
  if (code) response.code = code;
  if (details !== undefined) response.details = details;
  return response;
}
