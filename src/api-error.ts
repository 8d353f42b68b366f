/**
 * API Error Utilities
 *
 * Standardized error response format for all API endpoints.
 *
 * Format: { ok: false, error: string, code?: string }
 */

import type { Response } from 'express';

/**
 * Error codes for programmatic error handling
 */
export type ApiErrorCode =
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'UNAVAILABLE'
  | 'INTERNAL_ERROR';

/**
 * Standard API error response
 */
export interface ApiErrorResponse {
  ok: false;
  error: string;
  code?: ApiErrorCode;
}

/**
 * Standard API success response
 */
export interface ApiSuccessResponse<T = unknown> {
  ok: true;
  data?: T;
}

/**
 * Send a standardized error response
 */
export function sendError(
  res: Response,
  status: number,
  message: string,
  code?: ApiErrorCode
): void {
  const response: ApiErrorResponse = { ok: false, error: message };
  if (code) {
    response.code = code;
  }
  res.status(status).json(response);
}

/**
 * Send a standardized success response
 */
export function sendData<T>(res: Response, data: T): void {
  const response: ApiSuccessResponse<T> = { ok: true, data };
  res.json(response);
}

/**
 * Common error helpers
 */
export const apiError = {
  notFound: (res: Response, message: string) =>
    sendError(res, 404, message, 'NOT_FOUND'),

  validation: (res: Response, message: string) =>
    sendError(res, 400, message, 'VALIDATION_ERROR'),

  unavailable: (res: Response, message: string) =>
    sendError(res, 503, message, 'UNAVAILABLE'),

  internal: (res: Response, message: string) =>
    sendError(res, 500, message, 'INTERNAL_ERROR'),
};
