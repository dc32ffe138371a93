/**
 * Response envelope shared by every endpoint:
 * { success, data, error, timestamp }
 */

export const API_VERSION = '1.0.0';

export interface ApiErrorBody {
  code: string;
  message: string;
  details?: unknown;
}

export interface ApiResponse<T = unknown> {
  success: boolean;
  data: T | null;
  error: ApiErrorBody | null;
  timestamp: string;
}

export function apiResponse<T>(data: T): ApiResponse<T> {
  return { success: true, data, error: null, timestamp: new Date().toISOString() };
}

export function apiFailure(code: string, message: string, details?: unknown): ApiResponse<null> {
  return {
    success: false,
    data: null,
    error: { code, message, details },
    timestamp: new Date().toISOString(),
  };
}
