import type { ApiResponse, ErrorCode } from '@shared/types';

export function ok<T>(data: T): ApiResponse<T> {
  return { success: true, data };
}

export function fail(error: string, code?: ErrorCode): ApiResponse<never> {
  return code ? { success: false, error, code } : { success: false, error };
}
