/**
 * Response envelope shared by every route.
 */
import { clock } from '../utils/clock.js';

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  timestamp: string;
}

export function apiSuccess<T>(data: T): ApiResponse<T> {
  return {
    success: true,
    data,
    timestamp: clock.isoNow(),
  };
}

export function apiError(error: string): ApiResponse {
  return {
    success: false,
    error,
    timestamp: clock.isoNow(),
  };
}
