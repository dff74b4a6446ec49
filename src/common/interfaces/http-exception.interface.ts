export interface HttpExceptionResponse {
  statusCode: number;
  message: string | string[];
  error?: string;
  details?: Record<string, unknown>;
  timestamp?: string;
  path?: string;
}
