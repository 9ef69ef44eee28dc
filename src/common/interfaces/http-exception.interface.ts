export interface HttpExceptionResponse {
  statusCode: number;
  message: string | string[];
  error?: string;
  kind?: string;
  code?: number;
  timestamp?: string;
  path?: string;
}
