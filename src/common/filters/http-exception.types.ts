export interface ErrorResponse {
  statusCode: number;
  message: string | string[];
  error: string;
  timestamp: string;
  path: string;
  method: string;
  correlationId?: string;
}

export interface ResolvedError {
  status: number;
  message: string | string[];
  error: string;
}
