/**
 * HTTP client configuration
 */
export interface HttpClientConfig {
  baseURL: string;
  timeout?: number;
  verifySsl?: boolean;
  headers?: Record<string, string>;
  auth?: {
    username: string;
    password: string;
  };
}

/**
 * Status and text body of a router response
 */
export interface TransportResponse {
  status: number;
  body: string;
}
