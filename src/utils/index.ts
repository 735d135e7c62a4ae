// HTTP utilities
export { createHttpClient, formatHttpError, isNetworkError, withTimeout } from './http';

// Concurrency utilities
export { mapWithConcurrency } from './concurrency';

// Re-export types
export type { HttpClientConfig } from '../types/http.types';
