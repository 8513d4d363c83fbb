import type { CorsOptions } from 'cors';

export function corsOptions(frontendUrl?: string): CorsOptions {
  return {
    origin: [
      'http://localhost:5174',
      'http://0.0.0.0:5174',
      ...(frontendUrl ? [frontendUrl] : []),
    ],
    credentials: true,
    methods: [
      'GET',
      'POST',
      'OPTIONS',
    ],
    allowedHeaders: [
      'Content-Type',
      'Authorization',
      'X-Requested-With',
    ],
  };
}
