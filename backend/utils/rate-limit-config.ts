import type { Request } from 'express';
import type { Options } from 'express-rate-limit';

export const rateLimitConfig: Partial<Options> = {
  windowMs: 15 * 60 * 1000,
  limit: 30,
  message: { success: false, error: "Too many requests. Try again later." },
  standardHeaders: 'draft-8',
  legacyHeaders: false,

  // Behind a proxy the client is the first X-Forwarded-For entry
  keyGenerator: (req: Request) => {
    let clientIP = req.ip || req.socket.remoteAddress;

    const xForwardedFor = req.headers['x-forwarded-for'];
    const forwarded = Array.isArray(xForwardedFor) ? xForwardedFor[0] : xForwardedFor;
    if (forwarded) {
      const ips = forwarded.split(',').map(ip => ip.trim());
      clientIP = ips[0] || clientIP;
    }

    return clientIP || 'default-key';
  },
}
