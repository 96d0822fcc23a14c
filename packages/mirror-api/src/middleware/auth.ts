/**
 * Authentication Middleware
 * Static bearer key (MIRROR_API_KEY). With no key configured the API is open,
 * which is only meant for local use.
 */

import { timingSafeEqual } from 'crypto';
import type { Request, Response, NextFunction } from 'express';
import { getConfig } from '../config.js';
import { logError } from '../utils/errors.js';

let warnedOpen = false;

function keyMatches(token: string, apiKey: string): boolean {
  const a = Buffer.from(token);
  const b = Buffer.from(apiKey);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Authentication middleware
 * Expects "Authorization: Bearer <MIRROR_API_KEY>"
 */
export function authMiddleware(req: Request, res: Response, next: NextFunction): void {
  const apiKey = getConfig().MIRROR_API_KEY;
  const authHeader = req.headers.authorization;
  const requestContext = {
    method: req.method,
    path: req.path,
    hasAuthHeader: !!authHeader,
  };

  if (!apiKey) {
    if (!warnedOpen) {
      console.warn('[Auth] MIRROR_API_KEY not set, API is unauthenticated');
      warnedOpen = true;
    }
    return next();
  }

  // Must have Authorization header
  if (!authHeader) {
    res.status(401).json({
      success: false,
      errors: ['Authentication required. Provide Bearer token with the API key.'],
    });
    return;
  }

  // Must be Bearer token
  if (!authHeader.startsWith('Bearer ')) {
    const scheme = authHeader.split(' ')[0];
    const error = `Unsupported authentication scheme: ${scheme}. Use Bearer token.`;
    logError('authMiddleware', new Error(error), requestContext);
    res.status(401).json({
      success: false,
      errors: [error],
    });
    return;
  }

  const token = authHeader.substring(7);
  if (!keyMatches(token, apiKey)) {
    logError('authMiddleware', new Error('Invalid API key'), requestContext);
    res.status(401).json({
      success: false,
      errors: ['Invalid API key'],
    });
    return;
  }

  next();
}
