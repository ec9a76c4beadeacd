/**
 * Supabase JWT Authentication Middleware
 *
 * Validates requests have a valid Supabase access token in the Authorization header.
 * Format: Authorization: Bearer <access_token>
 */

import { IncomingMessage, ServerResponse } from 'http';
import { createClient, SupabaseClient } from '@supabase/supabase-js';

let supabase: SupabaseClient | null = null;

// Created on first use so the server can boot and serve /health without credentials
function getAuthClient(): SupabaseClient {
  if (!supabase) {
    const supabaseUrl = process.env.SUPABASE_URL;
    const supabaseKey = process.env.SUPABASE_SERVICE_KEY;

    if (!supabaseUrl || !supabaseKey) {
      throw new Error('Missing SUPABASE_URL or SUPABASE_SERVICE_KEY environment variables');
    }

    supabase = createClient(supabaseUrl, supabaseKey, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
    });
  }

  return supabase;
}

export interface AuthResult {
  authorized: boolean;
  userId?: string;
  error?: string;
}

export async function validateAuth(req: IncomingMessage): Promise<AuthResult> {
  const authHeader = req.headers.authorization;

  if (!authHeader) {
    return { authorized: false, error: 'Missing Authorization header' };
  }

  // Expected format: "Bearer <token>"
  const parts = authHeader.split(' ');

  if (parts.length !== 2 || parts[0].toLowerCase() !== 'bearer') {
    return { authorized: false, error: 'Invalid Authorization format. Expected: Bearer <token>' };
  }

  const token = parts[1];

  try {
    const { data: { user }, error } = await getAuthClient().auth.getUser(token);

    if (error || !user) {
      return { authorized: false, error: error?.message || 'Invalid or expired token' };
    }

    return { authorized: true, userId: user.id };
  } catch (err) {
    console.error('[Auth] Token verification failed:', err);
    return { authorized: false, error: 'Token verification failed' };
  }
}

export function sendUnauthorized(res: ServerResponse, message: string): void {
  res.writeHead(401, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify({ success: false, error: message }));
}

/**
 * Paths that don't require authentication
 */
const PUBLIC_PATHS = ['/health', '/'];

export function isPublicPath(pathname: string): boolean {
  return PUBLIC_PATHS.includes(pathname);
}

/**
 * Store user IDs by request for retrieval in handlers
 */
const requestUserMap = new WeakMap<IncomingMessage, string>();

export function setRequestUserId(req: IncomingMessage, userId: string): void {
  requestUserMap.set(req, userId);
}

export function requireUserId(req: IncomingMessage): string {
  const userId = requestUserMap.get(req);
  if (!userId) {
    throw new Error('User ID not found - authentication middleware may have failed');
  }
  return userId;
}
