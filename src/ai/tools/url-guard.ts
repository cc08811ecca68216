/**
 * URL Guard
 *
 * Rejects URLs that must never be fetched on behalf of generated content:
 * non-http(s) schemes, localhost, private and link-local ranges, cloud
 * metadata endpoints. Article text is model output, so every URL it carries
 * is untrusted.
 */

// ============================================================================
// Error Types
// ============================================================================

export class UnsafeUrlError extends Error {
  readonly name = 'UnsafeUrlError';

  constructor(message: string) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UnsafeUrlError);
    }
  }
}

export function isUnsafeUrlError(error: unknown): error is UnsafeUrlError {
  return error instanceof UnsafeUrlError;
}

// ============================================================================
// Validation
// ============================================================================

function privateRangeReason(hostname: string): string | undefined {
  const ipv4Match = hostname.match(/^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/);
  if (!ipv4Match) return undefined;

  const a = parseInt(ipv4Match[1] ?? '', 10);
  const b = parseInt(ipv4Match[2] ?? '', 10);

  if (a === 10) return 'Private IP range (10.x.x.x)';
  if (a === 172 && b >= 16 && b <= 31) return 'Private IP range (172.16-31.x.x)';
  if (a === 192 && b === 168) return 'Private IP range (192.168.x.x)';
  if (a === 169 && b === 254) return 'Link-local IP range (169.254.x.x)';
  if (a === 127) return 'Loopback IP range (127.x.x.x)';
  if (a === 0) return 'Current network (0.x.x.x)';
  return undefined;
}

/**
 * Parses and checks a URL, returning the parsed form.
 *
 * @throws UnsafeUrlError for malformed, non-http(s) or private-network URLs
 */
export function assertPublicUrl(url: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new UnsafeUrlError('Invalid URL format');
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new UnsafeUrlError(`Protocol not allowed: ${parsed.protocol}`);
  }

  const hostname = parsed.hostname.toLowerCase();
  if (hostname === 'localhost' || hostname === '[::1]' || hostname.endsWith('.localhost')) {
    throw new UnsafeUrlError('Localhost URLs are not allowed');
  }

  if (hostname === 'metadata.google.internal') {
    throw new UnsafeUrlError('Cloud metadata service access blocked');
  }

  const reason = privateRangeReason(hostname);
  if (reason) {
    throw new UnsafeUrlError(reason);
  }

  return parsed;
}
