function normalizeOrigin(origin: string) {
  const trimmed = origin.trim();
  if (!trimmed) {
    return '';
  }

  try {
    const url = new URL(trimmed);
    const port = url.port ? `:${url.port}` : '';
    return `${url.protocol.toLowerCase()}//${url.hostname.toLowerCase()}${port}`;
  } catch {
    return trimmed.toLowerCase();
  }
}

function expandOriginVariants(origin: string): string[] {
  try {
    const url = new URL(origin);
    const variants = [url.origin];
    if (url.hostname === 'localhost') {
      const port = url.port ? `:${url.port}` : '';
      variants.push(`${url.protocol}//127.0.0.1${port}`, `${url.protocol}//[::1]${port}`);
    }
    return variants;
  } catch {
    return [origin];
  }
}

function isLoopbackOrigin(origin: string) {
  try {
    const url = new URL(origin);
    return ['localhost', '127.0.0.1', '[::1]'].includes(url.hostname.toLowerCase()) && /^https?:$/.test(url.protocol);
  } catch {
    return false;
  }
}

export interface OriginPolicy {
  allowedOrigins: string[];
  isOriginAllowed(origin?: string | null): boolean;
}

/**
 * Builds the CORS check from a comma-separated origin list. `localhost`
 * entries also admit 127.0.0.1 and [::1]; with `allowAnyLoopback` every
 * http(s) loopback origin passes (development only).
 */
export function createOriginPolicy(corsOrigin: string, allowAnyLoopback: boolean): OriginPolicy {
  const allowed = new Set(
    corsOrigin
      .split(',')
      .map((origin) => origin.trim())
      .filter(Boolean)
      .flatMap(expandOriginVariants)
      .map(normalizeOrigin)
      .filter(Boolean)
  );

  return {
    allowedOrigins: Array.from(allowed),
    isOriginAllowed(origin) {
      if (!origin) {
        return true;
      }
      return allowed.has(normalizeOrigin(origin)) || (allowAnyLoopback && isLoopbackOrigin(origin));
    }
  };
}
