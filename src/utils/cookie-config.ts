export interface CookieOptions {
  domain?: string;
  secure: boolean;
  sameSite: 'lax' | 'none';
  httpOnly: boolean;
  maxAge: number;
}

/**
 * Extract the cookie domain from a URL. Localhost gets no domain restriction.
 */
export function extractDomainFromUrl(url: string): string | undefined {
  try {
    const hostname = new URL(url).hostname;

    if (hostname === 'localhost' || hostname === '127.0.0.1') {
      return undefined;
    }

    // api.example.com -> .example.com
    const parts = hostname.split('.');
    if (parts.length >= 2) {
      return `.${parts.slice(-2).join('.')}`;
    }

    return undefined;
  } catch {
    return undefined;
  }
}

export function getSessionCookieOptions(
  backendDomain: string,
  maxAge: number,
): CookieOptions {
  return {
    domain: extractDomainFromUrl(backendDomain),
    secure: backendDomain.startsWith('https://'),
    sameSite: 'lax',
    httpOnly: true,
    maxAge,
  };
}
