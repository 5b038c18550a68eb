function isValidPort(n: number): boolean {
  return Number.isInteger(n) && n >= 1 && n <= 65535;
}

// Targets come from the operator's config file, so private and loopback hosts are allowed.
export function validateHttpTarget(target: string): string | null {
  let url: URL;
  try {
    url = new URL(target);
  } catch {
    return 'must be a valid URL';
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return 'protocol must be http or https';
  }

  if (!url.hostname) return 'must include a hostname';
  if (url.username || url.password) return 'must not embed credentials; use api_key_env';

  const port = url.port ? Number(url.port) : url.protocol === 'http:' ? 80 : 443;
  if (!isValidPort(port)) return 'port is invalid';

  return null;
}

export function joinUrl(baseUrl: string, pathname: string): string {
  const base = baseUrl.replace(/\/+$/, '');
  const suffix = pathname.startsWith('/') ? pathname : `/${pathname}`;
  return `${base}${suffix}`;
}
