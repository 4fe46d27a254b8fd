export interface Cookie {
  name: string;
  value: string;
  /** Lower-case host or domain, without a leading dot */
  domain: string;
  /** false when the cookie came with a Domain attribute and applies to subdomains */
  hostOnly: boolean;
  path: string;
  secure: boolean;
  /** Unix time in seconds; undefined for session cookies */
  expiresAt?: number;
}

const NETSCAPE_HEADER = "# Netscape HTTP Cookie File";

function domainMatches(host: string, cookie: Cookie): boolean {
  if (host === cookie.domain) {
    return true;
  }
  return !cookie.hostOnly && host.endsWith(`.${cookie.domain}`);
}

function pathMatches(requestPath: string, cookiePath: string): boolean {
  if (requestPath === cookiePath) {
    return true;
  }
  const prefix = cookiePath.endsWith("/") ? cookiePath : `${cookiePath}/`;
  return requestPath.startsWith(prefix);
}

function defaultPath(url: URL): string {
  const lastSlash = url.pathname.lastIndexOf("/");
  return lastSlash <= 0 ? "/" : url.pathname.slice(0, lastSlash);
}

function parseExpiry(attributes: Map<string, string>, now: number): number | undefined {
  const maxAge = attributes.get("max-age");
  if (maxAge !== undefined && /^-?\d+$/.test(maxAge)) {
    return Math.floor(now / 1000) + Number(maxAge);
  }
  const expires = attributes.get("expires");
  if (expires !== undefined) {
    const parsed = Date.parse(expires);
    if (!Number.isNaN(parsed)) {
      return Math.floor(parsed / 1000);
    }
  }
  return undefined;
}

/**
 * In-memory cookie store that can be written to and read back from a
 * Netscape-format cookie file, the layout wget and curl use for cookie jars.
 */
export class CookieJar {
  private readonly cookies = new Map<string, Cookie>();

  get size(): number {
    return this.cookies.size;
  }

  list(): Cookie[] {
    return [...this.cookies.values()];
  }

  /**
   * Records one Set-Cookie header value received for `requestUrl`.
   * Cookies for a foreign domain are ignored; expired ones evict any stored
   * cookie with the same name, domain and path.
   */
  setCookie(header: string, requestUrl: URL, now: number = Date.now()): void {
    const [pair, ...rawAttributes] = header.split(";");
    const separator = pair.indexOf("=");
    if (separator <= 0) {
      return;
    }

    const attributes = new Map<string, string>();
    for (const raw of rawAttributes) {
      const index = raw.indexOf("=");
      const key = (index === -1 ? raw : raw.slice(0, index)).trim().toLowerCase();
      const value = index === -1 ? "" : raw.slice(index + 1).trim();
      attributes.set(key, value);
    }

    const host = requestUrl.hostname.toLowerCase();
    const domainAttribute = attributes.get("domain")?.replace(/^\./, "").toLowerCase();
    let domain = host;
    let hostOnly = true;
    if (domainAttribute) {
      if (host !== domainAttribute && !host.endsWith(`.${domainAttribute}`)) {
        return;
      }
      domain = domainAttribute;
      hostOnly = false;
    }

    const pathAttribute = attributes.get("path");
    const cookie: Cookie = {
      name: pair.slice(0, separator).trim(),
      value: pair.slice(separator + 1).trim(),
      domain,
      hostOnly,
      path: pathAttribute && pathAttribute.startsWith("/") ? pathAttribute : defaultPath(requestUrl),
      secure: attributes.has("secure"),
      expiresAt: parseExpiry(attributes, now)
    };

    const key = `${cookie.domain}\t${cookie.path}\t${cookie.name}`;
    if (cookie.expiresAt !== undefined && cookie.expiresAt * 1000 <= now) {
      this.cookies.delete(key);
      return;
    }
    this.cookies.set(key, cookie);
  }

  storeResponseCookies(response: Response, requestUrl: URL, now: number = Date.now()): void {
    for (const header of response.headers.getSetCookie()) {
      this.setCookie(header, requestUrl, now);
    }
  }

  /**
   * Builds the Cookie request header for `url`, or undefined when no stored
   * cookie applies.
   */
  cookieHeader(url: URL, now: number = Date.now()): string | undefined {
    const host = url.hostname.toLowerCase();
    const secureRequest = url.protocol === "https:";
    const matching = this.list().filter((cookie) =>
      domainMatches(host, cookie) &&
      pathMatches(url.pathname, cookie.path) &&
      (!cookie.secure || secureRequest) &&
      (cookie.expiresAt === undefined || cookie.expiresAt * 1000 > now)
    );
    if (matching.length === 0) {
      return undefined;
    }
    // Longer paths first
    matching.sort((a, b) => b.path.length - a.path.length);
    return matching.map((cookie) => `${cookie.name}=${cookie.value}`).join("; ");
  }

  toNetscape(): string {
    const lines = [NETSCAPE_HEADER, ""];
    for (const cookie of this.cookies.values()) {
      lines.push([
        cookie.hostOnly ? cookie.domain : `.${cookie.domain}`,
        cookie.hostOnly ? "FALSE" : "TRUE",
        cookie.path,
        cookie.secure ? "TRUE" : "FALSE",
        String(cookie.expiresAt ?? 0),
        cookie.name,
        cookie.value
      ].join("\t"));
    }
    return `${lines.join("\n")}\n`;
  }

  static fromNetscape(text: string): CookieJar {
    const jar = new CookieJar();
    for (const line of text.split(/\r?\n/)) {
      if (line.trim() === "" || line.startsWith("#")) {
        continue;
      }
      const fields = line.split("\t");
      if (fields.length !== 7) {
        continue;
      }
      const [rawDomain, includeSubdomains, cookiePath, secure, expiry, name, value] = fields;
      const expiresAt = Number(expiry);
      const cookie: Cookie = {
        name,
        value,
        domain: rawDomain.replace(/^\./, "").toLowerCase(),
        hostOnly: includeSubdomains !== "TRUE",
        path: cookiePath,
        secure: secure === "TRUE",
        expiresAt: Number.isFinite(expiresAt) && expiresAt > 0 ? expiresAt : undefined
      };
      jar.cookies.set(`${cookie.domain}\t${cookie.path}\t${cookie.name}`, cookie);
    }
    return jar;
  }
}
