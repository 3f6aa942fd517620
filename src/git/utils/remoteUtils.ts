const USERINFO_RE = /^([A-Za-z][A-Za-z0-9+.-]*:\/\/)[^/@]*@/;

export const TOKEN_USERNAME = "oauth2";

export function hasToken(url: string) {
  return USERINFO_RE.test(url.trim());
}

export function removeTokenFromUrl(url: string | null | undefined): string {
  if (!url) return "";
  return url.trim().replace(USERINFO_RE, "$1");
}

/** Strips userinfo from every URL embedded in free text (stderr, log lines). */
export function removeTokensFromText(text: string) {
  return text.replace(/([A-Za-z][A-Za-z0-9+.-]*:\/\/)[^/@\s]*@/g, "$1");
}

// Only http(s) remotes accept credentials in the URL; other schemes pass through stripped.
// The userinfo is spliced in as text so the stored remote strips back to the exact input.
export function addTokenToUrl(url: string, token: string | null | undefined): string {
  const bare = removeTokenFromUrl(url);
  if (!token) return bare;
  const scheme = /^https?:\/\//i.exec(bare);
  if (!scheme) return bare;
  const userinfo = `${TOKEN_USERNAME}:${encodeURIComponent(token)}@`;
  return scheme[0] + userinfo + bare.slice(scheme[0].length);
}
