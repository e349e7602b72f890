import type { CookieDescriptor } from "./types";

export const ASSIGNMENT_COOKIE_NAME = "__utmx";
export const TIMESTAMP_COOKIE_NAME = "__utmxx";

/**
 * Descriptors for both experiment cookies. Flags stay off, matching the
 * cookies the tracking client writes itself.
 */
export function buildExperimentCookies(options: {
  assignmentCookie: string;
  timestampCookie: string;
  domainName: string;
  path: string;
  expirationSeconds: number;
  nowMs: number;
}): CookieDescriptor[] {
  const expires = new Date(options.nowMs + options.expirationSeconds * 1000);
  const shared = {
    expires,
    path: options.path,
    domain: `.${options.domainName}`,
    secure: false,
    httpOnly: false,
  };

  return [
    { name: ASSIGNMENT_COOKIE_NAME, value: options.assignmentCookie, ...shared },
    { name: TIMESTAMP_COOKIE_NAME, value: options.timestampCookie, ...shared },
  ];
}

/**
 * Raw `Set-Cookie` header value; the cookie value is written unencoded
 */
export function cookieHeader(cookie: CookieDescriptor): string {
  const parts = [
    `${cookie.name}=${cookie.value}`,
    `Expires=${cookie.expires.toUTCString()}`,
    `Path=${cookie.path}`,
    `Domain=${cookie.domain}`,
  ];
  if (cookie.secure) parts.push("Secure");
  if (cookie.httpOnly) parts.push("HttpOnly");
  return parts.join("; ");
}
