import { describe, it, expect } from "vitest";
import { buildExperimentCookies, cookieHeader } from "./cookies";

const NOW_MS = 1_700_000_000_000;

describe("buildExperimentCookies()", () => {
  const cookies = buildExperimentCookies({
    assignmentCookie: "60493049.myExp$0:1",
    timestampCookie: "60493049.myExp$0:1700000000:8035200",
    domainName: "example.com",
    path: "/",
    expirationSeconds: 3600,
    nowMs: NOW_MS,
  });

  it("describes both cookies with the dotted domain and flags off", () => {
    expect(cookies).toEqual([
      {
        name: "__utmx",
        value: "60493049.myExp$0:1",
        expires: new Date(NOW_MS + 3_600_000),
        path: "/",
        domain: ".example.com",
        secure: false,
        httpOnly: false,
      },
      {
        name: "__utmxx",
        value: "60493049.myExp$0:1700000000:8035200",
        expires: new Date(NOW_MS + 3_600_000),
        path: "/",
        domain: ".example.com",
        secure: false,
        httpOnly: false,
      },
    ]);
  });

  it("renders a raw Set-Cookie header", () => {
    expect(cookieHeader(cookies[0])).toBe(
      "__utmx=60493049.myExp$0:1; Expires=Tue, 14 Nov 2023 23:13:20 GMT; Path=/; Domain=.example.com"
    );
  });

  it("adds flags when set", () => {
    expect(cookieHeader({ ...cookies[0], secure: true, httpOnly: true })).toBe(
      "__utmx=60493049.myExp$0:1; Expires=Tue, 14 Nov 2023 23:13:20 GMT; Path=/; Domain=.example.com; Secure; HttpOnly"
    );
  });
});
