import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { FileResponseCache } from "./cache";
import { HttpExperimentDataProvider } from "./provider";

const BODY = 'cx.experiments_ = {"myExp":{"data":{"items":[{"id":1,"weight":1}]}}};';

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "server-cx-cache-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
  vi.unstubAllGlobals();
});

describe("FileResponseCache", () => {
  it("names entries after the encoded key", () => {
    const cache = new FileResponseCache(`${dir}/`);
    expect(cache.pathFor("a/b")).toBe(path.join(dir, "cx-a%2Fb.cache"));
  });

  it("loads and stores the body on a miss", async () => {
    const cache = new FileResponseCache(dir);
    const load = vi.fn().mockResolvedValue(BODY);

    await expect(cache.getOrLoad("myExp", load)).resolves.toBe(BODY);
    expect(load).toHaveBeenCalledOnce();
    expect(fs.readFileSync(cache.pathFor("myExp"), "utf-8")).toBe(BODY);
  });

  it("serves a fresh entry without loading", async () => {
    const cache = new FileResponseCache(dir, { ttl: 60 });
    fs.writeFileSync(cache.pathFor("myExp"), "cached");
    const load = vi.fn().mockResolvedValue(BODY);

    await expect(cache.getOrLoad("myExp", load)).resolves.toBe("cached");
    expect(load).not.toHaveBeenCalled();
  });

  it("reloads a stale entry", async () => {
    const cache = new FileResponseCache(dir, {
      ttl: 60,
      clock: () => Date.now() + 120_000,
    });
    fs.writeFileSync(cache.pathFor("myExp"), "cached");
    const load = vi.fn().mockResolvedValue(BODY);

    await expect(cache.getOrLoad("myExp", load)).resolves.toBe(BODY);
    expect(load).toHaveBeenCalledOnce();
  });

  it("shares one load between concurrent callers", async () => {
    const cache = new FileResponseCache(dir);
    let release: (body: string) => void = () => undefined;
    const load = vi.fn(
      () =>
        new Promise<string>((resolve) => {
          release = resolve;
        })
    );

    const first = cache.getOrLoad("myExp", load);
    const second = cache.getOrLoad("myExp", load);
    // Let the cache lookups settle before the load resolves
    await vi.waitFor(() => expect(load).toHaveBeenCalled());
    release(BODY);

    await expect(Promise.all([first, second])).resolves.toEqual([BODY, BODY]);
    expect(load).toHaveBeenCalledOnce();
  });

  it("fails with CACHE_ERROR when the directory is not writable", async () => {
    const cache = new FileResponseCache(path.join(dir, "missing"));

    await expect(cache.getOrLoad("myExp", async () => BODY)).rejects.toMatchObject({
      code: "CACHE_ERROR",
    });
  });
});

describe("HttpExperimentDataProvider with a cache", () => {
  it("fetches once while the entry is fresh", async () => {
    const fetchMock = vi.fn().mockResolvedValue({
      ok: true,
      status: 200,
      text: () => Promise.resolve(BODY),
    });
    vi.stubGlobal("fetch", fetchMock);
    const provider = new HttpExperimentDataProvider({ cache: new FileResponseCache(dir) });

    const first = await provider.fetch("myExp");
    const second = await provider.fetch("myExp");

    expect(first).toEqual([{ variationId: 1, weight: 1, disabled: false }]);
    expect(second).toEqual(first);
    expect(fetchMock).toHaveBeenCalledOnce();
  });
});
