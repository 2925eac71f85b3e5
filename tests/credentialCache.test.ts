import { describe, it, expect } from "vitest";
import { CredentialCache } from "../src/crawl/credentialCache.js";

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void; reject: (err: Error) => void } {
  let resolve: (value: T) => void = () => undefined;
  let reject: (err: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe("CredentialCache", () => {
  it("logs in once and serves the cached token afterwards", async () => {
    let n = 0;
    const cache = new CredentialCache(async () => `token-${++n}`);

    expect(await cache.current()).toBe("token-1");
    expect(await cache.current()).toBe("token-1");
    expect(cache.loginCount).toBe(1);
  });

  it("shares one in-flight login between concurrent readers", async () => {
    const login = deferred<string>();
    const cache = new CredentialCache(() => login.promise);

    const readers = Promise.all([cache.current(), cache.current(), cache.refresh(null)]);
    login.resolve("token-1");

    expect(await readers).toEqual(["token-1", "token-1", "token-1"]);
    expect(cache.loginCount).toBe(1);
  });

  it("does not log in again when the stale token was already replaced", async () => {
    let n = 0;
    const cache = new CredentialCache(async () => `token-${++n}`);

    const first = await cache.current();
    const second = await cache.refresh(first);
    const again = await cache.refresh(first);

    expect(second).toBe("token-2");
    expect(again).toBe("token-2");
    expect(cache.loginCount).toBe(2);
  });

  it("lets the next caller retry after a failed login", async () => {
    let attempts = 0;
    const cache = new CredentialCache(async () => {
      attempts += 1;
      if (attempts === 1) throw new Error("login refused");
      return "token-ok";
    });

    await expect(cache.current()).rejects.toThrow("login refused");
    expect(await cache.current()).toBe("token-ok");
  });
});
