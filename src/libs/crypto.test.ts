import { describe, expect, it } from "vitest";
import { createHash, createHmac } from "crypto";
import { NonceSource, signKrakenRequest } from "./crypto.js";

describe("signKrakenRequest", () => {
  const secret = Buffer.from("test-secret").toString("base64");

  it("signs path + sha256(nonce + body) with the decoded secret", () => {
    const body = "nonce=1700000000000&ofs=50";
    const inner = createHash("sha256").update("1700000000000" + body).digest();
    const expected = createHmac("sha512", Buffer.from("test-secret"))
      .update(Buffer.concat([Buffer.from("/0/private/TradesHistory"), inner]))
      .digest("base64");

    expect(signKrakenRequest("/0/private/TradesHistory", "1700000000000", body, secret)).toBe(expected);
  });

  it("changes when the nonce changes", () => {
    const a = signKrakenRequest("/0/private/Ledgers", "1", "nonce=1", secret);
    const b = signKrakenRequest("/0/private/Ledgers", "2", "nonce=1", secret);
    expect(a).not.toBe(b);
  });
});

describe("NonceSource", () => {
  it("never repeats within the same millisecond", () => {
    const nonces = new NonceSource(() => 1000);
    expect([nonces.next(), nonces.next(), nonces.next()]).toEqual(["1000", "1001", "1002"]);
  });

  it("follows the clock when it moves ahead", () => {
    const times = [5, 50];
    const nonces = new NonceSource(() => times.shift() ?? 0);
    expect(nonces.next()).toBe("5");
    expect(nonces.next()).toBe("50");
  });
});
