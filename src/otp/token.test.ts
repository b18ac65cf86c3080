import { afterEach, describe, expect, it, vi } from "vitest";
import { MAX_COUNTER, counterFactor, timerFactor } from "./generator.js";
import {
  createGenerator,
  createToken,
  currentPassword,
  passwordAt,
  successor,
  updatedToken,
  type Generator,
} from "./token.js";

const SECRET = Buffer.from("12345678901234567890");

function mustCreate(generator: Generator | null): Generator {
  if (!generator) {
    throw new Error("expected a valid generator");
  }
  return generator;
}

afterEach(() => {
  vi.useRealTimers();
});

describe("createGenerator", () => {
  it("returns a frozen generator for a valid configuration", () => {
    const generator = mustCreate(
      createGenerator({ factor: timerFactor(30), secret: SECRET, algorithm: "SHA1", digits: 6 }),
    );
    expect(generator.digits).toBe(6);
    expect(Object.isFrozen(generator)).toBe(true);
  });

  it("is unaffected by later changes to its inputs", () => {
    const factor: { kind: "timer"; period: number } = { kind: "timer", period: 30 };
    const secret = Buffer.from("12345678901234567890");
    const generator = mustCreate(createGenerator({ factor, secret, algorithm: "SHA1", digits: 6 }));
    factor.period = 1000;
    secret[0] = 0;
    expect(generator.factor).toEqual({ kind: "timer", period: 30 });
    expect(Object.isFrozen(generator.factor)).toBe(true);
    expect(generator.secret[0]).toBe(0x31);
    expect(passwordAt(generator, 59)).toEqual({ ok: true, value: "287082" });
  });

  it("returns null for configurations the validator rejects", () => {
    expect(
      createGenerator({ factor: counterFactor(0n), secret: SECRET, algorithm: "SHA1", digits: 9 }),
    ).toBeNull();
    expect(
      createGenerator({ factor: timerFactor(301), secret: SECRET, algorithm: "SHA1", digits: 6 }),
    ).toBeNull();
  });
});

describe("passwordAt", () => {
  it("generates HOTP values from the counter and ignores time", () => {
    const generator = mustCreate(
      createGenerator({ factor: counterFactor(9n), secret: SECRET, algorithm: "SHA1", digits: 6 }),
    );
    expect(passwordAt(generator, 0)).toEqual({ ok: true, value: "520489" });
    expect(passwordAt(generator, -100)).toEqual({ ok: true, value: "520489" });
  });

  it("generates TOTP values from the time", () => {
    const generator = mustCreate(
      createGenerator({ factor: timerFactor(30), secret: SECRET, algorithm: "SHA1", digits: 8 }),
    );
    expect(passwordAt(generator, 59)).toEqual({ ok: true, value: "94287082" });
    expect(passwordAt(generator, 1234567890)).toEqual({ ok: true, value: "89005924" });
  });

  it("surfaces counter resolution failures", () => {
    const generator = mustCreate(
      createGenerator({ factor: timerFactor(30), secret: SECRET, algorithm: "SHA1", digits: 6 }),
    );
    expect(passwordAt(generator, -1)).toEqual({ ok: false, reason: "invalid_time" });
  });
});

describe("successor", () => {
  it("increments counter generators without touching the original", () => {
    const generator = mustCreate(
      createGenerator({ factor: counterFactor(0n), secret: SECRET, algorithm: "SHA1", digits: 6 }),
    );
    const next = mustCreate(successor(generator));
    expect(next.factor).toEqual({ kind: "counter", counter: 1n });
    expect(Object.isFrozen(next.factor)).toBe(true);
    expect(generator.factor).toEqual({ kind: "counter", counter: 0n });
    expect(passwordAt(next, 0)).toEqual({ ok: true, value: "287082" });
  });

  it("returns timer generators unchanged", () => {
    const generator = mustCreate(
      createGenerator({ factor: timerFactor(30), secret: SECRET, algorithm: "SHA1", digits: 6 }),
    );
    expect(successor(generator)).toBe(generator);
  });

  it("does not wrap past the largest 64-bit counter", () => {
    const generator = mustCreate(
      createGenerator({
        factor: counterFactor(MAX_COUNTER),
        secret: SECRET,
        algorithm: "SHA1",
        digits: 6,
      }),
    );
    expect(successor(generator)).toBeNull();
  });
});

describe("token", () => {
  it("defaults name and issuer to empty strings", () => {
    const generator = mustCreate(
      createGenerator({ factor: timerFactor(30), secret: SECRET, algorithm: "SHA1", digits: 6 }),
    );
    const token = createToken({ generator });
    expect(token.name).toBe("");
    expect(token.issuer).toBe("");
  });

  it("uses the system clock for the current password", () => {
    vi.useFakeTimers();
    vi.setSystemTime(59_000);
    const generator = mustCreate(
      createGenerator({ factor: timerFactor(30), secret: SECRET, algorithm: "SHA1", digits: 8 }),
    );
    const token = createToken({ generator, name: "alice@example.com", issuer: "Example" });
    expect(currentPassword(token)).toEqual({ ok: true, value: "94287082" });
  });

  it("advances counter tokens", () => {
    const generator = mustCreate(
      createGenerator({ factor: counterFactor(1n), secret: SECRET, algorithm: "SHA1", digits: 6 }),
    );
    const token = createToken({ generator, name: "bob" });
    const next = updatedToken(token);
    expect(next?.name).toBe("bob");
    expect(next && currentPassword(next, 0)).toEqual({ ok: true, value: "359152" });
  });

  it("has no update past the largest counter", () => {
    const generator = mustCreate(
      createGenerator({
        factor: counterFactor(MAX_COUNTER),
        secret: SECRET,
        algorithm: "SHA1",
        digits: 6,
      }),
    );
    expect(updatedToken(createToken({ generator }))).toBeNull();
  });
});
