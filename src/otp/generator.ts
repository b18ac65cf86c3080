import crypto from "node:crypto";
import { padStartWith } from "../utils/pad.js";

export type OtpAlgorithm = "SHA1" | "SHA256" | "SHA512";

export const OTP_ALGORITHMS: readonly OtpAlgorithm[] = ["SHA1", "SHA256", "SHA512"];

const HMAC_ALGORITHMS: Record<OtpAlgorithm, { name: string; digestLength: number }> = {
  SHA1: { name: "sha1", digestLength: 20 },
  SHA256: { name: "sha256", digestLength: 32 },
  SHA512: { name: "sha512", digestLength: 64 },
};

/** Where the moving factor comes from: an explicit counter (HOTP) or the clock (TOTP). */
export type Factor = { kind: "counter"; counter: bigint } | { kind: "timer"; period: number };

export type GeneratorParams = {
  factor: Factor;
  secret: Uint8Array;
  algorithm: OtpAlgorithm;
  digits: number;
};

export type OtpResult<T, R extends string> = { ok: true; value: T } | { ok: false; reason: R };

export type CounterErrorReason = "invalid_time" | "invalid_period";
export type PasswordErrorReason = "invalid_digits" | "invalid_counter";
export type GenerationErrorReason = CounterErrorReason | PasswordErrorReason;

const MIN_SANE_DIGITS = 6;
const MAX_SANE_DIGITS = 8;
const MAX_PERIOD_SECONDS = 300;

// Zero digits makes no sense; 10 digits overflows a 32-bit unsigned value.
const MIN_DIGITS = 1;
const MAX_DIGITS = 9;

export const MAX_COUNTER = 2n ** 64n - 1n;

export function counterFactor(counter: bigint): Factor {
  return { kind: "counter", counter };
}

export function timerFactor(period: number): Factor {
  return { kind: "timer", period };
}

export function digestLength(algorithm: OtpAlgorithm): number {
  return HMAC_ALGORITHMS[algorithm].digestLength;
}

export function isOtpAlgorithm(value: string): value is OtpAlgorithm {
  return OTP_ALGORITHMS.some((algorithm) => algorithm === value);
}

/**
 * Advisory check that a configuration is one authenticators commonly accept:
 * 6-8 digits and, for time-based factors, a period in (0, 300] seconds.
 * Narrower than the 1-9 digits {@link generatePassword} accepts.
 */
export function validateGenerator(params: GeneratorParams): boolean {
  const { factor, digits } = params;
  const validDigits =
    Number.isInteger(digits) && digits >= MIN_SANE_DIGITS && digits <= MAX_SANE_DIGITS;
  switch (factor.kind) {
    case "counter":
      return validDigits;
    case "timer":
      return validDigits && factor.period > 0 && factor.period <= MAX_PERIOD_SECONDS;
  }
}

/**
 * Derive the HOTP counter for a factor. Timer factors use
 * `floor(atTime / period)`, with `atTime` in seconds since the Unix epoch.
 */
export function resolveCounter(
  factor: Factor,
  atTime: number,
): OtpResult<bigint, CounterErrorReason> {
  switch (factor.kind) {
    case "counter":
      return { ok: true, value: factor.counter };
    case "timer": {
      if (!(atTime >= 0)) {
        return { ok: false, reason: "invalid_time" };
      }
      if (!(factor.period > 0)) {
        return { ok: false, reason: "invalid_period" };
      }
      const steps = Math.floor(atTime / factor.period);
      if (!Number.isFinite(steps)) {
        return { ok: false, reason: "invalid_time" };
      }
      const counter = BigInt(steps);
      if (counter > MAX_COUNTER) {
        return { ok: false, reason: "invalid_time" };
      }
      return { ok: true, value: counter };
    }
  }
}

function hmacDigest(algorithm: OtpAlgorithm, key: Uint8Array, message: Uint8Array): Buffer {
  return crypto.createHmac(HMAC_ALGORITHMS[algorithm].name, key).update(message).digest();
}

/** RFC 4226 section 5.3 dynamic truncation to a 31-bit integer. */
export function truncateDigest(hash: Buffer): number {
  const offset = hash.readUInt8(hash.length - 1) & 0x0f;
  return hash.readUInt32BE(offset) & 0x7fffffff;
}

/** Generate the HOTP value for a counter (RFC 4226). */
export function generatePassword(params: {
  algorithm: OtpAlgorithm;
  digits: number;
  secret: Uint8Array;
  counter: bigint;
}): OtpResult<string, PasswordErrorReason> {
  const { algorithm, digits, secret, counter } = params;
  if (!Number.isInteger(digits) || digits < MIN_DIGITS || digits > MAX_DIGITS) {
    return { ok: false, reason: "invalid_digits" };
  }
  if (counter < 0n || counter > MAX_COUNTER) {
    return { ok: false, reason: "invalid_counter" };
  }

  const counterBuf = Buffer.alloc(8);
  counterBuf.writeBigUInt64BE(counter);
  const hash = hmacDigest(algorithm, secret, counterBuf);
  const code = truncateDigest(hash) % 10 ** digits;
  return { ok: true, value: padStartWith(String(code), "0", digits) };
}
