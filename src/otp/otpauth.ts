import { decodeBase32, encodeBase32 } from "./base32.js";
import {
  MAX_COUNTER,
  isOtpAlgorithm,
  type Factor,
  type OtpAlgorithm,
  type OtpResult,
} from "./generator.js";
import { createGenerator, createToken, type Token } from "./token.js";

export type OtpauthErrorReason =
  | "invalid_uri"
  | "invalid_scheme"
  | "invalid_type"
  | "missing_secret"
  | "invalid_secret"
  | "invalid_algorithm"
  | "invalid_digits"
  | "invalid_period"
  | "invalid_counter"
  | "invalid_generator";

const DEFAULT_ALGORITHM: OtpAlgorithm = "SHA1";
const DEFAULT_DIGITS = "6";
const DEFAULT_PERIOD = "30";
const DEFAULT_COUNTER = "0";

const INTEGER_PATTERN = /^\d+$/;

/** Build an otpauth:// URI for authenticator app setup. */
export function buildOtpauthUri(token: Token): string {
  const { factor, secret, algorithm, digits } = token.generator;
  const name = encodeURIComponent(token.name);
  const label = token.issuer ? `${encodeURIComponent(token.issuer)}:${name}` : name;
  const qs = new URLSearchParams({ secret: encodeBase32(secret) });
  if (token.issuer) {
    qs.set("issuer", token.issuer);
  }
  qs.set("algorithm", algorithm);
  qs.set("digits", String(digits));
  switch (factor.kind) {
    case "counter":
      qs.set("counter", factor.counter.toString());
      return `otpauth://hotp/${label}?${qs.toString()}`;
    case "timer":
      qs.set("period", String(factor.period));
      return `otpauth://totp/${label}?${qs.toString()}`;
  }
}

function fail(reason: OtpauthErrorReason): { ok: false; reason: OtpauthErrorReason } {
  return { ok: false, reason };
}

function decodeLabelPart(part: string): string | null {
  try {
    return decodeURIComponent(part).trim();
  } catch {
    return null;
  }
}

// Split on the literal colon before decoding: an encoded %3A belongs to the issuer or name.
function parseLabel(pathname: string): { issuer?: string; name: string } | null {
  const raw = pathname.replace(/^\//, "");
  const separator = raw.indexOf(":");
  if (separator < 0) {
    const name = decodeLabelPart(raw);
    return name === null ? null : { name };
  }
  const issuer = decodeLabelPart(raw.slice(0, separator));
  const name = decodeLabelPart(raw.slice(separator + 1));
  if (issuer === null || name === null) {
    return null;
  }
  return { issuer, name };
}

function parseFactor(
  type: "hotp" | "totp",
  params: URLSearchParams,
): OtpResult<Factor, OtpauthErrorReason> {
  if (type === "hotp") {
    const raw = params.get("counter") ?? DEFAULT_COUNTER;
    if (!INTEGER_PATTERN.test(raw)) {
      return fail("invalid_counter");
    }
    const counter = BigInt(raw);
    if (counter > MAX_COUNTER) {
      return fail("invalid_counter");
    }
    return { ok: true, value: { kind: "counter", counter } };
  }
  const raw = params.get("period") ?? DEFAULT_PERIOD;
  const period = raw.trim() === "" ? Number.NaN : Number(raw);
  if (Number.isNaN(period)) {
    return fail("invalid_period");
  }
  return { ok: true, value: { kind: "timer", period } };
}

/**
 * Parse an otpauth:// Key URI into a token.
 *
 * Missing parameters fall back to SHA1, 6 digits, a 30 second period and
 * counter 0. The parsed configuration must pass generator validation.
 */
export function parseOtpauthUri(uri: string): OtpResult<Token, OtpauthErrorReason> {
  let url: URL;
  try {
    url = new URL(uri.trim());
  } catch {
    return fail("invalid_uri");
  }
  if (url.protocol !== "otpauth:") {
    return fail("invalid_scheme");
  }
  const type = url.host.toLowerCase();
  if (type !== "hotp" && type !== "totp") {
    return fail("invalid_type");
  }
  const label = parseLabel(url.pathname);
  if (!label) {
    return fail("invalid_uri");
  }

  const params = url.searchParams;
  const secretParam = params.get("secret");
  if (!secretParam) {
    return fail("missing_secret");
  }
  let secret: Buffer;
  try {
    secret = decodeBase32(secretParam);
  } catch {
    return fail("invalid_secret");
  }
  if (secret.length === 0) {
    return fail("invalid_secret");
  }

  const algorithm = (params.get("algorithm") ?? DEFAULT_ALGORITHM).toUpperCase();
  if (!isOtpAlgorithm(algorithm)) {
    return fail("invalid_algorithm");
  }
  const rawDigits = params.get("digits") ?? DEFAULT_DIGITS;
  if (!INTEGER_PATTERN.test(rawDigits)) {
    return fail("invalid_digits");
  }

  const factor = parseFactor(type, params);
  if (!factor.ok) {
    return factor;
  }

  const generator = createGenerator({
    factor: factor.value,
    secret,
    algorithm,
    digits: Number(rawDigits),
  });
  if (!generator) {
    return fail("invalid_generator");
  }
  return {
    ok: true,
    value: createToken({
      generator,
      name: label.name,
      issuer: params.get("issuer") ?? label.issuer ?? "",
    }),
  };
}
