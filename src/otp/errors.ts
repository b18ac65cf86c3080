import type { GenerationErrorReason } from "./generator.js";
import type { OtpauthErrorReason } from "./otpauth.js";

export type OtpErrorReason = GenerationErrorReason | OtpauthErrorReason;

const REASON_MESSAGES: Record<OtpErrorReason, string> = {
  invalid_time: "invalid time: expected a non-negative number of seconds",
  invalid_period: "invalid period: expected a positive number of seconds",
  invalid_digits: "invalid digits: expected an integer from 1 to 9",
  invalid_counter: "invalid counter: expected an integer from 0 to 18446744073709551615",
  invalid_uri: "invalid otpauth URI",
  invalid_scheme: "invalid otpauth URI: scheme must be otpauth",
  invalid_type: "invalid otpauth URI: type must be hotp or totp",
  missing_secret: "invalid otpauth URI: secret parameter is missing",
  invalid_secret: "invalid otpauth URI: secret is not valid base32",
  invalid_algorithm: "unsupported algorithm: expected SHA1, SHA256 or SHA512",
  invalid_generator:
    "unsupported configuration: expected 6 to 8 digits and a period of at most 300 seconds",
};

export function describeOtpError(reason: OtpErrorReason): string {
  return REASON_MESSAGES[reason];
}

/** Thrown at the CLI boundary, where result values become exceptions. */
export class OtpError extends Error {
  readonly reason: OtpErrorReason;

  constructor(reason: OtpErrorReason) {
    super(describeOtpError(reason));
    this.name = "OtpError";
    this.reason = reason;
  }
}
