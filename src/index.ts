export { decodeBase32, encodeBase32 } from "./otp/base32.js";
export { OtpError, describeOtpError, type OtpErrorReason } from "./otp/errors.js";
export {
  MAX_COUNTER,
  OTP_ALGORITHMS,
  counterFactor,
  digestLength,
  generatePassword,
  isOtpAlgorithm,
  resolveCounter,
  timerFactor,
  truncateDigest,
  validateGenerator,
  type CounterErrorReason,
  type Factor,
  type GenerationErrorReason,
  type GeneratorParams,
  type OtpAlgorithm,
  type OtpResult,
  type PasswordErrorReason,
} from "./otp/generator.js";
export { buildOtpauthUri, parseOtpauthUri, type OtpauthErrorReason } from "./otp/otpauth.js";
export {
  createGenerator,
  createToken,
  currentPassword,
  passwordAt,
  successor,
  updatedToken,
  type Generator,
  type Token,
} from "./otp/token.js";
export { padStartWith } from "./utils/pad.js";
