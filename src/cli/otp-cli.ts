import { InvalidArgumentError, type Command } from "commander";
import { loadConfig, type OtpConfig } from "../config/config.js";
import { getChildLogger } from "../logging.js";
import { decodeBase32 } from "../otp/base32.js";
import { OtpError } from "../otp/errors.js";
import {
  MAX_COUNTER,
  counterFactor,
  generatePassword,
  isOtpAlgorithm,
  resolveCounter,
  timerFactor,
  validateGenerator,
  type Factor,
  type OtpAlgorithm,
} from "../otp/generator.js";
import { buildOtpauthUri, parseOtpauthUri } from "../otp/otpauth.js";
import { createGenerator, createToken } from "../otp/token.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { theme } from "../terminal/theme.js";

const log = getChildLogger("cli");

export type OtpCliDeps = {
  runtime?: RuntimeEnv;
  config?: OtpConfig;
  /** Current Unix time in seconds. */
  now?: () => number;
};

type CodeOptions = {
  digits: number;
  algorithm: OtpAlgorithm;
  json: boolean;
};

type HotpOptions = CodeOptions & { counter: bigint };
type TotpOptions = CodeOptions & { period: number; time?: number };
type UriOptions = {
  name: string;
  issuer?: string;
  counter?: bigint;
  period: number;
  digits: number;
  algorithm: OtpAlgorithm;
};
type CodeFromUriOptions = { time?: number; json: boolean };

function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("expected an integer");
  }
  return Number(value);
}

function parseSeconds(value: string): number {
  const seconds = value.trim() === "" ? Number.NaN : Number(value);
  if (!Number.isFinite(seconds)) {
    throw new InvalidArgumentError("expected a number of seconds");
  }
  return seconds;
}

function parseCounter(value: string): bigint {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("expected a non-negative integer");
  }
  const counter = BigInt(value.trim());
  if (counter > MAX_COUNTER) {
    throw new InvalidArgumentError("expected a counter that fits in 64 bits");
  }
  return counter;
}

function parseAlgorithm(value: string): OtpAlgorithm {
  const upper = value.toUpperCase();
  if (!isOtpAlgorithm(upper)) {
    throw new InvalidArgumentError("expected SHA1, SHA256 or SHA512");
  }
  return upper;
}

function generateCode(params: {
  factor: Factor;
  secret: Uint8Array;
  algorithm: OtpAlgorithm;
  digits: number;
  atTime: number;
  runtime: RuntimeEnv;
}): { code: string; counter: bigint } {
  const { factor, secret, algorithm, digits, atTime, runtime } = params;
  if (!validateGenerator({ factor, secret, algorithm, digits })) {
    runtime.error(
      theme.warn("Warning: non-standard configuration; authenticators expect 6-8 digits."),
    );
  }
  const counter = resolveCounter(factor, atTime);
  if (!counter.ok) {
    throw new OtpError(counter.reason);
  }
  const password = generatePassword({ algorithm, digits, secret, counter: counter.value });
  if (!password.ok) {
    throw new OtpError(password.reason);
  }
  log.debug("generated password", {
    factor: factor.kind,
    algorithm,
    digits,
    counter: counter.value.toString(),
  });
  return { code: password.value, counter: counter.value };
}

function printCode(
  runtime: RuntimeEnv,
  result: { code: string; counter: bigint },
  json: boolean,
): void {
  if (json) {
    runtime.log(JSON.stringify({ code: result.code, counter: result.counter.toString() }));
    return;
  }
  runtime.log(result.code);
}

function secondsRemaining(atTime: number, period: number): number {
  return Math.ceil(period - (atTime % period));
}

export function registerOtpCli(program: Command, deps: OtpCliDeps = {}) {
  const runtime = deps.runtime ?? defaultRuntime;
  const config = deps.config ?? loadConfig();
  const now = deps.now ?? (() => Date.now() / 1000);

  program
    .command("hotp")
    .description("Generate a counter-based password (RFC 4226)")
    .argument("<secret>", "Shared secret (base32)")
    .option("--counter <n>", "Counter value", parseCounter, 0n)
    .option("--digits <n>", "Code length (1-9)", parseInteger, config.digits)
    .option("--algorithm <name>", "SHA1, SHA256 or SHA512", parseAlgorithm, config.algorithm)
    .option("--json", "Print JSON", false)
    .action((secret: string, opts: HotpOptions) => {
      const result = generateCode({
        factor: counterFactor(opts.counter),
        secret: decodeBase32(secret),
        algorithm: opts.algorithm,
        digits: opts.digits,
        atTime: 0,
        runtime,
      });
      printCode(runtime, result, opts.json);
    });

  program
    .command("totp")
    .description("Generate a time-based password (RFC 6238)")
    .argument("<secret>", "Shared secret (base32)")
    .option("--time <seconds>", "Unix time in seconds (default: now)", parseSeconds)
    .option("--period <seconds>", "Time step in seconds", parseSeconds, config.period)
    .option("--digits <n>", "Code length (1-9)", parseInteger, config.digits)
    .option("--algorithm <name>", "SHA1, SHA256 or SHA512", parseAlgorithm, config.algorithm)
    .option("--json", "Print JSON", false)
    .action((secret: string, opts: TotpOptions) => {
      const atTime = opts.time ?? now();
      const result = generateCode({
        factor: timerFactor(opts.period),
        secret: decodeBase32(secret),
        algorithm: opts.algorithm,
        digits: opts.digits,
        atTime,
        runtime,
      });
      printCode(runtime, result, opts.json);
      if (!opts.json) {
        runtime.log(theme.muted(`valid for ${secondsRemaining(atTime, opts.period)}s`));
      }
    });

  program
    .command("uri")
    .description("Build an otpauth:// URI for authenticator app setup")
    .argument("<secret>", "Shared secret (base32)")
    .requiredOption("--name <name>", "Account name (e.g. email)")
    .option("--issuer <issuer>", "Issuer shown by the authenticator")
    .option("--counter <n>", "Initial counter; builds an hotp URI", parseCounter)
    .option("--period <seconds>", "Time step in seconds", parseSeconds, config.period)
    .option("--digits <n>", "Code length (6-8)", parseInteger, config.digits)
    .option("--algorithm <name>", "SHA1, SHA256 or SHA512", parseAlgorithm, config.algorithm)
    .action((secret: string, opts: UriOptions) => {
      const generator = createGenerator({
        factor: opts.counter === undefined ? timerFactor(opts.period) : counterFactor(opts.counter),
        secret: decodeBase32(secret),
        algorithm: opts.algorithm,
        digits: opts.digits,
      });
      if (!generator) {
        throw new OtpError("invalid_generator");
      }
      runtime.log(
        buildOtpauthUri(createToken({ generator, name: opts.name, issuer: opts.issuer })),
      );
    });

  program
    .command("code")
    .description("Generate the current password for an otpauth:// URI")
    .argument("<uri>", "otpauth:// URI")
    .option("--time <seconds>", "Unix time in seconds (default: now)", parseSeconds)
    .option("--json", "Print JSON", false)
    .action((uri: string, opts: CodeFromUriOptions) => {
      const parsed = parseOtpauthUri(uri);
      if (!parsed.ok) {
        throw new OtpError(parsed.reason);
      }
      const { generator, issuer, name } = parsed.value;
      log.debug("parsed otpauth uri", { issuer, name, factor: generator.factor.kind });
      const result = generateCode({ ...generator, atTime: opts.time ?? now(), runtime });
      printCode(runtime, result, opts.json);
    });
}
