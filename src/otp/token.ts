import {
  MAX_COUNTER,
  generatePassword,
  resolveCounter,
  validateGenerator,
  type Factor,
  type GenerationErrorReason,
  type GeneratorParams,
  type OtpResult,
} from "./generator.js";

/** A validated OTP configuration. Only {@link createGenerator} should build one. */
export type Generator = Readonly<GeneratorParams>;

export type Token = {
  readonly name: string;
  readonly issuer: string;
  readonly generator: Generator;
};

function frozenFactor(factor: Factor): Factor {
  switch (factor.kind) {
    case "counter":
      return Object.freeze({ kind: "counter", counter: factor.counter });
    case "timer":
      return Object.freeze({ kind: "timer", period: factor.period });
  }
}

/**
 * Returns null when the parameters fail {@link validateGenerator}.
 * The factor and secret are copied; later changes to the inputs do not reach the generator.
 */
export function createGenerator(params: GeneratorParams): Generator | null {
  if (!validateGenerator(params)) {
    return null;
  }
  return Object.freeze({
    factor: frozenFactor(params.factor),
    secret: Uint8Array.from(params.secret),
    algorithm: params.algorithm,
    digits: params.digits,
  });
}

/** Password for the given Unix time in seconds. Counter generators ignore the time. */
export function passwordAt(
  generator: Generator,
  atTime: number,
): OtpResult<string, GenerationErrorReason> {
  const counter = resolveCounter(generator.factor, atTime);
  if (!counter.ok) {
    return counter;
  }
  return generatePassword({
    algorithm: generator.algorithm,
    digits: generator.digits,
    secret: generator.secret,
    counter: counter.value,
  });
}

/**
 * The generator to use after a counter-based password has been consumed.
 * Timer generators advance with the clock and are returned as-is.
 */
export function successor(generator: Generator): Generator | null {
  const { factor } = generator;
  switch (factor.kind) {
    case "timer":
      return generator;
    case "counter": {
      if (factor.counter >= MAX_COUNTER) {
        return null;
      }
      const next: Generator = {
        ...generator,
        factor: frozenFactor({ kind: "counter", counter: factor.counter + 1n }),
      };
      return Object.freeze(next);
    }
  }
}

export function createToken(params: {
  generator: Generator;
  name?: string;
  issuer?: string;
}): Token {
  return Object.freeze({
    name: params.name ?? "",
    issuer: params.issuer ?? "",
    generator: params.generator,
  });
}

export function currentPassword(
  token: Token,
  atTime: number = Date.now() / 1000,
): OtpResult<string, GenerationErrorReason> {
  return passwordAt(token.generator, atTime);
}

export function updatedToken(token: Token): Token | null {
  const next = successor(token.generator);
  if (!next) {
    return null;
  }
  return Object.freeze({ ...token, generator: next });
}
