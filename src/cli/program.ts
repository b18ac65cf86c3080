import { Command } from "commander";
import { loadConfig } from "../config/config.js";
import { setLogLevel } from "../logging.js";
import { VERSION } from "../version.js";
import { registerOtpCli, type OtpCliDeps } from "./otp-cli.js";

export function buildProgram(deps: OtpCliDeps = {}): Command {
  const config = deps.config ?? loadConfig();
  setLogLevel(config.logLevel);
  const program = new Command();
  program
    .name("onetime")
    .description("Generate HOTP and TOTP one-time passwords")
    .version(VERSION);
  registerOtpCli(program, { ...deps, config });
  return program;
}
