#!/usr/bin/env node
import { buildProgram } from "./cli/program.js";
import { defaultRuntime } from "./runtime.js";
import { theme } from "./terminal/theme.js";

async function main(argv: string[]): Promise<void> {
  await buildProgram().parseAsync(argv);
}

main(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  defaultRuntime.error(theme.error(message));
  defaultRuntime.exit(1);
});
