import chalk from "chalk";

export const theme = {
  heading: chalk.bold,
  success: chalk.green,
  warn: chalk.yellow,
  error: chalk.red,
  command: chalk.cyan,
  muted: chalk.gray,
};
