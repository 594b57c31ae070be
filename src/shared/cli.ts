import { style } from "./log-format.js";

const { bold, dim, red, white, notice } = style;

const ENV_NAMES: Readonly<Record<string, string>> = {
  "server.port": "PORT",
  "server.host": "HOST",
  "server.maxBodySize": "MAX_BODY_SIZE",
  "server.shutdownTimeoutMs": "SHUTDOWN_TIMEOUT_MS",
  "log.level": "LOG_LEVEL",
  "log.format": "LOG_FORMAT",
  "problems.typeBase": "PROBLEM_TYPE_BASE",
};

/**
 * Render config validation errors, one line per message.
 *
 *   ✗ PORT (server.port) → Number must be less than or equal to 65535
 */
export const formatConfigError = (errors: Readonly<Record<string, readonly string[]>>): string => {
  const lines: string[] = [];

  lines.push("");
  lines.push(`  ${notice("CONFIG ERROR")}  ${dim("Invalid configuration detected")}`);
  lines.push("");

  for (const [field, messages] of Object.entries(errors)) {
    const envName = ENV_NAMES[field];
    const label = envName === undefined ? field : `${envName} ${dim(`(${field})`)}`;
    for (const msg of messages) {
      lines.push(`  ${red("✗")} ${bold(white(label))} ${dim("→")} ${red(msg)}`);
    }
  }

  lines.push("");
  return `${lines.join("\n")}\n`;
};

export const printConfigError = (errors: Readonly<Record<string, readonly string[]>>): void => {
  process.stderr.write(formatConfigError(errors));
};
