import type { UserWalkConfig } from '../sdk/index.js';

/**
 * Raw options of the `walk` command as parsed by commander.
 */
export interface CLIOptions {
  strategy?: string;
  maxPages?: string;
  ignoreRobots?: boolean;
  robotsUrl?: string;
  userAgent?: string;
  header?: string[];
  timeout?: string;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Raw options of the `images` command.
 */
export interface ImagesCLIOptions {
  userAgent?: string;
  header?: string[];
  timeout?: string;
}

/**
 * Raw options of the `robots` command.
 */
export interface RobotsCLIOptions {
  userAgent: string;
}

/**
 * Parse --header values from "key:value" format into a Record.
 * Splits on the first colon to allow colons in the value.
 *
 * @param headers - Array of "key:value" strings
 * @returns A Record mapping header names to values
 * @throws Error if a header value does not contain a colon
 */
export function parseHeaders(headers: string[]): Record<string, string> {
  const result: Record<string, string> = {};

  for (const header of headers) {
    const colonIndex = header.indexOf(':');
    if (colonIndex === -1) {
      throw new Error(
        `Invalid header format: "${header}". Expected "key:value" format.`,
      );
    }
    const key = header.slice(0, colonIndex).trim();
    const value = header.slice(colonIndex + 1).trim();
    if (!key) {
      throw new Error(
        `Invalid header format: "${header}". Header name cannot be empty.`,
      );
    }
    result[key] = value;
  }

  return result;
}

/**
 * Parse a numeric flag that must be a positive whole number.
 *
 * @param value - Raw flag value
 * @param flag - Flag name, for the error message
 * @throws Error if the value is not a positive integer
 */
export function parsePositiveInt(value: string, flag: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid value for ${flag}: "${value}". Expected a positive integer.`);
  }
  return parsed;
}

/**
 * Build a walk config from the parsed CLI options and URL argument.
 *
 * Only sets properties that were explicitly provided by the user;
 * the SDK's own default merging handles the rest.
 *
 * @param url - The positional URL argument
 * @param options - The parsed commander options
 * @returns A partial config with at least `url` set
 */
export function buildConfig(url: string, options: CLIOptions): UserWalkConfig {
  const config: UserWalkConfig = { url };

  // Traversal
  if (options.strategy !== undefined) {
    config.strategy = options.strategy;
  }
  if (options.maxPages !== undefined) {
    config.maxPages = parsePositiveInt(options.maxPages, '--max-pages');
  }

  // Robots
  if (options.ignoreRobots) {
    config.respectRobots = false;
  }
  if (options.robotsUrl !== undefined) {
    config.robotsUrl = options.robotsUrl;
  }

  // Fetching
  if (options.userAgent !== undefined) {
    config.userAgent = options.userAgent;
  }
  if (options.header !== undefined && options.header.length > 0) {
    config.headers = parseHeaders(options.header);
  }
  if (options.timeout !== undefined) {
    config.timeoutMs = parsePositiveInt(options.timeout, '--timeout');
  }

  return config;
}
