import { Command } from 'commander';
import { walkSite, findImages, checkRobots } from '../sdk/index.js';
import { resolveStrategy } from '../crawler/strategy.js';
import { CONFIG_DEFAULTS } from '../types.js';
import { buildConfig, parseHeaders, parsePositiveInt } from './options.js';
import type { CLIOptions, ImagesCLIOptions, RobotsCLIOptions } from './options.js';
import {
  createProgressCallbacks,
  printSummary,
  type Verbosity,
} from './progress.js';

/**
 * Accumulate repeated option values into an array.
 * Used for --header, which can be specified multiple times.
 */
function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Determine the verbosity level from CLI flags.
 */
function getVerbosity(options: CLIOptions): Verbosity {
  if (options.quiet) return 'quiet';
  if (options.verbose) return 'verbose';
  return 'normal';
}

/**
 * Validate the `walk` options before calling the SDK, so bad flags are
 * reported as CLI errors.
 *
 * @throws Error if validation fails
 */
function validateCLIOptions(options: CLIOptions): void {
  if (options.verbose && options.quiet) {
    throw new Error('Cannot use --verbose and --quiet at the same time.');
  }
  if (options.strategy !== undefined) {
    resolveStrategy(options.strategy);
  }
}

/**
 * Print the error message to stderr and exit with code 1.
 */
function fail(error: unknown): void {
  process.stderr.write(
    `Error: ${error instanceof Error ? error.message : String(error)}\n`,
  );
  process.exit(1);
}

async function walkAction(url: string, options: CLIOptions): Promise<void> {
  try {
    validateCLIOptions(options);

    const verbosity = getVerbosity(options);
    const config = buildConfig(url, options);

    // Attach progress callbacks
    const callbacks = createProgressCallbacks(verbosity);
    config.onPageVisited = callbacks.onPageVisited;
    config.onPageSkipped = callbacks.onPageSkipped;
    config.onError = callbacks.onError;

    const result = await walkSite(config);
    printSummary(result, verbosity);

    process.exit(0);
  } catch (error) {
    fail(error);
  }
}

async function imagesAction(url: string, options: ImagesCLIOptions): Promise<void> {
  try {
    const images = await findImages(url, {
      userAgent: options.userAgent,
      headers: options.header && options.header.length > 0 ? parseHeaders(options.header) : undefined,
      timeoutMs: options.timeout !== undefined ? parsePositiveInt(options.timeout, '--timeout') : undefined,
    });
    for (const image of images) {
      process.stdout.write(`${image}\n`);
    }
    process.exit(0);
  } catch (error) {
    fail(error);
  }
}

async function robotsAction(
  robotsUrl: string,
  urls: string[],
  options: RobotsCLIOptions,
): Promise<void> {
  try {
    const verdicts = await checkRobots(robotsUrl, urls, { userAgent: options.userAgent });
    for (const { url, allowed } of verdicts) {
      process.stdout.write(`${allowed ? 'allowed' : 'disallowed'} ${url}\n`);
    }
    process.exit(0);
  } catch (error) {
    fail(error);
  }
}

/**
 * Create and configure the commander program with all commands and options.
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name('sitewalk')
    .description('Visit every same-host page reachable from a URL, depth-first or breadth-first')
    .version('0.1.0');

  program
    .command('walk', { isDefault: true })
    .description('Walk the site and print each visited URL')
    .argument('<url>', 'Start URL')

    // Traversal
    .option('-s, --strategy <name>', 'Traversal strategy: breadth-first (bfs) or depth-first (dfs)')
    .option('--max-pages <n>', 'Stop after visiting this many pages')

    // Robots
    .option('--ignore-robots', 'Ignore robots.txt')
    .option('--robots-url <url>', 'robots.txt location (default: <origin>/robots.txt)')

    // Fetching
    .option('--user-agent <ua>', 'User agent for requests and robots.txt rules', CONFIG_DEFAULTS.userAgent)
    .option('--header <key:value>', 'Custom header (repeatable)', collect, [])
    .option('--timeout <ms>', 'Request timeout in ms')

    // General
    .option('-v, --verbose', 'Verbose progress')
    .option('-q, --quiet', 'Suppress progress and summary')
    .action(walkAction);

  program
    .command('images')
    .description('Print the absolute URL of every image on a page')
    .argument('<url>', 'Page URL')
    .option('--user-agent <ua>', 'User agent for the request')
    .option('--header <key:value>', 'Custom header (repeatable)', collect, [])
    .option('--timeout <ms>', 'Request timeout in ms')
    .action(imagesAction);

  program
    .command('robots')
    .description('Check URLs against a robots.txt file')
    .argument('<robots-url>', 'robots.txt URL')
    .argument('<urls...>', 'URLs to check')
    .option('--user-agent <ua>', 'User agent whose rules apply', '*')
    .action(robotsAction);

  return program;
}

/**
 * Main CLI entry point. Parses command-line arguments and runs the
 * selected command.
 *
 * @param argv - The process.argv array to parse
 */
export async function run(argv: string[]): Promise<void> {
  await createProgram().parseAsync(argv);
}
