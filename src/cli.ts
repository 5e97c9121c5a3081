import chalk from 'chalk';
import { Command } from 'commander';
import { promises as fs } from 'fs';
import path from 'path';

import pkg from '../package.json';
import { runLoadTest } from '.';
import type { CliOptions } from './cli-options';
import { buildConfigInput, parseNumberOption } from './cli-options';
import type { LoadTestConfig } from './config';
import { parseConfig, readRawConfig } from './config';
import { buildConfigJsonSchema } from './schema';
import { getErrorMessage } from './utils';

/** Config file picked up from the working directory when none is given. */
export const DEFAULT_CONFIG_FILE = 'load-pacer.config.json';

/**
 * Template for a JSON-based load-pacer configuration file.
 */
const jsonConfigTemplate = `{
  "url": "http://localhost:8080/health",
  "method": "GET",
  "qps": 10,
  "duration": 30,
  "concurrency": 4,
  "timeout": 5,
  "headers": {
    "Content-Type": "application/json"
  },
  "expectedStatus": 200
}
`;

const fileExists = (filePath: string): Promise<boolean> =>
  fs.access(filePath).then(
    () => true,
    () => false,
  );

async function initConfigFile(): Promise<void> {
  const filePath = path.resolve(process.cwd(), DEFAULT_CONFIG_FILE);

  if (await fileExists(filePath)) {
    // eslint-disable-next-line no-console
    console.log(
      chalk.yellow(
        `Configuration file ${DEFAULT_CONFIG_FILE} already exists. Skipping.`,
      ),
    );
    return;
  }

  try {
    await fs.writeFile(filePath, jsonConfigTemplate);
    // eslint-disable-next-line no-console
    console.log(
      chalk.green(`Successfully created ${DEFAULT_CONFIG_FILE} at ${filePath}`),
    );
  } catch (err) {
    // eslint-disable-next-line no-console
    console.error(
      chalk.red(`Failed to create config file: ${getErrorMessage(err)}`),
    );
    process.exit(1);
  }
}

/**
 * The main action: runs a load test against `url`, or against the target of
 * the config file, with flags taking precedence over file values.
 */
async function runMain(
  url: string | undefined,
  opts: CliOptions,
): Promise<void> {
  let configSource = opts.config;
  if (!configSource && !url) {
    const defaultConfigPath = path.resolve(process.cwd(), DEFAULT_CONFIG_FILE);
    if (await fileExists(defaultConfigPath)) {
      configSource = defaultConfigPath;
    } else {
      // eslint-disable-next-line no-console
      console.error(
        chalk.red(
          `Error: No URL or config file provided and ${DEFAULT_CONFIG_FILE} not found in the current directory.`,
        ),
      );
      // eslint-disable-next-line no-console
      console.log(
        chalk.yellow(
          'Pass a URL, specify a config file using --config, or run `load-pacer init` to create one.',
        ),
      );
      process.exit(1);
    }
  }

  let config: LoadTestConfig;
  try {
    const fileConfig = configSource ? await readRawConfig(configSource) : {};
    config = parseConfig(buildConfigInput(url, opts, fileConfig));
  } catch (err) {
    // eslint-disable-next-line no-console
    console.error(chalk.red(`Error: ${getErrorMessage(err)}`));
    process.exit(1);
  }

  try {
    await runLoadTest({ config, quiet: opts.quiet });
  } catch {
    // runLoadTest prints its own failure; only the exit code is left.
    process.exit(1);
  }
}

/**
 * Builds the commander program. A fresh instance per parse, since commander
 * keeps parsed option values on the command.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('load-pacer')
    .description(
      'A rate-controlled HTTP load generator: sends requests to one endpoint at a target rate with a pool of concurrent workers and reports latency percentiles and error rates.',
    )
    .version(pkg.version);

  program
    .argument('[url]', 'Target URL (http or https)')
    .option('-c, --config <path>', 'Path or URL to a JSON config file')
    .option(
      '-q, --qps <number>',
      'Target requests per second',
      parseNumberOption,
    )
    .option(
      '-d, --duration <seconds>',
      'Test duration in seconds',
      parseNumberOption,
    )
    .option(
      '-n, --concurrency <number>',
      'Number of concurrent workers',
      parseNumberOption,
    )
    .option(
      '-t, --timeout <seconds>',
      'Per-request timeout in seconds',
      parseNumberOption,
    )
    .option('-m, --method <method>', 'HTTP method: GET, POST, PUT or DELETE')
    .option('-H, --headers <headers...>', 'Request headers as key:value pairs')
    .option(
      '-p, --payload <payload>',
      'Request body for POST and PUT (JSON or text)',
    )
    .option(
      '-s, --expected-status <code>',
      'Status code that counts as success',
      parseNumberOption,
    )
    .option('-a, --auth <token>', 'Bearer token for the Authorization header')
    .option('-o, --output <file>', 'Write the JSON summary report to a file')
    .option(
      '-e, --export <name>',
      'Export Markdown, CSV and XLSX reports to a directory with this base name',
    )
    .option('-v, --verbose', 'Print the JSON summary report')
    .option('--quiet', 'Suppress progress and summary tables')
    .action(runMain);

  program
    .command('init')
    .summary(`Create a ${DEFAULT_CONFIG_FILE} file`)
    .description('Create a boilerplate load-pacer configuration file')
    .action(initConfigFile);

  program
    .command('schema')
    .summary('Print the JSON Schema of the config file')
    .action(() => {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify(buildConfigJsonSchema(), null, 2));
    });

  program.addHelpText(
    'after',
    `
Examples:
  # Send 50 requests per second for 30 seconds with 10 workers
  $ load-pacer http://localhost:8080/health --qps 50 --duration 30 --concurrency 10

  # POST a JSON payload with a bearer token and save the summary report
  $ load-pacer http://localhost:8080/items -q 20 -m POST -p '{"name":"item"}' -a test-token -o report.json

  # Create a ${DEFAULT_CONFIG_FILE} file, then run it
  $ load-pacer init
  $ load-pacer

  # Run a specific config file, overriding its rate
  $ load-pacer --config ./path/to/config.json --qps 100
`,
  );

  return program;
}

/**
 * Parses the command line arguments and runs the program.
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(args);
}

if (require.main === module) {
  runCli().catch((err: unknown) => {
    // eslint-disable-next-line no-console
    console.error(chalk.red(String(err)));
    process.exit(1);
  });
}
