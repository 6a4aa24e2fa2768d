#!/usr/bin/env node

import { ReporterError } from '../errors';
import { Submit } from '../submit/submit';
import { formatVersion, getVersion } from '../metadata/version';

const USAGE = `
Usage: test-reporter <command> [options]

Commands:
  submit    Submit test results for analysis
  version   Print the reporter version

Run test-reporter <command> --help for command-specific help.
`;

const SUBMIT_USAGE = `
Usage: test-reporter submit TEST_RESULTS_DIR [TEST_RESULTS_DIR...] [options]

Package the XML test reports found in each directory, together with metadata
about this build, and upload them.

Options:
  --account-id <id>          Account ID (required)
  --repository-id <id>       Repository ID (required)
  --repository-dir <path>    Path to local clone of repository (default: .)
  --tree <sha>               SHA-1 hash of git tree, when no clone is available
  --coverage-files <globs>   Space-separated glob patterns of coverage reports
  --tags <tags>              Space-separated tags to attach to this build
  --quota-id <id>            Quota to count this build against
  --help                     Show this help

Environment:
  BUILDPULSE_ACCESS_KEY_ID, BUILDPULSE_SECRET_ACCESS_KEY (required)
`;

function hasFlag(args: string[], ...flags: string[]): boolean {
  return args.some((arg) => flags.includes(arg));
}

function printError(message: string): void {
  console.error(`\n${message}\n\nSee more help with --help\n`);
  process.exitCode = 1;
}

async function runSubmit(args: string[]): Promise<void> {
  if (hasFlag(args, '--help', '-h')) {
    console.log(SUBMIT_USAGE);
    return;
  }

  const submit = new Submit({ version: getVersion() });
  await submit.init(args, process.env);
  const key = await submit.run();
  console.log(`Delivered test results to BuildPulse (${key})`);
}

export async function main(args: string[]): Promise<void> {
  const [command, ...rest] = args;

  try {
    switch (command) {
      case 'submit':
        await runSubmit(rest);
        break;
      case 'version':
      case '--version':
        console.log(formatVersion(getVersion()));
        break;
      case 'help':
      case '--help':
      case '-h':
      case undefined:
        console.log(USAGE);
        break;
      default:
        printError(`Unknown command: ${command}`);
    }
  } catch (err) {
    if (err instanceof ReporterError) {
      printError(err.message);
      return;
    }
    throw err;
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).catch((err: unknown) => {
    console.error('Error:', err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
}
