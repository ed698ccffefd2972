/**
 * Interface for parsed CLI options.
 */
export interface CLIOptions {
  /** Batch file with the jobs to run */
  jobs?: string;
  /** Where to write the JSON report; stdout when omitted */
  out?: string;
  help?: boolean;
}

/**
 * Handles parsing of command line arguments.
 */
export class CLIInputParser {
  /**
   * Parse command line arguments.
   * @param args - Arguments array (usually process.argv.slice(2))
   */
  static parse(args: string[]): CLIOptions {
    const options: CLIOptions = {};

    for (let i = 0; i < args.length; i++) {
      const arg = args[i];

      if (arg === '--help' || arg === '-h') {
        options.help = true;
        return options;
      }

      if (arg === '--jobs' || arg === '--out') {
        const next = args[i + 1];
        if (next && !next.startsWith('-')) {
          if (arg === '--jobs') {
            options.jobs = next;
          } else {
            options.out = next;
          }
          i++;
        }
      } else if (!arg.startsWith('-')) {
        // Positional argument is the batch file if not already set
        if (!options.jobs) {
          options.jobs = arg;
        }
      }
    }

    return options;
  }

  /**
   * Generate help text for the CLI.
   */
  static getHelpText(): string {
    return `
Browser Session Orchestrator

Runs a batch of browser automation jobs against a bounded pool of isolated
browser contexts and writes one outcome per job.

Usage:
  npm start -- [options] [jobs-file]

Options:
  --jobs <file>        Batch file (JSON) describing the jobs to run
  --out <file>         Write the JSON report here instead of stdout
  --help, -h           Show this help message

Environment:
  POOL_CAPACITY, DEFAULT_JOB_TIMEOUT_MS, MAX_QUEUE_DEPTH, LOG_LEVEL, ...

Examples:
  npm start -- jobs.json
  npm start -- --jobs jobs.json --out reports/run.json
`;
  }
}
