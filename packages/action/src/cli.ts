import { Command, CommanderError, Option } from 'commander';
import winston from 'winston';
import { z } from 'zod';
import {
  CONFLICT_MODES,
  ConfigError,
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_DELAY_SECONDS,
  LINK_MODES,
  REGIONS,
  SHARE_MODES,
  WorkDriveClient,
  WorkDriveError,
  describeError,
  logger,
  setLoggerLevel,
  setLoggerTransports,
  validateRunOptions,
} from '@workdrive-upload/sdk';
import type { BatchResult, RunOptions, WorkDriveClientConfig } from '@workdrive-upload/sdk';
import { loadEnvironment } from './config.ts';
import { resolveFilePaths } from './paths.ts';
import { DEFAULT_OUTPUT_KEY, STDOUT_MODES, githubOutputLines, renderStdout, writeGithubOutput } from './output.ts';

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

const flagsSchema = z.object({
  remoteName: z.string().min(1, 'must not be empty').optional(),
  stdoutMode: z.enum(STDOUT_MODES),
  region: z.enum(REGIONS).optional(),
  linkMode: z.enum(LINK_MODES),
  shareMode: z.enum(SHARE_MODES),
  conflictMode: z.enum(CONFLICT_MODES),
  maxRetries: z.coerce.number({ invalid_type_error: 'must be a number' }),
  retryDelay: z.coerce.number({ invalid_type_error: 'must be a number' }),
  failFast: z.boolean().default(false),
  githubOutput: z.string().optional(),
  outputKey: z.string().regex(/^[A-Za-z_][A-Za-z0-9_-]*$/, 'must be a valid output name'),
  logLevel: z.enum(LOG_LEVELS),
  quiet: z.boolean().default(false),
});

export type CliFlags = z.infer<typeof flagsSchema>;

/** What the CLI needs from a client; the real one talks to WorkDrive. */
export interface UploadClient {
  upload(paths: readonly string[], options: RunOptions): Promise<BatchResult>;
}

export interface CliDependencies {
  env: NodeJS.ProcessEnv;
  cwd: string;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  createClient: (config: WorkDriveClientConfig) => UploadClient;
  /** Defaults to a console transport writing every level to stderr. */
  logTransports?: winston.transport[];
}

export const defaultDependencies: CliDependencies = {
  env: process.env,
  cwd: process.cwd(),
  stdout: text => process.stdout.write(text),
  stderr: text => process.stderr.write(text),
  createClient: config => new WorkDriveClient(config),
};

function buildProgram(deps: CliDependencies): Command {
  return new Command()
    .name('workdrive-upload')
    .description('Upload files to a Zoho WorkDrive folder and print shareable links')
    .version('1.0.0')
    .argument('<paths...>', 'files or glob patterns to upload')
    .option('--remote-name <name>', 'name to store a single file under')
    .addOption(new Option('--stdout-mode <mode>', 'stdout rendering').choices(STDOUT_MODES).default('full'))
    .addOption(new Option('--region <code>', 'WorkDrive data centre (default: ZOHO_REGION or us)').choices(REGIONS))
    .addOption(new Option('--link-mode <mode>', 'which URLs to report').choices(LINK_MODES).default('both'))
    .addOption(new Option('--share-mode <mode>', 'publish the file or not').choices(SHARE_MODES).default('public'))
    .addOption(
      new Option('--conflict-mode <mode>', 'what to do when the name exists').choices(CONFLICT_MODES).default('abort')
    )
    .option('--max-retries <n>', 'attempts per network call', String(DEFAULT_MAX_RETRIES))
    .option('--retry-delay <seconds>', 'delay between attempts', String(DEFAULT_RETRY_DELAY_SECONDS))
    .option('--fail-fast', 'stop at the first failing file')
    .option('--github-output <path>', 'file to append step outputs to (default: GITHUB_OUTPUT)')
    .option('--output-key <key>', 'output name for the direct URL', DEFAULT_OUTPUT_KEY)
    .addOption(new Option('--log-level <level>', 'progress log level').choices(LOG_LEVELS).default('info'))
    .option('-q, --quiet', 'only log errors')
    .exitOverride()
    .configureOutput({
      writeOut: text => deps.stdout(text),
      writeErr: text => deps.stderr(text),
    });
}

/** Parses argv (without the node and script entries) into paths and validated flags. */
export function parseArguments(argv: readonly string[], deps: CliDependencies): { patterns: string[]; flags: CliFlags } {
  const program = buildProgram(deps);
  program.parse([...argv], { from: 'user' });

  const parsed = flagsSchema.safeParse(program.opts());
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')} ${issue.message}`);
    throw new ConfigError(`Invalid options: ${problems.join('; ')}`);
  }
  return { patterns: program.args, flags: parsed.data };
}

function configureTransports(deps: CliDependencies): void {
  // stdout is reserved for the rendering the caller asked for
  setLoggerTransports(
    deps.logTransports ?? [new winston.transports.Console({ stderrLevels: [...LOG_LEVELS] })]
  );
}

function toRunOptions(flags: CliFlags): RunOptions {
  return {
    conflict: flags.conflictMode,
    share: flags.shareMode,
    link: flags.linkMode,
    maxRetries: flags.maxRetries,
    retryDelay: flags.retryDelay,
    remoteName: flags.remoteName,
    stopOnError: flags.failFast,
  };
}

async function execute(argv: readonly string[], deps: CliDependencies): Promise<number> {
  const { patterns, flags } = parseArguments(argv, deps);
  setLoggerLevel(flags.quiet ? 'error' : flags.logLevel);

  const environment = loadEnvironment(deps.env);
  const options = toRunOptions(flags);
  if (options.remoteName !== undefined && patterns.length > 1) {
    throw new ConfigError(`--remote-name can only be used with a single file (got ${patterns.length})`);
  }
  // Checked again below: one glob can expand to several files
  const paths = await resolveFilePaths(patterns, { cwd: deps.cwd, workspace: environment.workspace });
  validateRunOptions(paths, options);

  const region = flags.region ?? environment.region ?? 'us';
  logger.info(`Uploading ${paths.length} file(s) to folder ${environment.credentials.folderId} (region ${region})`);

  const client = deps.createClient({
    credentials: environment.credentials,
    region,
    apiBaseURL: environment.apiBaseURL,
    accountsBaseURL: environment.accountsBaseURL,
  });
  const batch = await client.upload(paths, options);

  const rendered = renderStdout(batch, flags.stdoutMode);
  if (rendered !== '') {
    deps.stdout(`${rendered}\n`);
  }

  const outputFile = flags.githubOutput ?? environment.githubOutput;
  if (outputFile) {
    await writeGithubOutput(outputFile, githubOutputLines(batch, flags.outputKey));
    logger.debug(`Wrote step outputs to ${outputFile}`);
  }

  return batch.failed > 0 || batch.aborted ? 1 : 0;
}

/**
 * Runs the CLI and returns the process exit code: 0 when every file was
 * uploaded, 1 on a fatal error or any failed file.
 */
export async function run(argv: readonly string[], deps: CliDependencies = defaultDependencies): Promise<number> {
  configureTransports(deps);
  try {
    return await execute(argv, deps);
  } catch (error) {
    if (error instanceof CommanderError) {
      // commander has already printed help, the version or the usage error
      return error.exitCode;
    }
    if (error instanceof WorkDriveError) {
      logger.error(`${error.name}: ${describeError(error)}`);
      return 1;
    }
    throw error;
  }
}
