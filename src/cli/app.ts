/**
 * Command-line entry logic: parses flags, wires credentials and logging,
 * then hands over to the menu loop.
 */

import * as path from "path";
import { parseArgs } from "util";
import { clientBuilder, type StorageService } from "../client/index.js";
import { ConsoleLogger, parseLogLevel, type Logger, type LogLevel } from "../observability/logging.js";
import type { HttpTransport } from "../transport/index.js";
import { createCommands } from "./commands.js";
import { runMenu } from "./menu.js";
import { PROJECT_FILE, getProjectId } from "./project.js";
import { ReadlinePrompter, type Prompter } from "./prompt.js";

export const LOG_LEVELS = ["DEBUG", "INFO", "WARNING", "ERROR", "CRITICAL"] as const;

export const USAGE = `Usage: cloud-storage-demo [options]

Options:
  --logging_level <level>      ${LOG_LEVELS.join(", ")} (default INFO)
  --credentials_file <file>    authorized-user JSON with a refresh token
  --project_file <file>        file holding the project id (default ${PROJECT_FILE})
  --download_dir <dir>         where downloaded objects are written (default .)
  -h, --help                   show this message

Without --credentials_file the access token is read from GOOGLE_OAUTH_ACCESS_TOKEN.`;

export interface AppOptions {
  logLevel: LogLevel;
  credentialsFile?: string;
  projectFile: string;
  downloadDir: string;
  help: boolean;
}

/**
 * Hooks for replacing the terminal, the logger or the network.
 */
export interface AppDependencies {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  prompter?: Prompter;
  createLogger?: (level: LogLevel) => Logger;
  transport?: HttpTransport;
  print?: (line: string) => void;
}

/**
 * Parse command-line flags.
 *
 * @throws {TypeError} for unknown flags or missing values
 * @throws {RangeError} for an unknown logging level
 */
export function parseOptions(argv: string[], cwd: string): AppOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      logging_level: { type: "string", default: "INFO" },
      credentials_file: { type: "string" },
      project_file: { type: "string", default: PROJECT_FILE },
      download_dir: { type: "string", default: "." },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
  });

  const levelName = values.logging_level ?? "INFO";
  const logLevel = parseLogLevel(levelName);
  if (!logLevel || levelName.toUpperCase() === "TRACE") {
    throw new RangeError(`Invalid log level: ${levelName}`);
  }

  return {
    logLevel,
    credentialsFile: values.credentials_file ? path.resolve(cwd, values.credentials_file) : undefined,
    projectFile: path.resolve(cwd, values.project_file ?? PROJECT_FILE),
    downloadDir: path.resolve(cwd, values.download_dir ?? "."),
    help: values.help ?? false,
  };
}

async function createStorageClient(
  options: AppOptions,
  env: NodeJS.ProcessEnv,
  projectId: string,
  logger: Logger,
  transport?: HttpTransport
): Promise<StorageService> {
  const builder = clientBuilder().fromEnv(env).projectId(projectId);
  if (options.credentialsFile) {
    builder.credentials({ type: "authorized_user_file", file: options.credentialsFile });
  }
  if (transport) {
    builder.transport(transport);
  }
  if (options.logLevel === "debug") {
    builder.enableLogging().logger(logger);
  }
  return builder.build();
}

/**
 * Run the demo and resolve with the process exit code.
 */
export async function runApp(argv: string[], deps: AppDependencies = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const cwd = deps.cwd ?? process.cwd();
  const print = deps.print ?? console.log;
  const createLogger = deps.createLogger ?? ((level: LogLevel) => new ConsoleLogger(level));

  let options: AppOptions;
  try {
    options = parseOptions(argv, cwd);
  } catch (error) {
    createLogger("error").error(`${error instanceof Error ? error.message : String(error)}\n${USAGE}`);
    return 1;
  }

  if (options.help) {
    print(USAGE);
    return 0;
  }

  const logger = createLogger(options.logLevel);
  const prompter = deps.prompter ?? new ReadlinePrompter();

  try {
    const projectId =
      env.GOOGLE_CLOUD_PROJECT || env.GCLOUD_PROJECT || (await getProjectId(options.projectFile, prompter));
    const client = await createStorageClient(options, env, projectId, logger, deps.transport);

    const commands = createCommands(client, {
      prompter,
      logger,
      downloadDir: options.downloadDir,
      workDir: cwd,
    });
    await runMenu(commands, prompter, logger, print);
    return 0;
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    return 1;
  } finally {
    prompter.close();
  }
}
