/**
 * Run Command
 * 
 * Loads the configuration, enumerates inputs and uploads them over SFTP.
 * Exit codes: 0 success, 1 configuration or user error, 2 anything else.
 */

import {
  enumerateInputs,
  exitCodeFor,
  isUserError,
  loadWriterConfig,
  EXIT_CODES,
  type ExitCode,
} from '@sftp-writer/core';
import {
  ConnectionManager,
  RetryingUploader,
  UploadOrchestrator,
  parsePrivateKey,
  type TransportFactory,
  type UploadSummary,
} from '@sftp-writer/upload';
import { createLogger, setLogLevel, type RetryOptions } from '@sftp-writer/utils';
import { APP_VERSION, loadCliConfig } from '../config/index.js';
import { printError, printSuccess } from '../lib/output.js';

export interface RunOptions {
  dataDir?: string;
  debug?: boolean;
}

export interface RunDependencies {
  transportFactory?: TransportFactory;
  retry?: Partial<Pick<RetryOptions, 'initialDelay' | 'maxDelay' | 'backoffMultiplier' | 'sleep'>>;
  clock?: () => Date;
  env?: NodeJS.ProcessEnv;
}

/**
 * Upload every input of the data directory. Throws on the first failure.
 */
export async function runWriter(
  options: RunOptions,
  deps: RunDependencies = {}
): Promise<UploadSummary> {
  const cliConfig = loadCliConfig({ dataDir: options.dataDir }, deps.env);
  setLogLevel(cliConfig.logLevel);

  const config = await loadWriterConfig(cliConfig.dataDir);
  if (config.debug || options.debug) {
    setLogLevel('debug');
  }

  const log = createLogger({ component: 'cli' });
  log.info({ version: APP_VERSION, dataDir: cliConfig.dataDir }, 'Running sftp-writer');
  log.debug({ host: config.host, port: config.port, remotePath: config.remotePath }, 'Configuration loaded');

  const credential = parsePrivateKey(config.privateKey, { passphrase: config.password });
  const tasks = await enumerateInputs(cliConfig.dataDir);
  log.info({ tables: tasks.filter(t => t.kind === 'table').length, files: tasks.filter(t => t.kind === 'file').length }, 'Inputs enumerated');

  const connections = new ConnectionManager({ transportFactory: deps.transportFactory });
  const orchestrator = new UploadOrchestrator({
    connect: () => connections.connect({
      host: config.host,
      port: config.port,
      username: config.user,
      password: config.password,
      credential,
    }),
    uploader: new RetryingUploader({ remotePath: config.remotePath, retry: deps.retry }),
    destination: {
      remotePath: config.remotePath,
      appendDate: config.appendDate,
      dateFormat: config.appendDateFormat,
    },
    clock: deps.clock,
  });

  const summary = await orchestrator.run(tasks);
  log.info({ total: summary.total }, 'Done.');
  return summary;
}

/**
 * Run the writer and translate the outcome into an exit code
 */
export async function executeRun(
  options: RunOptions,
  deps: RunDependencies = {}
): Promise<ExitCode> {
  const log = createLogger({ component: 'cli' });

  try {
    const summary = await runWriter(options, deps);
    printSuccess(`Uploaded ${summary.total} file(s)`);
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    if (isUserError(error)) {
      log.error({ err: error, code: error.code }, error.message);
      printError(error.message);
    } else {
      log.fatal({ err: error }, 'Unexpected failure');
      printError(error instanceof Error ? error.message : String(error));
    }
    return exitCodeFor(error);
  }
}

export async function runCommand(options: RunOptions): Promise<void> {
  process.exitCode = await executeRun(options);
}
