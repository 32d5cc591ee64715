import { execFile } from 'node:child_process';
import type { SupportedEngineAdapter } from '@pmm-link/engines';
import type { RegistrationInstance } from '@pmm-link/shared';
import { NotFoundError, RegistrationError } from '../errors.js';
import { logger } from '../logger.js';

export interface RunResult {
  exitCode: number;
  /** stdout followed by stderr */
  output: string;
}

/** Runs a command to completion; rejects only when it cannot be started */
export type RunFn = (command: string, args: string[]) => Promise<RunResult>;

/** Default run function that shells out to the real pmm-admin */
export const defaultRun: RunFn = (command, args) =>
  new Promise((resolve, reject) => {
    execFile(command, args, { maxBuffer: 1024 * 1024 }, (error, stdout, stderr) => {
      const output = `${stdout}${stderr}`;
      if (!error) {
        resolve({ exitCode: 0, output });
        return;
      }
      // String codes (ENOENT, EACCES, …) mean the process never ran.
      if (typeof error.code === 'string') {
        reject(error);
        return;
      }
      resolve({ exitCode: typeof error.code === 'number' ? error.code : 1, output });
    });
  });

const NOT_FOUND_PATTERN = /not found/i;
const MISSING_CLI_MESSAGE = 'pmm-admin not found. Install the PMM client or set PMM_ADMIN_CMD.';

export interface PmmAdminOptions {
  /** PMM server base URL, used to derive --server-url */
  baseUrl: string;
  /** Explicit command prefix; skips discovery of pmm-admin on PATH */
  command?: string[];
  serverUrlOverride?: string;
  run?: RunFn;
}

/**
 * Drives the local pmm-admin CLI. Invocations are serialised: pmm-admin
 * talks to a single local pmm-agent and is never run concurrently with itself.
 */
export class PmmAdmin {
  private baseUrl: string;
  private configuredCommand?: string[];
  private serverUrlOverride?: string;
  private run: RunFn;
  private detectedCommand?: string[];
  private tail: Promise<void> = Promise.resolve();

  constructor(options: PmmAdminOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.configuredCommand = options.command;
    this.serverUrlOverride = options.serverUrlOverride;
    this.run = options.run ?? defaultRun;
  }

  /** --server-url value: admin credentials embedded, always ending in `/` */
  buildServerUrl(password: string): string {
    let url = this.serverUrlOverride;
    if (!url) {
      // Kept textual: URL would drop an explicit default port such as :443.
      const match = /^(https?:)\/\/(.*)$/.exec(this.baseUrl);
      const scheme = match?.[1] ?? 'https:';
      const hostPart = match?.[2] ?? this.baseUrl;
      url = `${scheme}//admin:${encodeURIComponent(password)}@${hostPart}`;
    }
    return url.endsWith('/') ? url : `${url}/`;
  }

  async resolveCommand(): Promise<string[] | null> {
    if (this.configuredCommand && this.configuredCommand.length > 0) return this.configuredCommand;
    if (this.detectedCommand) return this.detectedCommand;

    try {
      const { exitCode } = await this.run('pmm-admin', ['--version']);
      if (exitCode !== 0) return null;
    } catch (error) {
      logger.debug({ err: error }, 'pmm-admin is not on PATH');
      return null;
    }

    this.detectedCommand = ['pmm-admin'];
    return this.detectedCommand;
  }

  /** Add a database as a PMM service; resolves with the CLI output */
  register(
    adapter: SupportedEngineAdapter,
    instance: RegistrationInstance,
    password: string,
  ): Promise<{ output: string }> {
    return this.exclusive(async () => {
      const args = adapter.buildAddArgs(instance, this.buildServerUrl(password));
      logger.info(
        { engine: adapter.id, service: instance.name, host: instance.host, port: instance.port },
        'Adding service to PMM',
      );

      const { exitCode, output } = await this.invoke(args);
      if (exitCode !== 0) {
        logger.warn({ service: instance.name, exitCode }, 'pmm-admin add failed');
        throw new RegistrationError(`pmm-admin failed (exit ${exitCode})`, output);
      }
      return { output };
    });
  }

  /** Remove a PMM service; a missing service is reported as NotFoundError */
  remove(serviceType: string, serviceName: string, password: string): Promise<{ output: string }> {
    return this.exclusive(async () => {
      const args = [
        'remove',
        serviceType,
        serviceName,
        '--force',
        `--server-url=${this.buildServerUrl(password)}`,
        '--server-insecure-tls',
      ];
      logger.info({ serviceType, service: serviceName }, 'Removing service from PMM');

      const { exitCode, output } = await this.invoke(args);
      if (exitCode !== 0) {
        if (NOT_FOUND_PATTERN.test(output)) {
          throw new NotFoundError(`Service '${serviceName}' was not found in PMM.`, output);
        }
        throw new RegistrationError(`pmm-admin remove failed (exit ${exitCode})`, output);
      }
      return { output };
    });
  }

  private async invoke(args: string[]): Promise<RunResult> {
    const command = await this.resolveCommand();
    if (!command) {
      throw new RegistrationError(MISSING_CLI_MESSAGE);
    }

    const [executable, ...prefix] = command;
    if (!executable) {
      throw new RegistrationError(MISSING_CLI_MESSAGE);
    }

    try {
      return await this.run(executable, [...prefix, ...args]);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new RegistrationError(`Could not run ${executable}: ${reason}`, '', { cause: error });
    }
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // The next caller waits for this one to settle; its outcome belongs to this caller.
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
