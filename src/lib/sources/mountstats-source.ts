import { readFile } from 'fs/promises';
import type { SSHSourceConfig } from '@/lib/config/ssh-source-config';
import { sshConnectionManager } from '@/lib/clients/ssh-client';
import type { RemoteShell, SSHConnectionConfig } from '@/lib/streaming/types';
import { collectTextLines } from '@/lib/parsers/text-parser';

/**
 * Where a mountstats report comes from. Each call to `readLines()`
 * returns a fresh snapshot of the whole report.
 */
export interface MountstatsSource {
  /** Label for logs */
  readonly name: string;

  readLines(): Promise<string[]>;

  close(): Promise<void>;
}

/**
 * Reads the report from the local filesystem
 */
export class FileMountstatsSource implements MountstatsSource {
  readonly name: string;

  constructor(private readonly path: string) {
    this.name = path;
  }

  async readLines(): Promise<string[]> {
    const text = await readFile(this.path, 'utf8');
    return text.split(/\r?\n/);
  }

  async close(): Promise<void> {}
}

/** Single-quote a path for a POSIX shell */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * A remote command that ended with a non-zero status
 */
export class RemoteCommandError extends Error {
  constructor(
    public readonly command: string,
    public readonly host: string,
    public readonly exitCode: number,
  ) {
    super(`${command} on ${host} exited with status ${exitCode}`);
    this.name = 'RemoteCommandError';
  }
}

type ShellFactory = (config: SSHConnectionConfig) => Promise<RemoteShell>;

/**
 * Reads the report of a remote host by running `cat` over SSH
 */
export class SSHMountstatsSource implements MountstatsSource {
  readonly name: string;

  constructor(
    private readonly hostConfig: SSHSourceConfig,
    private readonly path: string,
    private readonly openShell: ShellFactory = config => sshConnectionManager.getClient(config),
  ) {
    this.name = `${hostConfig.name}:${path}`;
  }

  /**
   * @throws {RemoteCommandError} If `cat` fails on the remote host
   */
  async readLines(): Promise<string[]> {
    const shell = await this.openShell({
      id: `ssh-mountstats-${this.hostConfig.host}:${this.hostConfig.port}`,
      host: this.hostConfig.host,
      port: this.hostConfig.port,
      auth: {
        type: this.hostConfig.privateKeyPath ? 'privateKey' : 'password',
        username: this.hostConfig.username,
        ...(this.hostConfig.privateKeyPath && { privateKeyPath: this.hostConfig.privateKeyPath }),
        ...(this.hostConfig.passphrase && { passphrase: this.hostConfig.passphrase }),
        ...(this.hostConfig.password && { password: this.hostConfig.password }),
      },
    });

    const command = `cat ${shellQuote(this.path)}`;
    const { stdout, exitCode } = await shell.exec(command);
    const lines = await collectTextLines(stdout);

    const code = await exitCode;
    if (code !== null && code !== 0) {
      throw new RemoteCommandError(command, this.hostConfig.name, code);
    }
    return lines;
  }

  async close(): Promise<void> {
    await sshConnectionManager.closeAll();
  }
}
