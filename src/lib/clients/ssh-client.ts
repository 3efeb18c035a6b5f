import { Client, type ConnectConfig } from 'ssh2';
import { readFileSync } from 'fs';
import type {
  RemoteCommand,
  RemoteShell,
  SSHConnectionConfig,
  StreamingClient,
} from '../streaming/types';

const CONNECT_TIMEOUT_MS = 10_000;

export class SSHClient implements StreamingClient, RemoteShell {
  readonly id: string;
  private client: Client;
  private config: SSHConnectionConfig;
  private connected = false;

  constructor(config: SSHConnectionConfig) {
    this.config = config;
    this.id = `ssh://${config.auth.username}@${config.host}:${config.port || 22}`;
    this.client = new Client();
  }

  /**
   * Establish the SSH connection
   * Wraps the callback-based ssh2 API in a promise
   */
  async connect(): Promise<void> {
    if (this.connected) return;

    console.log(`[SSHClient] Connecting to ${this.id}...`);

    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.client.end();
        reject(new Error(`SSH connection timeout to ${this.config.host}`));
      }, CONNECT_TIMEOUT_MS);

      this.client
        .on('ready', () => {
          clearTimeout(timeout);
          this.connected = true;
          console.log(`[SSHClient] Connected to ${this.id}`);
          resolve();
        })
        .on('error', (err) => {
          clearTimeout(timeout);
          this.connected = false;
          console.error(`[SSHClient] Connection error:`, err);
          reject(err);
        })
        .on('close', () => {
          this.connected = false;
        })
        .connect(this.buildSSHConfig());
    });
  }

  /**
   * Run a command. stdout is returned as a stream, stderr is logged.
   * `exitCode` settles once the remote side reports how the command ended.
   */
  async exec(command: string): Promise<RemoteCommand> {
    if (!this.connected) {
      throw new Error('SSH client not connected');
    }

    return new Promise((resolve, reject) => {
      this.client.exec(command, (err, channel) => {
        if (err) {
          reject(err);
          return;
        }

        const exitCode = new Promise<number | null>((settle) => {
          channel.on('exit', (code: number | null) => settle(code));
          channel.on('close', () => settle(null));
        });

        channel.stderr.on('data', (data: Buffer) => {
          console.error(`[SSHClient] STDERR: ${data.toString().trimEnd()}`);
        });

        resolve({ stdout: channel, exitCode });
      });
    });
  }

  isConnected(): boolean {
    return this.connected;
  }

  async close(): Promise<void> {
    console.log(`[SSHClient] Closing connection: ${this.id}`);
    this.client.end();
    this.connected = false;
  }

  private buildSSHConfig(): ConnectConfig {
    const auth = this.config.auth;
    const sshConfig: ConnectConfig = {
      host: this.config.host,
      port: this.config.port || 22,
      username: auth.username,
      readyTimeout: CONNECT_TIMEOUT_MS,
    };

    if (auth.type === 'password') {
      sshConfig.password = auth.password;
    } else {
      if (auth.privateKeyPath) {
        sshConfig.privateKey = readFileSync(auth.privateKeyPath);
      }
      if (auth.passphrase) {
        sshConfig.passphrase = auth.passphrase;
      }
    }

    return sshConfig;
  }
}

/**
 * Reuses one SSH connection per user@host:port across poll cycles
 */
export class SSHConnectionManager {
  private connections = new Map<string, SSHClient>();

  /**
   * Get a connected SSH client for the given config. A client whose
   * connection dropped is ended and replaced.
   */
  async getClient(config: SSHConnectionConfig): Promise<SSHClient> {
    const key = `${config.auth.username}@${config.host}:${config.port || 22}`;

    const existing = this.connections.get(key);
    if (existing?.isConnected()) {
      return existing;
    }

    if (existing) {
      this.connections.delete(key);
      await existing.close();
    }

    console.log(`[SSHConnectionManager] Creating new connection: ${key}`);
    const client = new SSHClient(config);
    await client.connect();
    this.connections.set(key, client);
    return client;
  }

  async closeAll(): Promise<void> {
    const promises = Array.from(this.connections.values()).map(client => client.close());
    await Promise.all(promises);
    this.connections.clear();
  }
}

export const sshConnectionManager = new SSHConnectionManager();
