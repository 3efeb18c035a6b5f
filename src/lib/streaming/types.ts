/**
 * Connection abstractions for the remote mountstats reader
 */

/**
 * A long-lived connection to a remote host
 */
export interface StreamingClient {
  /** Identifier for this client instance */
  id: string;

  /** Check if the connection is alive */
  isConnected(): boolean;

  /** Cleanup and close the connection */
  close(): Promise<void>;
}

/**
 * Authentication credentials for an SSH host
 */
export interface AuthCredentials {
  type: 'password' | 'privateKey';
  username: string;
  password?: string;
  privateKeyPath?: string;
  passphrase?: string;
}

/**
 * Configuration for SSH connections
 */
export interface SSHConnectionConfig {
  /** Unique identifier for this connection */
  id: string;
  host: string;
  port?: number;
  auth: AuthCredentials;
}

/**
 * A command started on a remote host
 */
export interface RemoteCommand {
  stdout: NodeJS.ReadableStream;
  /** Exit status; null when the command was killed by a signal or never reported one */
  exitCode: Promise<number | null>;
}

/**
 * Anything that can run a command and hand back its output
 */
export interface RemoteShell {
  exec(command: string): Promise<RemoteCommand>;
}
