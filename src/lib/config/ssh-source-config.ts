import { z } from 'zod';

const SSHSourceConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  name: z.string(),
  username: z.string().min(1),
  password: z.string().optional(),
  privateKeyPath: z.string().optional(),
  passphrase: z.string().optional(),
}).refine(
  (cfg) => cfg.password !== undefined || cfg.privateKeyPath !== undefined,
  { message: 'Either password or privateKeyPath must be provided' }
);

export type SSHSourceConfig = z.infer<typeof SSHSourceConfigSchema>;

/**
 * Load the optional remote host whose mountstats should be read over SSH.
 *
 * Variables: NFS_SSH_HOST, NFS_SSH_PORT, NFS_SSH_USER, NFS_SSH_HOST_NAME,
 * NFS_SSH_PASSWORD or NFS_SSH_KEY_PATH (+ NFS_SSH_KEY_PASSPHRASE).
 *
 * @returns Validated host config, or null when NFS_SSH_HOST is unset
 * @throws {z.ZodError} If a host is set but its configuration is invalid
 */
export function loadSSHSourceConfig(): SSHSourceConfig | null {
  const host = process.env.NFS_SSH_HOST;
  if (!host) return null;

  return SSHSourceConfigSchema.parse({
    host,
    port: parseInt(process.env.NFS_SSH_PORT || '22', 10),
    name: process.env.NFS_SSH_HOST_NAME || host,
    username: process.env.NFS_SSH_USER ?? '',
    ...(process.env.NFS_SSH_PASSWORD && { password: process.env.NFS_SSH_PASSWORD }),
    ...(process.env.NFS_SSH_KEY_PATH && { privateKeyPath: process.env.NFS_SSH_KEY_PATH }),
    ...(process.env.NFS_SSH_KEY_PASSPHRASE && { passphrase: process.env.NFS_SSH_KEY_PASSPHRASE }),
  });
}
