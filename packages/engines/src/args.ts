import type { RegistrationInstance } from '@pmm-link/shared';

/** Connection flags common to every `pmm-admin add` variant */
export function connectionArgs(instance: RegistrationInstance): string[] {
  return [
    `--username=${instance.username}`,
    `--password=${instance.password}`,
    `--host=${instance.host}`,
    `--port=${instance.port}`,
    `--service-name=${instance.name}`,
  ];
}

// Managed databases present provider certificates; the PMM server is usually self-signed.
export function tlsArgs(serverUrl: string): string[] {
  return ['--tls', '--tls-skip-verify', `--server-url=${serverUrl}`, '--server-insecure-tls'];
}
