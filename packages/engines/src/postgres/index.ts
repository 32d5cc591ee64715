import type { RegistrationInstance } from '@pmm-link/shared';
import { connectionArgs, tlsArgs } from '../args.js';
import type { SupportedEngineAdapter } from '../types.js';

function enableStatementsCommand(instance: RegistrationInstance): string {
  const user = instance.username;
  return (
    `psql "host=${instance.host} port=${instance.port} dbname=defaultdb user=doadmin sslmode=require" ` +
    `-c "CREATE EXTENSION IF NOT EXISTS pg_stat_statements; ` +
    `GRANT SELECT ON pg_stat_statements TO ${user}; ` +
    `GRANT pg_read_all_stats TO ${user};"`
  );
}

export const postgresEngine: SupportedEngineAdapter = {
  id: 'pg',
  displayName: 'PostgreSQL',
  supported: true,
  engineFilter: 'pg',
  defaultPort: 25060,
  serviceType: 'postgresql',

  userFields: (username) => ({ name: username }),

  buildAddArgs: (instance, serverUrl) => [
    'add',
    'postgresql',
    ...connectionArgs(instance),
    '--database=defaultdb',
    '--auto-discovery-limit=-1',
    ...tlsArgs(serverUrl),
    '--query-source=pgstatements',
  ],

  postSteps: (instance) => [
    {
      title: 'Install the PostgreSQL client',
      description: 'Run on the PMM server host.',
      command: 'apt install -y postgresql-client',
    },
    {
      title: 'Enable query analytics',
      description: `Create pg_stat_statements and grant ${instance.username} access to statistics. You will be prompted for the doadmin password.`,
      command: enableStatementsCommand(instance),
    },
    {
      title: 'Node metrics are not collected',
      description:
        'Node Summary metrics (CPU, RAM, disk) are not available for DigitalOcean Managed PostgreSQL ' +
        'because node_exporter cannot be installed on the managed host. ' +
        'Database metrics and query analytics are still collected.',
    },
  ],
};
