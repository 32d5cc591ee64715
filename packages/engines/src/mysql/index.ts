import type { RegistrationInstance } from '@pmm-link/shared';
import { connectionArgs, tlsArgs } from '../args.js';
import type { SupportedEngineAdapter } from '../types.js';

function grantCommand(instance: RegistrationInstance): string {
  const account = `'${instance.username}'@'%'`;
  return (
    `mysql -h ${instance.host} -P ${instance.port} -u doadmin -p --ssl-mode=REQUIRED ` +
    `-e "GRANT SELECT, PROCESS, REPLICATION CLIENT ON *.* TO ${account}; ` +
    `GRANT SELECT ON performance_schema.* TO ${account};"`
  );
}

export const mysqlEngine: SupportedEngineAdapter = {
  id: 'mysql',
  displayName: 'MySQL',
  supported: true,
  engineFilter: 'mysql',
  defaultPort: 25060,
  serviceType: 'mysql',

  // mysqld_exporter cannot authenticate with caching_sha2_password over every TLS setup
  userFields: (username) => ({
    name: username,
    mysql_settings: { auth_plugin: 'mysql_native_password' },
  }),

  buildAddArgs: (instance, serverUrl) => [
    'add',
    'mysql',
    ...connectionArgs(instance),
    ...tlsArgs(serverUrl),
    '--query-source=perfschema',
  ],

  postSteps: (instance) => [
    {
      title: 'Install the MySQL client',
      description: 'Run on the PMM server host.',
      command: 'apt install -y mysql-client',
    },
    {
      title: 'Grant monitoring permissions',
      description: `Grant ${instance.username} the privileges mysqld_exporter and query analytics need. You will be prompted for the doadmin password.`,
      command: grantCommand(instance),
    },
    {
      title: 'Node metrics are not collected',
      description:
        'Node Summary metrics (CPU, RAM, disk) are not available for DigitalOcean Managed MySQL ' +
        'because node_exporter cannot be installed on the managed host. ' +
        'Database metrics and query analytics are still collected.',
    },
  ],
};
