import type { RegistrationInstance } from '@pmm-link/shared';
import { describe, expect, it } from 'vitest';
import { mysqlEngine } from './index.js';

const instance: RegistrationInstance = {
  name: 'shop-mysql',
  host: 'shop-mysql.db.ondigitalocean.com',
  port: 25060,
  username: 'pmm_monitor',
  password: 'test-password',
};

describe('mysqlEngine', () => {
  it('builds the pmm-admin add arguments with perfschema query source', () => {
    expect(mysqlEngine.buildAddArgs(instance, 'https://admin:pw@pmm.local/')).toEqual([
      'add',
      'mysql',
      '--username=pmm_monitor',
      '--password=test-password',
      '--host=shop-mysql.db.ondigitalocean.com',
      '--port=25060',
      '--service-name=shop-mysql',
      '--tls',
      '--tls-skip-verify',
      '--server-url=https://admin:pw@pmm.local/',
      '--server-insecure-tls',
      '--query-source=perfschema',
    ]);
  });

  it('requests native password authentication for new users', () => {
    expect(mysqlEngine.userFields('monitor')).toEqual({
      name: 'monitor',
      mysql_settings: { auth_plugin: 'mysql_native_password' },
    });
  });

  it('returns the grant statement for the monitoring user', () => {
    const steps = mysqlEngine.postSteps(instance);
    expect(steps.map((s) => s.title)).toEqual([
      'Install the MySQL client',
      'Grant monitoring permissions',
      'Node metrics are not collected',
    ]);
    expect(steps[1]?.command).toBe(
      'mysql -h shop-mysql.db.ondigitalocean.com -P 25060 -u doadmin -p --ssl-mode=REQUIRED ' +
        `-e "GRANT SELECT, PROCESS, REPLICATION CLIENT ON *.* TO 'pmm_monitor'@'%'; ` +
        `GRANT SELECT ON performance_schema.* TO 'pmm_monitor'@'%';"`,
    );
  });
});
