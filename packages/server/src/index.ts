import fs from 'node:fs';
import http from 'node:http';
import https from 'node:https';
import path from 'node:path';
import { getRequestListener } from '@hono/node-server';
import { engineRegistry } from '@pmm-link/engines';
import { createApp } from './app.js';
import { SessionManager } from './auth/sessions.js';
import { DigitalOceanClient } from './clients/digitalocean.js';
import { PmmAdmin } from './clients/pmm-admin.js';
import { PmmServerClient } from './clients/pmm-server.js';
import { loadConfig } from './config.js';
import { logger } from './logger.js';
import { detectPublicIpv4 } from './public-ip.js';

const config = loadConfig();
logger.level = config.logLevel;

const certPath = path.join(config.tlsCertDir, 'cert.pem');
const keyPath = path.join(config.tlsCertDir, 'key.pem');
const tlsEnabled = fs.existsSync(certPath) && fs.existsSync(keyPath);

const sessions = new SessionManager();
sessions.startCleanupLoop();

const app = createApp({
  engines: engineRegistry,
  cloud: new DigitalOceanClient({ baseUrl: config.doApiBase }),
  pmmServer: new PmmServerClient({
    baseUrl: config.pmmBaseUrl,
    tlsVerify: config.pmmTlsVerify,
  }),
  pmmAdmin: new PmmAdmin({
    baseUrl: config.pmmBaseUrl,
    command: config.pmmAdminCmd,
    serverUrlOverride: config.pmmServerUrlOverride,
  }),
  sessions,
  sessionSecret: config.sessionSecret,
  secureCookies: tlsEnabled,
});

const listener = getRequestListener(app.fetch);

const server: http.Server = tlsEnabled
  ? https.createServer(
      { cert: fs.readFileSync(certPath), key: fs.readFileSync(keyPath) },
      listener,
    )
  : http.createServer(listener);

if (!tlsEnabled) {
  logger.warn(
    { certDir: config.tlsCertDir },
    'No cert.pem/key.pem found; serving plain HTTP. Secrets will cross the network unencrypted.',
  );
}

const protocol = tlsEnabled ? 'https' : 'http';

server.listen(config.port, config.host, () => {
  void detectPublicIpv4().then((publicIp) => {
    console.log('PMM Link v0.1.0');
    console.log(`  Listening: ${protocol}://${config.host}:${config.port}`);
    console.log(`  Public:    ${protocol}://${publicIp}:${config.port}`);
    console.log(`  Local:     ${protocol}://127.0.0.1:${config.port}`);
    console.log(`  PMM:       ${config.pmmBaseUrl}`);
    if (!tlsEnabled) console.log('  TLS:       disabled');
  });
});

// Graceful shutdown
function shutdown(): void {
  console.log('\nShutting down...');
  sessions.stopCleanupLoop();
  server.close();
  process.exit(0);
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

export { app, config };
