import { createServer } from 'http';
import { env } from './config/env.js';
import { buildRuntimeConfig } from './config/runtime.js';
import { createApp } from './app.js';
import { createUpgradeAuth } from './middleware/api-key-auth.js';
import { PathDependencyProbe, defaultDependencySpecs } from './services/dependency-probe.js';
import { ProcessSupervisor } from './services/process-supervisor.js';
import { systemProcessTable } from './services/process-table.js';
import { ProxyRegistrar } from './services/proxy-registrar.js';
import { SessionDirectories } from './services/session-directories.js';
import { SessionManager } from './services/session-manager.js';
import { RelayServer } from './websocket/relay.js';

const runtime = buildRuntimeConfig(env);

const dependencyProbe = new PathDependencyProbe(defaultDependencySpecs(runtime.executables));
const manager = new SessionManager(
  {
    directories: new SessionDirectories(runtime.sessionsRoot),
    processTable: systemProcessTable,
    supervisor: new ProcessSupervisor(runtime.supervisor),
    dependencyProbe,
    registrar: new ProxyRegistrar(runtime.registrar),
  },
  {
    launch: runtime.launch,
    termination: runtime.termination,
    reaper: runtime.reaper,
  }
);

const app = createApp({ manager, dependencyProbe, apiKey: env.API_KEY });

// Create HTTP server (needed for WebSocket)
const httpServer = createServer(app);

// Attach relay; only managed session ports may be relayed to
const relay = new RelayServer({
  ...runtime.relay,
  isPortAllowed: (port) => manager.registry.has(port),
  authorize: createUpgradeAuth(env.API_KEY),
});
relay.attach(httpServer);

// Sessions live exactly as long as the server that manages them
httpServer.once('close', () => {
  manager
    .shutdown()
    .then(() => {
      console.log('Server closed');
      process.exit(0);
    })
    .catch((err) => {
      console.error('Session cleanup failed during shutdown:', err);
      process.exit(1);
    });
});

// Start server
httpServer.listen(env.PORT, env.HOST, () => {
  console.log(`Server running at http://${env.HOST}:${env.PORT}`);
  console.log(`Health check: http://${env.HOST}:${env.PORT}/api/health`);
  console.log(`Relay available at ws://${env.HOST}:${env.PORT}/api/relay`);
  console.log(`Sessions root: ${runtime.sessionsRoot}`);

  manager.start();
  dependencyProbe
    .check()
    .then((report) => {
      if (!report.allPresent) {
        console.warn(
          `Missing dependencies: ${report.missing.map((dep) => dep.name).join(', ')}; launches will fail until installed`
        );
      }
    })
    .catch((err) => {
      console.error('Dependency check failed:', err);
    });
});

// Graceful shutdown
let shuttingDown = false;
const shutdown = (): void => {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log('Shutting down gracefully...');

  // Close relay connections so the HTTP server can close
  relay.close();

  httpServer.close();
  httpServer.closeAllConnections();
};

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);

export { app, httpServer, relay, manager };
