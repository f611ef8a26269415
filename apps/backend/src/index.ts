import 'dotenv/config';
import { createApp } from './app.js';
import { getDeployment } from './config/deployment.js';
import { createRegistryBackend } from './services/registryBackend.js';
import { appendLog, createLogEvent } from './storage/logStore.js';

const deployment = getDeployment();
const backend = createRegistryBackend(deployment);
const app = createApp(backend);

// ─── Start ──────────────────────────────────────────────
app.listen(deployment.port, () => {
  appendLog(
    createLogEvent('SERVER_START', {
      mode: backend.mode,
      chainId: backend.registry.chainId,
      registry: backend.registry.address,
    }),
  );
  console.log(`Token service registry running on http://localhost:${deployment.port}`);
  console.log(`   Mode:     ${backend.mode} (chain ${backend.registry.chainId})`);
  console.log(`   Registry: ${backend.registry.address}`);
  console.log(`   Health:   http://localhost:${deployment.port}/health`);
});

export default app;
