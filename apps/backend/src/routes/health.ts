import { Router } from 'express';
import { ZERO_ADDRESS } from '@token-services/shared';
import { getDeployment, isStrictMode } from '../config/deployment.js';
import type { RegistryBackend } from '../services/registryBackend.js';

/** Mask an address to first 6 + last 4 chars for public display. */
function maskAddress(addr: string): string {
  if (!addr || addr === ZERO_ADDRESS) return '(not configured)';
  if (addr.length < 12) return addr;
  return `${addr.slice(0, 6)}…${addr.slice(-4)}`;
}

export function createHealthRouter(backend: RegistryBackend): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    let deploymentInfo;
    try {
      const dep = getDeployment();
      deploymentInfo = {
        name: dep.name,
        strictMode: isStrictMode(),
        rpcUrl: !!dep.rpcUrl,
      };
    } catch (err) {
      deploymentInfo = {
        error: err instanceof Error ? err.message : 'Failed to load deployment config',
      };
    }

    res.json({
      status: 'ok',
      uptime: process.uptime(),
      service: 'token-service-registry',
      timestamp: new Date().toISOString(),
      version: '0.1.0',
      mode: backend.mode,
      chainId: backend.registry.chainId,
      registry: maskAddress(backend.registry.address),
      deployment: deploymentInfo,
    });
  });

  return router;
}
