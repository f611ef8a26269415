/**
 * Registry API: compute, create, token lookup, capability probe.
 * Integers travel as decimal strings in both directions.
 */

import { Router, type Response } from 'express';
import { z } from 'zod';
import {
  serializeBinding,
  serializeCreationRecord,
  toBindingRecord,
  zAddress,
  zBytes4,
} from '@token-services/shared';
import { isRegistryError } from '../registry/errors.js';
import { appendLog, createLogEvent } from '../storage/logStore.js';
import type { RegistryBackend } from '../services/registryBackend.js';

function validationError(res: Response, reason: string, error: z.ZodError) {
  return res.status(400).json({
    ok: false,
    reason,
    code: 'VALIDATION',
    details: JSON.stringify(error.flatten()),
  });
}

function failure(res: Response, err: unknown, requestId?: string) {
  if (err instanceof z.ZodError) return validationError(res, 'Invalid binding', err);
  if (isRegistryError(err)) {
    const status = err.code === 'SERVICE_NOT_DEPLOYED' ? 404 : 409;
    appendLog(createLogEvent(err.code === 'CREATION_FAILED' ? 'CREATION_FAILED' : 'ERROR', { reason: err.message }, 'WARN', requestId));
    return res.status(status).json({ ok: false, reason: err.message, code: err.code });
  }
  const message = err instanceof Error ? err.message : String(err);
  console.error('[registry] error:', message);
  appendLog(createLogEvent('ERROR', { reason: message }, 'ERROR', requestId));
  return res.status(500).json({ ok: false, reason: message, code: 'SERVER_ERROR' });
}

export function createRegistryRouter(backend: RegistryBackend): Router {
  const router = Router();
  const { registry } = backend;

  /**
   * POST /api/services/compute
   * Body: binding. Returns { ok: true, service, status }.
   */
  router.post('/services/compute', async (req, res) => {
    try {
      const binding = toBindingRecord(req.body);
      const service = await registry.compute(binding);
      const status = await registry.status(binding);
      return res.json({ ok: true, service, status });
    } catch (err) {
      return failure(res, err, req.requestId);
    }
  });

  /**
   * POST /api/services
   * Body: binding. Deploys unless already deployed.
   * Returns { ok: true, service, created, transactionHash } or 409 CREATION_FAILED.
   */
  router.post('/services', async (req, res) => {
    try {
      const binding = toBindingRecord(req.body);
      const result = await registry.deploy(binding);
      appendLog(
        createLogEvent(
          result.created ? 'SERVICE_CREATED' : 'SERVICE_EXISTS',
          { service: result.service, transactionHash: result.transactionHash, binding: serializeBinding(binding) },
          'INFO',
          req.requestId,
        ),
      );
      return res.status(result.created ? 201 : 200).json({
        ok: true,
        service: result.service,
        created: result.created,
        transactionHash: result.transactionHash,
      });
    } catch (err) {
      return failure(res, err, req.requestId);
    }
  });

  /**
   * GET /api/services/records
   * Created records seen by an in-process ledger.
   */
  router.get('/services/records', (_req, res) => {
    if (!backend.records) {
      return res.status(501).json({ ok: false, reason: 'Records are only kept in memory mode', code: 'UNSUPPORTED' });
    }
    return res.json({ ok: true, records: backend.records().map(serializeCreationRecord) });
  });

  /**
   * GET /api/services/:address/token
   * Returns { ok: true, originChainId, tokenContract, tokenId }.
   */
  router.get('/services/:address/token', async (req, res) => {
    try {
      const parsed = zAddress.safeParse(req.params.address);
      if (!parsed.success) return validationError(res, 'Invalid service address', parsed.error);
      const reference = await registry.token(parsed.data);
      return res.json({
        ok: true,
        originChainId: reference.originChainId.toString(),
        tokenContract: reference.tokenContract,
        tokenId: reference.tokenId.toString(),
      });
    } catch (err) {
      return failure(res, err, req.requestId);
    }
  });

  /**
   * GET /api/capabilities/:id
   * Returns { ok: true, capabilityId, supported }.
   */
  router.get('/capabilities/:id', async (req, res) => {
    try {
      const parsed = zBytes4.safeParse(req.params.id);
      if (!parsed.success) return validationError(res, 'Invalid capability id', parsed.error);
      const supported = await registry.supports(parsed.data);
      return res.json({ ok: true, capabilityId: parsed.data, supported });
    } catch (err) {
      return failure(res, err, req.requestId);
    }
  });

  return router;
}
