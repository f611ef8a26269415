#!/usr/bin/env node
// ─── Integration Health Harness ──────────────────────────
// Validates a running registry API against Zod schemas of its responses.
// Creates one service for a throwaway binding and reads it back.
//
// Usage:
//   BACKEND_URL=http://localhost:4000 npx tsx scripts/healthcheck.ts
//
// Exit code 0 = all passed, non-zero = failures detected.

import { z } from 'zod';

const BACKEND_URL = process.env.BACKEND_URL || 'http://localhost:4000';
const TIMEOUT_MS = 10_000;

// ─── Inline schemas (self-contained, no build dependency) ──

const AddressSchema = z.string().regex(/^0x[0-9a-fA-F]{40}$/);
const HashSchema = z.string().regex(/^0x[0-9a-fA-F]{64}$/);
const DecimalSchema = z.string().regex(/^[0-9]+$/);

const HealthSchema = z.object({
  status: z.literal('ok'),
  service: z.string(),
  timestamp: z.string(),
  version: z.string(),
  mode: z.enum(['memory', 'rpc']),
  chainId: z.number().int().positive(),
  registry: z.string(),
});

const ComputeSchema = z.object({
  ok: z.literal(true),
  service: AddressSchema,
  status: z.enum(['NOT_DEPLOYED', 'DEPLOYED']),
});

const CreateSchema = z.object({
  ok: z.literal(true),
  service: AddressSchema,
  created: z.boolean(),
  transactionHash: HashSchema,
});

const TokenSchema = z.object({
  ok: z.literal(true),
  originChainId: DecimalSchema,
  tokenContract: AddressSchema,
  tokenId: DecimalSchema,
});

const CapabilitySchema = z.object({
  ok: z.literal(true),
  capabilityId: z.string(),
  supported: z.boolean(),
});

// Random token id so repeated runs against a long-lived backend still create.
const binding = {
  implementation: '0x1111111111111111111111111111111111111111',
  salt: '0x0000000000000000000000000000000000000000000000000000000000000000',
  originChainId: '1',
  tokenContract: '0x2222222222222222222222222222222222222222',
  tokenId: String(Math.floor(Math.random() * 1_000_000_000)),
};

// ─── Test runner ─────────────────────────────────────────

interface TestResult {
  name: string;
  endpoint: string;
  passed: boolean;
  detail?: string;
}

const results: TestResult[] = [];

async function fetchJSON(path: string, init?: RequestInit): Promise<unknown> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), TIMEOUT_MS);
  try {
    const res = await fetch(`${BACKEND_URL}${path}`, {
      ...init,
      signal: controller.signal,
      headers: { 'Content-Type': 'application/json', ...(init?.headers ?? {}) },
    });
    if (!res.ok) throw new Error(`HTTP ${res.status}: ${await res.text()}`);
    return await res.json();
  } finally {
    clearTimeout(timer);
  }
}

async function runTest(
  name: string,
  endpoint: string,
  fn: () => Promise<void>,
) {
  try {
    await fn();
    results.push({ name, endpoint, passed: true });
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    results.push({ name, endpoint, passed: false, detail: msg });
  }
}

// ─── Tests ───────────────────────────────────────────────

async function main() {
  console.log(`\n🔍 Token Service Registry Health Check`);
  console.log(`   Backend: ${BACKEND_URL}\n`);

  // 1. GET /health
  await runTest('Health endpoint', 'GET /health', async () => {
    HealthSchema.parse(await fetchJSON('/health'));
  });

  // 2. POST /api/services/compute
  let predicted: string | undefined;
  await runTest('Compute service', 'POST /api/services/compute', async () => {
    const data = ComputeSchema.parse(
      await fetchJSON('/api/services/compute', { method: 'POST', body: JSON.stringify(binding) }),
    );
    predicted = data.service;
  });

  // 3. POST /api/services
  let service: string | undefined;
  await runTest('Create service', 'POST /api/services', async () => {
    const data = CreateSchema.parse(
      await fetchJSON('/api/services', { method: 'POST', body: JSON.stringify(binding) }),
    );
    if (predicted && data.service !== predicted) {
      throw new Error(`created ${data.service}, compute predicted ${predicted}`);
    }
    service = data.service;
  });

  // 4. GET /api/services/:address/token
  await runTest('Service token', 'GET /api/services/:address/token', async () => {
    if (!service) throw new Error('no service created');
    const data = TokenSchema.parse(await fetchJSON(`/api/services/${service}/token`));
    if (data.tokenId !== binding.tokenId) {
      throw new Error(`token() returned tokenId ${data.tokenId}, expected ${binding.tokenId}`);
    }
  });

  // 5. GET /api/capabilities/:id
  await runTest('Capability probe', 'GET /api/capabilities/:id', async () => {
    const data = CapabilitySchema.parse(await fetchJSON('/api/capabilities/0x01ffc9a7'));
    if (data.supported) throw new Error('0x01ffc9a7 must not be reported as supported');
  });

  // ─── Report ──────────────────────────────────────────

  console.log('─'.repeat(60));
  let failed = 0;
  for (const r of results) {
    const icon = r.passed ? '✅' : '❌';
    console.log(`  ${icon}  ${r.name.padEnd(30)} ${r.endpoint}`);
    if (!r.passed && r.detail) {
      // Truncate long Zod errors
      const lines = r.detail.split('\n').slice(0, 5).join('\n    ');
      console.log(`       ${lines}`);
      failed++;
    }
  }
  console.log('─'.repeat(60));
  console.log(`\n  Total: ${results.length}  Passed: ${results.length - failed}  Failed: ${failed}\n`);

  if (failed > 0) {
    console.log('❌ Integration health check FAILED\n');
    process.exit(1);
  } else {
    console.log('✅ All integration checks PASSED\n');
    process.exit(0);
  }
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(2);
});
