/**
 * Integration tests: a full runtime behind the HTTP server, driven by the client.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { loadConfig } from '../../src/core/config.js';
import { FabricError } from '../../src/core/errors.js';
import { MetricsCollector } from '../../src/core/metrics.js';
import { createRuntime, type FabricRuntime } from '../../src/runtime.js';
import { FabricHttpClient } from '../../src/transport/http-client.js';
import type { SignalEventWire } from '../../src/transport/types.js';
import { OTHER_TENANT, REQUIRED_TAGS, TENANT } from '../helpers.js';

const INITECH = { organizationId: 'initech', workspaceId: 'ops', userId: 'u-3' };

let runtime: FabricRuntime;
let baseUrl: string;
let client: FabricHttpClient;

function envelope(intent: string, inputs: Record<string, unknown>, organizationId = 'acme') {
  return JSON.stringify({
    domain: 'data-fabric',
    intent,
    inputs,
    tenant_context: { organization_id: organizationId, workspace_id: 'analytics', user_id: 'u-1' },
  });
}

function assetDeclaration(name: string, version: string, columns: { name: string; type: string }[]) {
  return {
    assetDeclaration: {
      assetType: 'dataset',
      name,
      version,
      schemaDeclaration: { columns },
      storageLocationRef: 'loc-orders',
      classification: 'internal',
      dataFormat: 'json',
      ownerRef: 'team-orders',
      tags: REQUIRED_TAGS,
    },
  };
}

beforeAll(async () => {
  const config = loadConfig({
    FABRIC_PORT: '0',
    FABRIC_HOST: '127.0.0.1',
    FABRIC_LOG_LEVEL: 'silent',
    FABRIC_RATE_LIMIT_COMPUTE: '2',
  });
  if (!config.ok) throw new Error(config.error);

  runtime = await createRuntime(config.value, { metrics: new MetricsCollector(), now: () => 0 });
  await runtime.start();
  baseUrl = `http://127.0.0.1:${runtime.server.port}`;
  client = new FabricHttpClient(baseUrl, { tenant: TENANT, retry: { maxRetries: 0 } });
});

afterAll(async () => {
  await runtime.stop();
});

describe('HTTP transport', () => {
  it('reports health', async () => {
    const health = await client.health();
    expect(health.status).toBe('ok');
    expect(health.version).toBe('1.0.0');
    expect(health.running_executions).toBe(0);
  });

  it('lists capabilities and filters by intent', async () => {
    expect(await client.capabilities()).toHaveLength(22);
    const ingest = await client.capabilities({ intent: 'IngestData' });
    expect(ingest.map((c) => c.name).sort()).toEqual(['DataExtractor', 'DataWriter', 'LineageEdgeWriter']);
    expect(ingest[0]?.domain).toBe('data-fabric');
  });

  it('runs a submitted intent to completion', async () => {
    runtime.fabric.putDataset(TENANT, 'orders', [
      { id: 1, region: 'eu', total: 10 },
      { id: 2, region: 'us', total: 25 },
    ]);

    const accepted = await client.submitIntent('ProfileData', { profileInput: { datasetRef: 'orders' } });
    expect(accepted.status).toBe('accepted');

    const execution = await client.waitForExecution(accepted.execution_id);
    expect(execution.status).toBe('succeeded');
    expect(execution.intent_id).toBe(accepted.intent_id);
    expect(execution.tenant_context).toEqual({ organization_id: 'acme', workspace_id: 'analytics', user_id: 'u-1' });
    expect(execution.steps.map((s) => [s.unit, s.status])).toEqual([['DataProfiler', 'succeeded']]);
  });

  it('hides executions from other tenants', async () => {
    const accepted = await client.submitIntent('ProfileData', { profileInput: { datasetRef: 'orders' } });
    const outsider = new FabricHttpClient(baseUrl, { tenant: OTHER_TENANT, retry: { maxRetries: 0 } });
    expect(await outsider.getExecution(accepted.execution_id)).toBeNull();
    expect(await client.getExecution('no-such-execution')).toBeNull();
    await client.waitForExecution(accepted.execution_id);
  });

  it('reports a failed step in the execution record', async () => {
    const accepted = await client.submitIntent('CommitDataVersion', {
      commitInput: { datasetRef: 'missing', parentCommitRef: null, commitMessage: 'm', authorRef: 'u-1' },
    });
    const execution = await client.waitForExecution(accepted.execution_id);
    expect(execution.status).toBe('failed');
    expect(execution.steps[0]?.status).toBe('failed');
    expect(execution.error?.details).toMatchObject({ unit: 'DataCommitter', step: 0 });
  });

  it('rejects an unsupported domain with 400', async () => {
    const resp = await fetch(`${baseUrl}/mcop/intents`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        domain: 'billing',
        intent: 'RegisterDataAsset',
        inputs: {},
        tenant_context: { organization_id: 'acme', workspace_id: 'analytics', user_id: 'u-1' },
      }),
    });
    expect(resp.status).toBe(400);
    expect(await resp.json()).toEqual({ error: { code: 'VALIDATION_FAILED', message: 'Unsupported domain: billing', details: { domain: 'billing' } } });
  });

  it('rejects a body that is not JSON with 415', async () => {
    const resp = await fetch(`${baseUrl}/mcop/intents`, {
      method: 'POST',
      headers: { 'Content-Type': 'text/plain' },
      body: 'ProfileData',
    });
    expect(resp.status).toBe(415);
    const body: unknown = await resp.json();
    expect(body).toMatchObject({ error: { code: 'VALIDATION_FAILED', message: 'Content-Type must be application/json' } });
  });

  it('rejects a tenant header that disagrees with the envelope with 403', async () => {
    const resp = await fetch(`${baseUrl}/mcop/intents`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'X-Tenant-Id': 'globex' },
      body: envelope('ProfileData', {}),
    });
    expect(resp.status).toBe(403);
    const body: unknown = await resp.json();
    expect(body).toMatchObject({ error: { code: 'ACCESS_DENIED', message: 'Tenant header does not match tenant_context' } });
  });

  it('rate limits compute intents per tenant with 429', async () => {
    const limited = new FabricHttpClient(baseUrl, { tenant: INITECH, retry: { maxRetries: 0 } });
    await limited.submitIntent('ProfileData', {});
    await limited.submitIntent('ProfileData', {});

    const rejection = await limited.submitIntent('ProfileData', {}).catch((err: unknown) => err);
    expect(rejection).toBeInstanceOf(FabricError);
    if (!(rejection instanceof FabricError)) return;
    expect(rejection.code).toBe('RATE_LIMITED');
    expect(rejection.message).toBe('Rate limit exceeded for compute requests');
    expect(rejection.details).toEqual({ rate_class: 'compute', retry_after_ms: 60_000 });

    const resp = await fetch(`${baseUrl}/mcop/intents`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: envelope('ProfileData', {}, 'initech'),
    });
    expect(resp.status).toBe(429);
    expect(resp.headers.get('retry-after')).toBe('60');
  });

  it('answers unknown routes with 404', async () => {
    const resp = await fetch(`${baseUrl}/nowhere`);
    expect(resp.status).toBe(404);
    const body: unknown = await resp.json();
    expect(body).toMatchObject({ error: { code: 'DATA_NOT_FOUND', message: 'No route for GET /nowhere' } });
  });

  it('rejects a body over the 1 MiB limit with 413', async () => {
    const resp = await fetch(`${baseUrl}/mcop/intents`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: envelope('ProfileData', { padding: 'x'.repeat(1_100_000) }),
    });
    expect(resp.status).toBe(413);
    expect(await resp.json()).toEqual({
      error: { code: 'VALIDATION_FAILED', message: 'Request body exceeds 1048576 bytes', details: {} },
    });
  });

  it('answers a malformed execution id with 404', async () => {
    const resp = await fetch(`${baseUrl}/mcop/executions/%E0%A4%A`);
    expect(resp.status).toBe(404);
    expect(await resp.json()).toEqual({
      error: { code: 'DATA_NOT_FOUND', message: 'Execution not found: %E0%A4%A', details: { execution_id: '%E0%A4%A' } },
    });
  });

  it('allows any origin when none are configured', async () => {
    const resp = await fetch(`${baseUrl}/health`, { headers: { Origin: 'https://app.example' } });
    expect(resp.headers.get('access-control-allow-origin')).toBe('*');
    expect(resp.headers.get('vary')).toBeNull();
  });

  it('streams trace events for the subscriber tenant', async () => {
    const controller = new AbortController();
    const stream = client.subscribeSignals({ signalTypes: ['trace'] }, { signal: controller.signal });
    const received: SignalEventWire[] = [];

    const reading = (async () => {
      for await (const event of stream) {
        received.push(event);
        if (event.name === 'execution_completed') break;
      }
    })();

    const deadline = Date.now() + 5000;
    while (runtime.server.subscriberCount === 0 && Date.now() < deadline) {
      await new Promise((resolve) => setTimeout(resolve, 10));
    }
    expect(runtime.server.subscriberCount).toBe(1);

    const accepted = await client.submitIntent('RegisterDataAsset', assetDeclaration('customers', '1.0.0', []));
    await reading;
    controller.abort();

    expect(received.map((e) => e.name)).toEqual(['intent_received', 'execution_started', 'execution_completed']);
    expect(received.every((e) => e.signal_type === 'trace' && e.tenant_context.organization_id === 'acme')).toBe(true);
    expect((await client.waitForExecution(accepted.execution_id)).status).toBe('succeeded');
  });

  it('refuses a signal subscription for another tenant', async () => {
    const resp = await fetch(`${baseUrl}/observability/signals?tenant_filter=globex`, { headers: { 'X-Tenant-Id': 'acme' } });
    expect(resp.status).toBe(403);
    const body: unknown = await resp.json();
    expect(body).toMatchObject({ error: { code: 'ACCESS_DENIED', message: 'Tenant acme cannot subscribe to globex' } });
  });

  it('exposes schema drift between asset versions', async () => {
    const v1 = await client.submitIntent('RegisterDataAsset', assetDeclaration('orders', '1.0.0', [{ name: 'id', type: 'integer' }]));
    expect((await client.waitForExecution(v1.execution_id)).status).toBe('succeeded');
    const v2 = await client.submitIntent(
      'RegisterDataAsset',
      assetDeclaration('orders', '2.0.0', [
        { name: 'id', type: 'integer' },
        { name: 'region', type: 'string' },
      ]),
    );
    expect((await client.waitForExecution(v2.execution_id)).status).toBe('succeeded');

    const resp = await fetch(`${baseUrl}/catalog/drift-events`, { headers: { 'X-Tenant-Id': 'acme' } });
    expect(resp.status).toBe(200);
    const body: unknown = await resp.json();
    expect(body).toMatchObject({
      count: 1,
      events: [
        {
          drift_type: 'schema',
          severity: 'warning',
          asset_name: 'orders',
          namespace: 'acme/analytics',
          description: 'Added columns: region',
          status: 'open',
        },
      ],
    });

    const foreign = await fetch(`${baseUrl}/catalog/drift-events?namespace=acme`, { headers: { 'X-Tenant-Id': 'globex' } });
    expect(foreign.status).toBe(403);
  });
});

describe('HTTP transport limits', () => {
  let limited: FabricRuntime;
  let limitedUrl: string;

  beforeAll(async () => {
    const config = loadConfig({
      FABRIC_PORT: '0',
      FABRIC_HOST: '127.0.0.1',
      FABRIC_LOG_LEVEL: 'silent',
      FABRIC_MAX_SSE_SUBSCRIBERS: '1',
      FABRIC_CORS_ORIGINS: 'https://a.example, https://b.example',
    });
    if (!config.ok) throw new Error(config.error);
    limited = await createRuntime(config.value, { metrics: new MetricsCollector() });
    await limited.start();
    limitedUrl = `http://127.0.0.1:${limited.server.port}`;
  });

  afterAll(async () => {
    await limited.stop();
  });

  it('refuses a signal subscriber over the cap with 503', async () => {
    const controller = new AbortController();
    const first = await fetch(`${limitedUrl}/observability/signals`, { signal: controller.signal });
    expect(first.status).toBe(200);

    const deadline = Date.now() + 5000;
    while (limited.server.subscriberCount === 0 && Date.now() < deadline) {
      await new Promise((resolve) => setTimeout(resolve, 10));
    }
    expect(limited.server.subscriberCount).toBe(1);

    const second = await fetch(`${limitedUrl}/observability/signals`);
    expect(second.status).toBe(503);
    expect(await second.json()).toEqual({
      error: { code: 'EXECUTION_FAILED', message: 'Too many signal subscribers', details: {} },
    });
    controller.abort();
  });

  it('echoes a listed origin', async () => {
    const resp = await fetch(`${limitedUrl}/health`, { method: 'OPTIONS', headers: { Origin: 'https://b.example' } });
    expect(resp.status).toBe(204);
    expect(resp.headers.get('access-control-allow-origin')).toBe('https://b.example');
    expect(resp.headers.get('vary')).toBe('Origin');
  });

  it('answers an unlisted origin with the first configured one', async () => {
    const resp = await fetch(`${limitedUrl}/health`, { headers: { Origin: 'https://evil.example' } });
    expect(resp.headers.get('access-control-allow-origin')).toBe('https://a.example');
  });
});
