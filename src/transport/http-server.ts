/**
 * Data Fabric HTTP Server: capability discovery, intent submission,
 * execution polling and the signal stream.
 * Uses Node.js built-in http module (no Express).
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { Socket } from 'node:net';
import { FabricError, errorMessage } from '../core/errors.js';
import { createLogger, type Logger } from '../core/logger.js';
import { globalMetrics, type MetricsCollector } from '../core/metrics.js';
import type { ErrorEnvelope } from '../core/types.js';
import type { CapabilityFilter, CapabilityRegistry } from '../mcop/capability-registry.js';
import type { IntentGateway } from '../mcop/intent-gateway.js';
import type { DataFabricIntentHandler, RateClass } from '../mcop/intent-handler.js';
import type { HubEventKind, SignalFilter, SignalHub } from '../observability/signal-hub.js';
import { HUB_EVENT_KINDS } from '../observability/signal-hub.js';
import type { DriftDetector } from '../policies/drift-control.js';
import { TenantRateLimiter } from './rate-limiter.js';
import { SSEWriter } from './sse.js';
import type { TransportConfig } from './types.js';
import { capabilityToWire, driftEventToWire, executionToWire, parseIntentEnvelope, signalToWire } from './wire.js';

export const SERVICE_VERSION = '1.0.0';

/** Request body read timeout in milliseconds */
const REQUEST_TIMEOUT_MS = 30_000;

const TENANT_HEADER = 'x-tenant-id';

type BodyResult = { ok: true; value: unknown } | { ok: false; reason: 'too_large' | 'invalid_json' | 'aborted' };

export interface FabricServerDeps {
  gateway: IntentGateway;
  handler: DataFabricIntentHandler;
  registry: CapabilityRegistry;
  hub: SignalHub;
  drift: DriftDetector;
}

export class FabricHttpServer {
  private server: Server | null = null;
  private streams = new Set<SSEWriter>();
  private startedAt = 0;
  private connections = new Set<Socket>();
  private logger: Logger;
  private metrics: MetricsCollector;
  private rateLimiter: TenantRateLimiter;

  constructor(
    private config: TransportConfig,
    private deps: FabricServerDeps,
    opts?: { metrics?: MetricsCollector; rateLimiter?: TenantRateLimiter; logger?: Logger },
  ) {
    this.logger = opts?.logger ?? createLogger('FabricHttpServer');
    this.metrics = opts?.metrics ?? globalMetrics;
    this.rateLimiter = opts?.rateLimiter ?? new TenantRateLimiter();
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = createServer((req, res) => {
        this.handleRequest(req, res).catch((err: unknown) => {
          this.logger.error('Unhandled request failure', { error: errorMessage(err) });
        });
      });
      server.on('connection', (socket) => {
        this.connections.add(socket);
        socket.on('close', () => this.connections.delete(socket));
      });
      server.once('error', reject);
      server.listen(this.config.port, this.config.host, () => {
        this.startedAt = Date.now();
        this.logger.info('Server started', { port: this.port, host: this.config.host });
        this.rateLimiter.startCleanup();
        resolve();
      });
      this.server = server;
    });
  }

  async stop(): Promise<void> {
    this.logger.info('Server stopping');
    this.rateLimiter.stopCleanup();

    for (const writer of this.streams) writer.close();
    this.streams.clear();

    for (const socket of this.connections) socket.destroy();
    this.connections.clear();

    return new Promise((resolve) => {
      if (!this.server) { resolve(); return; }
      this.server.close(() => resolve());
      this.server = null;
    });
  }

  /** The actual port after listen (useful when port=0) */
  get port(): number {
    const addr = this.server?.address();
    if (addr && typeof addr === 'object') return addr.port;
    return this.config.port;
  }

  get subscriberCount(): number {
    return this.streams.size;
  }

  // ── Request Router ──

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const startTime = Date.now();

    this.setCors(req, res);
    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    const base = this.config.basePath;
    const path = url.pathname.startsWith(base) ? url.pathname.slice(base.length) || '/' : url.pathname;
    const method = req.method ?? 'GET';
    this.metrics.counter('http_requests_total', { method, path: routeLabel(path) });

    try {
      if (method === 'GET' && path === '/health') {
        return this.handleHealth(res);
      }
      if (method === 'GET' && path === '/metrics') {
        return this.handleMetrics(req, url, res);
      }
      if (method === 'GET' && path === '/registry/capabilities') {
        if (!this.allow(req, res, 'read', null)) return;
        return this.handleCapabilities(url, res);
      }
      if (method === 'POST' && path === '/mcop/intents') {
        return await this.handleSubmit(req, res);
      }
      if (method === 'GET' && path.startsWith('/mcop/executions/')) {
        if (!this.allow(req, res, 'read', null)) return;
        return await this.handleExecution(req, path.slice('/mcop/executions/'.length), res);
      }
      if ((method === 'GET' || method === 'SUBSCRIBE') && path === '/observability/signals') {
        if (!this.allow(req, res, 'read', null)) return;
        return this.handleSignals(req, url, res);
      }
      if (method === 'GET' && path === '/catalog/drift-events') {
        if (!this.allow(req, res, 'read', null)) return;
        return this.handleDriftEvents(req, url, res);
      }

      this.sendError(res, new FabricError('DATA_NOT_FOUND', `No route for ${method} ${url.pathname}`), 404);
    } catch (err) {
      if (err instanceof FabricError) {
        this.sendError(res, err);
        return;
      }
      const message = errorMessage(err);
      this.logger.error('Request error', { method, path, error: message });
      this.metrics.counter('http_errors_total', { path: routeLabel(path) });
      this.sendError(res, new FabricError('EXECUTION_FAILED', message));
    } finally {
      this.metrics.histogram('http_duration_ms', Date.now() - startTime, { path: routeLabel(path) });
    }
  }

  // ── Route Handlers ──

  private handleHealth(res: ServerResponse): void {
    this.sendJson(res, 200, {
      status: 'ok',
      version: SERVICE_VERSION,
      uptime_ms: Date.now() - this.startedAt,
      running_executions: this.deps.gateway.runningCount,
      signal_subscribers: this.streams.size,
    });
  }

  private handleMetrics(req: IncomingMessage, url: URL, res: ServerResponse): void {
    const wantsText = url.searchParams.get('format') === 'prometheus' || (req.headers.accept ?? '').includes('text/plain');
    if (wantsText) {
      res.writeHead(200, { 'Content-Type': 'text/plain; version=0.0.4' });
      res.end(this.metrics.toPrometheus());
      return;
    }
    this.sendJson(res, 200, this.metrics.getSnapshot());
  }

  private handleCapabilities(url: URL, res: ServerResponse): void {
    const filter: CapabilityFilter = {};
    const domain = url.searchParams.get('domain');
    const tag = url.searchParams.get('tag');
    const capabilityType = url.searchParams.get('capability_type');
    const intent = url.searchParams.get('intent');
    if (domain) filter.domain = domain;
    if (tag) filter.tag = tag;
    if (capabilityType) filter.capabilityType = capabilityType;
    if (intent) filter.intent = intent;

    const capabilities = this.deps.registry.discover(filter).map(capabilityToWire);
    this.sendJson(res, 200, { domain: domain ?? null, count: capabilities.length, capabilities });
  }

  private async handleSubmit(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const contentType = req.headers['content-type'] ?? '';
    if (!contentType.includes('application/json')) {
      this.sendError(res, new FabricError('VALIDATION_FAILED', 'Content-Type must be application/json'), 415);
      return;
    }

    const body = await this.readBody(req);
    if (!body.ok) {
      if (body.reason === 'too_large') {
        this.sendError(res, new FabricError('VALIDATION_FAILED', `Request body exceeds ${this.config.maxBodyBytes} bytes`), 413);
      } else {
        this.sendError(res, new FabricError('VALIDATION_FAILED', 'Invalid JSON body'));
      }
      return;
    }

    const parsed = parseIntentEnvelope(body.value);
    if (!parsed.ok) {
      this.sendError(res, new FabricError('VALIDATION_FAILED', `Invalid intent envelope: ${parsed.error}`));
      return;
    }
    const request = parsed.value;

    const headerTenant = tenantHeader(req);
    if (headerTenant !== null && headerTenant !== request.tenant.organizationId) {
      this.sendError(res, new FabricError('ACCESS_DENIED', 'Tenant header does not match tenant_context', {
        header: headerTenant,
        organization_id: request.tenant.organizationId,
      }));
      return;
    }

    const rateClass = this.deps.handler.rateClassFor(request.intent) ?? 'write';
    if (!this.allow(req, res, rateClass, request.tenant.organizationId)) return;

    const accepted = await this.deps.gateway.submit(request);
    this.sendJson(res, 202, {
      intent_id: accepted.intentId,
      status: accepted.status,
      execution_id: accepted.executionId,
      trace_id: accepted.traceId,
    });
  }

  private async handleExecution(req: IncomingMessage, rawId: string, res: ServerResponse): Promise<void> {
    const executionId = decodeSegment(rawId);
    if (executionId === null) {
      this.sendError(res, new FabricError('DATA_NOT_FOUND', `Execution not found: ${rawId}`, { execution_id: rawId }));
      return;
    }
    const execution = await this.deps.gateway.getExecution(executionId);
    const headerTenant = tenantHeader(req);
    if (!execution || (headerTenant !== null && execution.tenant.organizationId !== headerTenant)) {
      this.sendError(res, new FabricError('DATA_NOT_FOUND', `Execution not found: ${executionId}`, { execution_id: executionId }));
      return;
    }
    this.sendJson(res, 200, executionToWire(execution));
  }

  private handleSignals(req: IncomingMessage, url: URL, res: ServerResponse): void {
    const filter = parseSignalFilter(url);
    if (typeof filter === 'string') {
      this.sendError(res, new FabricError('VALIDATION_FAILED', filter));
      return;
    }

    const headerTenant = tenantHeader(req);
    if (headerTenant !== null) {
      const requested = filter.tenantFilter?.organizationId;
      if (requested !== undefined && requested !== headerTenant) {
        this.sendError(res, new FabricError('ACCESS_DENIED', `Tenant ${headerTenant} cannot subscribe to ${requested}`));
        return;
      }
      filter.tenantFilter = { ...filter.tenantFilter, organizationId: headerTenant };
    }

    if (this.streams.size >= this.config.maxSseSubscribers) {
      this.sendError(res, new FabricError('EXECUTION_FAILED', 'Too many signal subscribers'), 503);
      return;
    }

    const writer = new SSEWriter(res, 15_000);
    this.streams.add(writer);
    const unsubscribe = this.deps.hub.subscribe(filter, (event) => {
      writer.send({ event: event.kind, id: event.eventId, data: JSON.stringify(signalToWire(event)) });
    });
    writer.onClose(() => {
      unsubscribe();
      this.streams.delete(writer);
      this.metrics.gauge('signal_subscribers', this.streams.size);
    });
    this.metrics.gauge('signal_subscribers', this.streams.size);

    writer.send({
      event: 'connected',
      data: JSON.stringify({
        domain: filter.domain ?? null,
        signal_types: filter.signalTypes ?? [],
        tenant_filter: filter.tenantFilter ?? null,
      }),
    });
  }

  private handleDriftEvents(req: IncomingMessage, url: URL, res: ServerResponse): void {
    const assetId = url.searchParams.get('asset_id');
    const headerTenant = tenantHeader(req);
    const namespace = url.searchParams.get('namespace') ?? headerTenant;
    if (headerTenant !== null && namespace !== null && namespace.split('/')[0] !== headerTenant) {
      this.sendError(res, new FabricError('ACCESS_DENIED', `Tenant ${headerTenant} cannot read namespace ${namespace}`));
      return;
    }

    const events = this.deps.drift.getOpenEvents({
      ...(assetId ? { assetId } : {}),
      ...(namespace ? { namespace } : {}),
    });
    this.sendJson(res, 200, { count: events.length, events: events.map(driftEventToWire) });
  }

  // ── Helpers ──

  /** Consume a rate-limit token; sends 429 and returns false when exhausted. */
  private allow(req: IncomingMessage, res: ServerResponse, rateClass: RateClass, tenant: string | null): boolean {
    const key = tenant ?? tenantHeader(req) ?? req.socket.remoteAddress ?? 'unknown';
    const result = this.rateLimiter.check(key, rateClass);
    if (result.allowed) return true;

    const retryAfterMs = result.retryAfterMs ?? 1000;
    this.metrics.counter('http_rate_limited_total', { rate_class: rateClass });
    this.logger.warn('Rate limited', { tenant: key, rateClass, retryAfterMs });
    res.setHeader('Retry-After', String(Math.max(1, Math.ceil(retryAfterMs / 1000))));
    this.sendError(res, new FabricError('RATE_LIMITED', `Rate limit exceeded for ${rateClass} requests`, {
      rate_class: rateClass,
      retry_after_ms: retryAfterMs,
    }));
    return false;
  }

  /** Echoes a listed request origin; otherwise the first configured origin, or `*` when none are. */
  private setCors(req: IncomingMessage, res: ServerResponse): void {
    const origins = this.config.corsOrigins;
    const origin = req.headers.origin;
    if (origins.length === 0) {
      res.setHeader('Access-Control-Allow-Origin', '*');
    } else {
      res.setHeader('Access-Control-Allow-Origin', origin !== undefined && origins.includes(origin) ? origin : origins[0] ?? '*');
      res.setHeader('Vary', 'Origin');
    }
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, SUBSCRIBE, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, X-Tenant-Id');
  }

  private sendJson(res: ServerResponse, status: number, body: unknown): void {
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(body));
  }

  private sendError(res: ServerResponse, err: FabricError, status: number = err.status): void {
    const envelope: ErrorEnvelope = err.toEnvelope();
    this.sendJson(res, status, envelope);
  }

  private readBody(req: IncomingMessage): Promise<BodyResult> {
    const limit = this.config.maxBodyBytes;
    return new Promise((resolve) => {
      const chunks: Buffer[] = [];
      let size = 0;
      let settled = false;
      const finish = (result: BodyResult) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        resolve(result);
      };
      const timeout = setTimeout(() => {
        req.destroy();
        finish({ ok: false, reason: 'aborted' });
      }, REQUEST_TIMEOUT_MS);

      req.on('data', (chunk: Buffer) => {
        size += chunk.length;
        if (size > limit) {
          req.removeAllListeners('data');
          req.resume();
          finish({ ok: false, reason: 'too_large' });
          return;
        }
        chunks.push(chunk);
      });
      req.on('end', () => {
        try {
          finish({ ok: true, value: JSON.parse(Buffer.concat(chunks).toString('utf8')) });
        } catch {
          finish({ ok: false, reason: 'invalid_json' });
        }
      });
      req.on('error', () => finish({ ok: false, reason: 'aborted' }));
    });
  }
}

// ── Request Parsing ──

function tenantHeader(req: IncomingMessage): string | null {
  const value = req.headers[TENANT_HEADER];
  const first = Array.isArray(value) ? value[0] : value;
  return first && first.trim() !== '' ? first.trim() : null;
}

/** Null for a malformed percent-encoding. */
function decodeSegment(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch (err) {
    if (err instanceof URIError) return null;
    throw err;
  }
}

function routeLabel(path: string): string {
  return path.startsWith('/mcop/executions/') ? '/mcop/executions/:id' : path;
}

/** Filter from `domain`, `signal_types` (comma separated) and `tenant_filter` (`org` or `org/ws`). */
export function parseSignalFilter(url: URL): SignalFilter | string {
  const filter: SignalFilter = {};

  const domain = url.searchParams.get('domain');
  if (domain) filter.domain = domain;

  const types = url.searchParams.get('signal_types');
  if (types) {
    const kinds: HubEventKind[] = [];
    for (const name of types.split(',').map((t) => t.trim()).filter((t) => t !== '')) {
      const kind = HUB_EVENT_KINDS.find((k) => k === name);
      if (!kind) return `Unknown signal type: ${name}`;
      kinds.push(kind);
    }
    filter.signalTypes = kinds;
  }

  const tenant = url.searchParams.get('tenant_filter');
  if (tenant) {
    const [organizationId, workspaceId] = tenant.split('/');
    filter.tenantFilter = {
      ...(organizationId ? { organizationId } : {}),
      ...(workspaceId ? { workspaceId } : {}),
    };
  }

  return filter;
}
