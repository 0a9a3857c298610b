import { createServer } from 'http';
import type { IncomingMessage, Server, ServerResponse } from 'http';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger.js';
import { AppError, ValidationError } from '../errors.js';
import type { Metrics } from '../metrics/counter.js';
import type { NatsClient } from '../nats/connection.js';
import type { ReadingsConsumer } from '../nats/consumer.js';
import type { TimeRange } from '../rules/types.js';
import type { AnalysisService } from '../services/analysis-service.js';
import type { ThresholdService } from '../services/threshold-service.js';

export interface ApiRequest {
    method: string;
    path: string;
    query: URLSearchParams;
    rawBody: string;
}

export interface ApiResponse {
    status: number;
    body: unknown;
}

export interface ApiDependencies {
    bus: Pick<NatsClient, 'isConnected'>;
    consumer: Pick<ReadingsConsumer, 'getState'>;
    metrics: Metrics;
    thresholds: ThresholdService;
    analysis: AnalysisService;
}

function ok(body: unknown): ApiResponse {
    return { status: 200, body };
}

function parseJson(rawBody: string): unknown {
    if (rawBody.trim() === '') {
        throw new ValidationError('Request body is required');
    }
    try {
        return JSON.parse(rawBody);
    } catch {
        throw new ValidationError('Request body is not valid JSON');
    }
}

function parseDate(raw: string, field: string): Date {
    const date = new Date(raw);
    if (isNaN(date.getTime())) {
        throw new ValidationError(`Invalid ${field}: ${raw}`, { field });
    }
    return date;
}

/** Reads the optional `start`/`end` query pair; both or neither must be set. */
export function parseRange(query: URLSearchParams): TimeRange | undefined {
    const start = query.get('start');
    const end = query.get('end');
    if (start === null && end === null) {
        return undefined;
    }
    if (start === null || end === null) {
        throw new ValidationError('start and end must be given together');
    }

    const range = { start: parseDate(start, 'start'), end: parseDate(end, 'end') };
    if (range.end.getTime() < range.start.getTime()) {
        throw new ValidationError('end must be >= start');
    }
    return range;
}

function decodePath(path: string): string[] {
    try {
        return path.split('/').filter(Boolean).map((s) => decodeURIComponent(s));
    } catch {
        throw new ValidationError('Malformed path', { path });
    }
}

function readBody(req: IncomingMessage): Promise<string> {
    return new Promise((resolve, reject) => {
        const chunks: Buffer[] = [];
        req.on('data', (chunk: Buffer) => chunks.push(chunk));
        req.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
        req.on('error', reject);
    });
}

export class ApiServer {
    private server: Server;

    constructor(
        private port: number,
        private deps: ApiDependencies,
    ) {
        this.server = createServer((req, res) => {
            this.handleRequest(req, res).catch((err) => {
                logger.error({ error: err, path: req.url }, 'Unhandled request failure');
                if (!res.headersSent) {
                    res.writeHead(500, { 'Content-Type': 'application/json' });
                }
                res.end(JSON.stringify({ error: 'INTERNAL', message: 'Internal server error' }));
            });
        });
    }

    private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
        const method = req.method ?? 'GET';
        const url = new URL(req.url ?? '/', 'http://localhost');
        const headerId = req.headers['x-request-id'];
        const requestId = typeof headerId === 'string' && headerId ? headerId : uuidv4();
        const startedAt = Date.now();
        const log = logger.child({ req_id: requestId });

        log.info({ method, path: url.pathname }, 'Request started');

        // CORS headers
        res.setHeader('Access-Control-Allow-Origin', '*');
        res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
        res.setHeader('Access-Control-Allow-Headers', 'Content-Type, X-Request-ID');
        res.setHeader('X-Request-ID', requestId);

        let response: ApiResponse;
        if (method === 'OPTIONS') {
            response = { status: 204, body: undefined };
        } else {
            const rawBody = method === 'POST' ? await readBody(req) : '';
            response = await this.route({ method, path: url.pathname, query: url.searchParams, rawBody });
        }

        const durationMs = Date.now() - startedAt;
        res.setHeader('X-Response-Time-ms', String(durationMs));

        if (response.body === undefined) {
            res.writeHead(response.status);
            res.end();
        } else {
            res.writeHead(response.status, { 'Content-Type': 'application/json' });
            res.end(JSON.stringify(response.body));
        }

        log.info({ status: response.status, path: url.pathname, duration_ms: durationMs }, 'Request finished');
    }

    /**
     * Dispatch one request. Application errors become their category's
     * status code; anything else is a 500.
     */
    async route(req: ApiRequest): Promise<ApiResponse> {
        try {
            const segments = decodePath(req.path);
            const [resource, id, sub] = segments;

            if (req.method === 'GET' && req.path === '/health') {
                return this.handleHealth();
            }
            if (req.method === 'GET' && req.path === '/metrics') {
                return ok({ ...this.deps.metrics.getCounters(), timestamp: new Date().toISOString() });
            }

            if (resource === 'thresholds') {
                if (req.method === 'POST' && segments.length === 1) {
                    return ok(await this.deps.thresholds.upsert(parseJson(req.rawBody)));
                }
                if (req.method === 'GET' && id && segments.length === 2) {
                    return ok(await this.deps.thresholds.list(id));
                }
                if (req.method === 'GET' && id && sub && segments.length === 3) {
                    return ok(await this.deps.thresholds.get(id, sub));
                }
            }

            if (resource === 'anomalies' && req.method === 'GET' && id && segments.length === 2) {
                return ok(await this.deps.analysis.listAnomalies(id, parseRange(req.query)));
            }

            if (resource === 'analyze' && req.method === 'POST' && id && segments.length === 2) {
                return ok(await this.deps.analysis.analyzeRecent(id));
            }

            return { status: 404, body: { error: 'NOT_FOUND', message: 'Not found' } };
        } catch (err) {
            if (err instanceof AppError) {
                return { status: err.httpStatus, body: err.toJSON() };
            }
            logger.error({ error: err, method: req.method, path: req.path }, 'Request failed');
            return { status: 500, body: { error: 'INTERNAL', message: 'Internal server error' } };
        }
    }

    private handleHealth(): ApiResponse {
        const isNatsConnected = this.deps.bus.isConnected();
        const consumerState = this.deps.consumer.getState();
        const healthy = isNatsConnected && consumerState === 'running';

        return {
            status: healthy ? 200 : 503,
            body: {
                status: healthy ? 'ok' : 'degraded',
                nats: {
                    connected: isNatsConnected,
                },
                consumer: {
                    state: consumerState,
                },
                timestamp: new Date().toISOString(),
            },
        };
    }

    async start(): Promise<void> {
        return new Promise((resolve) => {
            this.server.listen(this.port, () => {
                logger.info({ port: this.port }, 'HTTP API server started');
                resolve();
            });
        });
    }

    async stop(): Promise<void> {
        return new Promise((resolve) => {
            this.server.close(() => {
                logger.info('HTTP API server stopped');
                resolve();
            });
        });
    }
}
