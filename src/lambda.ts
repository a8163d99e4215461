import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import type { FastifyInstance, InjectOptions } from 'fastify';

type HTTPMethods = NonNullable<InjectOptions['method']>;
import { loadConfig } from './config.js';
import { buildApp } from './app.js';
import { createLogger } from './infrastructure/logger.js';
import { createRecordStore } from './infrastructure/store/index.js';

const METHODS: readonly HTTPMethods[] = ['DELETE', 'GET', 'HEAD', 'PATCH', 'POST', 'PUT', 'OPTIONS'];

function toMethod(value: string): HTTPMethods | undefined {
  const upper = value.toUpperCase();
  return METHODS.find((method) => method === upper);
}

function definedEntries<T>(source: Record<string, T | undefined> | null): Record<string, T> {
  const out: Record<string, T> = {};
  if (source === null) return out;
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

/** Multi-value query parameters win; single values fill the gaps. */
function toQuery(event: APIGatewayProxyEvent): Record<string, string | string[]> {
  const query: Record<string, string | string[]> = definedEntries(event.queryStringParameters);
  for (const [key, values] of Object.entries(definedEntries(event.multiValueQueryStringParameters))) {
    query[key] = values.length === 1 && values[0] !== undefined ? values[0] : values;
  }
  return query;
}

type ResultHeaders = NonNullable<APIGatewayProxyResult['headers']>;
type ResultMultiHeaders = NonNullable<APIGatewayProxyResult['multiValueHeaders']>;

function splitHeaders(
  raw: Record<string, string | number | string[] | undefined>,
): { headers: ResultHeaders; multiValueHeaders: ResultMultiHeaders } {
  const headers: ResultHeaders = {};
  const multiValueHeaders: ResultMultiHeaders = {};
  for (const [name, value] of Object.entries(raw)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      multiValueHeaders[name] = value;
    } else {
      headers[name] = value;
    }
  }
  return { headers, multiValueHeaders };
}

/**
 * Adapts API Gateway REST proxy events to a Fastify app by replaying each
 * request through `inject()`. Nothing listens on a socket.
 */
export function createHandler(
  app: FastifyInstance | Promise<FastifyInstance>,
): (event: APIGatewayProxyEvent) => Promise<APIGatewayProxyResult> {
  return async (event) => {
    const instance = await app;
    await instance.ready();

    const method = toMethod(event.httpMethod);
    if (method === undefined) {
      return {
        statusCode: 405,
        headers: { 'content-type': 'application/json; charset=utf-8' },
        body: JSON.stringify({ detail: `Method ${event.httpMethod} not allowed` }),
      };
    }

    const body = event.body === null
      ? undefined
      : event.isBase64Encoded ? Buffer.from(event.body, 'base64') : event.body;

    const response = await instance.inject({
      method,
      url: event.path,
      query: toQuery(event),
      headers: definedEntries(event.headers),
      ...(body !== undefined ? { payload: body } : {}),
    });

    return {
      statusCode: response.statusCode,
      ...splitHeaders(response.headers),
      body: response.body,
    };
  };
}

let cached: Promise<FastifyInstance> | undefined;

/** Builds the app once per warm container. */
async function bootstrap(): Promise<FastifyInstance> {
  const config = loadConfig();
  const log = createLogger(config);
  const store = await createRecordStore(config.store, log);
  return buildApp({ config, store });
}

/** Reuses the app across invocations; a failed bootstrap is retried next time. */
function getApp(): Promise<FastifyInstance> {
  if (cached === undefined) {
    cached = bootstrap().catch((err: unknown) => {
      cached = undefined;
      throw err;
    });
  }
  return cached;
}

export async function handler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  return createHandler(getApp())(event);
}
