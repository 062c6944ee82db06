import { request as httpRequest } from 'node:http';
import { request as httpsRequest } from 'node:https';

import { TransportError, extractErrno, extractMessage } from './errors';

import type { IncomingHttpHeaders } from 'node:http';
import type { ResponseHeaders } from './types';

export type HttpMethod = 'HEAD' | 'PUT' | 'POST';

export type HttpResponse = {
  status: number;
  reason: string;
  headers: ResponseHeaders;
  bodyText: string;
};

export type HttpRequestInput = {
  url: string;
  method: HttpMethod;
  headers?: Record<string, string>;
  body?: string;
  timeoutMs: number;
  tlsVerify: boolean;
};

export type HttpTransport = (input: HttpRequestInput) => Promise<HttpResponse>;

export function encodeBasicAuth(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`, 'utf8').toString('base64')}`;
}

function flattenHeaders(headers: IncomingHttpHeaders): ResponseHeaders {
  const out: ResponseHeaders = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    out[key] = Array.isArray(value) ? value.join(', ') : value;
  }
  return out;
}

export const sendHttpRequest: HttpTransport = (input) => {
  const url = new URL(input.url);
  const isHttps = url.protocol === 'https:';
  const reqFn = isHttps ? httpsRequest : httpRequest;
  const body = input.body === undefined ? undefined : Buffer.from(input.body, 'utf8');

  return new Promise<HttpResponse>((resolve, reject) => {
    const req = reqFn(
      {
        protocol: url.protocol,
        hostname: url.hostname,
        port: url.port ? Number(url.port) : undefined,
        path: `${url.pathname}${url.search}`,
        method: input.method,
        headers: {
          ...input.headers,
          ...(body ? { 'content-length': String(body.length) } : {}),
        },
        ...(isHttps ? { rejectUnauthorized: input.tlsVerify } : {}),
      },
      (res) => {
        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer | string) => chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk)));
        res.on('error', (err) => reject(toTransportError(err, input)));
        res.on('end', () => {
          resolve({
            status: res.statusCode ?? 0,
            reason: res.statusMessage ?? '',
            headers: flattenHeaders(res.headers),
            bodyText: Buffer.concat(chunks).toString('utf8'),
          });
        });
      },
    );

    req.on('error', (err) => reject(toTransportError(err, input)));
    req.setTimeout(input.timeoutMs, () => {
      req.destroy(Object.assign(new Error(`timed out after ${input.timeoutMs}ms`), { code: 'ETIMEDOUT' }));
    });
    if (body) req.write(body);
    req.end();
  });
};

function toTransportError(err: unknown, input: HttpRequestInput): TransportError {
  const url = new URL(input.url);
  return new TransportError(extractMessage(err), {
    errno: extractErrno(err),
    reason: extractMessage(err),
    cause: err,
    context: { method: input.method, host: url.host, timeout_ms: input.timeoutMs, tls_verify: input.tlsVerify },
  });
}
