import { MalformedResponseError, MutationError } from './errors';
import { encodeBasicAuth, sendHttpRequest } from './http';

import type { HttpResponse, HttpTransport } from './http';
import type { ProbeResult } from './types';

export type FolderClient = {
  probe: (url: string) => Promise<ProbeResult>;
  /** Creates an empty file; resolves with the 201 response. */
  touch: (url: string) => Promise<HttpResponse>;
};

function parseContentLength(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value.trim())) return null;
  const size = Number(value.trim());
  return Number.isSafeInteger(size) ? size : null;
}

export function toProbeResult(res: HttpResponse): ProbeResult {
  if (res.status === 200) {
    const size = parseContentLength(res.headers['content-length']);
    if (size === null) {
      throw new MalformedResponseError('HEAD returned 200 without a valid content-length', {
        status: res.status,
        reason: res.reason,
        headers: res.headers,
        context: { content_length: res.headers['content-length'] ?? null },
      });
    }
    return { kind: 'found', status: 200, size };
  }
  if (res.status === 404) return { kind: 'not_found', status: 404 };
  return { kind: 'error', status: res.status, reason: res.reason, headers: res.headers };
}

export function createFolderClient(input: {
  username: string;
  password: string;
  timeoutMs: number;
  tlsVerify: boolean;
  transport?: HttpTransport;
}): FolderClient {
  const send = input.transport ?? sendHttpRequest;
  const authorization = encodeBasicAuth(input.username, input.password);

  const probe = async (url: string): Promise<ProbeResult> => {
    const res = await send({
      url,
      method: 'HEAD',
      headers: { authorization },
      timeoutMs: input.timeoutMs,
      tlsVerify: input.tlsVerify,
    });
    return toProbeResult(res);
  };

  const touch = async (url: string): Promise<HttpResponse> => {
    const res = await send({
      url,
      method: 'PUT',
      headers: { authorization, 'content-type': 'application/octet-stream' },
      body: '',
      timeoutMs: input.timeoutMs,
      tlsVerify: input.tlsVerify,
    });
    // The datastore answers 201 for a newly created file; anything else is a failed touch.
    if (res.status !== 201) {
      throw new MutationError(`PUT failed with status ${res.status}`, {
        status: res.status,
        reason: res.reason,
        headers: res.headers,
      });
    }
    return res;
  };

  return { probe, touch };
}
