import { setTimeout as sleep } from 'node:timers/promises';

import { XMLParser } from 'fast-xml-parser';

import { silentLogger } from '@/lib/logging/logger';

import { MalformedResponseError, MutationError } from './errors';
import { sendHttpRequest } from './http';

import type { Logger } from '@/lib/logging/logger';
import type { HttpResponse, HttpTransport } from './http';

export type ServiceContent = {
  sessionManager: string;
  propertyCollector: string;
  searchIndex: string;
  fileManager: string;
};

export type TaskState = 'queued' | 'running' | 'success' | 'error';

export type TaskInfo = {
  state: TaskState;
  errorMessage?: string;
};

export type FileManagerClient = {
  deleteFile: (spec: string) => Promise<void>;
  makeDirectory: (spec: string, createParents?: boolean) => Promise<void>;
  /** Logs out when a session was opened. Never throws. */
  close: () => Promise<void>;
};

const parser = new XMLParser({ ignoreAttributes: true, removeNSPrefix: true, parseTagValue: false });

const SOAP_EXCERPT_LIMIT = 2000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

function toArray(value: unknown): unknown[] {
  if (value === undefined || value === null || value === '') return [];
  return Array.isArray(value) ? value : [value];
}

function toStringValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}

function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function soapEnvelope(innerXml: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<soapenv:Envelope xmlns:soapenv="http://schemas.xmlsoap.org/soap/envelope/" xmlns:vim25="urn:vim25">
  <soapenv:Body>
    ${innerXml}
  </soapenv:Body>
</soapenv:Envelope>`;
}

function parseBody(xml: string, op: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = parser.parse(xml);
  } catch (err) {
    throw new MalformedResponseError(`${op} returned invalid xml`, { cause: err, context: { op } });
  }
  const envelope = isRecord(parsed) ? parsed.Envelope : undefined;
  const body = isRecord(envelope) ? envelope.Body : undefined;
  if (!isRecord(body)) throw new MalformedResponseError(`${op} returned unexpected response`, { context: { op } });
  return body;
}

export function parseSoapFaultString(xml: string): string | undefined {
  try {
    const body = parseBody(xml, 'fault');
    const fault = body.Fault;
    return isRecord(fault) ? toStringValue(fault.faultstring) : undefined;
  } catch {
    return undefined;
  }
}

function parseReturnval(xml: string, op: string): unknown {
  const response = parseBody(xml, op)[`${op}Response`];
  return isRecord(response) ? response.returnval : undefined;
}

export function parseServiceContent(xml: string): ServiceContent {
  const returnval = parseReturnval(xml, 'RetrieveServiceContent');
  const content = isRecord(returnval) ? returnval : {};

  const sessionManager = toStringValue(content.sessionManager);
  const propertyCollector = toStringValue(content.propertyCollector);
  const searchIndex = toStringValue(content.searchIndex);
  const fileManager = toStringValue(content.fileManager);
  if (!sessionManager || !propertyCollector || !searchIndex || !fileManager) {
    throw new MalformedResponseError('RetrieveServiceContent returned unexpected response', {
      context: { op: 'RetrieveServiceContent' },
    });
  }

  return { sessionManager, propertyCollector, searchIndex, fileManager };
}

/** Returns the managed object id, or undefined when the call returned nothing. */
export function parseMoRefReturn(xml: string, op: string): string | undefined {
  const value = toStringValue(parseReturnval(xml, op))?.trim();
  return value ? value : undefined;
}

function parseTaskState(value: unknown): TaskState | undefined {
  if (value === 'queued' || value === 'running' || value === 'success' || value === 'error') return value;
  return undefined;
}

function describeTaskError(val: unknown): string | undefined {
  if (!isRecord(val)) return toStringValue(val);
  const localized = toStringValue(val.localizedMessage);
  if (localized) return localized;
  const fault = val.fault;
  if (isRecord(fault)) {
    const faultMessage = toStringValue(fault.faultMessage) ?? toStringValue(fault.msg);
    if (faultMessage) return faultMessage;
  }
  return undefined;
}

export function parseTaskInfo(xml: string): TaskInfo {
  const returnval = parseReturnval(xml, 'RetrievePropertiesEx');
  const objects = isRecord(returnval) ? returnval.objects : undefined;

  let state: TaskState | undefined;
  let errorMessage: string | undefined;
  for (const object of toArray(objects)) {
    if (!isRecord(object)) continue;
    for (const prop of toArray(object.propSet)) {
      if (!isRecord(prop)) continue;
      const name = toStringValue(prop.name);
      if (name === 'info.state') state = parseTaskState(prop.val);
      else if (name === 'info.error') errorMessage = describeTaskError(prop.val);
    }
  }

  if (!state) {
    throw new MalformedResponseError('RetrievePropertiesEx returned no task state', {
      context: { op: 'RetrievePropertiesEx' },
    });
  }
  return errorMessage === undefined ? { state } : { state, errorMessage };
}

function extractCookie(headers: Record<string, string>): string | undefined {
  const setCookie = headers['set-cookie'];
  if (!setCookie) return undefined;
  return setCookie.split(';')[0];
}

export function toSdkEndpoint(baseUrl: string): string {
  const trimmed = baseUrl.replace(/\/+$/, '');
  if (trimmed.endsWith('/sdk')) return trimmed;
  return `${trimmed}/sdk`;
}

export function createFileManagerClient(input: {
  baseUrl: string;
  username: string;
  password: string;
  datacenter: string;
  timeoutMs: number;
  tlsVerify: boolean;
  taskPollMs: number;
  /** Upper bound on waiting for a task; unset waits until the task finishes. */
  taskTimeoutMs?: number;
  signal?: AbortSignal;
  transport?: HttpTransport;
  logger?: Logger;
}): FileManagerClient {
  const send = input.transport ?? sendHttpRequest;
  const logger = input.logger ?? silentLogger;
  const sdkEndpoint = toSdkEndpoint(input.baseUrl);

  type Session = { content: ServiceContent; cookie: string; datacenter: string };
  let session: Promise<Session> | undefined;
  let login: { content: ServiceContent; cookie: string } | undefined;

  async function soapCall(op: string, innerXml: string, cookie?: string): Promise<HttpResponse> {
    const start = Date.now();
    const res = await send({
      url: sdkEndpoint,
      method: 'POST',
      headers: {
        'content-type': 'text/xml; charset=utf-8',
        ...(cookie ? { cookie } : {}),
      },
      body: soapEnvelope(innerXml),
      timeoutMs: input.timeoutMs,
      tlsVerify: input.tlsVerify,
    });
    const ok = res.status >= 200 && res.status < 300;
    logger.debug({
      event_type: 'soap.request',
      op,
      status: res.status,
      duration_ms: Date.now() - start,
      ...(ok ? {} : { body_excerpt: res.bodyText.slice(0, SOAP_EXCERPT_LIMIT) }),
    });
    if (!ok) {
      const fault = parseSoapFaultString(res.bodyText);
      throw new MutationError(fault ? `${op} failed: ${fault}` : `${op} failed with status ${res.status}`, {
        status: res.status,
        reason: fault ?? res.reason,
        context: { op },
      });
    }
    return res;
  }

  async function connect(): Promise<Session> {
    const serviceContentRes = await soapCall(
      'RetrieveServiceContent',
      `<vim25:RetrieveServiceContent>
        <vim25:_this type="ServiceInstance">ServiceInstance</vim25:_this>
      </vim25:RetrieveServiceContent>`,
    );
    const content = parseServiceContent(serviceContentRes.bodyText);

    const loginRes = await soapCall(
      'Login',
      `<vim25:Login>
        <vim25:_this type="SessionManager">${escapeXml(content.sessionManager)}</vim25:_this>
        <vim25:userName>${escapeXml(input.username)}</vim25:userName>
        <vim25:password>${escapeXml(input.password)}</vim25:password>
      </vim25:Login>`,
    );
    const cookie = extractCookie(loginRes.headers);
    if (!cookie) throw new MalformedResponseError('Login did not return session cookie', { context: { op: 'Login' } });
    login = { content, cookie };

    const findRes = await soapCall(
      'FindByInventoryPath',
      `<vim25:FindByInventoryPath>
        <vim25:_this type="SearchIndex">${escapeXml(content.searchIndex)}</vim25:_this>
        <vim25:inventoryPath>${escapeXml(input.datacenter)}</vim25:inventoryPath>
      </vim25:FindByInventoryPath>`,
      cookie,
    );
    const datacenter = parseMoRefReturn(findRes.bodyText, 'FindByInventoryPath');
    if (!datacenter) {
      throw new MutationError(`datacenter '${input.datacenter}' not found`, {
        context: { op: 'FindByInventoryPath' },
      });
    }

    return { content, cookie, datacenter };
  }

  function getSession(): Promise<Session> {
    session ??= connect();
    return session;
  }

  async function readTaskInfo(s: Session, task: string): Promise<TaskInfo> {
    const res = await soapCall(
      'RetrievePropertiesEx',
      `<vim25:RetrievePropertiesEx>
        <vim25:_this type="PropertyCollector">${escapeXml(s.content.propertyCollector)}</vim25:_this>
        <vim25:specSet>
          <vim25:propSet>
            <vim25:type>Task</vim25:type>
            <vim25:pathSet>info.state</vim25:pathSet>
            <vim25:pathSet>info.error</vim25:pathSet>
          </vim25:propSet>
          <vim25:objectSet><vim25:obj type="Task">${escapeXml(task)}</vim25:obj></vim25:objectSet>
        </vim25:specSet>
        <vim25:options></vim25:options>
      </vim25:RetrievePropertiesEx>`,
      s.cookie,
    );
    return parseTaskInfo(res.bodyText);
  }

  async function waitForTask(s: Session, task: string, op: string): Promise<void> {
    const deadline = input.taskTimeoutMs === undefined ? undefined : Date.now() + input.taskTimeoutMs;

    for (;;) {
      const info = await readTaskInfo(s, task);
      if (info.state === 'success') return;
      if (info.state === 'error') {
        const message = info.errorMessage ?? `${op} task failed`;
        throw new MutationError(message, { reason: message, context: { op, task } });
      }

      if (deadline !== undefined && Date.now() >= deadline) {
        throw new MutationError(`${op} task ${task} did not finish within ${input.taskTimeoutMs}ms`, {
          context: { op, task, state: info.state },
        });
      }
      if (input.signal?.aborted) {
        throw new MutationError(`${op} task ${task} wait aborted`, { context: { op, task, state: info.state } });
      }

      try {
        await sleep(input.taskPollMs, undefined, input.signal ? { signal: input.signal } : undefined);
      } catch (err) {
        throw new MutationError(`${op} task ${task} wait aborted`, { cause: err, context: { op, task } });
      }
    }
  }

  const deleteFile = async (spec: string) => {
    const s = await getSession();
    const res = await soapCall(
      'DeleteDatastoreFile_Task',
      `<vim25:DeleteDatastoreFile_Task>
        <vim25:_this type="FileManager">${escapeXml(s.content.fileManager)}</vim25:_this>
        <vim25:name>${escapeXml(spec)}</vim25:name>
        <vim25:datacenter type="Datacenter">${escapeXml(s.datacenter)}</vim25:datacenter>
      </vim25:DeleteDatastoreFile_Task>`,
      s.cookie,
    );
    const task = parseMoRefReturn(res.bodyText, 'DeleteDatastoreFile_Task');
    if (!task) {
      throw new MalformedResponseError('DeleteDatastoreFile_Task returned no task', {
        context: { op: 'DeleteDatastoreFile_Task' },
      });
    }
    await waitForTask(s, task, 'DeleteDatastoreFile_Task');
  };

  // MakeDirectory completes within the call; there is no task to wait for.
  const makeDirectory = async (spec: string, createParents = true) => {
    const s = await getSession();
    await soapCall(
      'MakeDirectory',
      `<vim25:MakeDirectory>
        <vim25:_this type="FileManager">${escapeXml(s.content.fileManager)}</vim25:_this>
        <vim25:name>${escapeXml(spec)}</vim25:name>
        <vim25:datacenter type="Datacenter">${escapeXml(s.datacenter)}</vim25:datacenter>
        <vim25:createParentDirectories>${createParents ? 'true' : 'false'}</vim25:createParentDirectories>
      </vim25:MakeDirectory>`,
      s.cookie,
    );
  };

  const close = async () => {
    if (!login) return;
    const { content, cookie } = login;
    login = undefined;
    try {
      await soapCall(
        'Logout',
        `<vim25:Logout>
          <vim25:_this type="SessionManager">${escapeXml(content.sessionManager)}</vim25:_this>
        </vim25:Logout>`,
        cookie,
      );
    } catch (err) {
      logger.error({
        event_type: 'soap.logout_failed',
        cause: err instanceof Error ? err.message : String(err),
      });
    }
  };

  return { deleteFile, makeDirectory, close };
}
