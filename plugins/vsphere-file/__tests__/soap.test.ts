import { createServer } from 'node:http';

import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest';

import { MalformedResponseError, MutationError } from '../errors';
import {
  createFileManagerClient,
  parseMoRefReturn,
  parseServiceContent,
  parseSoapFaultString,
  parseTaskInfo,
  toSdkEndpoint,
} from '../soap';

function envelope(inner: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<soapenv:Envelope xmlns:soapenv="http://schemas.xmlsoap.org/soap/envelope/" xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance">
  <soapenv:Body>${inner}</soapenv:Body>
</soapenv:Envelope>`;
}

const SERVICE_CONTENT = envelope(`
  <RetrieveServiceContentResponse xmlns="urn:vim25">
    <returnval>
      <rootFolder type="Folder">group-d1</rootFolder>
      <propertyCollector type="PropertyCollector">propertyCollector</propertyCollector>
      <searchIndex type="SearchIndex">SearchIndex</searchIndex>
      <sessionManager type="SessionManager">SessionManager</sessionManager>
      <fileManager type="FileManager">FileManager</fileManager>
    </returnval>
  </RetrieveServiceContentResponse>`);

function taskInfo(state: string, error?: string): string {
  const errorProp = error
    ? `<propSet><name>info.error</name><val xsi:type="LocalizedMethodFault"><fault xsi:type="FileLocked"></fault><localizedMessage>${error}</localizedMessage></val></propSet>`
    : '';
  return envelope(`
    <RetrievePropertiesExResponse xmlns="urn:vim25">
      <returnval>
        <objects>
          <obj type="Task">task-7</obj>
          <propSet><name>info.state</name><val xsi:type="TaskInfoState">${state}</val></propSet>
          ${errorProp}
        </objects>
      </returnval>
    </RetrievePropertiesExResponse>`);
}

function fault(message: string): string {
  return envelope(`
    <soapenv:Fault>
      <faultcode>ServerFaultCode</faultcode>
      <faultstring>${message}</faultstring>
    </soapenv:Fault>`);
}

describe('soap parsing', () => {
  it('parses service content references', () => {
    expect(parseServiceContent(SERVICE_CONTENT)).toEqual({
      sessionManager: 'SessionManager',
      propertyCollector: 'propertyCollector',
      searchIndex: 'SearchIndex',
      fileManager: 'FileManager',
    });
  });

  it('rejects service content without a file manager', () => {
    const xml = envelope(`
      <RetrieveServiceContentResponse xmlns="urn:vim25">
        <returnval><sessionManager type="SessionManager">SessionManager</sessionManager></returnval>
      </RetrieveServiceContentResponse>`);
    expect(() => parseServiceContent(xml)).toThrow(MalformedResponseError);
  });

  it('parses a managed object reference return value', () => {
    const xml = envelope(`
      <FindByInventoryPathResponse xmlns="urn:vim25">
        <returnval type="Datacenter">datacenter-2</returnval>
      </FindByInventoryPathResponse>`);
    expect(parseMoRefReturn(xml, 'FindByInventoryPath')).toBe('datacenter-2');
  });

  it('returns undefined for an empty return value', () => {
    const xml = envelope(`<FindByInventoryPathResponse xmlns="urn:vim25"></FindByInventoryPathResponse>`);
    expect(parseMoRefReturn(xml, 'FindByInventoryPath')).toBeUndefined();
  });

  it('parses task state and error message', () => {
    expect(parseTaskInfo(taskInfo('running'))).toEqual({ state: 'running' });
    expect(parseTaskInfo(taskInfo('error', 'file is locked'))).toEqual({
      state: 'error',
      errorMessage: 'file is locked',
    });
  });

  it('parses the fault string', () => {
    expect(parseSoapFaultString(fault('Permission to perform this operation was denied.'))).toBe(
      'Permission to perform this operation was denied.',
    );
    expect(parseSoapFaultString('not xml at all')).toBeUndefined();
  });

  it('appends /sdk to the endpoint once', () => {
    expect(toSdkEndpoint('https://vc.test/')).toBe('https://vc.test/sdk');
    expect(toSdkEndpoint('https://vc.test/sdk')).toBe('https://vc.test/sdk');
  });
});

type SoapCall = { op: string; body: string; cookie?: string };

function readTag(body: string, tag: string): string | undefined {
  return new RegExp(`<vim25:${tag}[^>]*>([^<]*)</vim25:${tag}>`).exec(body)?.[1];
}

describe('file manager client (mock vSphere SOAP)', () => {
  const calls: SoapCall[] = [];
  const taskPolls = new Map<string, number>();
  let endpoint = '';

  const server = createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      const body = Buffer.concat(chunks).toString('utf8');
      const op = /<vim25:(\w+)[\s>]/.exec(body)?.[1] ?? '';
      calls.push({ op, body, cookie: req.headers.cookie });
      res.setHeader('Content-Type', 'text/xml; charset=utf-8');

      const reply = (status: number, xml: string) => {
        res.statusCode = status;
        res.end(xml);
      };

      if (req.url !== '/sdk') return reply(404, '');
      if (op === 'RetrieveServiceContent') return reply(200, SERVICE_CONTENT);
      if (op === 'Login') {
        if (readTag(body, 'password') !== 'test-secret') {
          return reply(500, fault('Cannot complete login due to an incorrect user name or password.'));
        }
        res.setHeader('Set-Cookie', 'vmware_soap_session="session-1"; Path=/; HttpOnly');
        return reply(200, envelope('<LoginResponse xmlns="urn:vim25"><returnval></returnval></LoginResponse>'));
      }

      if (req.headers.cookie !== 'vmware_soap_session="session-1"') {
        return reply(500, fault('The session is not authenticated.'));
      }

      if (op === 'FindByInventoryPath') {
        const inner =
          readTag(body, 'inventoryPath') === 'DC1' ? '<returnval type="Datacenter">datacenter-2</returnval>' : '';
        return reply(
          200,
          envelope(`<FindByInventoryPathResponse xmlns="urn:vim25">${inner}</FindByInventoryPathResponse>`),
        );
      }
      if (op === 'DeleteDatastoreFile_Task') {
        const name = readTag(body, 'name') ?? '';
        const task = name.includes('locked') ? 'task-8' : name.includes('slow') ? 'task-9' : 'task-7';
        return reply(
          200,
          envelope(
            `<DeleteDatastoreFile_TaskResponse xmlns="urn:vim25"><returnval type="Task">${task}</returnval></DeleteDatastoreFile_TaskResponse>`,
          ),
        );
      }
      if (op === 'RetrievePropertiesEx') {
        const task = /<vim25:obj type="Task">([^<]*)</.exec(body)?.[1] ?? '';
        const polls = (taskPolls.get(task) ?? 0) + 1;
        taskPolls.set(task, polls);
        if (task === 'task-8') return reply(200, taskInfo('error', 'Unable to access file since it is locked'));
        if (task === 'task-9') return reply(200, taskInfo('running'));
        return reply(200, taskInfo(polls < 3 ? 'running' : 'success'));
      }
      if (op === 'MakeDirectory') {
        if ((readTag(body, 'name') ?? '').includes('denied')) {
          return reply(500, fault('Permission to perform this operation was denied.'));
        }
        return reply(200, envelope('<MakeDirectoryResponse xmlns="urn:vim25"></MakeDirectoryResponse>'));
      }
      if (op === 'Logout') return reply(200, envelope('<LogoutResponse xmlns="urn:vim25"></LogoutResponse>'));

      return reply(500, fault(`unexpected op ${op}`));
    });
  });

  beforeAll(async () => {
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('expected numeric address');
    endpoint = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  beforeEach(() => {
    calls.length = 0;
    taskPolls.clear();
  });

  type ClientOverrides = { password?: string; datacenter?: string; taskTimeoutMs?: number; signal?: AbortSignal };

  function client(overrides: ClientOverrides = {}) {
    return createFileManagerClient({
      baseUrl: endpoint,
      username: 'admin',
      password: overrides.password ?? 'test-secret',
      datacenter: overrides.datacenter ?? 'DC1',
      timeoutMs: 2000,
      tlsVerify: true,
      taskPollMs: 5,
      taskTimeoutMs: overrides.taskTimeoutMs,
      signal: overrides.signal,
    });
  }

  it('deletes a file and waits for the task to succeed', async () => {
    const fm = client();
    await fm.deleteFile('[datastore1] a/b');
    await fm.close();

    expect(calls.map((c) => c.op)).toEqual([
      'RetrieveServiceContent',
      'Login',
      'FindByInventoryPath',
      'DeleteDatastoreFile_Task',
      'RetrievePropertiesEx',
      'RetrievePropertiesEx',
      'RetrievePropertiesEx',
      'Logout',
    ]);
    const deleteCall = calls[3];
    expect(readTag(deleteCall?.body ?? '', 'name')).toBe('[datastore1] a/b');
    expect(readTag(deleteCall?.body ?? '', 'datacenter')).toBe('datacenter-2');
    expect(taskPolls.get('task-7')).toBe(3);
  });

  it('raises the task fault message when the delete task fails', async () => {
    const fm = client();
    const err = await fm.deleteFile('[datastore1] locked.vmdk').catch((e: unknown) => e);
    await fm.close();

    expect(err).toBeInstanceOf(MutationError);
    expect(err).toMatchObject({ message: 'Unable to access file since it is locked' });
  });

  it('gives up waiting after the task timeout', async () => {
    const fm = client({ taskTimeoutMs: 20 });
    const err = await fm.deleteFile('[datastore1] slow.vmdk').catch((e: unknown) => e);
    await fm.close();

    expect(err).toBeInstanceOf(MutationError);
    expect(err).toMatchObject({ message: 'DeleteDatastoreFile_Task task task-9 did not finish within 20ms' });
  });

  it('stops waiting when the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const fm = client({ signal: controller.signal });
    const err = await fm.deleteFile('[datastore1] slow.vmdk').catch((e: unknown) => e);
    await fm.close();

    expect(err).toBeInstanceOf(MutationError);
    expect(err).toMatchObject({ message: 'DeleteDatastoreFile_Task task task-9 wait aborted' });
  });

  it('creates a directory with parents and escapes the file specifier', async () => {
    const fm = client();
    await fm.makeDirectory('[R&D] iso/images', true);
    await fm.close();

    const mkdir = calls.find((c) => c.op === 'MakeDirectory');
    expect(readTag(mkdir?.body ?? '', 'name')).toBe('[R&amp;D] iso/images');
    expect(readTag(mkdir?.body ?? '', 'createParentDirectories')).toBe('true');
    expect(mkdir?.cookie).toBe('vmware_soap_session="session-1"');
  });

  it('surfaces SOAP faults from MakeDirectory', async () => {
    const fm = client();
    const err = await fm.makeDirectory('[datastore1] denied', true).catch((e: unknown) => e);
    await fm.close();

    expect(err).toBeInstanceOf(MutationError);
    expect(err).toMatchObject({
      message: 'MakeDirectory failed: Permission to perform this operation was denied.',
      status: 500,
    });
  });

  it('fails when the datacenter cannot be found, and still logs out', async () => {
    const fm = client({ datacenter: 'Nowhere' });
    const err = await fm.makeDirectory('[datastore1] x', true).catch((e: unknown) => e);
    await fm.close();

    expect(err).toBeInstanceOf(MutationError);
    expect(err).toMatchObject({ message: "datacenter 'Nowhere' not found" });
    expect(calls.map((c) => c.op)).toEqual(['RetrieveServiceContent', 'Login', 'FindByInventoryPath', 'Logout']);
  });

  it('reports login faults and skips logout', async () => {
    const fm = client({ password: 'wrong-secret' });
    const err = await fm.deleteFile('[datastore1] a/b').catch((e: unknown) => e);
    await fm.close();

    expect(err).toBeInstanceOf(MutationError);
    expect(err).toMatchObject({
      message: 'Login failed: Cannot complete login due to an incorrect user name or password.',
    });
    expect(calls.map((c) => c.op)).toEqual(['RetrieveServiceContent', 'Login']);
  });

  it('does not contact the server when nothing was requested', async () => {
    await client().close();
    expect(calls).toEqual([]);
  });
});
