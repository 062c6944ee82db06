import { loadRuntimeEnv } from '@/lib/env/runtime';
import { toPublicError } from '@/lib/errors/error';
import { createLogger } from '@/lib/logging/logger';

import { ConfigError, VsphereFileError, extractMessage } from './errors';
import { createFolderClient } from './folder-client';
import { buildBaseUrl } from './paths';
import { reconcileDatastorePath } from './reconcile';
import { parseRequest } from './request';
import { createFileManagerClient } from './soap';

import type { RuntimeEnv } from '@/lib/env/runtime';
import type { HttpTransport } from './http';
import type { FailureFields, ReconcileResult, ReconcileSuccess, VsphereFileResponseV1 } from './types';

export type RunResult = { response: VsphereFileResponseV1; exitCode: number };

function successResponse(result: ReconcileSuccess): VsphereFileResponseV1 {
  return { schema_version: 'vsphere-file-response-v1', failed: false, ...result };
}

function failureResponse(fields: Partial<ReconcileResult> & FailureFields): VsphereFileResponseV1 {
  return { schema_version: 'vsphere-file-response-v1', failed: true, changed: false, ...fields };
}

function configFailure(err: unknown): RunResult {
  const error = err instanceof VsphereFileError ? err.toAppError() : toPublicError(err);
  return { response: failureResponse({ msg: extractMessage(err), errno: null, reason: null, error }), exitCode: 1 };
}

function loadEnv(source: Record<string, string | undefined>): RuntimeEnv | ConfigError {
  try {
    return loadRuntimeEnv(source);
  } catch (err) {
    return new ConfigError(`invalid environment: ${extractMessage(err)}`, { cause: err });
  }
}

export async function runVsphereFile(input: {
  stdinText: string;
  env?: Record<string, string | undefined>;
  transport?: HttpTransport;
  signal?: AbortSignal;
  logWrite?: (line: string) => void;
}): Promise<RunResult> {
  const env = loadEnv(input.env ?? process.env);
  if (env instanceof ConfigError) return configFailure(env);

  const logger = createLogger({
    level: env.VSPHERE_FILE_LOG_LEVEL,
    env: env.NODE_ENV,
    write: input.logWrite,
  });

  let raw: unknown;
  try {
    raw = JSON.parse(input.stdinText);
  } catch (err) {
    return configFailure(new ConfigError('invalid input json', { cause: err }));
  }

  let request: ReturnType<typeof parseRequest>;
  try {
    request = parseRequest(raw, env);
  } catch (err) {
    logger.error({ event_type: 'vsphere_file.failed', msg: extractMessage(err) });
    return configFailure(err);
  }

  const { params, checkMode } = request;
  logger.info({
    event_type: 'vsphere_file.start',
    host: params.host,
    datacenter: params.datacenter,
    datastore: params.datastore,
    path: params.path,
    state: params.state,
    check_mode: checkMode,
    validate_certs: params.validate_certs,
  });

  const timeoutMs = params.timeout * 1000;
  const folder = createFolderClient({
    username: params.username,
    password: params.password,
    timeoutMs,
    tlsVerify: params.validate_certs,
    transport: input.transport,
  });
  const fileManager = createFileManagerClient({
    baseUrl: buildBaseUrl(params.host, params.port),
    username: params.username,
    password: params.password,
    datacenter: params.datacenter,
    timeoutMs,
    tlsVerify: params.validate_certs,
    taskPollMs: env.VSPHERE_FILE_TASK_POLL_MS,
    taskTimeoutMs: env.VSPHERE_FILE_TASK_TIMEOUT_MS,
    signal: input.signal,
    transport: input.transport,
    logger,
  });

  try {
    const outcome = await reconcileDatastorePath({ params, checkMode, deps: { folder, fileManager, logger } });
    if (outcome.ok) return { response: successResponse(outcome.result), exitCode: 0 };
    return { response: failureResponse(outcome.failure), exitCode: 1 };
  } finally {
    await fileManager.close();
  }
}
